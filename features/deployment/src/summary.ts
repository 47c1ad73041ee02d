/**
 * Post-deploy summary with copy-paste diagnostics
 */

import type { DeploymentPlan } from '@dockhand/shared';
import { CLI_NAME } from '@dockhand/shared';
import { shellQuote } from '@dockhand/ssh';

const RULE = '='.repeat(42);

export function sshCommand(plan: DeploymentPlan, remoteCommand: string): string {
  const { sshKeyPath, sshUser, serverAddress } = plan.params;
  return `ssh -i ${shellQuote(sshKeyPath)} ${sshUser}@${serverAddress} '${remoteCommand}'`;
}

export function logsCommand(plan: DeploymentPlan): string {
  return plan.deploymentType === 'compose'
    ? `cd ~/${plan.remoteDir} && docker-compose logs`
    : `docker logs ${plan.params.appName}`;
}

export function cleanupCommand(plan: DeploymentPlan): string {
  const { appName, serverAddress, sshUser, sshKeyPath } = plan.params;
  return [
    CLI_NAME,
    '--cleanup',
    `--app ${shellQuote(appName)}`,
    `--server ${shellQuote(serverAddress)}`,
    `--user ${shellQuote(sshUser)}`,
    `--key ${shellQuote(sshKeyPath)}`,
  ].join(' ');
}

export function buildSummaryLines(plan: DeploymentPlan, logFile: string): string[] {
  const { appName, serverAddress } = plan.params;
  return [
    RULE,
    'DEPLOYMENT SUCCESSFUL',
    RULE,
    `Application: ${appName}`,
    `Server: ${serverAddress}`,
    `Deployment type: ${plan.deploymentType === 'compose' ? 'multi-container (docker-compose)' : 'single-container (Dockerfile)'}`,
    `Access your application at: http://${serverAddress}`,
    `Check logs at: ${logFile}`,
    '',
    'Useful commands:',
    `  Check status: ${sshCommand(plan, 'docker ps')}`,
    `  View logs:    ${sshCommand(plan, logsCommand(plan))}`,
    `  Cleanup:      ${cleanupCommand(plan)}`,
    RULE,
  ];
}
