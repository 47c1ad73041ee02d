/**
 * Post-deploy checks
 */

import type { DeploymentPlan, RemoteOperation } from '@dockhand/shared';

export function serviceActive(service: 'docker' | 'nginx'): RemoteOperation {
  return {
    name: `${service}_active`,
    description: `Check the ${service} service is active`,
    severity: 'fatal',
    idempotency: 'safe',
    script: `systemctl is-active ${service}`,
  };
}

export function containersUp(plan: DeploymentPlan): RemoteOperation {
  if (plan.deploymentType === 'compose') {
    return {
      name: 'stack_up',
      description: 'Check the compose services are up',
      severity: 'warning',
      idempotency: 'safe',
      script: `cd ~/${plan.remoteDir} && docker-compose ps | grep -i 'up'`,
    };
  }
  return {
    name: 'container_up',
    description: 'Check the application container is running',
    severity: 'fatal',
    idempotency: 'safe',
    script: `docker ps --format '{{.Names}}' | grep -Fx ${plan.params.appName}`,
  };
}

/** Application port first, then the proxy on port 80 */
export function httpCheck(appPort: number): RemoteOperation {
  return {
    name: 'http_check',
    description: 'Request the application over HTTP',
    severity: 'warning',
    idempotency: 'safe',
    script: `curl -fsS --max-time 10 -o /dev/null http://localhost:${appPort} || curl -fsS --max-time 10 -o /dev/null http://localhost`,
  };
}

export function validationChecks(plan: DeploymentPlan): RemoteOperation[] {
  return [
    serviceActive('docker'),
    containersUp(plan),
    serviceActive('nginx'),
    httpCheck(plan.params.appPort),
  ];
}
