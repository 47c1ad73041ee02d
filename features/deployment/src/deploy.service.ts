/**
 * DeployService - Git repository to a running container behind nginx
 *
 * Pipeline:
 * 1. clone_repository -> 2. detect_deployment_type -> 3. test_connection
 * 4. provision_remote -> 5. transfer_files -> 6. deploy_application
 * 7. configure_proxy -> 8. validate_deployment
 *
 * Every remote step opens its own SSH session.
 */

import type {
  DeployResult,
  DeploymentParameters,
  DeploymentPlan,
  OperationResult,
  RemoteOperation,
} from '@dockhand/shared';
import { TRANSFER_EXCLUDES } from '@dockhand/shared';
import { withSession, type RemoteConnector, type RemoteShell } from '@dockhand/ssh';
import { detectDeploymentType } from './detect.js';
import { sshConfigFor } from './parameters.js';
import { conflictingSites } from './nginx.js';
import {
  activateSite,
  addUserToDockerGroup,
  checkConnectivity,
  deployApplication,
  failedCheckWarning,
  installPackages,
  listEnabledSites,
  remoteDeployDir,
  runOperation,
  validationChecks,
} from './operations/index.js';
import { runPipeline, type PipelineStep } from './pipeline.js';
import { RepositoryService } from './repository.service.js';
import type { DeployReporter, LocalRunner, LoggerLike, PipelineConfig } from './types.js';
import { silentReporter } from './types.js';

export interface DeployServiceDeps {
  local: LocalRunner;
  connect: RemoteConnector;
  logger: LoggerLike;
  config: PipelineConfig;
  reporter?: DeployReporter;
}

interface DeployState {
  params: DeploymentParameters;
  projectPath?: string;
  plan?: DeploymentPlan;
}

export class DeployService {
  private readonly repository: RepositoryService;
  private readonly reporter: DeployReporter;

  constructor(private readonly deps: DeployServiceDeps) {
    this.repository = new RepositoryService(deps.local, deps.logger, deps.config.workDir);
    this.reporter = deps.reporter ?? silentReporter;
  }

  async execute(params: DeploymentParameters): Promise<DeployResult> {
    const startTime = Date.now();
    const state: DeployState = { params };

    this.deps.logger.debug(`Deploying ${params.repoUrl} (${params.branch}) to ${params.serverAddress}`);
    const run = await runPipeline(this.pipeline(), state, this.reporter, this.deps.logger);

    return {
      success: run.success,
      appName: params.appName,
      serverAddress: params.serverAddress,
      accessUrl: `http://${params.serverAddress}`,
      deploymentType: state.plan?.deploymentType,
      plan: state.plan,
      steps: run.steps,
      duration: Date.now() - startTime,
      error: run.error,
    };
  }

  private pipeline(): PipelineStep<DeployState>[] {
    return [
      {
        name: 'clone_repository',
        title: 'Cloning repository',
        run: async (state) => {
          const { projectPath, warnings } = await this.repository.clone(state.params);
          state.projectPath = projectPath;
          return { output: `Cloned branch ${state.params.branch} into ${projectPath}`, warnings };
        },
      },
      {
        name: 'detect_deployment_type',
        title: 'Detecting deployment type',
        run: async (state) => {
          const projectPath = requireValue(state.projectPath, 'project path');
          const { deploymentType, descriptor } = await detectDeploymentType(projectPath);
          state.plan = {
            params: state.params,
            deploymentType,
            projectPath,
            remoteDir: remoteDeployDir(state.params.appName),
            imageName: state.params.appName.toLowerCase(),
          };
          const kind = deploymentType === 'compose' ? 'multi-container' : 'single-container';
          return { output: `Found ${descriptor}: ${kind} deployment` };
        },
      },
      {
        name: 'test_connection',
        title: 'Testing SSH connection',
        run: async (state) => {
          await this.inSession(state.params, (shell) => this.run(shell, checkConnectivity()));
          return { output: 'SSH connection successful' };
        },
      },
      {
        name: 'provision_remote',
        title: 'Setting up remote environment',
        run: async (state) => {
          const warnings: string[] = [];
          await this.inSession(state.params, async (shell) => {
            await this.run(shell, installPackages());
            const group = await this.run(shell, addUserToDockerGroup());
            if (!group.ok) {
              warnings.push(`Could not add ${state.params.sshUser} to the docker group (${failedCheckWarning(group)})`);
            }
          });
          return { output: 'Remote environment ready', warnings };
        },
      },
      {
        name: 'transfer_files',
        title: 'Transferring files',
        run: async (state) => {
          const plan = requireValue(state.plan, 'deployment plan');
          const summary = await this.inSession(state.params, (shell) =>
            shell.upload(plan.projectPath, plan.remoteDir, { exclude: TRANSFER_EXCLUDES }),
          );
          const links = summary.links > 0 ? ` and ${summary.links} links` : '';
          return {
            output: `Transferred ${summary.files} files (${summary.bytes} bytes)${links} to ~/${plan.remoteDir}`,
          };
        },
      },
      {
        name: 'deploy_application',
        title: 'Building and starting containers',
        run: async (state) => {
          const plan = requireValue(state.plan, 'deployment plan');
          await this.inSession(state.params, (shell) =>
            this.run(shell, deployApplication(plan, this.deps.config.settleSeconds)),
          );
          return {
            output: plan.deploymentType === 'compose'
              ? 'Compose stack started'
              : `Container ${plan.params.appName} running on port ${plan.params.appPort}`,
          };
        },
      },
      {
        name: 'configure_proxy',
        title: 'Configuring nginx',
        run: async (state) => {
          const { appName, appPort } = state.params;
          const warnings: string[] = [];
          await this.inSession(state.params, async (shell) => {
            const listing = await this.run(shell, listEnabledSites());
            const others = conflictingSites(splitLines(listing.result.stdout), appName);
            if (others.length > 0) {
              warnings.push(`Other enabled nginx sites also listen on port 80: ${others.join(', ')}`);
            }
            await this.run(shell, activateSite(appName, appPort));
          });
          return { output: `Proxy site ${appName} forwards / to localhost:${appPort}`, warnings };
        },
      },
      {
        name: 'validate_deployment',
        title: 'Validating deployment',
        run: async (state) => {
          const plan = requireValue(state.plan, 'deployment plan');
          const warnings: string[] = [];
          await this.inSession(state.params, async (shell) => {
            for (const check of validationChecks(plan)) {
              const result = await this.run(shell, check);
              if (!result.ok) warnings.push(failedCheckWarning(result));
            }
          });
          return { output: 'Services are running', warnings };
        },
      },
    ];
  }

  private inSession<T>(params: DeploymentParameters, fn: (shell: RemoteShell) => Promise<T>): Promise<T> {
    const { config } = this.deps;
    return withSession(this.deps.connect, sshConfigFor(params, config.sshPort), fn, {
      readyTimeout: config.connectTimeoutMs,
    });
  }

  private run(shell: RemoteShell, operation: RemoteOperation): Promise<OperationResult> {
    return runOperation(shell, operation, this.deps.logger, { timeout: this.deps.config.commandTimeoutMs });
  }
}

function requireValue<T>(value: T | undefined, what: string): T {
  if (value === undefined) {
    throw new Error(`Pipeline state is missing the ${what}`);
  }
  return value;
}

function splitLines(text: string): string[] {
  return text.split('\n').map((line) => line.trim()).filter(Boolean);
}
