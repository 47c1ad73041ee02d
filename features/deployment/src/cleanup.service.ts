/**
 * CleanupService - tear down everything a deployment created
 *
 * All remote operations are best-effort; only failing to connect is fatal.
 */

import type { CleanupResult, CleanupTarget } from '@dockhand/shared';
import { withSession, type RemoteConnector } from '@dockhand/ssh';
import { cleanupOperations, failedCheckWarning, runOperation } from './operations/index.js';
import { sshConfigFor } from './parameters.js';
import { runPipeline, type PipelineStep } from './pipeline.js';
import { RepositoryService } from './repository.service.js';
import type { DeployReporter, LocalRunner, LoggerLike, PipelineConfig } from './types.js';
import { silentReporter } from './types.js';

export interface CleanupServiceDeps {
  local: LocalRunner;
  connect: RemoteConnector;
  logger: LoggerLike;
  config: PipelineConfig;
  reporter?: DeployReporter;
}

export class CleanupService {
  private readonly repository: RepositoryService;
  private readonly reporter: DeployReporter;

  constructor(private readonly deps: CleanupServiceDeps) {
    this.repository = new RepositoryService(deps.local, deps.logger, deps.config.workDir);
    this.reporter = deps.reporter ?? silentReporter;
  }

  async execute(target: CleanupTarget): Promise<CleanupResult> {
    const startTime = Date.now();
    const run = await runPipeline(this.pipeline(), target, this.reporter, this.deps.logger);

    return {
      success: run.success,
      appName: target.appName,
      serverAddress: target.serverAddress,
      steps: run.steps,
      duration: Date.now() - startTime,
      error: run.error,
    };
  }

  private pipeline(): PipelineStep<CleanupTarget>[] {
    return [
      {
        name: 'remote_cleanup',
        title: 'Removing remote resources',
        run: async (target) => {
          const { config, logger } = this.deps;
          const warnings: string[] = [];
          const operations = cleanupOperations(target.appName);

          await withSession(this.deps.connect, sshConfigFor(target, config.sshPort), async (shell) => {
            for (const operation of operations) {
              const result = await runOperation(shell, operation, logger, { timeout: config.commandTimeoutMs });
              if (!result.ok) warnings.push(failedCheckWarning(result));
            }
          }, { readyTimeout: config.connectTimeoutMs });

          return { output: `Ran ${operations.length} cleanup operations on ${target.serverAddress}`, warnings };
        },
      },
      {
        name: 'local_cleanup',
        title: 'Removing local clone',
        run: async (target) => {
          const removed = await this.repository.remove(target.appName);
          return {
            output: removed
              ? `Removed ${this.repository.clonePath(target.appName)}`
              : 'No local clone found',
          };
        },
      },
    ];
  }
}
