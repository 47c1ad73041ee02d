/**
 * dockhand - Deploy Mode
 *
 * Prompt for parameters, run the pipeline, print the summary.
 */

import chalk from 'chalk';
import { DeployService, buildSummaryLines } from '@dockhand/deployment';
import { errorMessage } from '@dockhand/shared';
import { createRunContext, printBanner, type RunDeps } from '../lib/context.js';
import { collectDeploymentParameters } from '../lib/prompts.js';
import { createStepReporter } from '../lib/reporter.js';

// ============================================================================
// Deploy Action
// ============================================================================

/** @returns the process exit code */
export async function runDeploy(deps: RunDeps = {}): Promise<number> {
  const ctx = createRunContext('deploy', deps);
  const { logger } = ctx.run;

  try {
    if (ctx.interactive) printBanner('dockhand deploy');
    logger.info('Starting deployment');
    logger.info(`Log file: ${ctx.run.logFile}`);

    const params = await collectDeploymentParameters(ctx.prompter, deps.collect);
    ctx.run.registerSecret(params.token);
    logger.info(`Application name: ${params.appName}`);

    const service = new DeployService({
      local: ctx.local,
      connect: ctx.connect,
      logger,
      config: ctx.config,
      reporter: createStepReporter(logger, { interactive: ctx.interactive }),
    });
    const result = await service.execute(params);

    if (!result.success || !result.plan) {
      logger.error(`Deployment failed: ${result.error ?? 'unknown error'}`);
      return 1;
    }

    console.log('');
    for (const line of buildSummaryLines(result.plan, ctx.run.logFile)) {
      console.log(line.startsWith('=') || line === 'DEPLOYMENT SUCCESSFUL' ? chalk.green.bold(line) : line);
      logger.debug(line);
    }
    return 0;
  } catch (error) {
    logger.error(errorMessage(error));
    return 1;
  } finally {
    await ctx.run.close();
  }
}
