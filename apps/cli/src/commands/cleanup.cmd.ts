/**
 * dockhand - Cleanup Mode
 *
 * Removes the container, image, remote files, nginx site and local clone.
 */

import { CleanupService } from '@dockhand/deployment';
import { errorMessage } from '@dockhand/shared';
import { createRunContext, printBanner, type RunDeps } from '../lib/context.js';
import { collectCleanupTarget, type CleanupFlags } from '../lib/prompts.js';
import { createStepReporter } from '../lib/reporter.js';

// ============================================================================
// Cleanup Action
// ============================================================================

/** @returns the process exit code */
export async function runCleanup(flags: CleanupFlags = {}, deps: RunDeps = {}): Promise<number> {
  const ctx = createRunContext('cleanup', deps);
  const { logger } = ctx.run;

  try {
    if (ctx.interactive) printBanner('dockhand cleanup');
    logger.info('Starting cleanup');
    logger.info(`Log file: ${ctx.run.logFile}`);

    const target = await collectCleanupTarget(ctx.prompter, flags, deps.collect);

    const service = new CleanupService({
      local: ctx.local,
      connect: ctx.connect,
      logger,
      config: ctx.config,
      reporter: createStepReporter(logger, { interactive: ctx.interactive }),
    });
    const result = await service.execute(target);

    if (!result.success) {
      logger.error(`Cleanup failed: ${result.error ?? 'unknown error'}`);
      return 1;
    }

    logger.info(`Cleanup of ${target.appName} on ${target.serverAddress} completed`);
    return 0;
  } catch (error) {
    logger.error(errorMessage(error));
    return 1;
  } finally {
    await ctx.run.close();
  }
}
