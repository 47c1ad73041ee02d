/**
 * Ordered step execution
 *
 * Steps run one after another. A throw fails the step and every later step
 * is recorded as skipped; warnings are collected and the run continues.
 */

import type { StepName, StepOutcome } from '@dockhand/shared';
import { errorMessage } from '@dockhand/shared';
import type { DeployReporter, LoggerLike } from './types.js';

export interface StepReport {
  output?: string;
  warnings?: string[];
}

export interface PipelineStep<S> {
  name: StepName;
  title: string;
  run(state: S): Promise<StepReport>;
}

export interface PipelineRun {
  success: boolean;
  steps: StepOutcome[];
  error?: string;
}

export async function runPipeline<S>(
  pipeline: readonly PipelineStep<S>[],
  state: S,
  reporter: DeployReporter,
  logger: LoggerLike,
): Promise<PipelineRun> {
  const steps: StepOutcome[] = [];

  for (const [index, step] of pipeline.entries()) {
    reporter.stage(step.title);
    const stepStart = Date.now();

    try {
      const report = await step.run(state);
      const warnings = report.warnings ?? [];
      const outcome: StepOutcome = {
        name: step.name,
        title: step.title,
        status: warnings.length > 0 ? 'warning' : 'success',
        duration: Date.now() - stepStart,
        output: report.output,
        warnings,
      };
      steps.push(outcome);

      if (outcome.status === 'warning') {
        reporter.warn(outcome);
      } else {
        reporter.succeed(outcome);
      }
    } catch (error) {
      const outcome: StepOutcome = {
        name: step.name,
        title: step.title,
        status: 'failed',
        duration: Date.now() - stepStart,
        error: errorMessage(error),
        warnings: [],
      };
      steps.push(outcome);
      if (error instanceof Error && error.stack) {
        logger.debug(error.stack);
      }
      reporter.fail(outcome);

      for (const skipped of pipeline.slice(index + 1)) {
        steps.push({ name: skipped.name, title: skipped.title, status: 'skipped', duration: 0, warnings: [] });
      }
      return { success: false, steps, error: outcome.error };
    }
  }

  return { success: true, steps };
}
