/**
 * Step progress on the terminal
 *
 * The spinner only runs while a step is in flight; results go through the
 * run logger so they reach both the console and the log file.
 */

import ora from 'ora';
import type { StepOutcome } from '@dockhand/shared';
import type { DeployReporter, LoggerLike } from '@dockhand/deployment';

export type Spinner = Pick<ReturnType<typeof ora>, 'start' | 'stop'>;

export interface ReporterOptions {
  /** No spinner when false (non-TTY output, tests) */
  interactive?: boolean;
  spinner?: Spinner;
}

function seconds(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

export function createStepReporter(logger: LoggerLike, options: ReporterOptions = {}): DeployReporter {
  const interactive = options.interactive ?? Boolean(process.stdout.isTTY);
  const spinner: Spinner | null = interactive ? options.spinner ?? ora() : null;

  const settle = () => {
    spinner?.stop();
  };

  return {
    stage(title) {
      logger.debug(`${title}...`);
      spinner?.start(`${title}...`);
    },
    succeed(outcome: StepOutcome) {
      settle();
      logger.info(`${outcome.title}: ${outcome.output ?? 'done'} (${seconds(outcome.duration)})`);
    },
    warn(outcome: StepOutcome) {
      settle();
      logger.info(`${outcome.title}: ${outcome.output ?? 'done'} (${seconds(outcome.duration)})`);
      for (const warning of outcome.warnings) {
        logger.warn(warning);
      }
    },
    fail(outcome: StepOutcome) {
      settle();
      logger.error(`${outcome.title} failed: ${outcome.error ?? 'unknown error'}`);
    },
  };
}
