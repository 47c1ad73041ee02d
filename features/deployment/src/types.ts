/**
 * Deployment feature - service contracts
 */

import type { CommandResult, StepOutcome } from '@dockhand/shared';

export interface LoggerLike {
  info(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

/** Progress callbacks; the CLI drives a spinner with these */
export interface DeployReporter {
  stage(title: string): void;
  succeed(outcome: StepOutcome): void;
  warn(outcome: StepOutcome): void;
  fail(outcome: StepOutcome): void;
}

export interface LocalRunOptions {
  cwd?: string;
  timeout?: number;
}

export interface LocalRunner {
  run(file: string, args: readonly string[], options?: LocalRunOptions): Promise<CommandResult>;
}

export interface PipelineConfig {
  workDir: string;
  sshPort: number;
  connectTimeoutMs: number;
  commandTimeoutMs: number;
  settleSeconds: number;
}

export const silentReporter: DeployReporter = {
  stage: () => undefined,
  succeed: () => undefined,
  warn: () => undefined,
  fail: () => undefined,
};
