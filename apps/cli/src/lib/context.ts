/**
 * Per-invocation wiring shared by both run modes
 */

import chalk from 'chalk';
import { LocalExec, type LocalRunner } from '@dockhand/deployment';
import { createRunLogger, type RunLogger, type RunMode } from '@dockhand/logger';
import { getVersion, loadConfig, type DockhandConfig } from '@dockhand/shared';
import { connectSession, type RemoteConnector } from '@dockhand/ssh';
import type { CollectOptions, Prompter } from './prompts.js';
import { clackPrompter } from './prompts.js';

export interface RunDeps {
  prompter?: Prompter;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  connect?: RemoteConnector;
  local?: LocalRunner;
  /** Spinner and banner; defaults to whether stdout is a TTY */
  interactive?: boolean;
  collect?: CollectOptions;
}

export interface RunContext {
  config: DockhandConfig;
  run: RunLogger;
  prompter: Prompter;
  connect: RemoteConnector;
  local: LocalRunner;
  interactive: boolean;
}

export function createRunContext(mode: RunMode, deps: RunDeps = {}): RunContext {
  const config = loadConfig(deps.env, deps.cwd);
  const run = createRunLogger({ logDir: config.logDir, mode, level: config.logLevel });

  return {
    config,
    run,
    prompter: deps.prompter ?? clackPrompter,
    connect: deps.connect ?? connectSession,
    local: deps.local ?? new LocalExec(),
    interactive: deps.interactive ?? Boolean(process.stdout.isTTY),
  };
}

export function printBanner(title: string): void {
  console.log(chalk.cyan.bold('\n+===============================================+'));
  console.log(chalk.cyan.bold(`|   ${`${title} v${getVersion()}`.padEnd(44)}|`));
  console.log(chalk.cyan.bold('+===============================================+\n'));
}
