/**
 * dockhand - Commander Program Definition
 *
 * dockhand            deploy a repository to a server
 * dockhand --cleanup  remove a previous deployment
 */

import { Command } from 'commander';
import { CLI_NAME, getVersion } from '@dockhand/shared';
import { runCleanup } from './commands/cleanup.cmd.js';
import { runDeploy } from './commands/deploy.cmd.js';
import type { CleanupFlags } from './lib/prompts.js';

export { runDeploy } from './commands/deploy.cmd.js';
export { runCleanup } from './commands/cleanup.cmd.js';
export type { Prompter, CleanupFlags } from './lib/prompts.js';
export type { RunDeps } from './lib/context.js';

// ============================================================================
// Program Factory
// ============================================================================

interface ProgramOptions extends CleanupFlags {
  cleanup?: boolean;
}

export interface CliHandlers {
  deploy(): Promise<number>;
  cleanup(flags: CleanupFlags): Promise<number>;
}

const defaultHandlers: CliHandlers = {
  deploy: () => runDeploy(),
  cleanup: (flags) => runCleanup(flags),
};

export function createCLI(handlers: CliHandlers = defaultHandlers): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description('Deploy a containerized Git repository to a server over SSH, behind nginx')
    .version(getVersion())
    .option('--cleanup', 'Remove a previous deployment instead of deploying')
    .option('--app <name>', 'Application name (cleanup)')
    .option('--server <address>', 'Server address (cleanup)')
    .option('--user <username>', 'SSH username (cleanup)')
    .option('--key <path>', 'SSH private key path (cleanup)')
    .action(async (options: ProgramOptions) => {
      const { cleanup, ...flags } = options;
      process.exitCode = cleanup
        ? await handlers.cleanup(flags)
        : await handlers.deploy();
    });

  return program;
}
