#!/usr/bin/env tsx
/**
 * dockhand - Entry Point
 */

import chalk from 'chalk';
import { createCLI } from '../src/index.js';

async function main(): Promise<void> {
  await createCLI().parseAsync(process.argv);
}

main().catch((err: unknown) => {
  console.error(chalk.red('Fatal:'), err instanceof Error ? err.message : String(err));
  if (err instanceof Error && err.stack) {
    console.error(chalk.gray(err.stack));
  }
  process.exit(1);
});
