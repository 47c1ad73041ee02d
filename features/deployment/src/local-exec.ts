/**
 * Local command execution (git)
 *
 * Arguments are passed as an argv array, never through a shell, so the
 * authenticated clone URL needs no quoting.
 */

import { execFile } from 'node:child_process';
import type { CommandResult } from '@dockhand/shared';
import type { LocalRunner, LocalRunOptions } from './types.js';

export class LocalExec implements LocalRunner {
  async run(file: string, args: readonly string[], options: LocalRunOptions = {}): Promise<CommandResult> {
    const { cwd, timeout = 600000 } = options;
    const startTime = Date.now();

    return new Promise((resolve, reject) => {
      execFile(file, args, {
        cwd,
        timeout,
        maxBuffer: 10 * 1024 * 1024, // 10MB
        env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
      }, (error, stdout, stderr) => {
        if (error && error.killed) {
          reject(new Error(`Command timed out after ${timeout}ms`));
          return;
        }

        resolve({
          stdout: stdout || '',
          stderr: stderr || (error && typeof error.code !== 'number' ? error.message : ''),
          code: error ? (typeof error.code === 'number' ? error.code : 1) : 0,
          duration: Date.now() - startTime,
        });
      });
    });
  }
}
