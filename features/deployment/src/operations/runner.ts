/**
 * Executes RemoteOperations on an open shell
 */

import type { CommandResult, OperationResult, RemoteOperation } from '@dockhand/shared';
import { RemoteCommandError, errorMessage } from '@dockhand/shared';
import type { RemoteShell } from '@dockhand/ssh';
import type { LoggerLike } from '../types.js';

export interface RunOperationOptions {
  timeout: number;
}

/**
 * Output goes to the debug log. A failing fatal operation throws;
 * a failing warning operation is returned with `ok: false`, including
 * one whose command timed out or lost its session.
 */
export async function runOperation(
  shell: RemoteShell,
  operation: RemoteOperation,
  logger: LoggerLike,
  options: RunOperationOptions,
): Promise<OperationResult> {
  logger.debug(`[${shell.host}] ${operation.name}: ${operation.description}`);

  const startTime = Date.now();
  let result: CommandResult;
  try {
    result = await shell.runScript(operation.script, { timeout: options.timeout });
  } catch (error) {
    if (operation.severity === 'fatal') {
      throw error;
    }
    const message = errorMessage(error);
    logger.debug(`  ${operation.name} | ${message}`);
    return {
      operation: operation.name,
      ok: false,
      severity: operation.severity,
      result: { stdout: '', stderr: message, code: -1, duration: Date.now() - startTime },
      error: message,
    };
  }
  logOutput(logger, operation.name, result.stdout);
  logOutput(logger, operation.name, result.stderr);

  const ok = result.code === 0;
  if (!ok && operation.severity === 'fatal') {
    throw new RemoteCommandError(operation.name, result.code, result.stderr);
  }

  return { operation: operation.name, ok, severity: operation.severity, result };
}

function logOutput(logger: LoggerLike, name: string, text: string): void {
  for (const line of text.split('\n')) {
    if (line.trim()) {
      logger.debug(`  ${name} | ${line}`);
    }
  }
}

export function failedCheckWarning(result: OperationResult): string {
  if (result.error) {
    return `${result.operation} failed: ${result.error}`;
  }
  return `${result.operation} failed (exit code ${result.result.code})`;
}
