/**
 * @dockhand/logger - Run Logging
 *
 * One logger per invocation:
 * - console output at LOG_LEVEL, coloured
 * - a timestamped file (<mode>_YYYYMMDD_HHMMSS.log) with every record
 * - registered secrets redacted from both
 */

import { join } from 'node:path';
import { ensureDirSync } from 'fs-extra';
import { createLogger, type Logger } from 'winston';
import {
  createConsoleTransport,
  createRunFileTransport,
  createRedactFormat,
} from './transports.js';

export { SENSITIVE_KEYS, maskSensitiveData, redactSecrets } from './sanitizer.js';

export type RunMode = 'deploy' | 'cleanup';

export interface RunLoggerOptions {
  logDir: string;
  mode?: RunMode;
  level?: string;
  startedAt?: Date;
  console?: boolean;
}

export interface RunLogger {
  logger: Logger;
  logFile: string;
  registerSecret(secret: string): void;
  close(): Promise<void>;
}

const pad = (n: number) => String(n).padStart(2, '0');

export function logFileName(mode: RunMode, date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${mode}_${day}_${time}.log`;
}

export function createRunLogger(options: RunLoggerOptions): RunLogger {
  const {
    logDir,
    mode = 'deploy',
    level = process.env.LOG_LEVEL || 'info',
    startedAt = new Date(),
  } = options;

  ensureDirSync(logDir);
  const logFile = join(logDir, logFileName(mode, startedAt));
  const secrets = new Set<string>();
  const fileTransport = createRunFileTransport(logFile);

  const logger = createLogger({
    level: 'debug',
    format: createRedactFormat(secrets),
    transports: [fileTransport],
  });

  if (options.console !== false) {
    logger.add(createConsoleTransport(level));
  }

  let closed: Promise<void> | null = null;

  return {
    logger,
    logFile,
    registerSecret(secret: string) {
      if (secret) secrets.add(secret);
    },
    close() {
      if (!closed) {
        closed = new Promise<void>((resolve) => {
          fileTransport.on('finish', () => resolve());
          logger.end();
        });
      }
      return closed;
    },
  };
}
