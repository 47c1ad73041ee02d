/**
 * @dockhand/logger - Winston Formats & Transports
 * Coloured console output plus a plain per-run log file
 */

import chalk from 'chalk';
import { format, transports } from 'winston';
import { maskSensitiveData, redactSecrets } from './sanitizer.js';

const TIMESTAMP_FORMAT = 'YYYY-MM-DD HH:mm:ss';

// ============================================================================
// Custom Formats
// ============================================================================

export function createRedactFormat(secrets: ReadonlySet<string>) {
  return format((info) => {
    const { level: _level, message, ...meta } = info;
    const masked = maskSensitiveData(meta);
    if (masked && typeof masked === 'object') {
      Object.assign(info, masked);
    }
    info.message = redactSecrets(String(message), secrets);
    return info;
  })();
}

function metaSuffix(meta: Record<string, unknown>): string {
  if (Object.keys(meta).length === 0) return '';
  return ` ${JSON.stringify(meta)}`;
}

export const consoleFormat = format.printf(({ timestamp, level, message, ...meta }) => {
  const text = `${String(message)}${metaSuffix(meta)}`;
  switch (level) {
    case 'error':
      return `${chalk.red('[ERROR]')} ${text}`;
    case 'warn':
      return `${chalk.yellow('[WARNING]')} ${text}`;
    case 'debug':
      return `${chalk.gray('[DEBUG]')} ${chalk.gray(text)}`;
    default:
      return `${chalk.green(`[${String(timestamp)}]`)} ${text}`;
  }
});

export const fileFormat = format.printf(({ timestamp, level, message, ...meta }) => {
  return `[${String(timestamp)}] [${level.toUpperCase()}] ${String(message)}${metaSuffix(meta)}`;
});

// ============================================================================
// Transport Factories
// ============================================================================

export function createConsoleTransport(level: string) {
  return new transports.Console({
    level,
    format: format.combine(format.timestamp({ format: TIMESTAMP_FORMAT }), consoleFormat),
  });
}

/** Per-run file; captures everything down to debug (command output lands here only) */
export function createRunFileTransport(filename: string) {
  return new transports.File({
    filename,
    level: 'debug',
    format: format.combine(format.timestamp({ format: TIMESTAMP_FORMAT }), fileFormat),
  });
}
