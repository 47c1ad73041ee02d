/**
 * @dockhand/shared - Runtime Configuration
 *
 * Tool behaviour comes from the environment. Deployment inputs never do:
 * those are always prompted for.
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';

const configSchema = z.object({
  logLevel: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  logDir: z.string().min(1),
  workDir: z.string().min(1),
  sshPort: z.coerce.number().int().min(1).max(65535).default(22),
  connectTimeoutMs: z.coerce.number().int().positive().default(10_000),
  commandTimeoutMs: z.coerce.number().int().positive().default(1_800_000),
  settleSeconds: z.coerce.number().int().min(0).default(10),
});

export type DockhandConfig = z.infer<typeof configSchema>;

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): DockhandConfig {
  const parsed = configSchema.safeParse({
    logLevel: env.LOG_LEVEL || undefined,
    logDir: env.DOCKHAND_LOG_DIR || cwd,
    workDir: env.DOCKHAND_WORKDIR || cwd,
    sshPort: env.DOCKHAND_SSH_PORT || undefined,
    connectTimeoutMs: env.DOCKHAND_CONNECT_TIMEOUT_MS || undefined,
    commandTimeoutMs: env.DOCKHAND_COMMAND_TIMEOUT_MS || undefined,
    settleSeconds: env.DOCKHAND_SETTLE_SECONDS || undefined,
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(
      `Invalid configuration: ${issue.path.join('.')}: ${issue.message}`,
      { issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`) },
    );
  }

  return parsed.data;
}
