/**
 * Interactive parameter collection
 *
 * Each answer is checked as soon as it is given; the first invalid one ends
 * the run before anything touches the network or the filesystem.
 */

import { cancel, isCancel, password, text } from '@clack/prompts';
import { pathExists } from 'fs-extra';
import type { ZodType, ZodTypeDef } from 'zod';
import type { CleanupTarget, DeploymentParameters } from '@dockhand/shared';
import {
  CancelledError,
  DEFAULT_BRANCH,
  DEFAULT_SSH_KEY_PATH,
  ValidationError,
  cleanupTargetSchema,
  deploymentParametersSchema,
} from '@dockhand/shared';
import { deriveAppName, expandHome } from '@dockhand/deployment';

// ============================================================================
// Prompter
// ============================================================================

export interface TextOptions {
  placeholder?: string;
  defaultValue?: string;
}

export interface Prompter {
  text(message: string, options?: TextOptions): Promise<string>;
  password(message: string): Promise<string>;
}

function cancelled(): never {
  cancel('Operation cancelled');
  throw new CancelledError();
}

export const clackPrompter: Prompter = {
  async text(message, options = {}) {
    const value = await text({ message, ...options });
    if (isCancel(value)) cancelled();
    return value ?? '';
  },
  async password(message) {
    const value = await password({ message });
    if (isCancel(value)) cancelled();
    return value ?? '';
  },
};

// ============================================================================
// Checks
// ============================================================================

export interface CollectOptions {
  home?: string;
  keyExists?: (path: string) => Promise<boolean>;
}

const deployFields = deploymentParametersSchema.shape;
const cleanupFields = cleanupTargetSchema.shape;

function check<T, I>(schema: ZodType<T, ZodTypeDef, I>, value: I): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues[0].message);
  }
  return parsed.data;
}

async function keyPath(value: string, options: CollectOptions): Promise<string> {
  const path = expandHome(check(deployFields.sshKeyPath, value.trim() || DEFAULT_SSH_KEY_PATH), options.home);
  const exists = options.keyExists ?? ((candidate: string) => pathExists(candidate));
  if (!(await exists(path))) {
    throw new ValidationError(`SSH key not found at ${path}`);
  }
  return path;
}

function appNameFrom(repoUrl: string): string {
  return check(deployFields.appName, deriveAppName(repoUrl));
}

// ============================================================================
// Collectors
// ============================================================================

export async function collectDeploymentParameters(
  prompter: Prompter,
  options: CollectOptions = {},
): Promise<DeploymentParameters> {
  const repoUrl = check(
    deployFields.repoUrl,
    await prompter.text('Git repository URL', { placeholder: 'https://github.com/org/app.git' }),
  );
  const appName = appNameFrom(repoUrl);
  const token = check(deployFields.token, await prompter.password('Personal access token'));
  const branch = check(
    deployFields.branch,
    (await prompter.text('Branch', { placeholder: DEFAULT_BRANCH, defaultValue: DEFAULT_BRANCH })).trim() || undefined,
  );
  const sshUser = check(deployFields.sshUser, await prompter.text('SSH username'));
  const serverAddress = check(deployFields.serverAddress, await prompter.text('Server address'));
  const sshKeyPath = await keyPath(
    await prompter.text('SSH key path', { placeholder: DEFAULT_SSH_KEY_PATH, defaultValue: DEFAULT_SSH_KEY_PATH }),
    options,
  );
  const appPort = check(deployFields.appPort, await prompter.text('Application port', { placeholder: '3000' }));

  return { repoUrl, token, branch, sshUser, serverAddress, sshKeyPath, appPort, appName };
}

export interface CleanupFlags {
  app?: string;
  server?: string;
  user?: string;
  key?: string;
}

/** Flags win; anything missing is prompted for */
export async function collectCleanupTarget(
  prompter: Prompter,
  flags: CleanupFlags = {},
  options: CollectOptions = {},
): Promise<CleanupTarget> {
  const serverAddress = check(cleanupFields.serverAddress, flags.server ?? await prompter.text('Server address'));
  const sshUser = check(cleanupFields.sshUser, flags.user ?? await prompter.text('SSH username'));
  const sshKeyPath = await keyPath(
    flags.key ?? await prompter.text('SSH key path', { placeholder: DEFAULT_SSH_KEY_PATH, defaultValue: DEFAULT_SSH_KEY_PATH }),
    options,
  );
  const appName = check(cleanupFields.appName, flags.app ?? await prompter.text('Application name'));

  return { serverAddress, sshUser, sshKeyPath, appName };
}
