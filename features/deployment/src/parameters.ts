/**
 * Parameter derivation helpers
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import type { SSHConfig } from '@dockhand/shared';
import { ValidationError } from '@dockhand/shared';

/**
 * Application name = last path segment of the repository URL without `.git`.
 * https://host/org/app.git -> app
 */
export function deriveAppName(repoUrl: string): string {
  const path = repoUrl.trim().replace(/[?#].*$/, '').replace(/\/+$/, '');
  const segment = path.split(/[/:]/).pop() ?? '';
  const name = segment.replace(/\.git$/, '');
  if (!name) {
    throw new ValidationError(`Cannot derive an application name from '${repoUrl}'`);
  }
  return name;
}

/** Expand a leading `~` to the current user's home directory */
export function expandHome(path: string, home: string = homedir()): string {
  if (path === '~') return home;
  if (path.startsWith('~/')) return join(home, path.slice(2));
  return path;
}

/** Insert the access token as the basic-auth user: https://TOKEN@host/org/app.git */
export function buildAuthenticatedUrl(repoUrl: string, token: string): string {
  let url: URL;
  try {
    url = new URL(repoUrl);
  } catch {
    throw new ValidationError(`Invalid repository URL: ${repoUrl}`);
  }
  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    throw new ValidationError(`Repository URL must use http or https: ${repoUrl}`);
  }
  url.username = token;
  url.password = '';
  return url.toString();
}

export function sshConfigFor(
  target: { serverAddress: string; sshUser: string; sshKeyPath: string },
  port: number,
): SSHConfig {
  return {
    host: target.serverAddress,
    port,
    username: target.sshUser,
    privateKeyPath: target.sshKeyPath,
  };
}
