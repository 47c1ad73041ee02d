/**
 * RepositoryService - local clone management
 */

import { ensureDir, pathExists, remove } from 'fs-extra';
import { join } from 'node:path';
import type { DeploymentParameters } from '@dockhand/shared';
import { StepFailedError } from '@dockhand/shared';
import { buildAuthenticatedUrl } from './parameters.js';
import type { LocalRunner, LoggerLike } from './types.js';

const CLONE_TIMEOUT = 600000; // 10 minutes

export interface CloneResult {
  projectPath: string;
  warnings: string[];
}

export class RepositoryService {
  constructor(
    private readonly local: LocalRunner,
    private readonly logger: LoggerLike,
    private readonly workDir: string,
  ) {}

  clonePath(appName: string): string {
    return join(this.workDir, appName);
  }

  /** Fresh clone of the requested branch; a stale clone is deleted first */
  async clone(params: DeploymentParameters): Promise<CloneResult> {
    const projectPath = this.clonePath(params.appName);
    const warnings: string[] = [];

    if (await pathExists(projectPath)) {
      await remove(projectPath);
      warnings.push(`Removed existing local directory ${projectPath}`);
    }
    await ensureDir(this.workDir);

    const authUrl = buildAuthenticatedUrl(params.repoUrl, params.token);
    const result = await this.local.run(
      'git',
      ['clone', '-b', params.branch, authUrl, params.appName],
      { cwd: this.workDir, timeout: CLONE_TIMEOUT },
    );

    const redact = (text: string) => text.split(params.token).join('****');
    for (const line of redact(`${result.stdout}\n${result.stderr}`).split('\n')) {
      if (line.trim()) this.logger.debug(`  git | ${line}`);
    }

    if (result.code !== 0) {
      throw new StepFailedError(
        'clone_repository',
        'Failed to clone repository. Check the URL and your access token.',
        { exitCode: result.code, stderr: redact(result.stderr).trim() },
      );
    }

    return { projectPath, warnings };
  }

  /** @returns whether a clone was present */
  async remove(appName: string): Promise<boolean> {
    const projectPath = this.clonePath(appName);
    if (!(await pathExists(projectPath))) {
      return false;
    }
    await remove(projectPath);
    return true;
  }
}
