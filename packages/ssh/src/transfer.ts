/**
 * @dockhand/ssh - Transfer Planning
 *
 * Works out which directories, files and symbolic links of a local project
 * tree are mirrored to the remote host. Links are recreated as links, never
 * followed.
 */

import { lstat, readlink } from 'node:fs/promises';
import { glob } from 'glob';
import { join, posix } from 'node:path';
import { shellQuote } from './quote.js';

export interface TransferFile {
  /** POSIX path relative to the project root */
  path: string;
  mode: number;
  size: number;
}

export interface TransferLink {
  path: string;
  /** Link target exactly as stored, relative or absolute */
  target: string;
}

export interface TransferPlan {
  directories: string[];
  files: TransferFile[];
  links: TransferLink[];
}

export interface TransferSummary {
  directories: number;
  files: number;
  links: number;
  bytes: number;
}

export async function planTransfer(
  localDir: string,
  exclude: readonly string[] = [],
): Promise<TransferPlan> {
  const ignore = exclude.flatMap((name) => [name, `${name}/**`, `**/${name}`, `**/${name}/**`]);
  const entries = await glob('**/*', {
    cwd: localDir,
    dot: true,
    mark: true,
    posix: true,
    ignore,
  });

  const directories: string[] = [];
  const files: TransferFile[] = [];
  const links: TransferLink[] = [];

  for (const entry of entries.sort()) {
    const path = entry.endsWith('/') ? entry.slice(0, -1) : entry;
    if (links.some((link) => path.startsWith(`${link.path}/`))) {
      continue;
    }

    const localPath = join(localDir, path);
    const info = await lstat(localPath);
    if (info.isSymbolicLink()) {
      links.push({ path, target: await readlink(localPath) });
    } else if (info.isDirectory()) {
      directories.push(path);
    } else if (info.isFile()) {
      files.push({ path, mode: info.mode & 0o777, size: info.size });
    }
  }

  return { directories, files, links };
}

function batchCommands(
  prefix: string,
  targets: readonly string[],
  batchSize: number,
): string[] {
  const commands: string[] = [];
  for (let i = 0; i < targets.length; i += batchSize) {
    const batch = targets.slice(i, i + batchSize).map(shellQuote).join(' ');
    commands.push(`cd ~ && ${prefix} ${batch}`);
  }
  return commands;
}

/**
 * Build `mkdir -p` commands for the remote side, batched so no single
 * command line grows past what the remote shell accepts.
 */
export function mkdirCommands(remoteDir: string, directories: readonly string[], batchSize = 200): string[] {
  return batchCommands(
    'mkdir -p',
    [remoteDir, ...directories.map((dir) => posix.join(remoteDir, dir))],
    batchSize,
  );
}

/** Clear whatever sits at each link path so the link can be created again. */
export function unlinkCommands(remoteDir: string, links: readonly TransferLink[], batchSize = 200): string[] {
  return batchCommands(
    'rm -rf',
    links.map((link) => posix.join(remoteDir, link.path)),
    batchSize,
  );
}

export function summarizePlan(plan: TransferPlan): TransferSummary {
  return {
    directories: plan.directories.length,
    files: plan.files.length,
    links: plan.links.length,
    bytes: plan.files.reduce((total, file) => total + file.size, 0),
  };
}
