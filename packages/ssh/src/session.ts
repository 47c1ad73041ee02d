/**
 * @dockhand/ssh - One-shot SSH Session
 *
 * Each pipeline step opens its own session, runs its batch and closes it.
 * Host keys are accepted without verification, so first contact with a new
 * server needs no interactive trust prompt.
 */

import { Client, utils, type ConnectConfig, type SFTPWrapper } from 'ssh2';
import { pathExists } from 'fs-extra';
import { readFile } from 'node:fs/promises';
import { join, posix } from 'node:path';
import type { SSHConfig, SSHResult } from '@dockhand/shared';
import { ConnectionError, RemoteCommandError } from '@dockhand/shared';
import { shellQuote } from './quote.js';
import {
  mkdirCommands,
  planTransfer,
  summarizePlan,
  unlinkCommands,
  type TransferSummary,
} from './transfer.js';

// ============================================================================
// Configuration
// ============================================================================

const SESSION_DEFAULTS = {
  readyTimeout: 10000,   // 10 seconds
  execTimeout: 60000,    // 1 minute
};

// ============================================================================
// Types
// ============================================================================

export interface SessionOptions {
  readyTimeout?: number;
  /** ssh-agent socket; defaults to SSH_AUTH_SOCK, empty string disables it */
  agent?: string;
}

export interface ExecOptions {
  timeout?: number;
}

export interface UploadOptions {
  exclude?: readonly string[];
}

export interface RemoteShell {
  readonly host: string;
  exec(command: string, options?: ExecOptions): Promise<SSHResult>;
  /** Run a multi-line bash script as a single remote command */
  runScript(script: string, options?: ExecOptions): Promise<SSHResult>;
  /** Mirror a local directory into a directory relative to the remote home */
  upload(localDir: string, remoteDir: string, options?: UploadOptions): Promise<TransferSummary>;
  disconnect(): void;
}

export type RemoteConnector = (config: SSHConfig, options?: SessionOptions) => Promise<RemoteShell>;

// ============================================================================
// Connection
// ============================================================================

/**
 * Authenticate with the key file and, when one is running, the ssh-agent.
 * A key ssh2 cannot parse (passphrase-protected, unknown format) is left to
 * the agent instead of failing the handshake.
 */
export function connectConfigFor(
  config: SSHConfig,
  privateKey: Buffer,
  options: SessionOptions = {},
): ConnectConfig {
  const agent = options.agent ?? process.env.SSH_AUTH_SOCK;
  const parsed = utils.parseKey(privateKey);
  if (parsed instanceof Error && !agent) {
    throw new ConnectionError(
      config.host,
      `Cannot use SSH private key ${config.privateKeyPath} (${parsed.message}) and no ssh-agent is available`,
    );
  }

  return {
    host: config.host,
    port: config.port,
    username: config.username,
    readyTimeout: options.readyTimeout ?? SESSION_DEFAULTS.readyTimeout,
    ...(agent ? { agent } : {}),
    ...(parsed instanceof Error ? {} : { privateKey }),
  };
}

// ============================================================================
// Session
// ============================================================================

export class RemoteSession implements RemoteShell {
  private client: Client | null = null;

  constructor(
    private readonly config: SSHConfig,
    private readonly options: SessionOptions = {},
  ) {}

  get host(): string {
    return this.config.host;
  }

  async connect(): Promise<void> {
    if (this.client) return;

    const { host, privateKeyPath } = this.config;
    if (!(await pathExists(privateKeyPath))) {
      throw new ConnectionError(host, `SSH private key not found: ${privateKeyPath}`);
    }
    const connectionConfig = connectConfigFor(this.config, await readFile(privateKeyPath), this.options);

    this.client = await new Promise<Client>((resolve, reject) => {
      const client = new Client();
      client
        .on('ready', () => resolve(client))
        .on('error', (err: Error) => reject(new ConnectionError(host, err.message)))
        .connect(connectionConfig);
    });
  }

  disconnect(): void {
    if (this.client) {
      this.client.end();
      this.client = null;
    }
  }

  async exec(command: string, options: ExecOptions = {}): Promise<SSHResult> {
    const { timeout = SESSION_DEFAULTS.execTimeout } = options;
    const client = this.requireClient();
    const startTime = Date.now();

    return new Promise((resolve, reject) => {
      let stdout = '';
      let stderr = '';
      let exitCode: number | null = null;
      let timeoutId: ReturnType<typeof setTimeout> | undefined;

      client.exec(command, (err, stream) => {
        if (err) {
          reject(err);
          return;
        }

        if (timeout > 0) {
          timeoutId = setTimeout(() => {
            reject(new Error(`Command timed out after ${timeout}ms`));
            stream.destroy();
          }, timeout);
        }

        stream
          .on('exit', (code: number | null) => {
            exitCode = code;
          })
          .on('close', () => {
            clearTimeout(timeoutId);
            resolve({
              stdout,
              stderr,
              code: exitCode ?? -1,
              duration: Date.now() - startTime,
            });
          })
          .on('data', (data: Buffer) => {
            stdout += data.toString();
          });

        stream.stderr.on('data', (data: Buffer) => {
          stderr += data.toString();
        });
      });
    });
  }

  runScript(script: string, options: ExecOptions = {}): Promise<SSHResult> {
    return this.exec(`bash -c ${shellQuote(script)}`, options);
  }

  async upload(localDir: string, remoteDir: string, options: UploadOptions = {}): Promise<TransferSummary> {
    const plan = await planTransfer(localDir, options.exclude);

    for (const command of mkdirCommands(remoteDir, plan.directories)) {
      const result = await this.exec(command);
      if (result.code !== 0) {
        throw new RemoteCommandError('create_directories', result.code, result.stderr);
      }
    }

    for (const command of unlinkCommands(remoteDir, plan.links)) {
      const result = await this.exec(command);
      if (result.code !== 0) {
        throw new RemoteCommandError('clear_links', result.code, result.stderr);
      }
    }

    const sftp = await this.openSftp();
    try {
      for (const file of plan.files) {
        await putFile(sftp, join(localDir, file.path), posix.join(remoteDir, file.path), file.mode);
      }
      for (const link of plan.links) {
        await putLink(sftp, link.target, posix.join(remoteDir, link.path));
      }
    } finally {
      sftp.end();
    }

    return summarizePlan(plan);
  }

  private openSftp(): Promise<SFTPWrapper> {
    const client = this.requireClient();
    return new Promise((resolve, reject) => {
      client.sftp((err, sftp) => {
        if (err) {
          reject(err);
          return;
        }
        resolve(sftp);
      });
    });
  }

  private requireClient(): Client {
    if (!this.client) {
      throw new Error('SSH not connected. Call connect() first.');
    }
    return this.client;
  }
}

function putFile(sftp: SFTPWrapper, localPath: string, remotePath: string, mode: number): Promise<void> {
  return new Promise((resolve, reject) => {
    sftp.fastPut(localPath, remotePath, { mode }, (err) => {
      if (err) {
        reject(new Error(`Failed to upload ${localPath}: ${err.message}`));
        return;
      }
      resolve();
    });
  });
}

function putLink(sftp: SFTPWrapper, target: string, remotePath: string): Promise<void> {
  return new Promise((resolve, reject) => {
    sftp.symlink(target, remotePath, (err) => {
      if (err) {
        reject(new Error(`Failed to create link ${remotePath} -> ${target}: ${err.message}`));
        return;
      }
      resolve();
    });
  });
}
