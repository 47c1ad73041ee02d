/**
 * @dockhand/ssh - SSH Sessions & File Transfer
 *
 * Features:
 * - One connection per call (no pooling, nothing left open between steps)
 * - Key-based authentication, automatic host key acceptance
 * - Command timeout support
 * - SFTP mirroring of a local tree with exclusions
 */

import type { SSHConfig } from '@dockhand/shared';
import { RemoteSession, type RemoteConnector, type RemoteShell, type SessionOptions } from './session.js';

export { RemoteSession, connectConfigFor } from './session.js';
export type { RemoteShell, RemoteConnector, SessionOptions, ExecOptions, UploadOptions } from './session.js';
export { planTransfer, mkdirCommands, unlinkCommands, summarizePlan } from './transfer.js';
export type { TransferPlan, TransferFile, TransferLink, TransferSummary } from './transfer.js';
export { shellQuote } from './quote.js';

// ============================================================================
// Factory Functions
// ============================================================================

/** Open a connected session */
export const connectSession: RemoteConnector = async (config, options) => {
  const session = new RemoteSession(config, options);
  await session.connect();
  return session;
};

/** Execute with automatic connection management */
export async function withSession<T>(
  connector: RemoteConnector,
  config: SSHConfig,
  fn: (shell: RemoteShell) => Promise<T>,
  options?: SessionOptions,
): Promise<T> {
  const shell = await connector(config, options);
  try {
    return await fn(shell);
  } finally {
    shell.disconnect();
  }
}
