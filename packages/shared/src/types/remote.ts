/**
 * @dockhand/shared - Remote Execution Types
 */

// ============================================================================
// SSH Types
// ============================================================================

export interface SSHConfig {
  host: string;
  port: number;
  username: string;
  privateKeyPath: string;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  code: number;
  duration: number;
}

export type SSHResult = CommandResult;

// ============================================================================
// Remote Operations
// ============================================================================

/** fatal: the run stops on failure. warning: the failure is reported and the run continues. */
export type Severity = 'fatal' | 'warning';

/**
 * safe: re-running when already done is a no-op.
 * replace: re-running replaces what a previous run left behind.
 * destructive: removes state.
 */
export type Idempotency = 'safe' | 'replace' | 'destructive';

export interface RemoteOperation {
  name: string;
  description: string;
  severity: Severity;
  idempotency: Idempotency;
  script: string;
}

export interface OperationResult {
  operation: string;
  ok: boolean;
  severity: Severity;
  result: CommandResult;
  /** Set when the command never produced an exit code (timeout, dropped session) */
  error?: string;
}
