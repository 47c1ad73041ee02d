/**
 * @dockhand/shared - Error Classes
 * Structured error handling for the deployment pipeline
 */

export class DockhandError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'DockhandError';
    this.code = code;
    this.details = details;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON() {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export class ValidationError extends DockhandError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class CancelledError extends DockhandError {
  constructor(message: string = 'Operation cancelled') {
    super(message, 'CANCELLED');
    this.name = 'CancelledError';
  }
}

export class ConnectionError extends DockhandError {
  constructor(host: string, reason: string) {
    super(`Failed to connect to ${host}: ${reason}`, 'CONNECTION_FAILED', { host, reason });
    this.name = 'ConnectionError';
  }
}

export class RemoteCommandError extends DockhandError {
  public readonly operation: string;
  public readonly exitCode: number;
  public readonly stderr: string;

  constructor(operation: string, exitCode: number, stderr: string) {
    const reason = stderr.trim().split('\n').filter(Boolean).pop();
    super(
      reason
        ? `Remote operation '${operation}' exited with code ${exitCode}: ${reason}`
        : `Remote operation '${operation}' exited with code ${exitCode}`,
      'REMOTE_COMMAND_FAILED',
      { operation, exitCode },
    );
    this.name = 'RemoteCommandError';
    this.operation = operation;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export class StepFailedError extends DockhandError {
  public readonly step: string;

  constructor(step: string, message: string, details?: Record<string, unknown>) {
    super(message, 'STEP_FAILED', { step, ...details });
    this.name = 'StepFailedError';
    this.step = step;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
