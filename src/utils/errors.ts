/**
 * Error classes for the deployment chain.
 *
 * Every error carries a stable `code` and a message that can be dropped
 * straight into a notification.
 */

export class DeployError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'DeployError';
    this.code = code;
    this.details = details;

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

/**
 * Missing or invalid settings: bad config file, unsupported key type,
 * missing clone URL, deploy directory absent without createDir.
 */
export class ConfigurationError extends DeployError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Remote host unreachable, authentication rejected or connect timeout.
 */
export class ConnectivityError extends DeployError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONNECTIVITY_ERROR', details);
    this.name = 'ConnectivityError';
  }
}

export class CommandError extends DeployError {
  public readonly command: string;
  public readonly exitCode: number | null;
  public readonly stderr: string;

  constructor(command: string, exitCode: number | null, stderr: string, message?: string, code: string = 'COMMAND_FAILED') {
    super(
      message ?? `Command '${command}' failed with exit code ${exitCode ?? 'unknown'}. Error: ${stderr}`,
      code,
      { command, exitCode }
    );
    this.name = 'CommandError';
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export class CommandTimeoutError extends CommandError {
  constructor(command: string, timeoutMs: number, stderr: string = '') {
    super(command, null, stderr, `Command '${command}' timed out after ${timeoutMs}ms`, 'COMMAND_TIMEOUT');
    this.name = 'CommandTimeoutError';
  }
}

/**
 * Raised at a suspension point once the run has been superseded.
 * Not a failure: the chain reports it as its own terminal outcome.
 */
export class RunCancelledError extends DeployError {
  constructor(message: string = 'Deployment superseded by a newer push.') {
    super(message, 'RUN_CANCELLED');
    this.name = 'RunCancelledError';
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}
