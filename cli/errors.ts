/**
 * CLI error types
 * Each error carries its context and knows how to print a hint for it.
 */

export enum CommandErrorType {
  DaemonNotRunning = 'daemon_not_running',
  DaemonStartFailed = 'daemon_start_failed',
  InvalidParams = 'invalid_params',
  Remote = 'remote_error'
}

export class CommandError extends Error {
  constructor(
    public readonly type: CommandErrorType,
    public readonly context: Record<string, unknown>,
    message?: string
  ) {
    super(message || `Command error: ${type}`);
    this.name = 'CommandError';
    Error.captureStackTrace(this, this.constructor);
  }

  format(): string {
    return this.message;
  }
}

export class DaemonNotRunningError extends CommandError {
  constructor(readonly detail?: string) {
    super(CommandErrorType.DaemonNotRunning, { detail }, 'mcplex daemon is not running');
    this.name = 'DaemonNotRunningError';
  }

  format(): string {
    const reason = this.detail ? ` (${this.detail})` : '';
    return `mcplex daemon is not running${reason}. Start with: mcplex daemon start`;
  }
}

export class DaemonStartError extends CommandError {
  constructor(readonly detail: string) {
    super(CommandErrorType.DaemonStartFailed, { detail }, `Failed to start daemon: ${detail}`);
    this.name = 'DaemonStartError';
  }
}

export class InvalidParamsError extends CommandError {
  constructor(readonly reason: string) {
    super(CommandErrorType.InvalidParams, { reason }, `Invalid parameters: ${reason}`);
    this.name = 'InvalidParamsError';
  }
}

/**
 * Failure reported by the daemon for a command
 */
export class RemoteCommandError extends CommandError {
  constructor(
    message: string,
    readonly remoteType?: string
  ) {
    super(CommandErrorType.Remote, { remoteType }, message);
    this.name = 'RemoteCommandError';
  }
}
