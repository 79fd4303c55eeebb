/**
 * Base error class for workspace operations
 */
export class WorkspaceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WorkspaceError';
    Object.setPrototypeOf(this, WorkspaceError.prototype);
  }
}

/**
 * A git command exited non-zero
 */
export class GitCommandFailedError extends WorkspaceError {
  public readonly command: string;
  public readonly exitCode: number;
  public readonly stderr: string;

  constructor(message: string, command: string, exitCode: number, stderr: string) {
    super(message);
    this.name = 'GitCommandFailedError';
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
    Object.setPrototypeOf(this, GitCommandFailedError.prototype);
  }
}

/**
 * The remote refused the push (non-fast-forward, hook, protection)
 */
export class PushRejectedError extends GitCommandFailedError {
  constructor(branch: string, command: string, exitCode: number, stderr: string) {
    super(`Push rejected for ${branch}: ${stderr.trim().split('\n')[0] ?? ''}`, command, exitCode, stderr);
    this.name = 'PushRejectedError';
    Object.setPrototypeOf(this, PushRejectedError.prototype);
  }
}
