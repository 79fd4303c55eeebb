import { execFile } from 'child_process';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

/**
 * Options for executing commands
 */
export type ExecOptions = {
  /** Working directory for the command */
  cwd?: string;
  /** Additional environment variables */
  env?: Record<string, string>;
  /** Timeout in milliseconds */
  timeout?: number;
};

/**
 * Result of executing a command. Non-zero exits resolve, they do not reject.
 */
export type ExecResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

export type ExecCommand = (command: string, args: string[], options?: ExecOptions) => Promise<ExecResult>;

function stringField(error: object, field: 'stdout' | 'stderr'): string {
  const value: unknown = Reflect.get(error, field);
  return typeof value === 'string' ? value : '';
}

/**
 * ExecCommand over `child_process.execFile` (no shell, so no quoting).
 * Git is kept from prompting for editors or credentials.
 */
export function createExecCommand(): ExecCommand {
  return async (command, args, options = {}) => {
    const env = {
      ...process.env,
      GIT_EDITOR: 'true',
      GIT_TERMINAL_PROMPT: '0',
      ...options.env,
    };

    try {
      const { stdout, stderr } = await execFileAsync(command, args, {
        cwd: options.cwd,
        env,
        timeout: options.timeout,
        maxBuffer: 16 * 1024 * 1024,
      });
      return { exitCode: 0, stdout, stderr };
    } catch (error) {
      if (!(error instanceof Error)) {
        return { exitCode: 1, stdout: '', stderr: String(error) };
      }
      const code: unknown = Reflect.get(error, 'code');
      return {
        exitCode: typeof code === 'number' ? code : 1,
        stdout: stringField(error, 'stdout'),
        stderr: stringField(error, 'stderr') || error.message,
      };
    }
  };
}
