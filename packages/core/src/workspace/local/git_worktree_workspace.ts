/**
 * GitWorktreeWorkspace - RepoWorkspace over a `git worktree`
 *
 * One long-lived clone serves every task; each task gets its own worktree
 * under `worktreeRoot`, created from `origin/<base>` and removed on
 * dispose. The clone itself is provisioned outside Leash.
 */

import * as path from 'path';
import type { CommitAuthor, CommitOptions, RepoWorkspace, WorkspaceFactory } from '../workspace';
import { GitCommandFailedError, PushRejectedError } from '../errors';
import type { ExecCommand, ExecResult } from './exec_command';

export type GitWorktreeWorkspaceFactoryOptions = {
  /** Existing clone with an `origin` remote */
  repoRoot: string;
  /** Directory holding one worktree per task */
  worktreeRoot: string;
  baseBranch: string;
  execCommand: ExecCommand;
};

const PUSH_REJECTED_PATTERN = /\[rejected\]|\[remote rejected\]|failed to push/i;

async function git(execCommand: ExecCommand, cwd: string, args: string[]): Promise<ExecResult> {
  const result = await execCommand('git', args, { cwd });
  if (result.exitCode !== 0) {
    const command = `git ${args.join(' ')}`;
    throw new GitCommandFailedError(
      `${command} failed: ${result.stderr.trim().split('\n')[0] ?? ''}`,
      command,
      result.exitCode,
      result.stderr,
    );
  }
  return result;
}

function lines(output: string): string[] {
  return output.split('\n').map(line => line.trimEnd()).filter(line => line.length > 0);
}

/**
 * Path from a `git status --porcelain` line; renames report the new path.
 */
function porcelainPath(line: string): string {
  const entry = line.slice(3);
  const arrow = entry.indexOf(' -> ');
  return arrow === -1 ? entry : entry.slice(arrow + 4);
}

export class GitWorktreeWorkspace implements RepoWorkspace {
  private base: string;

  constructor(
    readonly path: string,
    private readonly repoRoot: string,
    private readonly execCommand: ExecCommand,
    base: string,
  ) {
    this.base = base;
  }

  async checkoutBranch(branch: string, base: string): Promise<void> {
    this.base = base;
    await git(this.execCommand, this.path, ['checkout', '-B', branch, `origin/${base}`]);
  }

  async commitAll(message: string, author: CommitAuthor, options: CommitOptions = {}): Promise<boolean> {
    await git(this.execCommand, this.path, ['add', '-A']);
    const status = await git(this.execCommand, this.path, ['status', '--porcelain']);
    if (lines(status.stdout).length === 0 && !options.allowEmpty) {
      return false;
    }
    await git(this.execCommand, this.path, [
      '-c', `user.name=${author.name}`,
      '-c', `user.email=${author.email}`,
      'commit', '-m', message,
      ...(options.allowEmpty ? ['--allow-empty'] : []),
    ]);
    return true;
  }

  async push(branch: string): Promise<void> {
    const args = ['push', '--set-upstream', 'origin', branch];
    const result = await this.execCommand('git', args, { cwd: this.path });
    if (result.exitCode === 0) return;

    const command = `git ${args.join(' ')}`;
    if (PUSH_REJECTED_PATTERN.test(result.stderr)) {
      throw new PushRejectedError(branch, command, result.exitCode, result.stderr);
    }
    throw new GitCommandFailedError(
      `${command} failed: ${result.stderr.trim().split('\n')[0] ?? ''}`,
      command,
      result.exitCode,
      result.stderr,
    );
  }

  async modifiedFiles(): Promise<string[]> {
    const committed = await git(this.execCommand, this.path, ['diff', '--name-only', `origin/${this.base}...HEAD`]);
    const working = await git(this.execCommand, this.path, ['status', '--porcelain']);
    const files = new Set([...lines(committed.stdout), ...lines(working.stdout).map(porcelainPath)]);
    return Array.from(files).sort();
  }

  async dispose(): Promise<void> {
    await git(this.execCommand, this.repoRoot, ['worktree', 'remove', '--force', this.path]);
  }
}

export class GitWorktreeWorkspaceFactory implements WorkspaceFactory {
  constructor(private readonly options: GitWorktreeWorkspaceFactoryOptions) {}

  async create(taskId: string): Promise<GitWorktreeWorkspace> {
    const { repoRoot, worktreeRoot, baseBranch, execCommand } = this.options;
    const directory = path.join(worktreeRoot, taskId.replace(/[^A-Za-z0-9._-]/g, '-'));

    await git(execCommand, repoRoot, ['fetch', 'origin', baseBranch]);
    await git(execCommand, repoRoot, ['worktree', 'add', '--force', '--detach', directory, `origin/${baseBranch}`]);

    return new GitWorktreeWorkspace(directory, repoRoot, execCommand, baseBranch);
  }
}
