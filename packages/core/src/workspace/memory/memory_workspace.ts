/**
 * MemoryWorkspace - In-memory RepoWorkspace for tests
 *
 * The coding agent double "edits" files with `touch`; commits and pushes
 * are recorded. Push failures can be queued with `failNextPush`.
 */

import type { CommitAuthor, CommitOptions, RepoWorkspace, WorkspaceFactory } from '../workspace';

export type RecordedCommit = {
  branch: string | null;
  message: string;
  author: CommitAuthor;
  files: string[];
};

export class MemoryWorkspace implements RepoWorkspace {
  readonly path: string;
  branch: string | null = null;
  base: string | null = null;
  disposed = false;
  readonly commits: RecordedCommit[] = [];
  readonly pushes: string[] = [];
  private readonly committed = new Set<string>();
  private readonly pending = new Set<string>();
  private readonly pushFailures: Error[] = [];

  constructor(path: string) {
    this.path = path;
  }

  async checkoutBranch(branch: string, base: string): Promise<void> {
    this.branch = branch;
    this.base = base;
    this.committed.clear();
    this.pending.clear();
  }

  async commitAll(message: string, author: CommitAuthor, options: CommitOptions = {}): Promise<boolean> {
    if (this.pending.size === 0 && !options.allowEmpty) {
      return false;
    }
    const files = Array.from(this.pending).sort();
    this.commits.push({ branch: this.branch, message, author, files });
    files.forEach(file => this.committed.add(file));
    this.pending.clear();
    return true;
  }

  async push(branch: string): Promise<void> {
    const failure = this.pushFailures.shift();
    if (failure) {
      throw failure;
    }
    this.pushes.push(branch);
  }

  async modifiedFiles(): Promise<string[]> {
    return Array.from(new Set([...this.committed, ...this.pending])).sort();
  }

  async dispose(): Promise<void> {
    this.disposed = true;
  }

  // ==================== Test Helper Methods ====================

  touch(...paths: string[]): void {
    paths.forEach(path => this.pending.add(path));
  }

  failNextPush(error: Error): void {
    this.pushFailures.push(error);
  }
}

/**
 * Hands out one MemoryWorkspace per task and keeps them for inspection.
 */
export class MemoryWorkspaceFactory implements WorkspaceFactory {
  private readonly workspaces = new Map<string, MemoryWorkspace>();
  private readonly onCreate: ((workspace: MemoryWorkspace) => void) | undefined;

  constructor(options: { onCreate?: (workspace: MemoryWorkspace) => void } = {}) {
    this.onCreate = options.onCreate;
  }

  async create(taskId: string): Promise<MemoryWorkspace> {
    const workspace = new MemoryWorkspace(`/tmp/leash/${taskId}`);
    this.workspaces.set(taskId, workspace);
    this.onCreate?.(workspace);
    return workspace;
  }

  get(taskId: string): MemoryWorkspace | undefined {
    return this.workspaces.get(taskId);
  }
}
