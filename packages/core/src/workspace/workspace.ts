/**
 * RepoWorkspace - the checked-out repository a task's agent works in
 *
 * Cloning is outside Leash: a factory hands out an isolated checkout per
 * task and the task runner drives branch, commit and push through it.
 */

export type CommitAuthor = {
  name: string;
  email: string;
};

export type CommitOptions = {
  /** Create the commit even with nothing staged */
  allowEmpty?: boolean;
};

export interface RepoWorkspace {
  readonly path: string;
  /** Create (or reset) `branch` at the tip of `base` and switch to it. */
  checkoutBranch(branch: string, base: string): Promise<void>;
  /** Stage everything and commit. Resolves false when there was nothing to commit. */
  commitAll(message: string, author: CommitAuthor, options?: CommitOptions): Promise<boolean>;
  push(branch: string): Promise<void>;
  /** Paths changed on the current branch relative to its base, committed or not. */
  modifiedFiles(): Promise<string[]>;
  dispose(): Promise<void>;
}

export interface WorkspaceFactory {
  create(taskId: string): Promise<RepoWorkspace>;
}
