export type { CommitAuthor, CommitOptions, RepoWorkspace, WorkspaceFactory } from './workspace';
export { WorkspaceError, GitCommandFailedError, PushRejectedError } from './errors';
export { GitWorktreeWorkspace, GitWorktreeWorkspaceFactory, createExecCommand } from './local';
export type { GitWorktreeWorkspaceFactoryOptions, ExecCommand, ExecOptions, ExecResult } from './local';
