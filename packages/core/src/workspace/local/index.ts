export { GitWorktreeWorkspace, GitWorktreeWorkspaceFactory } from './git_worktree_workspace';
export type { GitWorktreeWorkspaceFactoryOptions } from './git_worktree_workspace';
export { createExecCommand } from './exec_command';
export type { ExecCommand, ExecOptions, ExecResult } from './exec_command';
