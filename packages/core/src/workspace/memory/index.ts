export { MemoryWorkspace, MemoryWorkspaceFactory } from './memory_workspace';
export type { RecordedCommit } from './memory_workspace';
