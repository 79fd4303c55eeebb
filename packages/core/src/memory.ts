/**
 * In-memory implementations
 *
 * Everything here keeps its state in the current process. Suitable for
 * tests and single-process runs; several workers need @leash/core/redis.
 */

// CoordinationStore
export { MemoryCoordinationStore } from './coordination_store/memory';
export type { MemoryCoordinationStoreOptions } from './coordination_store/memory';

// ConfigStore
export { MemoryConfigStore } from './config_store/memory';

// TaskQueue
export { MemoryTaskQueue } from './task_queue/memory';

// ChatNotifier
export { MemoryChatNotifier } from './chat/memory';
export type { RecordedPost, RecordedReaction } from './chat/memory';

// PullRequestPublisher
export { MemoryPullRequestPublisher } from './pull_request/memory';
export type { StoredPullRequest } from './pull_request/memory';

// CodingAgent
export { ScriptedCodingAgent } from './coding_agent/memory';
export type { CodingAgentScript, ScriptedAnswer } from './coding_agent/memory';

// Workspace
export { MemoryWorkspace, MemoryWorkspaceFactory } from './workspace/memory';
export type { RecordedCommit } from './workspace/memory';
