/**
 * Key layout shared by every component. Backends add the namespace prefix.
 */

/** Default retention for mappings, feedback logs and flags (24 hours). */
export const DEFAULT_RETENTION_SECONDS = 24 * 60 * 60;

export const StoreKeys = {
  threadTask: (thread: string): string => `thread_tasks:${thread}`,
  taskThread: (taskId: string): string => `task_threads:${taskId}`,
  /** Task id of a finished task whose thread may be bound again */
  threadReleased: (thread: string): string => `thread_released:${thread}`,
  threadMessages: (thread: string): string => `thread_messages:${thread}`,
  activeTasks: (agentName: string): string => `active_tasks:${agentName}`,
  agentTasks: (agentName: string): string => `agent_tasks:${agentName}`,
  readPointer: (taskId: string): string => `read_pointer:${taskId}`,
  cancellation: (taskId: string): string => `cancel:${taskId}`,
  progress: (taskId: string): string => `progress:${taskId}`,
  taskQueue: (): string => 'queue:tasks',
} as const;
