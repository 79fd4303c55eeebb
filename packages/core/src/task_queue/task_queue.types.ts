import type { Logger } from '../logger';

/**
 * The unit of work handed from the entry point to the worker pool.
 * Field names are the wire format.
 */
export type TaskMessage = {
  task_id: string;
  task_description: string;
  branch_name: string;
  agent_name: string;
  agent_display_name: string;
  agent_email: string;
  thread_ts: string;
  channel_id: string;
  requester_name: string;
  requester_profile_url: string | null;
  /** Epoch seconds */
  start_time: number;
};

export interface TaskQueue {
  enqueue(message: TaskMessage): Promise<void>;
  /** Next message, or null once `timeoutMs` passes with the queue empty. */
  dequeue(timeoutMs: number): Promise<TaskMessage | null>;
  size(): Promise<number>;
}

export type RedisTaskQueueOptions = {
  logger?: Logger;
  /** List key, before the client's keyPrefix (default: queue:tasks) */
  key?: string;
};
