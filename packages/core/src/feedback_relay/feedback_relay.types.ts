import type { ChatNotifier, MessageRef, ThreadRef } from '../chat';
import type { CoordinationStore } from '../coordination_store';
import type { IEventStream } from '../event_bus';
import type { Logger } from '../logger';
import type { Sleep } from '../utils/sleep';

export type FeedbackSender = {
  id: string;
  name: string;
};

/**
 * A human message posted in a bound thread. `sequence` is its 1-based
 * position in the thread's log.
 */
export type FeedbackMessage = {
  sequence: number;
  sender: FeedbackSender;
  text: string;
  /** Chat timestamp of the message */
  timestamp: string;
  messageRef?: MessageRef;
};

export type RecordResult =
  | { status: 'recorded'; message: FeedbackMessage }
  | { status: 'unbound' };

export type AwaitOptions = {
  timeoutMs: number;
  pollIntervalMs: number;
  signal?: AbortSignal;
};

export type AwaitResult =
  | { status: 'message'; message: FeedbackMessage }
  | { status: 'timeout' }
  | { status: 'aborted' };

export type FeedbackRelayDependencies = {
  store: CoordinationStore;
  chat?: ChatNotifier;
  eventBus?: IEventStream;
  logger?: Logger;
  /** TTL for mappings, logs and read pointers (default: 24h) */
  retentionSeconds?: number;
  /** Clock in milliseconds (default: Date.now) */
  now?: () => number;
  sleep?: Sleep;
};

export interface IFeedbackRelay {
  bind(thread: string, taskId: string): Promise<void>;
  /** Called once the task has finished; the thread may then be bound again. */
  release(taskId: string): Promise<void>;
  unbind(thread: string): Promise<void>;
  taskForThread(thread: string): Promise<string | null>;
  threadForTask(taskId: string): Promise<string | null>;
  recordMessage(
    thread: string,
    sender: FeedbackSender,
    text: string,
    timestamp: string,
    messageRef?: MessageRef,
  ): Promise<RecordResult>;
  peekNew(taskId: string, limit?: number): Promise<FeedbackMessage[]>;
  awaitNext(taskId: string, options: AwaitOptions): Promise<AwaitResult>;
  ask(taskId: string, thread: ThreadRef, question: string, options: AwaitOptions): Promise<AwaitResult>;
  getAllMessages(taskId: string): Promise<FeedbackMessage[]>;
  formatForAgent(messages: FeedbackMessage[]): string;
  renderForPr(taskId: string): Promise<string>;
}
