import type { IAgentRegistry } from '../agent_registry/agent_registry.types';
import type { ICancellationController } from '../cancellation/cancellation.types';
import type { ChatNotifier, ThreadRef } from '../chat/chat_notifier';
import type { CodingAgent } from '../coding_agent/coding_agent';
import type { CoordinationStore } from '../coordination_store/coordination_store';
import type { IEventStream } from '../event_bus';
import type { AwaitOptions, AwaitResult, IFeedbackRelay } from '../feedback_relay/feedback_relay.types';
import type { Logger } from '../logger';
import type { PullRequestPublisher } from '../pull_request/pull_request_publisher';
import type { TaskIntake } from '../task_intake/task_intake';
import type { TaskRunner } from '../task_machine/task_runner';
import type { TaskQueue } from '../task_queue/task_queue.types';
import type { Sleep } from '../utils/sleep';
import type { TaskWorker } from '../worker/task_worker';
import type { WorkspaceFactory } from '../workspace/workspace';

/**
 * Backends and collaborators the engine runs against. Pick memory ones for
 * a single process, Redis ones for several workers.
 */
export type LeashDependencies = {
  store: CoordinationStore;
  queue: TaskQueue;
  chat: ChatNotifier;
  publisher: PullRequestPublisher;
  codingAgent: CodingAgent;
  workspaces: WorkspaceFactory;
  eventBus?: IEventStream;
  /** Shared by every component (default: one prefixed logger per component) */
  logger?: Logger;
  sleep?: Sleep;
  now?: () => number;
};

export type Leash = {
  registry: IAgentRegistry;
  relay: IFeedbackRelay;
  cancellation: ICancellationController;
  intake: TaskIntake;
  runner: TaskRunner;
  worker: TaskWorker;
  /** Timeout and poll interval of a feedback wait, from `feedback.*` */
  feedbackWait: Omit<AwaitOptions, 'signal'>;
  /** Waits for the next thread reply using `feedbackWait`. */
  awaitFeedback(taskId: string, signal?: AbortSignal): Promise<AwaitResult>;
  /** Posts a question to the thread, then waits like `awaitFeedback`. */
  ask(taskId: string, thread: ThreadRef, question: string, signal?: AbortSignal): Promise<AwaitResult>;
};
