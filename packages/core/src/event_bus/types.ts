/**
 * Event Bus types for task lifecycle notifications
 */

import type { TaskPhase } from '../task_machine/task_machine.types';

/**
 * Base event structure
 */
export type BaseEvent = {
  /** Event type identifier */
  type: string;
  /** Event timestamp */
  timestamp: number;
  /** Event payload */
  payload: unknown;
  /** Component that emitted the event */
  source: string;
};

export type TaskQueuedEvent = BaseEvent & {
  type: 'task.queued';
  payload: {
    taskId: string;
    agentName: string;
    requesterName: string;
  };
};

export type TaskPhaseChangedEvent = BaseEvent & {
  type: 'task.phase.changed';
  payload: {
    taskId: string;
    from: TaskPhase;
    to: TaskPhase;
  };
};

export type TaskFeedbackReceivedEvent = BaseEvent & {
  type: 'task.feedback.received';
  payload: {
    taskId: string;
    thread: string;
    sequence: number;
    sender: string;
  };
};

export type TaskReadyEvent = BaseEvent & {
  type: 'task.ready';
  payload: {
    taskId: string;
    agentName: string;
    pullRequestUrl: string;
    durationMs: number;
  };
};

export type TaskFailedEvent = BaseEvent & {
  type: 'task.failed';
  payload: {
    taskId: string;
    agentName: string;
    phase: TaskPhase;
    reason: string;
  };
};

export type TaskCancelledEvent = BaseEvent & {
  type: 'task.cancelled';
  payload: {
    taskId: string;
    agentName: string;
    cancelledBy: string;
    completedPhases: TaskPhase[];
  };
};

export type RegistryDegradedEvent = BaseEvent & {
  type: 'registry.degraded';
  payload: {
    reason: string;
  };
};

export type RegistryRecoveredEvent = BaseEvent & {
  type: 'registry.recovered';
  payload: Record<string, never>;
};

/**
 * Union of every event Leash components publish
 */
export type LeashEvent =
  | TaskQueuedEvent
  | TaskPhaseChangedEvent
  | TaskFeedbackReceivedEvent
  | TaskReadyEvent
  | TaskFailedEvent
  | TaskCancelledEvent
  | RegistryDegradedEvent
  | RegistryRecoveredEvent;

/**
 * Event handler function type
 */
export type EventHandler<T extends BaseEvent = BaseEvent> = (event: T) => void | Promise<void>;

/**
 * Event subscription
 */
export type EventSubscription = {
  /** Unique subscription identifier */
  id: string;
  /** Event type subscribed to */
  eventType: string;
  /** Subscription metadata */
  metadata?: {
    createdAt: number;
  };
};
