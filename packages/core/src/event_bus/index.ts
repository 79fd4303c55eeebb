export { EventBus } from './event_bus';
export type { IEventStream } from './event_bus';
export type {
  BaseEvent,
  LeashEvent,
  EventHandler,
  EventSubscription,
  TaskQueuedEvent,
  TaskPhaseChangedEvent,
  TaskFeedbackReceivedEvent,
  TaskReadyEvent,
  TaskFailedEvent,
  TaskCancelledEvent,
  RegistryDegradedEvent,
  RegistryRecoveredEvent,
} from './types';
