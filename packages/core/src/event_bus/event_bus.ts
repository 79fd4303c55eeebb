import { EventEmitter } from 'events';

import type {
  LeashEvent,
  EventHandler,
  EventSubscription,
} from './types';
import { createLogger } from '../logger';
import type { Logger } from '../logger';

type EventOfType<T extends LeashEvent['type']> = Extract<LeashEvent, { type: T }>;

type Registration = {
  subscription: EventSubscription;
  listener: (event: LeashEvent) => void;
};

// Generate unique subscription IDs
function generateSubscriptionId(): string {
  return `subscription:${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
}

function isEventOfType<T extends LeashEvent['type']>(
  event: LeashEvent,
  eventType: T,
): event is EventOfType<T> {
  return event.type === eventType;
}

/**
 * Event Stream interface - contract for in-process and remote bus implementations
 */
export interface IEventStream {
  /**
   * Publish an event to the bus
   */
  publish(event: LeashEvent): void;

  /**
   * Subscribe to events of a specific type
   */
  subscribe<T extends LeashEvent['type']>(
    eventType: T,
    handler: EventHandler<EventOfType<T>>
  ): EventSubscription;

  /**
   * Unsubscribe from events
   */
  unsubscribe(subscriptionId: string): boolean;

  /**
   * Get all active subscriptions
   */
  getSubscriptions(): EventSubscription[];

  /**
   * Clear all subscriptions (for testing/cleanup)
   */
  clearSubscriptions(): void;

  /**
   * Wait for all pending event handlers to complete (for testing)
   */
  waitForIdle(options?: { timeout?: number }): Promise<void>;
}

/**
 * Local EventBus implementation using Node.js EventEmitter
 *
 * Operates in-memory inside one worker process. Components publish task
 * lifecycle events without knowing who listens; handlers run in the
 * background and their failures are logged, never propagated to the
 * publisher.
 */
export class EventBus implements IEventStream {
  private emitter: EventEmitter;
  private registrations: Map<string, Registration>;
  private pendingHandlers: Set<Promise<void>>;
  private logger: Logger;

  constructor(logger: Logger = createLogger('[EventBus] ')) {
    this.emitter = new EventEmitter();
    this.registrations = new Map();
    this.pendingHandlers = new Set();
    this.logger = logger;

    // Increase max listeners for high-throughput scenarios
    this.emitter.setMaxListeners(100);
  }

  /**
   * Publish an event to all subscribers
   */
  publish(event: LeashEvent): void {
    if (!event.type) {
      throw new Error('Event must have a valid type string');
    }

    if (!Number.isFinite(event.timestamp)) {
      throw new Error('Event must have a valid timestamp number');
    }

    if (!event.source) {
      throw new Error('Event must have a valid source string');
    }

    this.emitter.emit(event.type, event);

    // Also emit on wildcard for monitoring
    this.emitter.emit('*', event);
  }

  subscribe<T extends LeashEvent['type']>(
    eventType: T,
    handler: EventHandler<EventOfType<T>>
  ): EventSubscription {
    return this.register(eventType, (event) => {
      if (isEventOfType(event, eventType)) {
        this.track(eventType, () => handler(event));
      }
    });
  }

  /**
   * Subscribe to all events (wildcard subscription)
   * Useful for debugging, monitoring, or logging
   */
  subscribeToAll(handler: EventHandler<LeashEvent>): EventSubscription {
    return this.register('*', (event) => {
      this.track('*', () => handler(event));
    });
  }

  unsubscribe(subscriptionId: string): boolean {
    const registration = this.registrations.get(subscriptionId);
    if (!registration) {
      return false;
    }

    this.emitter.removeListener(registration.subscription.eventType, registration.listener);
    this.registrations.delete(subscriptionId);

    return true;
  }

  getSubscriptions(): EventSubscription[] {
    return Array.from(this.registrations.values()).map(r => r.subscription);
  }

  clearSubscriptions(): void {
    this.emitter.removeAllListeners();
    this.registrations.clear();
  }

  /**
   * Get subscription count for a specific event type
   */
  getSubscriptionCount(eventType: string): number {
    return this.emitter.listenerCount(eventType);
  }

  /**
   * Wait for all pending event handlers to complete.
   *
   * In production, events are fire-and-forget.
   * In tests, use this to synchronize before assertions.
   *
   * @example
   * ```typescript
   * await runner.run(message);     // publishes task.ready
   * await eventBus.waitForIdle();  // wait for subscribers
   * expect(readyHandler).toHaveBeenCalled();
   * ```
   */
  async waitForIdle(options: { timeout?: number } = {}): Promise<void> {
    const timeout = options.timeout ?? 5000;
    const startTime = Date.now();

    while (this.pendingHandlers.size > 0) {
      if (Date.now() - startTime > timeout) {
        this.logger.warn(`waitForIdle() timeout after ${timeout}ms with ${this.pendingHandlers.size} handlers still pending`);
        break;
      }

      await Promise.race([
        Promise.all(Array.from(this.pendingHandlers)),
        new Promise(resolve => setTimeout(resolve, 10)) // Re-check every 10ms
      ]);
    }
  }

  // ==================== PRIVATE HELPERS ====================

  private register(eventType: string, listener: (event: LeashEvent) => void): EventSubscription {
    const subscription: EventSubscription = {
      id: generateSubscriptionId(),
      eventType,
      metadata: {
        createdAt: Date.now()
      }
    };

    this.emitter.on(eventType, listener);
    this.registrations.set(subscription.id, { subscription, listener });

    return subscription;
  }

  private track(eventType: string, run: () => void | Promise<void>): void {
    const handlerPromise = (async () => {
      try {
        await run();
      } catch (error) {
        this.logger.error(`Error in event handler for ${eventType}:`, error);
      }
    })();

    this.pendingHandlers.add(handlerPromise);
    void handlerPromise.finally(() => {
      this.pendingHandlers.delete(handlerPromise);
    });
  }
}
