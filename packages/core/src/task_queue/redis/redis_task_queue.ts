/**
 * RedisTaskQueue - Redis list implementation of TaskQueue
 *
 * Producers LPUSH, workers BRPOP, so each message goes to exactly one
 * worker. BRPOP blocks its connection: give the queue a client of its own.
 *
 * @example
 * ```typescript
 * import Redis from 'ioredis';
 * const queue = new RedisTaskQueue(new Redis(config.store.url, { keyPrefix: config.store.keyPrefix }));
 * const message = await queue.dequeue(5000);
 * ```
 */

import type { Redis } from 'ioredis';
import { StoreKeys } from '../../coordination_store/keys';
import { StoreUnavailableError } from '../../coordination_store/errors';
import { createLogger } from '../../logger';
import type { Logger } from '../../logger';
import { InvalidTaskMessageError } from '../errors';
import { parseTaskMessage, validateTaskMessage } from '../task_message';
import type { RedisTaskQueueOptions, TaskMessage, TaskQueue } from '../task_queue.types';

export class RedisTaskQueue implements TaskQueue {
  private readonly key: string;
  private readonly logger: Logger;

  constructor(
    private readonly client: Redis,
    options: RedisTaskQueueOptions = {},
  ) {
    this.key = options.key ?? StoreKeys.taskQueue();
    this.logger = options.logger ?? createLogger('[RedisTaskQueue] ');
  }

  async enqueue(message: TaskMessage): Promise<void> {
    validateTaskMessage(message);
    await this.call('enqueue', () => this.client.lpush(this.key, JSON.stringify(message)));
    this.logger.debug(`Enqueued ${message.task_id}`);
  }

  /**
   * BRPOP counts whole seconds and treats 0 as "forever", so the timeout
   * is rounded up to at least one second.
   */
  async dequeue(timeoutMs: number): Promise<TaskMessage | null> {
    const timeoutSeconds = Math.max(1, Math.ceil(timeoutMs / 1000));
    const reply = await this.call('dequeue', () => this.client.brpop(this.key, timeoutSeconds));
    if (!reply) return null;

    const [, raw] = reply;
    try {
      return parseTaskMessage(raw);
    } catch (error) {
      if (!(error instanceof InvalidTaskMessageError)) throw error;
      this.logger.error(`Dropping malformed queue payload: ${error.message}`);
      return null;
    }
  }

  async size(): Promise<number> {
    return this.call('size', () => this.client.llen(this.key));
  }

  // ==================== PRIVATE HELPERS ====================

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error: unknown) {
      throw new StoreUnavailableError(`queue ${operation}`, error instanceof Error ? error.message : String(error));
    }
  }
}
