/**
 * MemoryTaskQueue - In-process FIFO implementation of TaskQueue
 *
 * A pending `dequeue` is handed the next enqueued message directly;
 * otherwise it resolves to null once its timeout passes.
 */

import type { TaskMessage, TaskQueue } from '../task_queue.types';
import { validateTaskMessage } from '../task_message';

type Waiter = {
  resolve: (message: TaskMessage | null) => void;
  timer: NodeJS.Timeout;
};

export class MemoryTaskQueue implements TaskQueue {
  private readonly messages: TaskMessage[] = [];
  private readonly waiters: Waiter[] = [];

  async enqueue(message: TaskMessage): Promise<void> {
    validateTaskMessage(message);
    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve(message);
      return;
    }
    this.messages.push(message);
  }

  async dequeue(timeoutMs: number): Promise<TaskMessage | null> {
    const next = this.messages.shift();
    if (next) return next;
    if (timeoutMs <= 0) return null;

    return new Promise(resolve => {
      const waiter: Waiter = {
        resolve,
        timer: setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) this.waiters.splice(index, 1);
          resolve(null);
        }, timeoutMs),
      };
      this.waiters.push(waiter);
    });
  }

  async size(): Promise<number> {
    return this.messages.length;
  }

  // ==================== Test Helper Methods ====================

  /**
   * Drop queued messages and release every pending dequeue with null.
   */
  clear(): void {
    this.messages.length = 0;
    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.resolve(null);
    }
  }
}
