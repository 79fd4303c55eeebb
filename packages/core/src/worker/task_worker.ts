/**
 * TaskWorker - pulls task messages off a queue and runs them one at a time
 *
 * Nothing that goes wrong with a single task stops the loop: a failed
 * dequeue or a runner error is logged, the worker backs off, then polls
 * again.
 *
 * @example
 * ```typescript
 * const worker = new TaskWorker({ queue, runner });
 * worker.start();
 * // ...
 * await worker.stop(); // waits for the task in hand to finish
 * ```
 */

import { createLogger } from '../logger';
import type { Logger } from '../logger';
import type { TaskMessage, TaskQueue } from '../task_queue/task_queue.types';
import type { TaskOutcome } from '../task_machine/task_machine.types';
import { humanizeError } from '../task_machine/errors';
import { sleep as defaultSleep } from '../utils/sleep';
import type { Sleep } from '../utils/sleep';

/** Anything that can take a message to a terminal outcome (TaskRunner). */
export interface TaskExecutor {
  run(message: TaskMessage): Promise<TaskOutcome>;
}

export type TaskWorkerDependencies = {
  queue: TaskQueue;
  runner: TaskExecutor;
  logger?: Logger;
  /** How long one dequeue waits for a message (default: 5000) */
  dequeueTimeoutMs?: number;
  /** Pause after an error before polling again (default: 5000) */
  errorBackoffMs?: number;
  sleep?: Sleep;
};

export type TaskWorkerResult =
  | { status: 'idle' }
  | { status: 'busy' }
  | { status: 'processed'; outcome: TaskOutcome }
  | { status: 'error'; taskId?: string; error: string };

export class TaskWorker {
  private readonly queue: TaskQueue;
  private readonly runner: TaskExecutor;
  private readonly logger: Logger;
  private readonly dequeueTimeoutMs: number;
  private readonly errorBackoffMs: number;
  private readonly sleep: Sleep;
  private running = false;
  private processing = false;
  private loop: Promise<void> | null = null;
  private abort: AbortController | null = null;

  constructor(deps: TaskWorkerDependencies) {
    this.queue = deps.queue;
    this.runner = deps.runner;
    this.logger = deps.logger ?? createLogger('[TaskWorker] ');
    this.dequeueTimeoutMs = deps.dequeueTimeoutMs ?? 5000;
    this.errorBackoffMs = deps.errorBackoffMs ?? 5000;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  /**
   * Starts polling. Idempotent.
   */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.abort = new AbortController();
    this.logger.info('Worker started');
    this.loop = this.poll(this.abort.signal);
  }

  /**
   * Stops polling and resolves once the current task (if any) has finished.
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.abort?.abort();
    await this.loop;
    this.loop = null;
    this.abort = null;
    this.logger.info('Worker stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Takes at most one message off the queue and runs it to completion.
   */
  async processNext(): Promise<TaskWorkerResult> {
    if (this.processing) {
      return { status: 'busy' };
    }
    this.processing = true;

    let message: TaskMessage | null;
    try {
      message = await this.queue.dequeue(this.dequeueTimeoutMs);
    } catch (error) {
      this.processing = false;
      const reason = humanizeError(error);
      this.logger.warn(`Dequeue failed: ${reason}`);
      return { status: 'error', error: reason };
    }

    if (!message) {
      this.processing = false;
      return { status: 'idle' };
    }

    try {
      const outcome = await this.runner.run(message);
      this.logger.info(`${message.task_id} finished as ${outcome.phase}`);
      return { status: 'processed', outcome };
    } catch (error) {
      const reason = humanizeError(error);
      this.logger.error(`${message.task_id} crashed the runner: ${reason}`, error);
      return { status: 'error', taskId: message.task_id, error: reason };
    } finally {
      this.processing = false;
    }
  }

  // ==================== PRIVATE HELPERS ====================

  private async poll(signal: AbortSignal): Promise<void> {
    while (this.running) {
      const result = await this.processNext();
      if ((result.status === 'error' || result.status === 'busy') && this.running) {
        await this.sleep(this.errorBackoffMs, signal);
      }
    }
  }
}
