import { sleep as defaultSleep } from '../utils/sleep';
import type { Sleep } from '../utils/sleep';
import { RetriesExhaustedError, classifyError } from './errors';

/** Backoff between attempts of a transient remote call: 60s, 120s, 240s. */
export const DEFAULT_RETRY_DELAYS_MS: readonly number[] = [60_000, 120_000, 240_000];

export type RetryOptions = {
  /** One entry per retry (default: DEFAULT_RETRY_DELAYS_MS) */
  delaysMs?: readonly number[];
  isTransient?: (error: unknown) => boolean;
  sleep?: Sleep;
  onRetry?: (error: unknown, retry: number, delayMs: number) => void;
};

/**
 * Runs `operation`, retrying transient failures after each delay in turn.
 * Non-transient failures propagate at once; a transient failure that
 * outlives every delay becomes RetriesExhaustedError.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const delays = options.delaysMs ?? DEFAULT_RETRY_DELAYS_MS;
  const isTransient = options.isTransient ?? ((error: unknown) => classifyError(error) === 'transient');
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (!isTransient(error)) {
        throw error;
      }
      const delay = delays[attempt];
      if (delay === undefined) {
        throw new RetriesExhaustedError(error, attempt + 1);
      }
      options.onRetry?.(error, attempt + 1, delay);
      await sleep(delay);
    }
  }
}
