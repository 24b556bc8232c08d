/**
 * Retry Policy
 *
 * One policy for entry and close orders: bounded attempts, exponential
 * backoff, and a predicate deciding which errors are worth another try.
 */

import { logger, normalizeError } from '../logger.js';
import { isTransientError } from './errors.js';

export interface RetryPolicyConfig {
  /** Total attempts including the first one */
  maxAttempts: number;

  /** Delay before the second attempt, doubled afterwards */
  baseDelayMs: number;

  /** Upper bound for a single delay */
  maxDelayMs?: number;
}

export type RetryPredicate = (error: unknown) => boolean;
/** Resolves after `ms`, or as soon as `signal` aborts */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const defaultSleep: Sleep = (ms, signal) =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

export class RetryPolicy {
  private readonly config: RetryPolicyConfig;
  private readonly isRetryable: RetryPredicate;
  private readonly sleep: Sleep;

  constructor(
    config: RetryPolicyConfig,
    isRetryable: RetryPredicate = isTransientError,
    sleep: Sleep = defaultSleep
  ) {
    this.config = { ...config, maxAttempts: Math.max(1, Math.floor(config.maxAttempts)) };
    this.isRetryable = isRetryable;
    this.sleep = sleep;
  }

  get maxAttempts(): number {
    return this.config.maxAttempts;
  }

  /**
   * Delay after the given failed attempt (1-based)
   */
  delayFor(attempt: number): number {
    const delay = this.config.baseDelayMs * 2 ** (attempt - 1);
    return this.config.maxDelayMs === undefined ? delay : Math.min(delay, this.config.maxDelayMs);
  }

  /**
   * Run the operation until it succeeds, fails with a non-retryable error,
   * or runs out of attempts. The last error is rethrown.
   */
  async execute<T>(operation: (attempt: number) => Promise<T>, label: string): Promise<T> {
    const { maxAttempts } = this.config;

    for (let attempt = 1; ; attempt++) {
      try {
        return await operation(attempt);
      } catch (error) {
        const retryable = this.isRetryable(error);
        if (!retryable || attempt >= maxAttempts) {
          throw error;
        }

        const delay = this.delayFor(attempt);
        logger.warn(`${label} failed, attempt ${attempt}/${maxAttempts}`, {
          error: normalizeError(error).message,
          retryInMs: delay,
        });
        await this.sleep(delay);
      }
    }
  }
}
