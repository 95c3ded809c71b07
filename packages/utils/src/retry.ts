/**
 * Retry Logic
 *
 * Bounded retry with exponential backoff. Callers decide which failures
 * are worth another attempt through `retryIf`.
 */

import { sleep } from './time.js';

export interface RetryOptions {
  maxAttempts: number;
  initialDelay: number;
  maxDelay: number;
  backoffMultiplier: number;
  retryIf?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export const defaultRetryOptions: RetryOptions = {
  maxAttempts: 3,
  initialDelay: 500,
  maxDelay: 8000,
  backoffMultiplier: 2,
};

/**
 * Execute a function with automatic retry on failure.
 * The attempt number (1-based) is passed to `fn`.
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts = { ...defaultRetryOptions, ...options };
  const maxAttempts = Math.max(1, Math.floor(opts.maxAttempts));
  let delay = opts.initialDelay;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (opts.retryIf && !opts.retryIf(error)) {
        throw error;
      }
      if (attempt >= maxAttempts) {
        throw error;
      }

      opts.onRetry?.(error, attempt, delay);
      await sleep(delay);

      delay = Math.min(delay * opts.backoffMultiplier, opts.maxDelay);
    }
  }
}
