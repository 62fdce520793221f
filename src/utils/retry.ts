/**
 * @fileoverview Retry loop with exponential backoff.
 *
 * Every thrown error counts as transient: the provider SDKs surface
 * network, quota and 5xx failures through the same exception path.
 */

import { errorMessage } from './errors.js';
import type { AppLogger } from './observability/index.js';
import type { Clock } from './timing.js';

export type RetryOptions = {
  /** Human-readable operation label for logs */
  operation: string;
  /** Total attempts, including the first one */
  maxAttempts: number;
  /** Wait before the second attempt; doubles for each attempt after that */
  backoffBaseMs: number;
  clock: Clock;
  log: AppLogger;
  /** Extra fields attached to every retry log line */
  logData?: Record<string, unknown>;
};

/**
 * Delay after a failed attempt (0-based): base * 2^attempt.
 */
export function backoffDelayMs(attempt: number, backoffBaseMs: number): number {
  return backoffBaseMs * 2 ** attempt;
}

/**
 * Run `fn` until it resolves or `maxAttempts` is exhausted.
 * The last error is re-thrown.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const { operation, maxAttempts, backoffBaseMs, clock, log, logData } = options;
  let lastError: unknown = new Error(`${operation} was not attempted`);

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (attempt === maxAttempts - 1) break;

      const waitMs = backoffDelayMs(attempt, backoffBaseMs);
      log.warn('retry_scheduled', {
        ...logData,
        operation,
        error: errorMessage(error),
        attempt: attempt + 1,
        totalAttempts: maxAttempts,
        retryInMs: waitMs,
      });
      await clock.sleep(waitMs);
    }
  }

  throw lastError;
}
