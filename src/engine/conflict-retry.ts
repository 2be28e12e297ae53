/**
 * Optimistic-concurrency retry.
 *
 * The operation passed in must perform its own read: each attempt starts
 * from fresh state and re-evaluates, so a write based on a stale read is
 * never replayed. Only ConflictError is retried; every other error
 * propagates on the first attempt.
 */

import { ConflictError } from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';

export interface ConflictRetryOptions {
  /** Total attempts, including the first. */
  maxAttempts: number;
  /** Base delay for exponential backoff between attempts. */
  baseDelayMs: number;
  /** Label included in log lines. */
  operation: string;
  logger?: Logger;
}

/** Exponential backoff: base, 2x base, 4x base, ... */
export function computeBackoff(baseMs: number, attempt: number): number {
  return baseMs * Math.pow(2, attempt - 1);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function withConflictRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: ConflictRetryOptions,
): Promise<T> {
  const log = options.logger ?? rootLogger;
  let attempt = 1;
  for (;;) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (!(err instanceof ConflictError) || attempt >= options.maxAttempts) {
        throw err;
      }
      log.warn('Concurrent modification, re-reading', {
        operation: options.operation,
        attempt,
        details: err.typedError.details,
      });
      const delay = computeBackoff(options.baseDelayMs, attempt);
      if (delay > 0) await sleep(delay);
      attempt++;
    }
  }
}
