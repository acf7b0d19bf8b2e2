/**
 * retry.ts — Bounded retry with exponential backoff.
 *
 * One utility for every call site that retries (detail page visits, challenge
 * solving).  The result is a tagged value instead of a rethrow so the caller
 * decides whether a final failure means "skip this item" or "abort the stage".
 *
 * Delay before attempt n+1 is `baseDelayMs * 2^(n-1)`: 2 s, 4 s, 8 s… with the
 * default base.
 */

import { sleep as realSleep, type Sleep } from './timing';

export interface RetryPolicy {
  /** Total attempts, including the first one. */
  attempts: number;
  baseDelayMs: number;
  sleep?: Sleep;
}

export interface RetryHooks {
  /** Called after a failed attempt that will be retried. */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Return true to stop retrying immediately (e.g. the browser is gone). */
  shouldAbort?: (error: unknown) => boolean;
}

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number; aborted: boolean };

export function backoffDelay(baseDelayMs: number, attempt: number): number {
  return baseDelayMs * 2 ** (attempt - 1);
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {},
): Promise<RetryResult<T>> {
  const pause = policy.sleep ?? realSleep;
  const attempts = Math.max(1, policy.attempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      const value = await operation(attempt);
      return { ok: true, value, attempts: attempt };
    } catch (err) {
      lastError = err;

      if (hooks.shouldAbort?.(err)) {
        return { ok: false, error: err, attempts: attempt, aborted: true };
      }

      if (attempt < attempts) {
        const delayMs = backoffDelay(policy.baseDelayMs, attempt);
        hooks.onRetry?.(err, attempt, delayMs);
        if (delayMs > 0) await pause(delayMs);
      }
    }
  }

  return { ok: false, error: lastError, attempts, aborted: false };
}
