import type { RetryPolicy } from './config';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryOptions extends RetryPolicy {
  sleep?: Sleep;
  /** Called after every failed attempt, including the last one. */
  onAttemptFailed?: (attempt: number, err: unknown) => void;
}

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; attempts: number; lastError: unknown };

/**
 * Runs `operation` up to `maxAttempts` times with a fixed `intervalMs` pause
 * between attempts (none after the last). No backoff, no jitter.
 */
export async function retry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<RetryOutcome<T>> {
  const { maxAttempts, intervalMs, onAttemptFailed } = options;
  const pause = options.sleep ?? sleep;
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
  }

  let lastError: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const value = await operation(attempt);
      return { ok: true, value, attempts: attempt };
    } catch (err) {
      lastError = err;
      onAttemptFailed?.(attempt, err);
    }
    if (attempt < maxAttempts) await pause(intervalMs);
  }
  return { ok: false, attempts: maxAttempts, lastError };
}
