// src/services/retry.ts
// What: Injectable retry/backoff capability for provider calls.
// How: withRetry() re-runs an operation while it throws TransientProviderError, sleeping
//      min(maxDelayMs, baseDelayMs * 2^(attempt-1)) scaled by a jitter factor in [1 - jitter, 1].
//      After maxAttempts the last transient failure becomes ProviderUnavailable; any other error is rethrown at once.

import { ProviderUnavailable, TransientProviderError } from '../errors.js';
import logger from '../logging.js';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitter: number; // 0..1
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/** Zero-delay policy; tests substitute it for the configured one. */
export const immediateRetry = (maxAttempts = 3): RetryPolicy => ({
  maxAttempts,
  baseDelayMs: 0,
  maxDelayMs: 0,
  jitter: 0,
  sleep: async () => {},
});

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const exp = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
  const jitter = Math.min(Math.max(policy.jitter, 0), 1);
  const random = policy.random ?? Math.random;
  return Math.round(exp * (1 - jitter * random()));
}

export async function withRetry<T>(label: string, policy: RetryPolicy, op: (attempt: number) => Promise<T>): Promise<T> {
  const sleep = policy.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, policy.maxAttempts);
  let lastErr: TransientProviderError | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await op(attempt);
    } catch (err) {
      if (!(err instanceof TransientProviderError)) throw err;
      lastErr = err;
      if (attempt === maxAttempts) break;
      const delay = backoffDelay(policy, attempt);
      logger.warn({ label, attempt, delay_ms: delay, err: err.message }, 'Transient provider error; backing off');
      await sleep(delay);
    }
  }

  throw new ProviderUnavailable(
    `${label} failed after ${maxAttempts} attempts: ${lastErr?.message ?? 'unknown error'}`,
    maxAttempts,
    { cause: lastErr },
  );
}
