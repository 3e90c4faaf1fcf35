import { ProviderFailure, toProviderFailure } from './failures.js';
import type { RetryPolicy } from './types.js';

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
};

export interface RetryHooks {
  sleep?: (ms: number) => Promise<void>;
  /** Uniform [0, 1) source for jitter. */
  random?: () => number;
  onRetry?: (info: { attempt: number; delayMs: number; failure: ProviderFailure }) => void;
}

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; failure: ProviderFailure; attempts: number; exhausted: boolean };

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Exponential backoff with equal jitter: half the window is fixed, half random.
 * A provider-supplied retry-after wins when it is longer, capped at maxDelayMs.
 */
export function backoffDelay(
  attempt: number,
  policy: RetryPolicy,
  random: () => number,
  retryAfterMs?: number,
): number {
  const window = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
  const jittered = Math.floor(window / 2 + random() * (window / 2));
  if (retryAfterMs !== undefined && retryAfterMs > jittered) {
    return Math.min(policy.maxDelayMs, retryAfterMs);
  }
  return jittered;
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {},
): Promise<RetryResult<T>> {
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));
  const wait = hooks.sleep ?? sleep;
  const random = hooks.random ?? Math.random;

  for (let attempt = 1; ; attempt++) {
    try {
      const value = await operation(attempt);
      return { ok: true, value, attempts: attempt };
    } catch (error) {
      const failure = toProviderFailure(error);
      if (!failure.isRetryable) {
        return { ok: false, failure, attempts: attempt, exhausted: false };
      }
      if (attempt >= maxAttempts) {
        return { ok: false, failure, attempts: attempt, exhausted: true };
      }

      const delayMs = backoffDelay(attempt, policy, random, failure.retryAfterMs);
      hooks.onRetry?.({ attempt, delayMs, failure });
      await wait(delayMs);
    }
  }
}
