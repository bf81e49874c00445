import { sleep } from '../utils/sleep.js';

export interface RetryPolicy {
  /** Total attempts, including the first. Values below 1 are treated as 1. */
  maxAttempts: number;
  /** Fixed pause between attempts */
  delayMs: number;
  /** Return false to give up immediately on this error. Defaults to retrying everything. */
  shouldRetry?: (error: unknown) => boolean;
}

export const DEFAULT_SOCIAL_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  delayMs: 5_000,
};

/**
 * Runs `fn` until it resolves or the policy is exhausted, then rethrows the
 * last error. `onRetry` fires before each pause with the 1-based attempt that
 * just failed.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  onRetry?: (attempt: number, error: unknown) => void
): Promise<T> {
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));
  const shouldRetry = policy.shouldRetry ?? (() => true);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || !shouldRetry(error)) {
        throw error;
      }
      onRetry?.(attempt, error);
      await sleep(policy.delayMs);
    }
  }
}
