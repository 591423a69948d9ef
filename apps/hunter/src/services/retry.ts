import { sleep } from "../utils/sleep.js";

export interface RetryPolicy {
  /** Retries after the first attempt */
  maxRetries: number;
  /** Delay before the first retry, doubled for each further retry */
  backoffFactorMs: number;
  maxBackoffMs: number;
  isRetryable: (error: unknown) => boolean;
}

export type RetryListener = (error: unknown, retry: number, delayMs: number) => void;

/**
 * Delay before the given retry (1-based)
 */
export function backoffDelay(policy: RetryPolicy, retry: number): number {
  const delay = policy.backoffFactorMs * 2 ** (retry - 1);
  return Math.min(delay, policy.maxBackoffMs);
}

/**
 * Run an operation, retrying errors the policy considers transient
 */
export async function withRetry<T>(
  policy: RetryPolicy,
  operation: () => Promise<T>,
  onRetry?: RetryListener
): Promise<T> {
  let retry = 0;

  for (;;) {
    try {
      return await operation();
    } catch (error) {
      if (retry >= policy.maxRetries || !policy.isRetryable(error)) {
        throw error;
      }

      retry++;
      const delayMs = backoffDelay(policy, retry);
      onRetry?.(error, retry, delayMs);
      await sleep(delayMs);
    }
  }
}
