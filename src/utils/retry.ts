import { toError } from "./errors";
import { delay } from "./timeout";

/**
 * Describes how many times an operation runs and how long to wait between runs.
 */
export interface RetryPolicy {
  /** Total number of attempts, including the first one. */
  maxAttempts: number;
  /** Delay before the second attempt, in milliseconds. */
  baseDelayMs: number;
  /** Factor applied to the delay after each failed attempt. */
  multiplier: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  multiplier: 2,
};

export interface RetryHooks {
  /** Return false to stop retrying and rethrow immediately. */
  shouldRetry?: (error: Error, attempt: number) => boolean;
  /** Called before sleeping ahead of the next attempt. */
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
}

/**
 * Delay to wait after the failed attempt `attempt` (zero-based).
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return policy.baseDelayMs * policy.multiplier ** attempt;
}

/**
 * Runs `operation` until it resolves or the policy's attempts are spent.
 * Attempts are strictly sequential. The last error is rethrown on exhaustion.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {},
): Promise<T> {
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (caught) {
      const error = toError(caught);
      const hasAttemptsLeft = attempt + 1 < maxAttempts;
      if (!hasAttemptsLeft || hooks.shouldRetry?.(error, attempt) === false) {
        throw error;
      }

      const wait = backoffDelay(policy, attempt);
      hooks.onRetry?.(error, attempt, wait);
      await delay(wait);
    }
  }
}
