/**
 * Bounded exponential backoff
 *
 * delay(attempt) = min(baseDelayMs * 2^attempt, maxDelayMs)
 * At most maxRetries extra attempts after the first. Non-retryable errors are
 * rethrown immediately.
 */

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface RetryHooks {
  isRetryable: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.baseDelayMs * Math.pow(2, attempt), policy.maxDelayMs);
}

export async function withRetry<T>(operation: () => Promise<T>, policy: RetryPolicy, hooks: RetryHooks): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= policy.maxRetries || !hooks.isRetryable(error)) {
        throw error;
      }
      const delay = backoffDelay(policy, attempt);
      hooks.onRetry?.(error, attempt + 1, delay);
      await sleep(delay);
    }
  }
}
