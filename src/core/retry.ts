/**
 * Bounded exponential backoff shared by the embedder and the store adapter.
 */

export interface RetryPolicy {
  attempts: number;      // Total attempts, including the first
  baseDelayMs: number;   // Delay before the second attempt, doubled each time
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: 4,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
};

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.baseDelayMs * Math.pow(2, attempt - 1), policy.maxDelayMs);
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: {
    policy: RetryPolicy;
    isRetryable: (error: unknown) => boolean;
    sleep?: Sleep;
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  }
): Promise<T> {
  const { policy, isRetryable, onRetry } = options;
  const wait = options.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= policy.attempts || !isRetryable(error)) {
        throw error;
      }
      const delay = backoffDelay(policy, attempt);
      onRetry?.(error, attempt, delay);
      await wait(delay);
    }
  }
}
