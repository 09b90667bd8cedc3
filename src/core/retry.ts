export const RETRY_MAX_DELAY_MS = 10_000;

export interface RetryPolicy {
  /** Extra attempts after the first one. */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs?: number;
}

export interface RetryHooks {
  isRetryable: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function calculateBackoffMs(attempt: number, baseMs: number, maxMs = RETRY_MAX_DELAY_MS): number {
  return Math.min(maxMs, baseMs * 2 ** Math.max(0, attempt - 1));
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks,
): Promise<T> {
  const maxAttempts = Math.max(0, policy.maxRetries) + 1;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || !hooks.isRetryable(error)) {
        throw error;
      }
      const delayMs = calculateBackoffMs(attempt, policy.baseDelayMs, policy.maxDelayMs);
      hooks.onRetry?.(error, attempt, delayMs);
      if (delayMs > 0) {
        await sleep(delayMs);
      }
    }
  }
}
