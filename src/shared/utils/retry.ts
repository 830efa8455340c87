import pRetry from "p-retry";
import { isRetryable } from "../errors";

export interface RetryPolicy {
  retries: number;
  minTimeoutMs: number;
  maxTimeoutMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  retries: 3,
  minTimeoutMs: 200,
  maxTimeoutMs: 5_000,
};

export interface RetryHooks {
  /** Defaults to the error's own `retryable` flag. */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: Error, attempt: number, retriesLeft: number) => void;
}

/**
 * Runs `operation` with bounded exponential backoff. Only errors accepted by
 * `shouldRetry` are attempted again; anything else is rethrown as is.
 */
export function withRetry<T>(operation: () => Promise<T>, policy: RetryPolicy, hooks: RetryHooks = {}): Promise<T> {
  const shouldRetry = hooks.shouldRetry ?? isRetryable;
  return pRetry(
    async () => {
      try {
        return await operation();
      } catch (error) {
        if (!shouldRetry(error)) {
          throw new pRetry.AbortError(error instanceof Error ? error : new Error(String(error)));
        }
        throw error;
      }
    },
    {
      retries: Math.max(0, policy.retries),
      factor: 2,
      minTimeout: policy.minTimeoutMs,
      maxTimeout: policy.maxTimeoutMs,
      onFailedAttempt: (error) => {
        if (error.retriesLeft > 0) {
          hooks.onRetry?.(error, error.attemptNumber, error.retriesLeft);
        }
      },
    },
  );
}
