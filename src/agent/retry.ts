import { ModelServiceError } from './errors.js';

export interface RetryOptions {
  /** Extra attempts after the first; 0 disables retrying */
  maxRetries: number;
  backoffMs: number;
  maxBackoffMs?: number;
  jitter?: number;
}

export const NO_RETRY: RetryOptions = {
  maxRetries: 0,
  backoffMs: 500,
  maxBackoffMs: 8000,
  jitter: 0.2,
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function withJitter(value: number, jitter: number): number {
  const delta = value * jitter;
  return value + (Math.random() * 2 - 1) * delta;
}

export function isRetryableError(error: unknown): boolean {
  return error instanceof ModelServiceError && error.retryable;
}

// retry only wraps the policy; timeouts are enforced by the callee
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = NO_RETRY,
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void
): Promise<T> {
  let attempt = 0;

  while (true) {
    try {
      return await fn(attempt);
    } catch (error) {
      attempt += 1;
      if (attempt > options.maxRetries || !isRetryableError(error)) {
        throw error;
      }

      const rawBackoff = options.backoffMs * Math.pow(2, attempt - 1);
      const cappedBackoff = Math.min(rawBackoff, options.maxBackoffMs ?? rawBackoff);
      const delay = Math.max(0, options.jitter ? withJitter(cappedBackoff, options.jitter) : cappedBackoff);
      onRetry?.(error, attempt, delay);
      await sleep(delay);
    }
  }
}
