/**
 * Retry Utility
 *
 * Exponential backoff for calls to remote services.
 *
 * @module shared/utils/retry
 */

export interface RetryOptions {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries?: number;

  /** Base delay in milliseconds (default: 1000) */
  baseDelay?: number;

  /** Maximum delay cap in milliseconds (default: 10000) */
  maxDelay?: number;

  /** Exponential factor (default: 2) */
  factor?: number;

  /** Jitter factor, 0-1 (default: 0.1) */
  jitter?: number;

  /** Whether an error is worth another attempt (default: every error) */
  isRetryable?: (error: Error) => boolean;

  /** Called before each wait */
  onRetry?: (attempt: number, error: Error, nextDelay: number) => void;
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxRetries: 3,
  baseDelay: 1000,
  maxDelay: 10000,
  factor: 2,
  jitter: 0.1,
  isRetryable: () => true,
  onRetry: () => undefined,
};

/**
 * Delay before retry number `attempt + 1`:
 * `min(baseDelay * factor^attempt, maxDelay)`, spread by +/- jitter
 */
export function computeBackoffDelay(attempt: number, options: RetryOptions = {}): number {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const exponentialDelay = opts.baseDelay * Math.pow(opts.factor, attempt);
  const cappedDelay = Math.min(exponentialDelay, opts.maxDelay);

  const jitterAmount = cappedDelay * opts.jitter;
  const jitter = Math.random() * jitterAmount * 2 - jitterAmount;
  return Math.max(0, Math.round(cappedDelay + jitter));
}

/**
 * Retry with Exponential Backoff
 *
 * @throws the last error once retries are exhausted or the error is not retryable
 *
 * @example
 * ```typescript
 * const vector = await retryWithBackoff(() => callVisionApi(body), {
 *   maxRetries: 3,
 *   isRetryable: isTransientHttpError,
 * });
 * ```
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options?: RetryOptions
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt >= opts.maxRetries || !opts.isRetryable(lastError)) {
        throw lastError;
      }

      const delay = computeBackoffDelay(attempt, opts);
      opts.onRetry(attempt + 1, lastError, delay);
      await sleep(delay);
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
