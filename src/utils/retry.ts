/**
 * Retry Utility with Exponential Backoff
 *
 * Gateway lookups cross a distributed network and fail transiently far
 * more often than they fail for good. Only failures the caller marks as
 * retryable are attempted again.
 */

export interface RetryOptions {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries?: number;
  /** Base delay in milliseconds (default: 500) */
  baseDelay?: number;
  /** Maximum delay in milliseconds (default: 8000) */
  maxDelay?: number;
  /** Jitter factor 0-1 added on top of each delay (default: 0.1) */
  jitter?: number;
  shouldRetry?: (error: Error, attempt: number) => boolean;
  onRetry?: (error: Error, attempt: number, delay: number) => void;
}

/**
 * Run `fn`, retrying with exponentially growing delays.
 * The last error is rethrown once retries are exhausted or `shouldRetry`
 * declines.
 *
 * @example
 * ```typescript
 * const bounds = await retryWithBackoff(
 *   () => store.lookupBounds(identifier),
 *   { maxRetries: 2, shouldRetry: isTransientGatewayError }
 * );
 * ```
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxRetries = 3,
    baseDelay = 500,
    maxDelay = 8000,
    jitter = 0.1,
    shouldRetry = () => true,
    onRetry,
  } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt >= maxRetries || !shouldRetry(lastError, attempt)) {
        throw lastError;
      }

      const exponentialDelay = baseDelay * Math.pow(2, attempt);
      const delay = Math.min(exponentialDelay + exponentialDelay * jitter * Math.random(), maxDelay);

      onRetry?.(lastError, attempt + 1, delay);
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
}
