/**
 * Retry utilities for handling transient failures.
 */

/**
 * Options for retry behavior.
 */
export interface RetryOptions {
  /** Maximum number of retry attempts after the first (default: 2) */
  maxRetries?: number;
  /** Fixed delay between attempts in milliseconds (default: 1000) */
  delay?: number;
  /** Callback called before each retry */
  onRetry?: (error: unknown, attempt: number, delay: number) => void;
}

/**
 * Error thrown once every attempt has failed. Carries the last failure.
 */
export class RetryExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: Error
  ) {
    super(lastError.message);
    this.name = 'RetryExhaustedError';
  }
}

/**
 * Sleep for a specified duration.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute a function with retries on failure.
 *
 * Every error is retried. The defaults give `maxRetries + 1` attempts with a
 * fixed one-second wait between them and no wait after the last.
 *
 * @throws RetryExhaustedError after the last attempt fails
 *
 * @example
 * ```typescript
 * const reply = await withRetry(() => client.complete(messages), { maxRetries: 2 });
 * ```
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { maxRetries = 2, delay = 1000, onRetry } = options;

  let attempt = 0;

  for (;;) {
    try {
      return await fn();
    } catch (error) {
      attempt++;

      if (attempt > maxRetries) {
        throw new RetryExhaustedError(attempt, error instanceof Error ? error : new Error(String(error)));
      }

      onRetry?.(error, attempt, delay);

      await sleep(delay);
    }
  }
}
