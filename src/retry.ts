import { type RetryOptions, DEFAULT_RETRY_OPTIONS } from "./retryOptions.js";

const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Retries an asynchronous operation with exponential backoff and jitter.
 * @param operation The asynchronous function to retry.
 * @param options Overrides for {@link DEFAULT_RETRY_OPTIONS}.
 * @returns The result of the first successful attempt.
 * @throws The last error encountered once attempts are exhausted, or the first
 *         error rejected by `shouldRetry`.
 */
export async function retry<T>(
    operation: () => Promise<T>,
    options: Partial<RetryOptions> = {}
  ): Promise<T> {
    const config: RetryOptions = { ...DEFAULT_RETRY_OPTIONS, ...options };
    const attempts = Math.max(1, config.maxRetries);

    let delay = config.initialDelay;

    for (let attempt = 1; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        const lastError = error instanceof Error ? error : new Error(String(error));

        if (attempt >= attempts || (config.shouldRetry && !config.shouldRetry(lastError))) {
          throw lastError;
        }

        config.onRetry?.(lastError, attempt);

        const jitter = delay * 0.2 * (Math.random() - 0.5);
        await sleep(Math.max(0, delay + jitter));

        delay = Math.min(delay * config.factor, config.maxDelay);
      }
    }
  }
