import { ConfigurationError } from "./errors.js";

/**
 * Configuration options for the retry mechanism.
 */
export interface RetryOptions {
  /** Total number of attempts, including the first one. 1 disables retrying. */
  maxRetries: number;
  /** Delay in milliseconds before the first retry. */
  initialDelay: number;
  /** Upper bound for the delay between attempts. */
  maxDelay: number;
  /** Backoff multiplier applied after each failed attempt. */
  factor: number;
  /** Called before each retry attempt. */
  onRetry?: (error: Error, attempt: number) => void;
  /** Returns false for errors that must fail immediately. */
  shouldRetry?: (error: Error) => boolean;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 3,
  initialDelay: 100,
  maxDelay: 5000,
  factor: 2,
  onRetry: (error, attempt) => {
    console.warn(`Retry attempt ${attempt} after error: ${error.message}`);
  },
  // Bad input does not get better by asking again.
  shouldRetry: (error) => !(error instanceof ConfigurationError),
};
