/**
 * Retry with Exponential Backoff
 *
 * Generic retry utility for steps that can fail transiently
 * (login page load, report downloads).
 * CAPTCHA retries have their own controller because every attempt
 * needs a fresh challenge, not just a delay.
 */
import { logger } from "../../monitoring/logger";

export interface RetryOptions {
  /** Maximum number of attempts (including the first) */
  maxAttempts: number;
  /** Initial delay in milliseconds before first retry */
  initialDelayMs: number;
  /** Multiply delay by this factor on each retry (default: 2) */
  backoffFactor?: number;
  /** Optional label for log messages */
  label?: string;
  /** Return false to stop retrying and rethrow immediately */
  shouldRetry?: (error: Error) => boolean;
}

/**
 * Executes an async function with exponential backoff retry.
 *
 * @param fn - Async function to execute, receives the 1-based attempt number
 * @returns The result of fn() on success
 * @throws The last error if all attempts are exhausted or shouldRetry declines
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const {
    maxAttempts,
    initialDelayMs,
    backoffFactor = 2,
    label = "operation",
    shouldRetry = () => true,
  } = options;
  let lastError: Error = new Error(`${label} was not attempted`);

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (!shouldRetry(lastError)) {
        throw lastError;
      }

      if (attempt === maxAttempts) {
        logger.error(
          { attempt, maxAttempts, error: lastError.message, label },
          `${label} failed after ${maxAttempts} attempts`
        );
        throw lastError;
      }

      const delay = initialDelayMs * Math.pow(backoffFactor, attempt - 1);
      // Jitter (±20%)
      const jitter = delay * 0.2 * (Math.random() * 2 - 1);
      const actualDelay = Math.round(delay + jitter);

      logger.warn(
        { attempt, maxAttempts, delay: actualDelay, error: lastError.message, label },
        `${label} attempt ${attempt} failed, retrying in ${actualDelay}ms`
      );

      await sleep(actualDelay);
    }
  }

  throw lastError;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
