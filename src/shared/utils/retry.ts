/**
 * Retry with Backoff
 *
 * Generic retry utility for sub-operations that fail transiently
 * (indicator queries racing a navigation, for instance).
 * The resolver's outer attempt loop is separate; this is for single calls.
 */
import { logger as defaultLogger, Logger } from "../../monitoring/logger";

export interface RetryOptions {
  /** Maximum number of attempts (including the first) */
  maxAttempts: number;
  /** Initial delay in milliseconds before first retry */
  initialDelayMs: number;
  /** Multiply delay by this factor on each retry (default: 2) */
  backoffFactor?: number;
  /** Randomize each delay by ±20% (default: true) */
  jitter?: boolean;
  /** Optional label for log messages */
  label?: string;
  /** Errors this returns false for are rethrown without retrying */
  shouldRetry?: (error: Error) => boolean;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

/**
 * Executes an async function, retrying failures with backoff.
 *
 * @returns The result of fn() on success
 * @throws The last error if all attempts are exhausted, or the first
 *         error shouldRetry rejects
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const {
    maxAttempts,
    initialDelayMs,
    backoffFactor = 2,
    jitter = true,
    label = "operation",
    shouldRetry = () => true,
    sleep: wait = sleep,
    logger = defaultLogger,
  } = options;
  const attempts = Math.max(1, maxAttempts);
  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (!shouldRetry(lastError)) {
        throw lastError;
      }

      if (attempt === attempts) {
        logger.warn(
          { attempt, maxAttempts: attempts, error: lastError.message, label },
          `${label} failed after ${attempts} attempts`
        );
        throw lastError;
      }

      const delay = initialDelayMs * Math.pow(backoffFactor, attempt - 1);
      const actualDelay = jitter
        ? Math.round(delay + delay * 0.2 * (Math.random() * 2 - 1))
        : delay;

      logger.debug(
        { attempt, maxAttempts: attempts, delay: actualDelay, error: lastError.message, label },
        `${label} attempt ${attempt} failed, retrying in ${actualDelay}ms`
      );

      await wait(actualDelay);
    }
  }

  // Unreachable: the loop either returns or throws
  throw lastError ?? new Error(`${label} did not run`);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function secondsToMs(seconds: number): number {
  return Math.round(seconds * 1000);
}
