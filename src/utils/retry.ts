/**
 * Bounded retry with linear backoff.
 *
 * The unit of retry is a single HTTP request: attempt N (1-indexed) that fails
 * is followed by a wait of `N * baseDelayMs`, except after the final attempt.
 *
 * @module utils/retry
 */

import { logger } from './logger';
import { AppError, ErrorCode, HttpError, errorMessage } from './errors';

export interface RetryOptions {
  /** Total attempts including the first one (default: 5) */
  maxAttempts?: number;
  /** Delay unit in milliseconds; the wait before retry N is N * baseDelayMs (default: 1000) */
  baseDelayMs?: number;
  /** Predicate to decide if an error is retryable. Return true to retry. */
  retryOn?: (error: unknown) => boolean;
  /** Label used in log lines and in the terminal error */
  label?: string;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Default retry predicate: network failures, timeouts, 429 and 5xx are transient.
 * Other 4xx responses are answers, not failures, and go straight back to the caller.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof HttpError) {
    return error.status === 429 || error.status >= 500;
  }

  if (error instanceof AppError) {
    return error.code === ErrorCode.TIMEOUT || error.code === ErrorCode.HTTP_ERROR;
  }

  // fetch rejects with TypeError('fetch failed') for connection resets, DNS, TLS
  return error instanceof Error;
}

/**
 * Wait before retrying after the given (1-indexed) failed attempt
 */
export function computeDelay(attempt: number, baseDelayMs: number): number {
  return attempt * baseDelayMs;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute a function with retry logic and linear backoff.
 *
 * @throws AppError(EXTRACTION_ERROR) carrying the last failure once all attempts are used
 * @throws the original error when `retryOn` rejects it
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? 5);
  const baseDelayMs = options.baseDelayMs ?? 1000;
  const retryOn = options.retryOn ?? isTransientError;
  const wait = options.sleep ?? sleep;
  const label = options.label ?? 'request';
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!retryOn(error)) {
        throw error;
      }

      lastError = error;

      if (attempt === maxAttempts) {
        break;
      }

      const delay = computeDelay(attempt, baseDelayMs);

      logger.warn('Retrying after transient error', {
        label,
        attempt,
        maxAttempts,
        delayMs: delay,
        error: errorMessage(error)
      });

      await wait(delay);
    }
  }

  throw new AppError(
    ErrorCode.EXTRACTION_ERROR,
    `${label} failed after ${maxAttempts} attempts: ${errorMessage(lastError)}`,
    { attempts: maxAttempts, cause: errorMessage(lastError) }
  );
}
