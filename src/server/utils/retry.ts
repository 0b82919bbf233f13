/**
 * Retry Utility with Exponential Backoff
 *
 * Provides a centralized retry mechanism with exponential backoff and jitter
 * for transient failures. Sleeps between attempts can be interrupted through
 * an AbortSignal.
 */

import { logger } from './logger.js';
import { RunCancelledError } from '../types/errors.js';

/**
 * Configuration for retry behavior
 */
export interface RetryConfig {
  /** Total number of attempts including the first one (default: 3) */
  maxAttempts?: number;
  /** Initial delay in milliseconds (default: 1000) */
  initialDelay?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelay?: number;
  /** Exponential backoff multiplier (default: 2) */
  multiplier?: number;
  /** Relative jitter applied to each delay, 0.2 means ±20% (default: 0) */
  jitterRatio?: number;
  /** Source of randomness for jitter, in [0, 1) */
  random?: () => number;
  /** Function to determine if an error is retryable (default: retries on transient errors) */
  isRetryable?: (error: unknown) => boolean;
  /** Stops further attempts and interrupts the backoff sleep */
  signal?: AbortSignal;
}

/**
 * Default retry configuration
 */
const DEFAULT_RETRY_CONFIG = {
  maxAttempts: 3,
  initialDelay: 1000,
  maxDelay: 30000,
  multiplier: 2,
  jitterRatio: 0,
};

/**
 * Default retryable error detection
 * Retries on transient errors: 429, 5xx, ECONNRESET, ETIMEDOUT
 */
function defaultIsRetryable(error: unknown): boolean {
  // Check for ServiceConnectionError (has statusCode)
  if (error && typeof error === 'object' && 'statusCode' in error) {
    const status = error.statusCode;
    if (typeof status === 'number') {
      if (status === 408 || status === 429 || (status >= 500 && status < 600)) {
        return true;
      }
      if (status >= 400 && status < 500) {
        return false;
      }
    }
  }

  // Check for ServiceRateLimitError (by name)
  if (error && typeof error === 'object' && 'name' in error) {
    if (error.name === 'ServiceRateLimitError') {
      return true;
    }
  }

  // Check for network error codes
  if (error && typeof error === 'object' && 'code' in error) {
    const code = error.code;
    if (code === 'ECONNRESET' || code === 'ETIMEDOUT' || code === 'ECONNREFUSED') {
      return true;
    }
  }

  // Check for error messages
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    if (
      message.includes('timeout') ||
      message.includes('timed out') ||
      message.includes('connection') ||
      message.includes('network') ||
      message.includes('econnreset') ||
      message.includes('etimedout')
    ) {
      return true;
    }
  }

  return false;
}

/**
 * Calculate exponential backoff delay: initialDelay * multiplier^attempt,
 * capped at maxDelay, then spread by ±jitterRatio and capped again.
 *
 * @param attempt - Current attempt number (0-indexed)
 */
export function calculateBackoffDelay(
  attempt: number,
  config: Pick<RetryConfig, 'initialDelay' | 'multiplier' | 'maxDelay' | 'jitterRatio' | 'random'> = {}
): number {
  const initialDelay = config.initialDelay ?? DEFAULT_RETRY_CONFIG.initialDelay;
  const multiplier = config.multiplier ?? DEFAULT_RETRY_CONFIG.multiplier;
  const maxDelay = config.maxDelay ?? DEFAULT_RETRY_CONFIG.maxDelay;
  const jitterRatio = config.jitterRatio ?? DEFAULT_RETRY_CONFIG.jitterRatio;
  const random = config.random ?? Math.random;

  const base = Math.min(initialDelay * Math.pow(multiplier, attempt), maxDelay);
  if (jitterRatio <= 0) {
    return Math.round(base);
  }
  const spread = base * jitterRatio * (2 * random() - 1);
  return Math.max(0, Math.round(Math.min(base + spread, maxDelay)));
}

/**
 * Extract a retry-after hint (ServiceRateLimitError.retryAfterSeconds)
 *
 * @returns Retry-After value in milliseconds, or null if not present
 */
function getRetryAfterDelay(error: unknown): number | null {
  if (error && typeof error === 'object' && 'retryAfterSeconds' in error) {
    const seconds = error.retryAfterSeconds;
    if (typeof seconds === 'number' && seconds > 0) {
      return seconds * 1000;
    }
  }
  return null;
}

/**
 * Sleep that rejects with RunCancelledError as soon as the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new RunCancelledError());
  }
  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new RunCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Retry an operation with exponential backoff
 *
 * Non-retryable errors are rethrown immediately. A retryable error is
 * rethrown only once every attempt has been used.
 *
 * @param operation - The operation to retry; receives the 0-indexed attempt number
 * @param config - Retry configuration
 * @param context - Optional context for logging (e.g., operation name)
 * @throws RunCancelledError when the signal aborts between attempts
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  config: RetryConfig = {},
  context?: string
): Promise<T> {
  const {
    maxAttempts = DEFAULT_RETRY_CONFIG.maxAttempts,
    maxDelay = DEFAULT_RETRY_CONFIG.maxDelay,
    isRetryable = defaultIsRetryable,
    signal,
  } = config;

  let lastError: unknown;
  const contextStr = context ? ` (${context})` : '';

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    if (signal?.aborted) {
      throw new RunCancelledError();
    }

    try {
      const result = await operation(attempt);

      if (attempt > 0) {
        logger.info(
          { attempt: attempt + 1, maxAttempts, context },
          `Operation succeeded after ${attempt} retry attempts${contextStr}`
        );
      }

      return result;
    } catch (error) {
      lastError = error;

      if (!isRetryable(error)) {
        logger.debug(
          {
            attempt: attempt + 1,
            maxAttempts,
            error: error instanceof Error ? error.message : String(error),
            context,
          },
          `Non-retryable error encountered${contextStr}`
        );
        throw error;
      }

      if (attempt >= maxAttempts - 1) {
        logger.error(
          {
            attempt: attempt + 1,
            maxAttempts,
            error: error instanceof Error ? error.message : String(error),
            context,
          },
          `Operation failed after ${maxAttempts} attempts${contextStr}`
        );
        throw error;
      }

      let delay: number;
      const retryAfterDelay = getRetryAfterDelay(error);
      if (retryAfterDelay !== null) {
        delay = Math.min(retryAfterDelay, maxDelay);
        logger.warn(
          { attempt: attempt + 1, maxAttempts, delay, retryAfter: retryAfterDelay, context },
          `Rate limit detected, using Retry-After delay${contextStr}`
        );
      } else {
        delay = calculateBackoffDelay(attempt, config);
      }

      logger.warn(
        {
          attempt: attempt + 1,
          maxAttempts,
          delay,
          error: error instanceof Error ? error.message : String(error),
          context,
        },
        `Retrying operation${contextStr} (attempt ${attempt + 1}/${maxAttempts})`
      );

      await sleep(delay, signal);
    }
  }

  // Only reachable when maxAttempts < 1
  throw lastError ?? new Error('Operation was not attempted');
}

/**
 * Check if an error is retryable using default logic
 */
export function isRetryableError(error: unknown): boolean {
  return defaultIsRetryable(error);
}
