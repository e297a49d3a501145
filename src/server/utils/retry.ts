/**
 * Retry Utility with Exponential Backoff
 *
 * Boundary collaborators (PostgreSQL pools, record source queries) wrap their
 * I/O in this helper. The aggregation core itself never retries.
 */

import { logger } from './logger.js';

/**
 * Configuration for retry behavior
 */
export interface RetryConfig {
  /** Maximum number of retry attempts (default: 3) */
  maxAttempts?: number;
  /** Initial delay in milliseconds (default: 1000) */
  initialDelay?: number;
}

const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_INITIAL_DELAY = 1000;
const BACKOFF_MULTIPLIER = 2;
const MAX_DELAY = 30000;

/**
 * SQLSTATE codes PostgreSQL reports for conditions that clear up on their own
 */
const TRANSIENT_SQLSTATES = new Set([
  '40001', // serialization_failure
  '40P01', // deadlock_detected
  '53300', // too_many_connections
  '57P01', // admin_shutdown
  '57P02', // crash_shutdown
  '57P03', // cannot_connect_now
]);

/**
 * Retries on network errors and transient PostgreSQL conditions
 */
export function isTransientError(error: unknown): boolean {
  if (error && typeof error === 'object' && 'code' in error) {
    const code = error.code;
    if (typeof code === 'string') {
      if (code === 'ECONNRESET' || code === 'ETIMEDOUT' || code === 'ECONNREFUSED') {
        return true;
      }
      // Class 08: connection exceptions
      if (code.startsWith('08') || TRANSIENT_SQLSTATES.has(code)) {
        return true;
      }
    }
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    if (
      message.includes('timeout') ||
      message.includes('connection terminated') ||
      message.includes('econnreset') ||
      message.includes('etimedout')
    ) {
      return true;
    }
  }

  return false;
}

/**
 * Delay before the next attempt, doubling per attempt up to 30s
 *
 * @param attempt - Current attempt number (0-indexed)
 */
export function backoffDelay(attempt: number, initialDelay: number): number {
  return Math.min(initialDelay * Math.pow(BACKOFF_MULTIPLIER, attempt), MAX_DELAY);
}

/**
 * Retry an operation with exponential backoff
 *
 * @param operation - The operation to retry (async function)
 * @param config - Retry configuration
 * @param context - Optional context for logging (e.g., operation name)
 * @returns Result of the operation
 * @throws The last error if all retries are exhausted
 */
export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  config: RetryConfig = {},
  context?: string
): Promise<T> {
  const { maxAttempts = DEFAULT_MAX_ATTEMPTS, initialDelay = DEFAULT_INITIAL_DELAY } = config;

  let lastError: unknown;
  const contextStr = context ? ` (${context})` : '';

  for (let attempt = 0; attempt <= maxAttempts; attempt++) {
    try {
      const result = await operation();

      if (attempt > 0) {
        logger.info(
          {
            attempt: attempt + 1,
            maxAttempts: maxAttempts + 1,
            context,
          },
          `Operation succeeded after ${attempt} retry attempts${contextStr}`
        );
      }

      return result;
    } catch (error) {
      lastError = error;

      if (!isTransientError(error)) {
        logger.debug(
          {
            attempt: attempt + 1,
            maxAttempts: maxAttempts + 1,
            error: error instanceof Error ? error.message : String(error),
            context,
          },
          `Non-retryable error encountered${contextStr}`
        );
        throw error;
      }

      if (attempt >= maxAttempts) {
        logger.error(
          {
            attempt: attempt + 1,
            maxAttempts: maxAttempts + 1,
            error: error instanceof Error ? error.message : String(error),
            context,
          },
          `Operation failed after ${maxAttempts + 1} attempts${contextStr}`
        );
        throw error;
      }

      const delay = backoffDelay(attempt, initialDelay);

      logger.warn(
        {
          attempt: attempt + 1,
          maxAttempts: maxAttempts + 1,
          delay,
          error: error instanceof Error ? error.message : String(error),
          context,
        },
        `Retrying operation${contextStr} (attempt ${attempt + 1}/${maxAttempts + 1})`
      );

      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }

  // This should never be reached, but TypeScript requires it
  throw lastError || new Error('Operation failed after retries');
}
