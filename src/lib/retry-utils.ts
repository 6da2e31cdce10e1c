/**
 * Retry Utilities
 *
 * Exponential backoff around operations that return a Result. Only `ok: false`
 * results and thrown errors are retried; an operation that wants a terminal
 * outcome (a timeout, an expected empty answer) returns it as a success.
 */

import { type Result, Failure } from '@/types';
import { RETRY_CONFIG } from '@/config/retry';
import { extractErrorMessage } from './errors';

export type Sleep = (ms: number) => Promise<void>;

/**
 * Configuration for exponential backoff retry
 */
export interface RetryConfig {
  /** Maximum number of attempts (including initial) */
  readonly maxAttempts: number;
  /** Delay in milliseconds before the first retry */
  readonly baseDelayMs: number;
  /** Exponential multiplier for each retry */
  readonly exponentialBase: number;
  /** Called before sleeping ahead of the next attempt */
  readonly onRetry?: (attempt: RetryAttempt) => void;
  /** Injected for tests; defaults to a timer-based sleep */
  readonly sleep?: Sleep;
}

/**
 * Retry attempt information
 */
export interface RetryAttempt {
  readonly attemptNumber: number;
  readonly totalAttempts: number;
  readonly delay: number;
  readonly error: unknown;
}

export interface RetryResult<T> {
  readonly result: Result<T>;
  readonly attempts: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: RETRY_CONFIG.MAX_ATTEMPTS,
  baseDelayMs: RETRY_CONFIG.BASE_DELAY_MS,
  exponentialBase: RETRY_CONFIG.EXPONENTIAL_BASE,
};

/**
 * Performs operation with exponential backoff retry logic
 *
 * The delay after failed attempt `n` (1-based) is
 * `baseDelayMs * exponentialBase^(n-1)`.
 */
export async function withExponentialBackoff<T>(
  operation: () => Promise<Result<T>>,
  config: Partial<RetryConfig> = {},
): Promise<RetryResult<T>> {
  const finalConfig: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...config };
  const sleep = finalConfig.sleep ?? defaultSleep;

  let lastError: unknown;
  let lastFailure: Result<T> | undefined;

  for (let attempt = 1; attempt <= finalConfig.maxAttempts; attempt++) {
    let error: unknown;
    try {
      const result = await operation();
      if (result.ok) {
        return { result, attempts: attempt };
      }
      lastFailure = result;
      error = result.error;
    } catch (thrown) {
      lastFailure = undefined;
      error = thrown;
    }
    lastError = error;

    if (attempt === finalConfig.maxAttempts) {
      break;
    }

    const delay = calculateDelay(attempt - 1, finalConfig);
    finalConfig.onRetry?.({
      attemptNumber: attempt,
      totalAttempts: finalConfig.maxAttempts,
      delay,
      error,
    });
    await sleep(delay);
  }

  return {
    result:
      lastFailure ??
      Failure(
        `All ${finalConfig.maxAttempts} retry attempts failed. Last error: ${extractErrorMessage(lastError)}`,
      ),
    attempts: finalConfig.maxAttempts,
  };
}

/**
 * Delay before retry number `attemptIndex + 1`
 */
export function calculateDelay(
  attemptIndex: number,
  config: Pick<RetryConfig, 'baseDelayMs' | 'exponentialBase'>,
): number {
  return config.baseDelayMs * Math.pow(config.exponentialBase, attemptIndex);
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
