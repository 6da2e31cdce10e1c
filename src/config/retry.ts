/**
 * Backoff for a kubectl invocation that failed on one cluster: three attempts
 * in total, sleeping 2 s and then 4 s between them.
 */
export const RETRY_CONFIG = {
  MAX_ATTEMPTS: 3,
  BASE_DELAY_MS: 2000,
  EXPONENTIAL_BASE: 2,
} as const;
