/**
 * Environment Variable Parsing Utilities
 *
 * Typed readers for the MULTIKUBE_* variables with consistent default handling.
 * Every reader takes the environment explicitly so configuration can be built
 * from an injected map in tests.
 */

export type EnvSource = Readonly<Record<string, string | undefined>>;

/**
 * Parse integer from environment variable with default
 *
 * @example
 * parseIntEnv('MULTIKUBE_CONCURRENCY', 8) // 8 if unset or not a number
 */
export function parseIntEnv(key: string, defaultValue: number, env: EnvSource = process.env): number {
  const value = env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse a duration given in seconds and return milliseconds
 *
 * @example
 * parseSecondsEnv('MULTIKUBE_CACHE_TTL', 3600) // 3_600_000 when unset
 */
export function parseSecondsEnv(
  key: string,
  defaultSeconds: number,
  env: EnvSource = process.env,
): number {
  return parseIntEnv(key, defaultSeconds, env) * 1000;
}

/**
 * Parse string from environment variable with default.
 * An empty string counts as unset.
 */
export function parseStringEnv(key: string, defaultValue: string, env: EnvSource = process.env): string {
  const value = env[key];
  return value === undefined || value === '' ? defaultValue : value;
}

/**
 * Parse boolean from environment variable with default
 *
 * Recognizes 'true' / '1' / 'yes' and 'false' / '0' / 'no'; anything else yields the default.
 */
export function parseBoolEnv(key: string, defaultValue: boolean, env: EnvSource = process.env): boolean {
  const value = env[key];
  if (value === undefined) return defaultValue;
  const lower = value.toLowerCase();
  if (lower === 'false' || lower === '0' || lower === 'no') return false;
  if (lower === 'true' || lower === '1' || lower === 'yes') return true;
  return defaultValue;
}
