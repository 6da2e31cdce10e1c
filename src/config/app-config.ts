/**
 * Unified Application Configuration
 *
 * One explicit configuration object, built once at process start from the
 * environment and passed to every component factory. Tests build their own
 * with overrides instead of touching process-wide state.
 */

import os from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { Failure, Success, type Result } from '@/types';
import { ONE_YEAR_SECONDS, STORE_FILES, DEFAULT_TIMEOUTS } from './constants';
import { RETRY_CONFIG } from './retry';
import { parseBoolEnv, parseIntEnv, parseSecondsEnv, parseStringEnv, type EnvSource } from './env-utils';

const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const AppConfigSchema = z.object({
  paths: z.object({
    baseDir: z.string().min(1),
    inventoryFile: z.string().min(1),
    kubeconfigDir: z.string().min(1),
    contextsFile: z.string().min(1),
    defaultContextFile: z.string().min(1),
    regionsFile: z.string().min(1),
  }),
  cache: z.object({
    inventoryTtlMs: z.number().int().nonnegative(),
    kubeconfigTtlMs: z.number().int().nonnegative(),
  }),
  execution: z.object({
    concurrency: z.number().int().positive(),
    retryAttempts: z.number().int().positive(),
    retryBaseDelayMs: z.number().int().nonnegative(),
    commandTimeoutMs: z.number().int().positive(),
    lockTimeoutMs: z.number().int().positive(),
  }),
  output: z.object({
    sortByCluster: z.boolean(),
  }),
  logging: z.object({
    level: LogLevelSchema,
  }),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;

export type AppConfigOverrides = { [K in keyof AppConfig]?: Partial<AppConfig[K]> };

export interface CreateAppConfigOptions {
  env?: EnvSource;
  overrides?: AppConfigOverrides;
}

function storePaths(baseDir: string): AppConfig['paths'] {
  return {
    baseDir,
    inventoryFile: join(baseDir, STORE_FILES.inventory),
    kubeconfigDir: join(baseDir, STORE_FILES.kubeconfigDir),
    contextsFile: join(baseDir, STORE_FILES.contexts),
    defaultContextFile: join(baseDir, STORE_FILES.defaultContext),
    regionsFile: join(baseDir, STORE_FILES.regions),
  };
}

/**
 * Create configuration with environment variable overrides and validation
 *
 * Environment:
 * - MULTIKUBE_HOME: base directory (default ~/.multikube)
 * - MULTIKUBE_CACHE_TTL / MULTIKUBE_KUBECONFIG_TTL: seconds (default one year)
 * - MULTIKUBE_CONCURRENCY: worker pool size (default host parallelism)
 * - MULTIKUBE_COMMAND_TIMEOUT: seconds per kubectl invocation (default 20)
 * - MULTIKUBE_SORT_OUTPUT: sort merged rows by cluster name
 * - LOG_LEVEL: pino level
 */
export function createAppConfig(options: CreateAppConfigOptions = {}): Result<AppConfig> {
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};

  const baseDir =
    overrides.paths?.baseDir ??
    parseStringEnv('MULTIKUBE_HOME', join(os.homedir(), STORE_FILES.home), env);

  const rawConfig = {
    paths: { ...storePaths(baseDir), ...overrides.paths },
    cache: {
      inventoryTtlMs: parseSecondsEnv('MULTIKUBE_CACHE_TTL', ONE_YEAR_SECONDS, env),
      kubeconfigTtlMs: parseSecondsEnv('MULTIKUBE_KUBECONFIG_TTL', ONE_YEAR_SECONDS, env),
      ...overrides.cache,
    },
    execution: {
      concurrency: parseIntEnv('MULTIKUBE_CONCURRENCY', os.availableParallelism(), env),
      retryAttempts: RETRY_CONFIG.MAX_ATTEMPTS,
      retryBaseDelayMs: RETRY_CONFIG.BASE_DELAY_MS,
      commandTimeoutMs: parseSecondsEnv(
        'MULTIKUBE_COMMAND_TIMEOUT',
        DEFAULT_TIMEOUTS.kubectl / 1000,
        env,
      ),
      lockTimeoutMs: DEFAULT_TIMEOUTS.lock,
      ...overrides.execution,
    },
    output: {
      sortByCluster: parseBoolEnv('MULTIKUBE_SORT_OUTPUT', false, env),
      ...overrides.output,
    },
    logging: {
      level: parseStringEnv('LOG_LEVEL', 'info', env),
      ...overrides.logging,
    },
  };

  const parsed = AppConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    return Failure(`Invalid configuration: ${issues}`, {
      message: 'Invalid configuration',
      hint: 'One of the MULTIKUBE_* or LOG_LEVEL environment values is out of range',
      resolution: 'Check the environment variables listed in `multikube --help`',
      details: { code: 'CONFIGURATION_INVALID', issues: parsed.error.issues },
    });
  }
  return Success(parsed.data);
}
