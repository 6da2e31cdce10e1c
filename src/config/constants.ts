/**
 * Application Constants and Defaults
 */

/** One year, the default lifetime of both caches */
export const ONE_YEAR_SECONDS = 31_536_000;

/**
 * File and directory names under the multikube home directory
 */
export const STORE_FILES = {
  home: '.multikube',
  inventory: 'cluster_cache.json',
  kubeconfigDir: 'kubeconfigs',
  contexts: 'contexts.json',
  defaultContext: 'default_context.json',
  regions: 'eks_regions.json',
} as const;

export const KUBECONFIG_EXTENSION = '.kubeconfig';

/**
 * Default timeout values in milliseconds
 */
export const DEFAULT_TIMEOUTS = {
  kubectl: 20_000,
  /** Waiting on another unit that is logging in or generating the same kubeconfig */
  lock: 120_000,
} as const;

/** Sub-command whose output is streamed line by line instead of tabulated */
export const LOG_COMMAND = 'logs';

/** Sub-command assumed when no pass-through arguments are given */
export const DEFAULT_COMMAND = 'get';

/** Fixed header of the merged table */
export const TABLE_HEADERS = ['CLUSTER', 'NAME', 'READY', 'STATUS', 'RESTARTS', 'AGE'] as const;

/** Marker in kubectl stderr that classifies a failure as an expected empty result */
export const NOT_FOUND_MARKER = 'not found';
