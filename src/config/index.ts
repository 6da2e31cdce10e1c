/**
 * Configuration entry point
 */

export * from './constants';
export * from './retry';
export * from './env-utils';
export * from './app-config';
