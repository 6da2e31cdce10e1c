/**
 * Logger utilities built on pino.
 *
 * Logs go to stderr so stdout carries only the merged table or log stream.
 */

import pino, { type LoggerOptions } from 'pino';

export type Logger = pino.Logger;

export interface CreateLoggerOptions {
  name?: string;
  level?: string;
}

function resolveLevel(explicit?: string): string {
  if (explicit) return explicit;
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.NODE_ENV === 'development' ? 'debug' : 'info';
}

/**
 * Create a pino logger writing synchronously to stderr
 *
 * Synchronous writes keep log lines from being lost when the CLI calls
 * `process.exit` right after a fatal error.
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const loggerOptions: LoggerOptions = {
    name: options.name ?? 'multikube',
    level: resolveLevel(options.level),
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: ['credentials', '*.credentials', 'secretAccessKey', '*.secretAccessKey', 'sessionToken'],
      censor: '[REDACTED]',
    },
  };

  return pino(loggerOptions, pino.destination({ dest: 2, sync: true }));
}

export interface Timer {
  end(context?: Record<string, unknown>): number;
  error(error: unknown, context?: Record<string, unknown>): number;
  checkpoint(label: string, context?: Record<string, unknown>): void;
}

/**
 * Time an operation and log its duration at debug level
 */
export function createTimer(logger: Logger, operation: string): Timer {
  const start = Date.now();

  return {
    end(context = {}) {
      const durationMs = Date.now() - start;
      logger.debug({ ...context, operation, durationMs }, `${operation} completed`);
      return durationMs;
    },
    error(error, context = {}) {
      const durationMs = Date.now() - start;
      logger.debug({ ...context, operation, durationMs, error: String(error) }, `${operation} failed`);
      return durationMs;
    },
    checkpoint(label, context = {}) {
      logger.debug(
        { ...context, operation, checkpoint: label, elapsedMs: Date.now() - start },
        `${operation}: ${label}`,
      );
    },
  };
}
