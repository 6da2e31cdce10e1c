/**
 * Centralized error formatting for CLI commands
 * Ensures consistent error messages and exit behavior
 */

import type { Result } from '@/types/core';
import { extractErrorMessage } from '@/lib/errors';

/**
 * Standard error formatting for CLI commands
 */
function formatError(message: string, error?: unknown): string {
  const prefix = '❌';
  const baseMessage = `${prefix} ${message}`;

  if (!error) {
    return baseMessage;
  }

  if (typeof error === 'string') {
    return error === message ? baseMessage : `${baseMessage}: ${error}`;
  }

  return `${baseMessage}: ${extractErrorMessage(error)}`;
}

/**
 * Lines printed for a failed result: the error, then the hint and resolution
 * when the failure carries guidance
 */
export function formatResultError(result: Result<unknown>, message: string): string[] {
  if (result.ok) {
    return [];
  }
  const lines = [formatError(message, result.error)];
  if (result.guidance?.hint) {
    lines.push(`   Hint: ${result.guidance.hint}`);
  }
  if (result.guidance?.resolution) {
    lines.push(`   Resolution: ${result.guidance.resolution}`);
  }
  return lines;
}

/**
 * Handle Result errors consistently across CLI commands
 */
export function handleResultError<T>(result: Result<T>, message: string): never {
  if (result.ok) {
    throw new Error('Called handleResultError on successful result');
  }

  for (const line of formatResultError(result, message)) {
    console.error(line);
  }
  process.exit(1);
}

/**
 * Handle generic errors consistently across CLI commands
 */
export function handleGenericError(message: string, error?: unknown): never {
  console.error(formatError(message, error));
  process.exit(1);
}
