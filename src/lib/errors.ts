/**
 * Error handling utilities and message templates
 *
 * Consolidates error utilities, centralized error messages and the codes of
 * failures that end the run.
 */

import { Failure, type ErrorGuidance, type Result } from '@/types';

// ============================================================================
// Error Message Templates
// ============================================================================

export const ERROR_MESSAGES = {
  NO_PROFILES: (configPath: string) => `No AWS profiles found in ${configPath}`,
  NO_CONTEXTS: () => 'No contexts stored. Use --store-clusters-contexts to add contexts first.',
  NO_DEFAULT_CONTEXT: () => 'No cluster pattern provided or available in the default context.',
  CONTEXT_NOT_FOUND: (name: string) => `Context ${name} not found`,
  NO_MATCHING_CLUSTERS: (pattern: string) => `No matching clusters found for the pattern ${pattern}`,
  INVALID_PATTERN: (pattern: string, reason: string) => `Invalid cluster pattern ${pattern}: ${reason}`,
  NO_REGIONS: () => 'No AWS regions configured',
  LOGIN_FAILED: (profile: string) =>
    `Failed to log in to AWS SSO for profile '${profile}'. Ensure your AWS SSO config is correct.`,
  CREDENTIALS_UNAVAILABLE: (profile: string) =>
    `Failed to retrieve credentials for profile '${profile}'. Please ensure you are logged in via SSO.`,
  CACHE_UNREADABLE: (path: string, reason: string) => `Cannot read cluster cache ${path}: ${reason}`,
  OPERATION_FAILED: (operation: string, error: string) => `${operation} failed: ${error}`,
} as const;

// ============================================================================
// Fatal failure codes
// ============================================================================

/**
 * Codes of user-actionable failures. A failure carrying one of these ends the
 * run with exit code 1; everything else is absorbed where it happens.
 */
export type FatalCode =
  | 'CONFIGURATION_MISSING'
  | 'CONFIGURATION_INVALID'
  | 'CONTEXT_NOT_FOUND'
  | 'NO_PROFILES'
  | 'NO_MATCHING_CLUSTERS'
  | 'INVALID_PATTERN'
  | 'REAUTHENTICATION_FAILED'
  | 'CREDENTIALS_UNAVAILABLE'
  | 'CACHE_UNREADABLE';

export function fatalFailure<T>(
  code: FatalCode,
  message: string,
  guidance: Omit<ErrorGuidance, 'message'> = {},
): Result<T> {
  return Failure(message, {
    ...guidance,
    message,
    details: { ...guidance.details, code },
  });
}

/**
 * Read the fatal code from a failed result, if it carries one
 */
export function failureCode(result: Result<unknown>): string | undefined {
  if (result.ok) return undefined;
  const code = result.guidance?.details?.code;
  return typeof code === 'string' ? code : undefined;
}

// ============================================================================
// Error Utilities
// ============================================================================

/**
 * Safely extracts error message from unknown error types.
 * Invariant: Always returns a string message
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Creates a formatted error message with optional context
 */
export function formatErrorMessage(context: string, error: unknown): string {
  return `${context}: ${extractErrorMessage(error)}`;
}
