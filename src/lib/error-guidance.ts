/**
 * Error guidance pattern matching for AWS and kubectl failures
 */

import type { ErrorGuidance } from '@/types';
import { extractErrorMessage } from './errors';

/**
 * Pattern definition for matching errors and generating guidance
 */
export interface ErrorPattern {
  /** Test if this pattern matches the given error */
  match: (error: unknown) => boolean;
  /** Generate guidance for a matched error */
  guidance: (error: unknown) => ErrorGuidance;
}

/**
 * Create error guidance builder with pattern matching
 *
 * @param patterns - Patterns checked in order; the first match wins
 * @param defaultGuidance - Guidance when no pattern matches
 *
 * @example
 * ```typescript
 * const extractGuidance = createErrorGuidanceBuilder([
 *   messagePattern('AccessDenied', {
 *     message: 'Access denied',
 *     hint: 'The profile lacks eks:ListClusters',
 *     resolution: 'Grant the permission or remove the region',
 *   }),
 * ]);
 * const guidance = extractGuidance(error);
 * ```
 */
export function createErrorGuidanceBuilder(
  patterns: ErrorPattern[],
  defaultGuidance?: (error: unknown) => ErrorGuidance,
) {
  return function extractGuidance(error: unknown): ErrorGuidance {
    for (const pattern of patterns) {
      if (pattern.match(error)) {
        return pattern.guidance(error);
      }
    }

    if (defaultGuidance) {
      return defaultGuidance(error);
    }

    return {
      message: extractErrorMessage(error),
      hint: 'An unexpected error occurred',
      resolution: 'Check the error message and logs for more details',
    };
  };
}

/**
 * Create pattern that matches any of the given substrings (case-insensitive)
 * in the error message or error name
 */
export function messagePattern(
  substrings: string | readonly string[],
  guidance: ErrorGuidance | ((error: unknown) => ErrorGuidance),
): ErrorPattern {
  const needles = (typeof substrings === 'string' ? [substrings] : substrings).map((s) =>
    s.toLowerCase(),
  );
  return customPattern((error: unknown) => {
    const name = error instanceof Error ? error.name : '';
    const haystack = `${name} ${extractErrorMessage(error)}`.toLowerCase();
    return needles.some((needle) => haystack.includes(needle));
  }, guidance);
}

/**
 * Create pattern with custom match function
 */
export function customPattern(
  matchFn: (error: unknown) => boolean,
  guidance: ErrorGuidance | ((error: unknown) => ErrorGuidance),
): ErrorPattern {
  return {
    match: matchFn,
    guidance: typeof guidance === 'function' ? guidance : () => guidance,
  };
}
