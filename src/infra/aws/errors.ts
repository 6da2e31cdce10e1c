/**
 * AWS error handling utilities with actionable guidance
 *
 * Every guidance produced here carries `details.reason`, which tells the
 * session manager whether logging in again can help.
 */

import type { ErrorGuidance, IdentityFailureReason } from '@/types';
import { createErrorGuidanceBuilder, messagePattern, type ErrorPattern } from '@/lib/error-guidance';
import { extractErrorMessage } from '@/lib/errors';

const withReason =
  (reason: IdentityFailureReason, guidance: Omit<ErrorGuidance, 'details'>) =>
  (error: unknown): ErrorGuidance => ({
    ...guidance,
    details: { reason, originalError: extractErrorMessage(error) },
  });

/**
 * AWS error patterns in order of specificity
 */
const awsErrorPatterns: ErrorPattern[] = [
  // Expired or missing SSO token: recoverable by `aws sso login`
  messagePattern(
    [
      'sso session',
      'token is expired',
      'token has expired',
      'expiredtoken',
      'sso token',
      'aws sso login',
      'unauthorizedssotoken',
    ],
    withReason('auth-expired', {
      message: 'AWS SSO session expired',
      hint: 'The cached SSO token for this profile is missing or expired',
      resolution: 'Log in again with `aws sso login --profile <profile>`',
    }),
  ),

  messagePattern(
    ['could not be found', 'profile not found', 'could not resolve credentials', 'missing credentials'],
    withReason('credentials', {
      message: 'AWS credentials unavailable',
      hint: 'The profile does not exist or has no usable credential source',
      resolution: 'Check the profile in ~/.aws/config (or AWS_CONFIG_FILE)',
    }),
  ),

  messagePattern(
    ['accessdenied', 'not authorized'],
    withReason('credentials', {
      message: 'AWS access denied',
      hint: 'The role behind this profile lacks the required permission',
      resolution: 'Grant sts:GetCallerIdentity and eks:ListClusters / eks:DescribeCluster to the role',
    }),
  ),

  messagePattern(
    ['enotfound', 'econnrefused', 'etimedout', 'network'],
    withReason('credentials', {
      message: 'Cannot reach AWS',
      hint: 'The AWS endpoint could not be reached',
      resolution: 'Check network connectivity and proxy settings',
    }),
  ),
];

const defaultAwsGuidance = withReason('credentials', {
  message: 'AWS call failed',
  hint: 'An unexpected error was returned by AWS',
  resolution: 'Run the same operation with the AWS CLI to see the full error',
});

const extractGuidance = createErrorGuidanceBuilder(awsErrorPatterns, defaultAwsGuidance);

/**
 * Extract error with actionable guidance for AWS operations
 */
export function extractAwsErrorGuidance(error: unknown): ErrorGuidance {
  return extractGuidance(error);
}
