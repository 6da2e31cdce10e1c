/**
 * kubectl error handling utilities with actionable guidance
 */

import type { ErrorGuidance } from '@/types';
import { createErrorGuidanceBuilder, messagePattern, type ErrorPattern } from '@/lib/error-guidance';

/**
 * kubectl stderr patterns in order of specificity
 */
const kubectlErrorPatterns: ErrorPattern[] = [
  messagePattern(['executable file not found', 'enoent'], {
    message: 'kubectl not found',
    hint: 'kubectl (or the aws CLI used by the kubeconfig exec plugin) is not on PATH',
    resolution: 'Install kubectl and the AWS CLI v2 and make sure both are on PATH.',
  }),

  messagePattern(['unauthorized', 'must be logged in', 'token has expired'], {
    message: 'Kubernetes authentication failed',
    hint: 'The cluster rejected the token produced by the kubeconfig',
    resolution: 'Check that the profile maps to a role with access to the cluster (EKS access entries or aws-auth).',
  }),

  messagePattern(['forbidden'], {
    message: 'Kubernetes authorization failed',
    hint: 'The identity lacks RBAC permission for this command',
    resolution: 'Verify RBAC permissions with `kubectl auth can-i <verb> <resource>`.',
  }),

  messagePattern(['connection refused', 'no such host', 'i/o timeout', 'unable to connect'], {
    message: 'Cannot connect to Kubernetes cluster',
    hint: 'The API server endpoint could not be reached',
    resolution: 'Check network access to the cluster endpoint (VPN, private endpoint, security groups).',
  }),

  messagePattern(['unknown command', 'unknown flag', 'unknown shorthand flag'], {
    message: 'Invalid kubectl arguments',
    hint: 'kubectl rejected the command line',
    resolution: 'Run the same command with plain kubectl to check its syntax.',
  }),
];

function defaultKubectlGuidance(error: unknown): ErrorGuidance {
  return {
    message: 'kubectl command failed',
    hint: 'kubectl exited with an error',
    resolution: 'Re-run the command against the single cluster with `kubectl --kubeconfig <file>`.',
    details: { stderr: String(error) },
  };
}

const extractGuidance = createErrorGuidanceBuilder(kubectlErrorPatterns, defaultKubectlGuidance);

/**
 * Extract guidance from kubectl stderr
 */
export function extractKubectlErrorGuidance(stderr: string): ErrorGuidance {
  return extractGuidance(new Error(stderr));
}
