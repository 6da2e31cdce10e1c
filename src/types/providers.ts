/**
 * Narrow interfaces to the external collaborators: the AWS identity provider,
 * EKS cluster listing, kubeconfig generation, the kubectl binary and the terminal.
 *
 * Production implementations live under `@/infra`; tests supply in-process fakes.
 */

import type { Result } from './core';
import type { Profile, Region } from './inventory';

/**
 * Why an identity lookup failed. `auth-expired` is recoverable by logging in
 * again; `credentials` needs the operator to fix their AWS configuration.
 */
export type IdentityFailureReason = 'auth-expired' | 'credentials';

export interface IdentityProvider {
  /**
   * Resolve the AWS account id behind `profile`.
   * Failures carry `guidance.details.reason` of type {@link IdentityFailureReason}.
   */
  getCallerAccountId(profile: Profile, region?: Region): Promise<Result<string>>;
  /** Run the interactive SSO login flow for `profile` */
  login(profile: Profile): Promise<Result<void>>;
}

export interface ClusterLister {
  listClusters(profile: Profile, region: Region): Promise<Result<string[]>>;
}

export interface AccessConfigGenerator {
  generateAccessConfig(
    clusterName: string,
    profile: Profile,
    region: Region,
    outputPath: string,
  ): Promise<Result<void>>;
}

/** Outcome of one kubectl invocation */
export type InvocationOutcome =
  | { kind: 'ok'; stdout: string }
  | { kind: 'failed'; stderr: string; exitCode: number | null }
  | { kind: 'timeout'; timeoutMs: number };

export interface CommandInvoker {
  invoke(configPath: string, argv: readonly string[], timeoutMs: number): Promise<InvocationOutcome>;
}

export interface ProfileSource {
  /** Where profiles are read from, for messages */
  readonly location: string;
  loadProfiles(): Promise<Profile[]>;
}

/**
 * Interactive input capability. Keeps prompts out of the caching and
 * resolution logic so those stay testable without a terminal.
 */
export interface InteractiveInput {
  input(message: string): Promise<string>;
  select(message: string, choices: readonly string[]): Promise<string>;
}
