/**
 * AWS identity through STS GetCallerIdentity, with SSO login delegated to the AWS CLI
 */

import { GetCallerIdentityCommand, STSClient } from '@aws-sdk/client-sts';
import { fromIni } from '@aws-sdk/credential-providers';
import type { Logger } from 'pino';
import { Failure, Success, type IdentityProvider, type Result } from '@/types';
import { extractErrorMessage } from '@/lib/errors';
import { runInteractive } from '@/lib/process';
import { extractAwsErrorGuidance } from './errors';

/** STS is global; any commercial region answers GetCallerIdentity */
const FALLBACK_STS_REGION = 'us-east-1';

export interface AwsIdentityProviderOptions {
  logger: Logger;
  /** Replaces the `aws sso login` invocation */
  runLogin?: (profile: string) => Promise<Result<void>>;
}

const awsSsoLogin = (profile: string): Promise<Result<void>> =>
  runInteractive('aws', ['sso', 'login', '--profile', profile]);

export function createAwsIdentityProvider({ logger, runLogin = awsSsoLogin }: AwsIdentityProviderOptions): IdentityProvider {
  const log = logger.child({ component: 'aws-identity' });

  return {
    async getCallerAccountId(profile, region) {
      const sts = new STSClient({
        region: region ?? FALLBACK_STS_REGION,
        credentials: fromIni({ profile }),
      });
      try {
        const identity = await sts.send(new GetCallerIdentityCommand({}));
        if (!identity.Account) {
          return Failure(`GetCallerIdentity returned no account for profile ${profile}`, {
            message: 'AWS identity has no account',
            details: { reason: 'credentials', profile },
          });
        }
        return Success(identity.Account);
      } catch (error) {
        const guidance = extractAwsErrorGuidance(error);
        log.debug({ profile, region, error: extractErrorMessage(error) }, guidance.message);
        return Failure(extractErrorMessage(error), guidance);
      } finally {
        sts.destroy();
      }
    },

    login(profile) {
      return runLogin(profile);
    },
  };
}
