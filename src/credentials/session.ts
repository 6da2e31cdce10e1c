/**
 * AWS session handling shared by inventory regeneration and kubeconfig materialization.
 *
 * An expired SSO session triggers exactly one login and one re-check. Logins
 * for the same profile are serialized, so concurrent units that all discover
 * an expired token open one browser flow, not one each.
 */

import type { Logger } from 'pino';
import type { IdentityFailureReason, IdentityProvider, Profile, Region, Result } from '@/types';
import { ERROR_MESSAGES, extractErrorMessage, fatalFailure } from '@/lib/errors';
import { createKeyedMutex } from '@/lib/mutex';

export interface EnsureSessionOptions {
  /** Run the login flow even when the current session is still valid */
  forceLogin?: boolean;
  region?: Region;
}

export interface SessionManager {
  /** Resolve the account id of `profile`, logging in again once if the session expired */
  ensureSession(profile: Profile, options?: EnsureSessionOptions): Promise<Result<string>>;
}

export interface SessionManagerDeps {
  identity: IdentityProvider;
  logger: Logger;
  lockTimeoutMs: number;
}

export function identityFailureReason(result: Result<unknown>): IdentityFailureReason | undefined {
  if (result.ok) return undefined;
  const reason = result.guidance?.details?.reason;
  return reason === 'auth-expired' || reason === 'credentials' ? reason : undefined;
}

export function createSessionManager({ identity, logger, lockTimeoutMs }: SessionManagerDeps): SessionManager {
  const log = logger.child({ component: 'session' });
  const loginMutex = createKeyedMutex({ defaultTimeout: lockTimeoutMs });

  const loginFailed = (profile: Profile, error: string): Result<string> =>
    fatalFailure('REAUTHENTICATION_FAILED', ERROR_MESSAGES.LOGIN_FAILED(profile), {
      hint: error,
      resolution: `Run \`aws sso login --profile ${profile}\` manually and check the sso_* settings of the profile`,
      details: { profile },
    });

  const credentialsUnavailable = (profile: Profile, error: string): Result<string> =>
    fatalFailure('CREDENTIALS_UNAVAILABLE', ERROR_MESSAGES.CREDENTIALS_UNAVAILABLE(profile), {
      hint: error,
      resolution: `Check the [profile ${profile}] section of your AWS config`,
      details: { profile },
    });

  const serialized = async <T>(profile: Profile, fn: () => Promise<Result<T>>): Promise<Result<T>> => {
    try {
      return await loginMutex.withLock(profile, fn);
    } catch (error) {
      return fatalFailure<T>('REAUTHENTICATION_FAILED', ERROR_MESSAGES.LOGIN_FAILED(profile), {
        hint: extractErrorMessage(error),
        resolution: 'Another login for this profile did not finish in time; run the command again',
        details: { profile },
      });
    }
  };

  const loginAndRecheck = (profile: Profile, region: Region | undefined): Promise<Result<string>> =>
    serialized(profile, async () => {
      // Another unit may have completed the login while this one waited
      const current = await identity.getCallerAccountId(profile, region);
      if (current.ok) return current;

      log.info(`SSO token for profile ${profile} is missing or expired.`);
      log.info('Attempting to log in to AWS SSO...');
      const login = await identity.login(profile);
      if (!login.ok) return loginFailed(profile, login.error);
      log.info('SSO login successful.');

      const after = await identity.getCallerAccountId(profile, region);
      return after.ok ? after : loginFailed(profile, after.error);
    });

  return {
    async ensureSession(profile, options = {}) {
      if (options.forceLogin) {
        const login = await serialized(profile, () => identity.login(profile));
        if (!login.ok) return loginFailed(profile, login.error);
        log.info('SSO login successful.');
      }

      const account = await identity.getCallerAccountId(profile, options.region);
      if (account.ok) return account;

      if (identityFailureReason(account) === 'auth-expired') {
        return loginAndRecheck(profile, options.region);
      }
      return credentialsUnavailable(profile, account.error);
    },
  };
}
