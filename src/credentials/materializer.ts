/**
 * Kubeconfig materializer
 *
 * Produces one kubeconfig per (account, cluster) under the kubeconfig
 * directory and reuses it until it is older than the kubeconfig TTL.
 */

import path from 'node:path';
import type { Logger } from 'pino';
import { Failure, Success, type AccessConfigGenerator, type Profile, type Region, type Result } from '@/types';
import type { AppConfig } from '@/config';
import { KUBECONFIG_EXTENSION } from '@/config/constants';
import { extractErrorMessage } from '@/lib/errors';
import { isFileFresh } from '@/lib/file-utils';
import { createKeyedMutex } from '@/lib/mutex';
import { validateKubeconfig } from '@/infra/kubernetes/kubeconfig';
import type { SessionManager } from './session';

export interface KubeconfigMaterializer {
  /** Path of a valid kubeconfig for the cluster, generating it when missing or stale */
  ensure(clusterName: string, profile: Profile, region: Region): Promise<Result<string>>;
}

export interface KubeconfigMaterializerDeps {
  config: Pick<AppConfig, 'paths' | 'cache' | 'execution'>;
  session: SessionManager;
  generator: AccessConfigGenerator;
  logger: Logger;
  now?: () => number;
}

export function kubeconfigKey(accountId: string, clusterName: string): string {
  return `${accountId}-${clusterName}`;
}

export function createKubeconfigMaterializer({
  config,
  session,
  generator,
  logger,
  now = Date.now,
}: KubeconfigMaterializerDeps): KubeconfigMaterializer {
  const log = logger.child({ component: 'materializer' });
  const generation = createKeyedMutex({ defaultTimeout: config.execution.lockTimeoutMs });
  const ttlMs = config.cache.kubeconfigTtlMs;

  const generate = async (
    key: string,
    kubeconfigPath: string,
    clusterName: string,
    profile: Profile,
    region: Region,
  ): Promise<Result<string>> => {
    // The unit holding the lock before this one may have just written the file
    if (await isFileFresh(kubeconfigPath, ttlMs, now())) {
      return Success(kubeconfigPath);
    }

    log.debug({ cluster: clusterName, profile, region, key }, 'Generating kubeconfig');
    const generated = await generator.generateAccessConfig(clusterName, profile, region, kubeconfigPath);
    if (!generated.ok) {
      return generated;
    }

    const validated = validateKubeconfig(kubeconfigPath);
    if (!validated.ok) {
      return validated;
    }
    log.debug({ cluster: clusterName, context: validated.value.contextName }, 'Kubeconfig ready');
    return Success(kubeconfigPath);
  };

  return {
    async ensure(clusterName, profile, region) {
      const account = await session.ensureSession(profile, { region });
      if (!account.ok) {
        return account;
      }

      const key = kubeconfigKey(account.value, clusterName);
      const kubeconfigPath = path.join(config.paths.kubeconfigDir, `${key}${KUBECONFIG_EXTENSION}`);

      if (await isFileFresh(kubeconfigPath, ttlMs, now())) {
        return Success(kubeconfigPath);
      }

      try {
        return await generation.withLock(key, () =>
          generate(key, kubeconfigPath, clusterName, profile, region),
        );
      } catch (error) {
        return Failure(`Kubeconfig for ${clusterName} not ready: ${extractErrorMessage(error)}`, {
          message: 'Kubeconfig generation did not complete',
          hint: 'Another unit was still generating the same kubeconfig',
          resolution: 'Run the command again',
          details: { key },
        });
      }
    },
  };
}
