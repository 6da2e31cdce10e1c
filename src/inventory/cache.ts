/**
 * Inventory Cache
 *
 * Persisted mapping of profile to `accountId/region/clusterName` entries.
 * Freshness is the file's modification time; the file is rewritten wholesale
 * on every regeneration.
 */

import type { Logger } from 'pino';
import {
  Success,
  type ClusterLister,
  type InventoryMap,
  type Profile,
  type Result,
} from '@/types';
import { formatClusterRef } from '@/types/inventory';
import type { AppConfig } from '@/config';
import { ERROR_MESSAGES, failureCode, fatalFailure } from '@/lib/errors';
import { isFileFresh, readJsonFile, writeJsonFileAtomic } from '@/lib/file-utils';
import { createTimer } from '@/lib/logger';
import type { SessionManager } from '@/credentials/session';
import type { RegionStore } from '@/store/region-store';
import { InventoryFileSchema } from '@/store/schemas';

export interface RegenerateOptions {
  /** Run the login flow on the first profile/region pair even if the session is valid */
  forceLogin?: boolean;
}

export interface InventoryCache {
  /** True iff the file exists and is younger than the inventory TTL */
  isFresh(): Promise<boolean>;
  load(): Promise<Result<InventoryMap>>;
  save(inventory: InventoryMap): Promise<Result<void>>;
  /** Rebuild from AWS for every profile and every configured region, then persist */
  regenerate(profiles: readonly Profile[], options?: RegenerateOptions): Promise<Result<InventoryMap>>;
}

export interface InventoryCacheDeps {
  config: Pick<AppConfig, 'paths' | 'cache'>;
  regions: RegionStore;
  session: SessionManager;
  lister: ClusterLister;
  logger: Logger;
  now?: () => number;
}

export function createInventoryCache({
  config,
  regions,
  session,
  lister,
  logger,
  now = Date.now,
}: InventoryCacheDeps): InventoryCache {
  const log = logger.child({ component: 'inventory-cache' });
  const inventoryFile = config.paths.inventoryFile;

  const unreadable = (reason: string): Result<InventoryMap> =>
    fatalFailure('CACHE_UNREADABLE', ERROR_MESSAGES.CACHE_UNREADABLE(inventoryFile, reason), {
      hint: 'The cluster inventory has not been built yet or was damaged',
      resolution: 'Rebuild it with `multikube --init`',
      details: { file: inventoryFile },
    });

  const save = (inventory: InventoryMap): Promise<Result<void>> =>
    writeJsonFileAtomic(inventoryFile, inventory);

  return {
    isFresh() {
      return isFileFresh(inventoryFile, config.cache.inventoryTtlMs, now());
    },

    async load() {
      const read = await readJsonFile(inventoryFile, InventoryFileSchema);
      if (!read.ok) return unreadable(read.error);
      if (read.value === undefined) return unreadable('file does not exist');
      return Success(read.value);
    },

    save,

    async regenerate(profiles, options = {}) {
      const timer = createTimer(log, 'inventory regeneration');
      const regionList = await regions.loadOrPromptRegions();
      if (!regionList.ok) {
        timer.error(regionList.error);
        return regionList;
      }

      let forceLogin = options.forceLogin ?? false;
      const inventory: InventoryMap = {};

      for (const profile of profiles) {
        const entries: string[] = [];
        for (const region of regionList.value) {
          const account = await session.ensureSession(profile, { forceLogin, region });
          forceLogin = false;
          if (!account.ok) {
            if (failureCode(account) === 'REAUTHENTICATION_FAILED') {
              timer.error(account.error, { profile, region });
              return account;
            }
            log.error({ profile, region }, `Unexpected error with profile '${profile}' in region '${region}': ${account.error}`);
            continue;
          }

          const clusters = await lister.listClusters(profile, region);
          if (!clusters.ok) {
            log.error({ profile, region }, clusters.error);
            continue;
          }

          entries.push(
            ...clusters.value.map((clusterName) =>
              formatClusterRef({ accountId: account.value, region, clusterName }),
            ),
          );
          log.info(
            { profile, region, accountId: account.value, clusters: clusters.value.length },
            `Successfully listed clusters for profile '${profile}' in region '${region}' and account '${account.value}'.`,
          );
        }
        inventory[profile] = entries;
      }

      const written = await save(inventory);
      if (!written.ok) {
        timer.error(written.error);
        return written;
      }
      timer.end({ profiles: profiles.length, regions: regionList.value.length });
      log.info('Cache generated successfully.');
      return Success(inventory);
    },
  };
}
