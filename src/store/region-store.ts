/**
 * Persisted list of AWS regions to scan for EKS clusters.
 * The first run asks for the list; later runs reuse it until the file is edited or removed.
 */

import type { Logger } from 'pino';
import { Success, type InteractiveInput, type Region, type Result } from '@/types';
import type { AppConfig } from '@/config';
import { ERROR_MESSAGES, fatalFailure } from '@/lib/errors';
import { readJsonFile, writeJsonFileAtomic } from '@/lib/file-utils';
import { RegionsFileSchema } from './schemas';

export interface RegionStore {
  loadOrPromptRegions(): Promise<Result<Region[]>>;
}

export interface RegionStoreDeps {
  config: Pick<AppConfig, 'paths'>;
  input: InteractiveInput;
  logger: Logger;
}

export function parseRegionList(raw: string): Region[] {
  return raw
    .split(',')
    .map((region) => region.trim())
    .filter((region) => region.length > 0);
}

export function createRegionStore({ config, input, logger }: RegionStoreDeps): RegionStore {
  const log = logger.child({ component: 'region-store' });
  const regionsFile = config.paths.regionsFile;

  return {
    async loadOrPromptRegions() {
      const stored = await readJsonFile(regionsFile, RegionsFileSchema);
      if (stored.ok && stored.value && stored.value.regions.length > 0) {
        return Success(stored.value.regions);
      }
      if (!stored.ok) {
        log.warn({ file: regionsFile, error: stored.error }, 'Ignoring unreadable regions file');
      }

      log.error('No AWS regions configuration found.');
      const answer = await input.input(
        'Please enter comma-separated AWS regions (e.g., us-east-1,eu-west-1):',
      );
      const regions = parseRegionList(answer);
      if (regions.length === 0) {
        return fatalFailure<Region[]>('CONFIGURATION_MISSING', ERROR_MESSAGES.NO_REGIONS(), {
          hint: 'At least one region is needed to discover clusters',
          resolution: 'Run the command again and enter a list such as us-east-1,eu-west-1',
        });
      }

      const written = await writeJsonFileAtomic(regionsFile, { regions });
      if (!written.ok) {
        return written;
      }
      log.info({ regions }, 'Regions stored');
      return Success(regions);
    },
  };
}
