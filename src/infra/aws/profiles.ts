/**
 * AWS profile enumeration from the shared config file
 */

import os from 'node:os';
import path from 'node:path';
import { loadSharedConfigFiles } from '@smithy/shared-ini-file-loader';
import type { Profile, ProfileSource } from '@/types';
import { readTextFile } from '@/lib/file-utils';

/** Section kinds other than `[profile NAME]` that the loader keeps under a prefix */
const NON_PROFILE_PREFIXES = ['sso-session.', 'services.'];

/** The loader files `[default]` and `[profile default]` under the same key */
const NAMED_DEFAULT_SECTION = /^[ \t]*\[[ \t]*profile[ \t]+default[ \t]*\]/m;

export function defaultAwsConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.AWS_CONFIG_FILE || path.join(os.homedir(), '.aws', 'config');
}

export function hasNamedDefaultProfile(configText: string): boolean {
  return NAMED_DEFAULT_SECTION.test(configText);
}

/**
 * Names of the `[profile NAME]` sections, in loader order. The plain
 * `[default]` section is not a named profile; `default` is kept only when
 * the file also has a `[profile default]` section.
 */
export function profileNames(configFile: Record<string, unknown>, namedDefault = false): Profile[] {
  return Object.keys(configFile).filter((key) =>
    key === 'default' ? namedDefault : !NON_PROFILE_PREFIXES.some((prefix) => key.startsWith(prefix)),
  );
}

export function createAwsProfileSource(configPath: string = defaultAwsConfigPath()): ProfileSource {
  return {
    location: configPath,
    async loadProfiles() {
      const { configFile } = await loadSharedConfigFiles({
        configFilepath: configPath,
        ignoreCache: true,
      });
      const configText = await readTextFile(configPath);
      return profileNames(configFile, configText !== undefined && hasNamedDefaultProfile(configText));
    },
  };
}
