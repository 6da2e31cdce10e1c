/**
 * Inventory domain types: profiles, regions, cluster references and the
 * units of work handed to the fan-out executor.
 */

import { Failure, Success, type Result } from './core';

/** Named AWS identity/credential configuration */
export type Profile = string;

/** AWS region identifier, e.g. `eu-west-1` */
export type Region = string;

/**
 * One cluster within one identity's scope.
 * Canonical on-disk encoding is `accountId/region/clusterName`.
 */
export interface ClusterRef {
  accountId: string;
  region: Region;
  clusterName: string;
}

/** Persisted inventory: profile to ordered `accountId/region/clusterName` strings */
export type InventoryMap = Record<Profile, string[]>;

/** One concrete cluster to run the pass-through command against */
export interface ResolvedTarget {
  clusterName: string;
  profile: Profile;
  region: Region;
}

/**
 * One output row. Log rows hold a single attributed line; tabular rows start
 * with the cluster name followed by the split columns.
 */
export type ExecutionRow = string[];

export function formatClusterRef(ref: ClusterRef): string {
  return `${ref.accountId}/${ref.region}/${ref.clusterName}`;
}

export function parseClusterRef(encoded: string): Result<ClusterRef> {
  const parts = encoded.split('/');
  const [accountId, region, clusterName] = parts;
  if (parts.length !== 3 || !accountId || !region || !clusterName) {
    return Failure(`Malformed cluster reference: ${encoded}`, {
      message: 'Malformed cluster reference',
      hint: 'Inventory entries must look like accountId/region/clusterName',
      resolution: 'Rebuild the inventory with `multikube --init`',
      details: { encoded },
    });
  }
  return Success({ accountId, region, clusterName });
}
