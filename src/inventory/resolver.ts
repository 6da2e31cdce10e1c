/**
 * Pattern Resolver
 *
 * Turns the inventory and the active context's pattern into the ordered list
 * of clusters to target.
 */

import { Success, type InventoryMap, type ResolvedTarget, type Result } from '@/types';
import { parseClusterRef } from '@/types/inventory';
import { ERROR_MESSAGES, extractErrorMessage, fatalFailure } from '@/lib/errors';

/**
 * Compile a cluster-name pattern.
 *
 * The sticky flag pins every match to index 0, giving "starts with" semantics:
 * `prod-` matches `prod-eks-1` but not `staging-prod-eks-1`, exactly like `^prod-`.
 */
export function compileClusterPattern(pattern: string): Result<RegExp> {
  try {
    return Success(new RegExp(pattern, 'y'));
  } catch (error) {
    return fatalFailure('INVALID_PATTERN', ERROR_MESSAGES.INVALID_PATTERN(pattern, extractErrorMessage(error)), {
      hint: 'Context patterns are regular expressions matched against the start of cluster names',
      resolution: 'Escape special characters or fix the expression, e.g. `prod-.*`',
      details: { pattern },
    });
  }
}

export function matchesClusterName(compiled: RegExp, clusterName: string): boolean {
  compiled.lastIndex = 0;
  return compiled.test(clusterName);
}

/**
 * Resolve the targets selected by `pattern`.
 *
 * Order follows the inventory: profiles in insertion order, then each
 * profile's clusters in stored order. Entries that do not parse as
 * `accountId/region/clusterName` are skipped.
 */
export function resolveTargets(inventory: InventoryMap, pattern: string): Result<ResolvedTarget[]> {
  const compiled = compileClusterPattern(pattern);
  if (!compiled.ok) return compiled;

  const targets: ResolvedTarget[] = [];
  for (const [profile, clusters] of Object.entries(inventory)) {
    for (const encoded of clusters) {
      const ref = parseClusterRef(encoded);
      if (!ref.ok) continue;
      if (matchesClusterName(compiled.value, ref.value.clusterName)) {
        targets.push({ clusterName: ref.value.clusterName, profile, region: ref.value.region });
      }
    }
  }

  if (targets.length === 0) {
    return fatalFailure('NO_MATCHING_CLUSTERS', ERROR_MESSAGES.NO_MATCHING_CLUSTERS(pattern), {
      hint:
        Object.keys(inventory).length === 0
          ? 'The cluster inventory is empty'
          : 'No cached cluster name starts with the pattern',
      resolution: 'Rebuild the inventory with `multikube --renew-cache` or pick another context',
      details: { pattern },
    });
  }
  return Success(targets);
}
