/**
 * Schemas of the JSON documents persisted under the multikube home directory
 */

import { z } from 'zod';

/** `cluster_cache.json`: profile to `accountId/region/clusterName` entries */
export const InventoryFileSchema = z.record(z.string(), z.array(z.string()));

/** `eks_regions.json` */
export const RegionsFileSchema = z.object({
  regions: z.array(z.string()),
});

/** `contexts.json`: context name to cluster-name pattern */
export const ContextsFileSchema = z.record(z.string(), z.string());

/** `default_context.json` */
export const DefaultContextFileSchema = z.object({
  default_context: z.string(),
});

export type ContextsFile = z.infer<typeof ContextsFileSchema>;
