export {
  createInventoryCache,
  type InventoryCache,
  type InventoryCacheDeps,
  type RegenerateOptions,
} from './cache';
export { compileClusterPattern, matchesClusterName, resolveTargets } from './resolver';
