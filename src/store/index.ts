export { createContextStore, type ContextStore, type SelectedContext } from './context-store';
export { createRegionStore, parseRegionList, type RegionStore } from './region-store';
export * from './schemas';
