/**
 * multikube public API
 *
 * The CLI is the primary entry point; these exports allow embedding the
 * pipeline with custom providers.
 */

export { createApp, createDefaultProviders, createOrchestrator } from './app';
export type { CliRequest, CreateAppOptions, Orchestrator, OrchestratorDeps, Providers } from './app';

export { createAppConfig } from './config/app-config';
export type { AppConfig, AppConfigOverrides, LogLevel } from './config/app-config';

export { createLogger } from './lib/logger';
export type { Logger } from './lib/logger';

export { createContextStore, createRegionStore } from './store';
export type { ContextStore, RegionStore, SelectedContext } from './store';
export { createInventoryCache, resolveTargets, compileClusterPattern } from './inventory';
export type { InventoryCache } from './inventory';
export { createKubeconfigMaterializer, createSessionManager } from './credentials';
export type { KubeconfigMaterializer, SessionManager } from './credentials';
export { createFanoutExecutor } from './fanout';
export type { FanoutExecutor } from './fanout';
export { renderResults, formatTable } from './cli/render';

export type {
  Result,
  ErrorGuidance,
  ClusterRef,
  InventoryMap,
  ResolvedTarget,
  ExecutionRow,
  IdentityProvider,
  ClusterLister,
  AccessConfigGenerator,
  CommandInvoker,
  InvocationOutcome,
  ProfileSource,
  InteractiveInput,
} from './types';
export { Success, Failure } from './types';
