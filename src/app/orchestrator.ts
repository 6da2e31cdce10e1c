/**
 * Orchestrator: one pipeline per CLI mode, built from the store, inventory,
 * credential and fan-out components.
 */

import { Success, type Result } from '@/types';
import { ERROR_MESSAGES, fatalFailure } from '@/lib/errors';
import { createTimer } from '@/lib/logger';
import { createContextStore, createRegionStore } from '@/store';
import { createInventoryCache, resolveTargets } from '@/inventory';
import { createKubeconfigMaterializer, createSessionManager } from '@/credentials';
import { commandKind, createFanoutExecutor } from '@/fanout';
import { renderResults } from '@/cli/render';
import type { Orchestrator, OrchestratorDeps } from './types';

export function createOrchestrator({
  config,
  logger,
  providers,
  sleep,
  now,
  write,
}: OrchestratorDeps): Orchestrator {
  const log = logger.child({ component: 'orchestrator' });
  const clock = now ?? (() => new Date());
  const epochMs = (): number => clock().getTime();

  const regions = createRegionStore({ config, input: providers.input, logger });
  const contexts = createContextStore({ config, input: providers.input, logger });
  const session = createSessionManager({
    identity: providers.identity,
    logger,
    lockTimeoutMs: config.execution.lockTimeoutMs,
  });
  const inventory = createInventoryCache({
    config,
    regions,
    session,
    lister: providers.lister,
    logger,
    now: epochMs,
  });
  const materializer = createKubeconfigMaterializer({
    config,
    session,
    generator: providers.generator,
    logger,
    now: epochMs,
  });
  const executor = createFanoutExecutor({
    config,
    materializer,
    invoker: providers.invoker,
    logger,
    now: clock,
    ...(sleep ? { sleep } : {}),
  });

  const loadProfiles = async (): Promise<Result<string[]>> => {
    const profiles = await providers.profiles.loadProfiles();
    if (profiles.length === 0) {
      return fatalFailure('NO_PROFILES', ERROR_MESSAGES.NO_PROFILES(providers.profiles.location), {
        hint: 'Only [profile NAME] sections are used; [default] is ignored',
        resolution: 'Add a profile with `aws configure sso`',
        details: { location: providers.profiles.location },
      });
    }
    return Success(profiles);
  };

  const init = async (): Promise<Result<void>> => {
    const profiles = await loadProfiles();
    if (!profiles.ok) return profiles;

    const rebuilt = await inventory.regenerate(profiles.value, { forceLogin: true });
    if (!rebuilt.ok) return rebuilt;

    log.info('Cluster cache initialized.');
    return Success(undefined);
  };

  const storeContext = (pattern: string): Promise<Result<string>> => contexts.storeContext(pattern);

  const setDefault = (name: string): Promise<Result<void>> => contexts.setDefault(name);

  const selectContext = async (): Promise<Result<string>> => {
    const selected = await contexts.promptForContext();
    if (!selected.ok) return selected;

    const updated = await contexts.setDefault(selected.value.name);
    if (!updated.ok) return updated;
    return Success(selected.value.name);
  };

  const run = async (
    argv: readonly string[],
    options: { renewCache?: boolean } = {},
  ): Promise<Result<void>> => {
    const timer = createTimer(log, 'fan-out run');

    const pattern = await contexts.getDefaultPattern();
    if (!pattern.ok) return pattern;
    if (pattern.value === undefined) {
      return fatalFailure('CONFIGURATION_MISSING', ERROR_MESSAGES.NO_DEFAULT_CONTEXT(), {
        hint: 'No default context is set, or it points at a context that was removed',
        resolution: 'Pick one with `multikube` (no arguments) or `multikube --set-clusters-contexts <name>`',
      });
    }

    const profiles = await loadProfiles();
    if (!profiles.ok) return profiles;

    if (options.renewCache || !(await inventory.isFresh())) {
      const rebuilt = await inventory.regenerate(profiles.value);
      if (!rebuilt.ok) return rebuilt;
    }

    const cached = await inventory.load();
    if (!cached.ok) return cached;

    const targets = resolveTargets(cached.value, pattern.value);
    if (!targets.ok) return targets;
    timer.checkpoint('targets resolved', { targets: targets.value.length });

    const executed = await executor.run(targets.value, argv);
    if (!executed.ok) return executed;
    const rows = executed.value;
    renderResults(rows, commandKind(argv), {
      logger: log,
      sortByCluster: config.output.sortByCluster,
      ...(write ? { write } : {}),
    });
    timer.end({ targets: targets.value.length, rows: rows.length });
    return Success(undefined);
  };

  return {
    init,
    storeContext,
    setDefault,
    selectContext,
    run,

    handle(request) {
      switch (request.mode) {
        case 'init':
          return init();
        case 'store-context':
          return storeContext(request.pattern);
        case 'set-default':
          return setDefault(request.name);
        case 'select-context':
          return selectContext();
        case 'run':
          return run(request.argv, { renewCache: request.renewCache });
      }
    },
  };
}
