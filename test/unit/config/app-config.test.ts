import os from 'node:os';
import path from 'node:path';
import { createAppConfig } from '@/config';

describe('createAppConfig', () => {
  it('should use the defaults for an empty environment', () => {
    const result = createAppConfig({ env: {} });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const config = result.value;
    const home = path.join(os.homedir(), '.multikube');
    expect(config.paths).toEqual({
      baseDir: home,
      inventoryFile: path.join(home, 'cluster_cache.json'),
      kubeconfigDir: path.join(home, 'kubeconfigs'),
      contextsFile: path.join(home, 'contexts.json'),
      defaultContextFile: path.join(home, 'default_context.json'),
      regionsFile: path.join(home, 'eks_regions.json'),
    });
    expect(config.cache).toEqual({ inventoryTtlMs: 31_536_000_000, kubeconfigTtlMs: 31_536_000_000 });
    expect(config.execution).toMatchObject({
      concurrency: os.availableParallelism(),
      retryAttempts: 3,
      retryBaseDelayMs: 2000,
      commandTimeoutMs: 20_000,
    });
    expect(config.output.sortByCluster).toBe(false);
    expect(config.logging.level).toBe('info');
  });

  it('should read the MULTIKUBE_* variables', () => {
    const result = createAppConfig({
      env: {
        MULTIKUBE_HOME: '/srv/multikube',
        MULTIKUBE_CACHE_TTL: '3600',
        MULTIKUBE_KUBECONFIG_TTL: '60',
        MULTIKUBE_CONCURRENCY: '3',
        MULTIKUBE_COMMAND_TIMEOUT: '5',
        MULTIKUBE_SORT_OUTPUT: 'true',
        LOG_LEVEL: 'debug',
      },
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.paths.inventoryFile).toBe(path.join('/srv/multikube', 'cluster_cache.json'));
    expect(result.value.cache).toEqual({ inventoryTtlMs: 3_600_000, kubeconfigTtlMs: 60_000 });
    expect(result.value.execution.concurrency).toBe(3);
    expect(result.value.execution.commandTimeoutMs).toBe(5_000);
    expect(result.value.output.sortByCluster).toBe(true);
    expect(result.value.logging.level).toBe('debug');
  });

  it('should let overrides win over the environment', () => {
    const result = createAppConfig({
      env: { MULTIKUBE_HOME: '/srv/multikube', MULTIKUBE_CONCURRENCY: '3' },
      overrides: { paths: { baseDir: '/tmp/other' }, execution: { concurrency: 1 } },
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.paths.regionsFile).toBe(path.join('/tmp/other', 'eks_regions.json'));
    expect(result.value.execution.concurrency).toBe(1);
  });

  it('should reject out-of-range values with a CONFIGURATION_INVALID failure', () => {
    const result = createAppConfig({ env: { MULTIKUBE_CONCURRENCY: '0', LOG_LEVEL: 'loud' } });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toContain('execution.concurrency');
    expect(result.error).toContain('logging.level');
    expect(result.guidance?.details?.code).toBe('CONFIGURATION_INVALID');
  });
});
