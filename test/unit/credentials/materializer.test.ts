import path from 'node:path';
import {
  createKubeconfigMaterializer,
  createSessionManager,
  kubeconfigKey,
  type KubeconfigMaterializer,
} from '@/credentials';
import { failureCode } from '@/lib/errors';
import type { AppConfig } from '@/config';
import {
  createFakeGenerator,
  createFakeIdentity,
  TEST_ACCOUNT_ID,
  type FakeGenerator,
  type FakeIdentity,
} from '../../__support__/mocks/providers';
import { createSilentLogger } from '../../__support__/utilities/logger';
import { createTestConfig } from '../../__support__/utilities/test-config';
import { createTestTempDir } from '../../__support__/utilities/tmp-helpers';

const OTHER_ACCOUNT = '444455556666';

describe('KubeconfigMaterializer', () => {
  let config: AppConfig;
  let cleanup: () => Promise<void>;
  let identity: FakeIdentity;
  let generator: FakeGenerator;

  const createMaterializer = (now?: () => number): KubeconfigMaterializer => {
    const logger = createSilentLogger();
    const session = createSessionManager({ identity, logger, lockTimeoutMs: 5000 });
    return createKubeconfigMaterializer({ config, session, generator, logger, ...(now ? { now } : {}) });
  };

  beforeEach(() => {
    const temp = createTestTempDir('multikube-kubeconfigs-');
    config = createTestConfig(temp.dir.name, { cache: { kubeconfigTtlMs: 60_000 } });
    cleanup = temp.cleanup;
    identity = createFakeIdentity({ dev: TEST_ACCOUNT_ID, other: OTHER_ACCOUNT });
    generator = createFakeGenerator();
  });

  afterEach(async () => {
    await cleanup();
  });

  it('kubeconfigKey should join account and cluster', () => {
    expect(kubeconfigKey(TEST_ACCOUNT_ID, 'dev-eks-1')).toBe('111122223333-dev-eks-1');
  });

  it('should generate a kubeconfig once and reuse it while fresh', async () => {
    const materializer = createMaterializer();
    const expectedPath = path.join(config.paths.kubeconfigDir, '111122223333-dev-eks-1.kubeconfig');

    const first = await materializer.ensure('dev-eks-1', 'dev', 'us-east-1');
    const second = await materializer.ensure('dev-eks-1', 'dev', 'us-east-1');

    expect(first).toEqual({ ok: true, value: expectedPath });
    expect(second).toEqual(first);
    expect(generator.calls).toEqual([
      { clusterName: 'dev-eks-1', profile: 'dev', region: 'us-east-1', outputPath: expectedPath },
    ]);
  });

  it('should regenerate once the file reaches the TTL', async () => {
    await createMaterializer().ensure('dev-eks-1', 'dev', 'us-east-1');

    const later = createMaterializer(() => Date.now() + 60_000);
    const result = await later.ensure('dev-eks-1', 'dev', 'us-east-1');

    expect(result.ok).toBe(true);
    expect(generator.calls).toHaveLength(2);
  });

  it('should generate once for concurrent requests of the same cluster', async () => {
    const materializer = createMaterializer();

    const results = await Promise.all([
      materializer.ensure('dev-eks-1', 'dev', 'us-east-1'),
      materializer.ensure('dev-eks-1', 'dev', 'us-east-1'),
      materializer.ensure('dev-eks-1', 'dev', 'us-east-1'),
    ]);

    expect(results.every((result) => result.ok)).toBe(true);
    expect(generator.calls).toHaveLength(1);
  });

  it('should keep same-named clusters of different accounts apart', async () => {
    const materializer = createMaterializer();

    const dev = await materializer.ensure('shared', 'dev', 'us-east-1');
    const other = await materializer.ensure('shared', 'other', 'us-east-1');

    expect(dev.ok && path.basename(dev.value)).toBe('111122223333-shared.kubeconfig');
    expect(other.ok && path.basename(other.value)).toBe('444455556666-shared.kubeconfig');
    expect(generator.calls).toHaveLength(2);
  });

  it('should return the generator failure', async () => {
    generator.failures.add('gone');

    const result = await createMaterializer().ensure('gone', 'dev', 'us-east-1');

    expect(result.ok ? undefined : result.error).toBe(
      'aws eks update-kubeconfig failed for gone: ResourceNotFoundException',
    );
  });

  it('should reject a generated file without a current context', async () => {
    generator.content = 'apiVersion: v1\nkind: Config\nclusters: []\ncontexts: []\nusers: []\n';

    const result = await createMaterializer().ensure('dev-eks-1', 'dev', 'us-east-1');

    expect(result.ok ? undefined : result.error).toBe('No current context set in kubeconfig');
  });

  it('should not generate without a working session', async () => {
    const result = await createMaterializer().ensure('dev-eks-1', 'missing', 'us-east-1');

    expect(failureCode(result)).toBe('CREDENTIALS_UNAVAILABLE');
    expect(generator.calls).toEqual([]);
  });
});
