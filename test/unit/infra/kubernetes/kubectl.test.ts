import { classifyKubectlRun, createKubectlInvoker, kubectlArgs } from '@/infra/kubernetes';
import type { CapturedRun } from '@/lib/process';

const run = (overrides: Partial<CapturedRun>): CapturedRun => ({
  stdout: '',
  stderr: '',
  exitCode: 0,
  timedOut: false,
  ...overrides,
});

describe('kubectl', () => {
  it('kubectlArgs should put the kubeconfig before the pass-through arguments', () => {
    expect(kubectlArgs('/kc/a.kubeconfig', ['get', 'pods', '-A'])).toEqual([
      '--kubeconfig',
      '/kc/a.kubeconfig',
      'get',
      'pods',
      '-A',
    ]);
  });

  describe('classifyKubectlRun', () => {
    it('should treat exit code 0 as success', () => {
      expect(classifyKubectlRun(run({ stdout: 'NAME\n' }), 20_000)).toEqual({ kind: 'ok', stdout: 'NAME\n' });
    });

    it('should report a non-zero exit with its stderr', () => {
      expect(classifyKubectlRun(run({ exitCode: 1, stderr: 'forbidden' }), 20_000)).toEqual({
        kind: 'failed',
        stderr: 'forbidden',
        exitCode: 1,
      });
    });

    it('should report an expired deadline as a timeout', () => {
      expect(classifyKubectlRun(run({ exitCode: null, timedOut: true }), 20_000)).toEqual({
        kind: 'timeout',
        timeoutMs: 20_000,
      });
    });

    it('should report a start failure as a failure without exit code', () => {
      expect(classifyKubectlRun(run({ exitCode: null, spawnError: 'spawn kubectl ENOENT' }), 20_000)).toEqual({
        kind: 'failed',
        stderr: 'spawn kubectl ENOENT',
        exitCode: null,
      });
    });
  });

  it('should invoke the configured binary', async () => {
    const invoker = createKubectlInvoker({ binary: '/nonexistent/kubectl' });

    expect(await invoker.invoke('/kc/a.kubeconfig', ['get', 'pods'], 1000)).toEqual({
      kind: 'failed',
      stderr: 'spawn /nonexistent/kubectl ENOENT',
      exitCode: null,
    });
  });
});
