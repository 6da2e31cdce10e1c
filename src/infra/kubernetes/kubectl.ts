/**
 * kubectl invocation against one generated kubeconfig
 */

import type { CommandInvoker, InvocationOutcome } from '@/types';
import { runCaptured, type CapturedRun } from '@/lib/process';

export interface KubectlInvokerOptions {
  /** Path or name of the kubectl binary */
  binary?: string;
}

export function kubectlArgs(configPath: string, argv: readonly string[]): string[] {
  return ['--kubeconfig', configPath, ...argv];
}

export function classifyKubectlRun(run: CapturedRun, timeoutMs: number): InvocationOutcome {
  if (run.timedOut) {
    return { kind: 'timeout', timeoutMs };
  }
  if (run.spawnError !== undefined) {
    return { kind: 'failed', stderr: run.spawnError, exitCode: null };
  }
  if (run.exitCode === 0) {
    return { kind: 'ok', stdout: run.stdout };
  }
  return { kind: 'failed', stderr: run.stderr, exitCode: run.exitCode };
}

export function createKubectlInvoker(options: KubectlInvokerOptions = {}): CommandInvoker {
  const binary = options.binary ?? 'kubectl';

  return {
    async invoke(configPath, argv, timeoutMs) {
      const run = await runCaptured(binary, kubectlArgs(configPath, argv), { timeoutMs });
      return classifyKubectlRun(run, timeoutMs);
    },
  };
}
