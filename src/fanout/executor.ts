/**
 * Fan-out Executor
 *
 * Runs one pass-through kubectl command against every resolved target on a
 * bounded worker pool and merges the shaped rows. A failing cluster only
 * removes its own rows from the result; a failed re-login or missing
 * credentials end the whole run.
 */

import type { Logger } from 'pino';
import {
  Failure,
  Success,
  type CommandInvoker,
  type ExecutionRow,
  type InvocationOutcome,
  type ResolvedTarget,
  type Result,
} from '@/types';
import type { AppConfig } from '@/config';
import { NOT_FOUND_MARKER } from '@/config/constants';
import { extractErrorMessage, failureCode } from '@/lib/errors';
import { createTimer } from '@/lib/logger';
import { withExponentialBackoff, type Sleep } from '@/lib/retry-utils';
import { createWorkerPool } from '@/lib/worker-pool';
import type { KubeconfigMaterializer } from '@/credentials/materializer';
import { extractKubectlErrorGuidance } from '@/infra/kubernetes/errors';
import { shapeOutput } from './output-shaping';

export interface FanoutExecutor {
  run(targets: readonly ResolvedTarget[], argv: readonly string[]): Promise<Result<ExecutionRow[]>>;
}

export interface FanoutExecutorDeps {
  config: Pick<AppConfig, 'execution'>;
  materializer: KubeconfigMaterializer;
  invoker: CommandInvoker;
  logger: Logger;
  sleep?: Sleep;
  now?: () => Date;
}

/** Outcomes that end the retry loop; only generic failures are retried */
type TerminalOutcome = Exclude<InvocationOutcome, { kind: 'failed' }> | { kind: 'not-found' };

/** Materializer failures that no other cluster can recover from */
const RUN_ENDING_CODES: ReadonlySet<string> = new Set(['REAUTHENTICATION_FAILED', 'CREDENTIALS_UNAVAILABLE']);

function isRunEnding(result: Result<unknown>): boolean {
  const code = failureCode(result);
  return code !== undefined && RUN_ENDING_CODES.has(code);
}

export function isNotFound(stderr: string): boolean {
  return stderr.toLowerCase().includes(NOT_FOUND_MARKER);
}

export function createFanoutExecutor({
  config,
  materializer,
  invoker,
  logger,
  sleep,
  now = () => new Date(),
}: FanoutExecutorDeps): FanoutExecutor {
  const log = logger.child({ component: 'fanout' });
  const { concurrency, retryAttempts, retryBaseDelayMs, commandTimeoutMs } = config.execution;

  const invokeOnce = async (configPath: string, argv: readonly string[]): Promise<Result<TerminalOutcome>> => {
    const outcome = await invoker.invoke(configPath, argv, commandTimeoutMs);
    if (outcome.kind !== 'failed') {
      return Success<TerminalOutcome>(outcome);
    }
    if (isNotFound(outcome.stderr)) {
      return Success<TerminalOutcome>({ kind: 'not-found' });
    }
    return Failure(outcome.stderr.trim(), {
      ...extractKubectlErrorGuidance(outcome.stderr),
      details: { exitCode: outcome.exitCode },
    });
  };

  const runTarget = async (target: ResolvedTarget, argv: readonly string[]): Promise<Result<ExecutionRow[]>> => {
    const { clusterName, profile, region } = target;
    const unitLog = log.child({ cluster: clusterName, profile, region });
    const timer = createTimer(unitLog, 'cluster execution');

    const kubeconfig = await materializer.ensure(clusterName, profile, region);
    if (!kubeconfig.ok) {
      if (isRunEnding(kubeconfig)) {
        timer.error(kubeconfig.error);
        return kubeconfig;
      }
      unitLog.error(
        { hint: kubeconfig.guidance?.hint, resolution: kubeconfig.guidance?.resolution },
        `Failed to prepare kubeconfig for cluster ${clusterName}: ${kubeconfig.error}`,
      );
      timer.error(kubeconfig.error);
      return Success([]);
    }

    const { result, attempts } = await withExponentialBackoff(() => invokeOnce(kubeconfig.value, argv), {
      maxAttempts: retryAttempts,
      baseDelayMs: retryBaseDelayMs,
      ...(sleep ? { sleep } : {}),
      onRetry: ({ attemptNumber, delay, error }) => {
        unitLog.debug({ attempt: attemptNumber, delayMs: delay }, `kubectl failed, retrying: ${extractErrorMessage(error)}`);
      },
    });

    if (!result.ok) {
      unitLog.error(
        { attempts, hint: result.guidance?.hint },
        `Error running kubectl on ${clusterName}:\n ${result.error}`,
      );
      timer.error(result.error, { attempts });
      return Success([]);
    }

    const outcome = result.value;
    switch (outcome.kind) {
      case 'not-found':
        unitLog.info(`Pod not found in cluster ${clusterName}, skipping.`);
        timer.end({ attempts, outcome: outcome.kind });
        return Success([]);
      case 'timeout':
        unitLog.error({ timeoutMs: outcome.timeoutMs }, `Timeout expired for cluster ${clusterName}, skipping.`);
        timer.error('timeout', { attempts });
        return Success([]);
      case 'ok': {
        const rows = shapeOutput(clusterName, argv, outcome.stdout, now());
        timer.end({ attempts, rows: rows.length });
        return Success(rows);
      }
    }
  };

  return {
    async run(targets, argv) {
      const pool = createWorkerPool(concurrency);
      const merged: ExecutionRow[] = [];
      let ended: Result<ExecutionRow[]> | undefined;

      const units = targets.map((target) =>
        pool
          .submit(async () => {
            // Queued units do not start once the run has ended
            if (ended) return;
            const result = await runTarget(target, argv);
            if (!result.ok) {
              if (!ended) ended = result;
              return;
            }
            for (const row of result.value) {
              merged.push(row);
            }
          })
          .catch((error: unknown) => {
            log.error(
              { cluster: target.clusterName, profile: target.profile, region: target.region },
              `Unexpected failure for cluster ${target.clusterName}: ${extractErrorMessage(error)}`,
            );
          }),
      );

      await Promise.all(units);
      return ended ?? Success(merged);
    },
  };
}
