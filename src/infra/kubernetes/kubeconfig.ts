/**
 * Kubeconfig validation
 *
 * A generated kubeconfig is only handed to kubectl once it parses and names a
 * current context.
 */

import * as fs from 'node:fs';
import * as k8s from '@kubernetes/client-node';
import { Success, Failure, type Result } from '@/types';
import { extractErrorMessage } from '@/lib/errors';

export interface KubeconfigInfo {
  path: string;
  contextName: string;
  clusterName: string;
  server: string;
}

/**
 * Validate that a kubeconfig file is readable and parseable
 */
export function validateKubeconfig(configPath: string): Result<KubeconfigInfo> {
  if (!fs.existsSync(configPath)) {
    return Failure(`Kubeconfig file does not exist: ${configPath}`, {
      message: 'Kubeconfig file not found',
      hint: 'aws eks update-kubeconfig reported success but wrote nothing',
      resolution: 'Run the same `aws eks update-kubeconfig` command by hand and check its output.',
      details: { configPath },
    });
  }

  const kc = new k8s.KubeConfig();
  try {
    kc.loadFromFile(configPath);
  } catch (error) {
    return Failure(`Failed to parse kubeconfig: ${configPath}`, {
      message: 'Invalid kubeconfig format',
      hint: 'The kubeconfig file could not be parsed',
      resolution: `Delete ${configPath} so it is generated again on the next run.`,
      details: { configPath, error: extractErrorMessage(error) },
    });
  }

  const currentContext = kc.getCurrentContext();
  if (!currentContext) {
    return Failure('No current context set in kubeconfig', {
      message: 'No active Kubernetes context',
      hint: 'The kubeconfig file has no current context configured',
      resolution: `Delete ${configPath} so it is generated again on the next run.`,
      details: { configPath },
    });
  }

  const cluster = kc.getCurrentCluster();
  return Success({
    path: configPath,
    contextName: currentContext,
    clusterName: cluster?.name ?? 'unknown',
    server: cluster?.server ?? 'unknown',
  });
}
