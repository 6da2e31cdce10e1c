/**
 * Kubeconfig generation through `aws eks update-kubeconfig`
 */

import { Failure, Success, type AccessConfigGenerator } from '@/types';
import { runCaptured } from '@/lib/process';
import { extractAwsErrorGuidance } from './errors';

export interface AwsCliKubeconfigGeneratorOptions {
  /** Path or name of the AWS CLI binary */
  binary?: string;
}

export function updateKubeconfigArgs(
  clusterName: string,
  profile: string,
  region: string,
  outputPath: string,
): string[] {
  return [
    'eks',
    'update-kubeconfig',
    '--name',
    clusterName,
    '--kubeconfig',
    outputPath,
    '--profile',
    profile,
    '--region',
    region,
  ];
}

export function createAwsCliKubeconfigGenerator(
  options: AwsCliKubeconfigGeneratorOptions = {},
): AccessConfigGenerator {
  const binary = options.binary ?? 'aws';

  return {
    async generateAccessConfig(clusterName, profile, region, outputPath) {
      const run = await runCaptured(binary, updateKubeconfigArgs(clusterName, profile, region, outputPath), {
        env: { ...process.env, AWS_PROFILE: profile },
      });
      if (run.exitCode === 0) {
        return Success(undefined);
      }
      const reason = run.spawnError ?? run.stderr.trim();
      return Failure(`aws eks update-kubeconfig failed for ${clusterName}: ${reason}`, {
        ...extractAwsErrorGuidance(new Error(reason)),
        message: 'Kubeconfig generation failed',
      });
    },
  };
}
