/**
 * Application Entry Point
 * Wires the production providers into the orchestrator
 */

import type { Logger } from 'pino';
import {
  createAwsCliKubeconfigGenerator,
  createAwsIdentityProvider,
  createAwsProfileSource,
  createEksClusterLister,
} from '@/infra/aws';
import { createKubectlInvoker } from '@/infra/kubernetes';
import { createInquirerInput } from '@/cli/prompts';
import { createOrchestrator } from './orchestrator';
import type { Orchestrator, OrchestratorDeps, Providers } from './types';

export interface CreateAppOptions extends Omit<OrchestratorDeps, 'providers'> {
  /** Replace individual providers, e.g. with in-process fakes */
  providers?: Partial<Providers>;
}

export function createDefaultProviders(logger: Logger): Providers {
  return {
    identity: createAwsIdentityProvider({ logger }),
    lister: createEksClusterLister(),
    generator: createAwsCliKubeconfigGenerator(),
    invoker: createKubectlInvoker(),
    profiles: createAwsProfileSource(),
    input: createInquirerInput(),
  };
}

export function createApp({ providers = {}, ...deps }: CreateAppOptions): Orchestrator {
  return createOrchestrator({
    ...deps,
    providers: { ...createDefaultProviders(deps.logger), ...providers },
  });
}

export { createOrchestrator } from './orchestrator';
export type { CliRequest, Orchestrator, OrchestratorDeps, Providers } from './types';
