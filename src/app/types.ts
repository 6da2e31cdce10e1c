/**
 * Application-level request and dependency types
 */

import type { Logger } from 'pino';
import type {
  AccessConfigGenerator,
  ClusterLister,
  CommandInvoker,
  IdentityProvider,
  InteractiveInput,
  ProfileSource,
  Result,
} from '@/types';
import type { AppConfig } from '@/config';
import type { Sleep } from '@/lib/retry-utils';

/** What the command line asked for, after argument parsing */
export type CliRequest =
  | { mode: 'init' }
  | { mode: 'store-context'; pattern: string }
  | { mode: 'set-default'; name: string }
  | { mode: 'select-context' }
  | { mode: 'run'; argv: string[]; renewCache: boolean };

/** External collaborators; production wiring uses the AWS CLI/SDK, kubectl and inquirer */
export interface Providers {
  identity: IdentityProvider;
  lister: ClusterLister;
  generator: AccessConfigGenerator;
  invoker: CommandInvoker;
  profiles: ProfileSource;
  input: InteractiveInput;
}

export interface OrchestratorDeps {
  config: AppConfig;
  logger: Logger;
  providers: Providers;
  sleep?: Sleep;
  now?: () => Date;
  /** Where rendered output lines go; stdout by default */
  write?: (line: string) => void;
}

export interface Orchestrator {
  /** Rebuild the inventory with a forced login */
  init(): Promise<Result<void>>;
  storeContext(pattern: string): Promise<Result<string>>;
  setDefault(name: string): Promise<Result<void>>;
  /** Interactive context selection; the chosen context becomes the default */
  selectContext(): Promise<Result<string>>;
  /** Resolve targets, fan the command out and render the merged result */
  run(argv: readonly string[], options?: { renewCache?: boolean }): Promise<Result<void>>;
  handle(request: CliRequest): Promise<Result<unknown>>;
}
