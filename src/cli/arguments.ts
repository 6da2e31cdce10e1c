/**
 * Command-line parsing
 *
 * multikube's own flags are only recognized in first position. Anything else
 * is a kubectl command line and is forwarded untouched, so `multikube get pods
 * --help` shows kubectl's help rather than ours. Only the long `--help` and
 * `--version` are ours; `-h` and `-V` go to kubectl.
 */

import { Command } from 'commander';
import type { CliRequest } from '@/app/types';

export const MULTIKUBE_FLAGS: ReadonlySet<string> = new Set([
  '--init',
  '--store-clusters-contexts',
  '--set-clusters-contexts',
  '--renew-cache',
  '--help',
  '--version',
]);

interface ProgramOptions {
  init?: boolean;
  storeClustersContexts?: string;
  setClustersContexts?: string;
  renewCache?: boolean;
}

export function createProgram(version: string): Command {
  return new Command()
    .name('multikube')
    .description(
      'Run one kubectl command across every EKS cluster matching the default context,\n' +
        'discovered from your AWS profiles and regions.',
    )
    .version(version, '--version', 'output the version number')
    .helpOption('--help', 'display help for command')
    .option('--init', 'initialize or refresh the cluster cache (forces an SSO login)')
    .option('--store-clusters-contexts <pattern>', 'store a cluster context for a cluster-name pattern')
    .option('--set-clusters-contexts <context>', 'set the default cluster context')
    .option('--renew-cache', 'rebuild the cluster cache before running the command')
    .argument('[kubectl...]', 'pass-through arguments for kubectl')
    .allowUnknownOption()
    .passThroughOptions()
    .addHelpText(
      'after',
      `

Examples:
  $ multikube --init
  $ multikube --store-clusters-contexts prod-
  $ multikube --set-clusters-contexts production
  $ multikube get pods -A
  $ multikube --renew-cache get deployments -n kube-system
  $ multikube logs my-pod -n apps

Environment Variables:
  MULTIKUBE_HOME              Base directory (default: ~/.multikube)
  MULTIKUBE_CACHE_TTL         Cluster cache lifetime in seconds (default: one year)
  MULTIKUBE_KUBECONFIG_TTL    Generated kubeconfig lifetime in seconds (default: one year)
  MULTIKUBE_CONCURRENCY       Clusters processed in parallel (default: CPU count)
  MULTIKUBE_COMMAND_TIMEOUT   Per-cluster kubectl deadline in seconds (default: 20)
  MULTIKUBE_SORT_OUTPUT       Sort merged rows by cluster name (default: false)
  LOG_LEVEL                   Logging level (default: info)
  AWS_CONFIG_FILE             AWS config file with the profiles (default: ~/.aws/config)
`,
    );
}

/**
 * Map the command line (without the node and script entries) to a request.
 * `--help` and `--version` are handled by commander, which prints and exits.
 */
export function parseCliArguments(args: readonly string[], program: Command): CliRequest {
  const first = args[0];
  if (first !== undefined && !MULTIKUBE_FLAGS.has(first)) {
    return { mode: 'run', argv: [...args], renewCache: false };
  }

  program.parse([...args], { from: 'user' });
  const options = program.opts<ProgramOptions>();
  const passthrough = [...program.args];

  if (options.init) {
    return { mode: 'init' };
  }
  if (options.storeClustersContexts !== undefined) {
    return { mode: 'store-context', pattern: options.storeClustersContexts };
  }
  if (options.setClustersContexts !== undefined) {
    return { mode: 'set-default', name: options.setClustersContexts };
  }
  if (passthrough.length === 0) {
    return { mode: 'select-context' };
  }
  return { mode: 'run', argv: passthrough, renewCache: options.renewCache ?? false };
}
