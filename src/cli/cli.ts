#!/usr/bin/env node
/**
 * multikube CLI
 * Fans a kubectl command out across the EKS clusters of the default context
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { argv } from 'node:process';
import { z } from 'zod';
import { createApp } from '@/app';
import { createAppConfig } from '@/config';
import { ensureDirectories } from '@/lib/file-utils';
import { createLogger } from '@/lib/logger';
import { createProgram, parseCliArguments } from './arguments';
import { handleGenericError, handleResultError } from './error-formatting';

const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const packageJsonPath = __dirname.includes('dist')
    ? join(__dirname, '../../../package.json') // dist/src/cli/ -> root
    : join(__dirname, '../../package.json'); // src/cli/ -> root
  return PackageJsonSchema.parse(JSON.parse(readFileSync(packageJsonPath, 'utf-8'))).version;
}

async function main(): Promise<void> {
  const request = parseCliArguments(argv.slice(2), createProgram(readVersion()));

  const configResult = createAppConfig();
  if (!configResult.ok) {
    handleResultError(configResult, 'Invalid configuration');
  }
  const config = configResult.value;
  const logger = createLogger({ name: 'multikube', level: config.logging.level });

  await ensureDirectories(config.paths.baseDir, config.paths.kubeconfigDir);

  const app = createApp({ config, logger });
  const result = await app.handle(request);
  if (!result.ok) {
    handleResultError(result, result.error);
  }
}

main().catch((error: unknown) => {
  handleGenericError('multikube failed', error);
});
