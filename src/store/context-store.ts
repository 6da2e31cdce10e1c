/**
 * Named cluster-selection patterns ("contexts") and the pointer to the default one.
 *
 * Contexts are only ever created or changed by an explicit user action; the
 * fan-out path reads them and nothing else.
 */

import type { Logger } from 'pino';
import { Success, type InteractiveInput, type Result } from '@/types';
import type { AppConfig } from '@/config';
import { ERROR_MESSAGES, fatalFailure } from '@/lib/errors';
import { readJsonFile, writeJsonFileAtomic } from '@/lib/file-utils';
import { compileClusterPattern } from '@/inventory/resolver';
import { ContextsFileSchema, DefaultContextFileSchema, type ContextsFile } from './schemas';

export interface SelectedContext {
  name: string;
  pattern: string;
}

export interface ContextStore {
  /** All stored contexts in insertion order */
  listContexts(): Promise<Result<ContextsFile>>;
  /** Ask for a unique name and persist `name -> pattern`; resolves to the chosen name */
  storeContext(pattern: string): Promise<Result<string>>;
  setDefault(name: string): Promise<Result<void>>;
  /** Pattern of the default context, or `undefined` when there is none */
  getDefaultPattern(): Promise<Result<string | undefined>>;
  promptForContext(): Promise<Result<SelectedContext>>;
}

export interface ContextStoreDeps {
  config: Pick<AppConfig, 'paths'>;
  input: InteractiveInput;
  logger: Logger;
}

const noContexts = <T>(): Result<T> =>
  fatalFailure('CONFIGURATION_MISSING', ERROR_MESSAGES.NO_CONTEXTS(), {
    hint: 'No cluster contexts have been stored yet',
    resolution: 'Store one with `multikube --store-clusters-contexts <pattern>`',
  });

export function createContextStore({ config, input, logger }: ContextStoreDeps): ContextStore {
  const log = logger.child({ component: 'context-store' });
  const { contextsFile, defaultContextFile } = config.paths;

  const listContexts = async (): Promise<Result<ContextsFile>> => {
    const stored = await readJsonFile(contextsFile, ContextsFileSchema);
    if (!stored.ok) return stored;
    return Success(stored.value ?? {});
  };

  const promptForUniqueName = async (existing: ContextsFile): Promise<string> => {
    for (;;) {
      const name = (await input.input('Enter a unique name for this context:')).trim();
      if (name.length === 0) {
        log.info('The context name cannot be empty.');
      } else if (Object.hasOwn(existing, name)) {
        log.info(`The context name ${name} already exists. Please choose a different name.`);
      } else {
        return name;
      }
    }
  };

  return {
    listContexts,

    async storeContext(pattern) {
      const compiled = compileClusterPattern(pattern);
      if (!compiled.ok) return compiled;

      const contexts = await listContexts();
      if (!contexts.ok) return contexts;

      const name = await promptForUniqueName(contexts.value);
      const written = await writeJsonFileAtomic(contextsFile, { ...contexts.value, [name]: pattern });
      if (!written.ok) return written;

      log.info(`Context ${name} with pattern ${pattern} stored successfully.`);
      return Success(name);
    },

    async setDefault(name) {
      const contexts = await listContexts();
      if (!contexts.ok) return contexts;
      if (Object.keys(contexts.value).length === 0) return noContexts<void>();

      if (!Object.hasOwn(contexts.value, name)) {
        return fatalFailure<void>('CONTEXT_NOT_FOUND', ERROR_MESSAGES.CONTEXT_NOT_FOUND(name), {
          hint: `Known contexts: ${Object.keys(contexts.value).join(', ')}`,
          resolution: 'Pick one of the known contexts or store a new one first',
          details: { name },
        });
      }

      const written = await writeJsonFileAtomic(defaultContextFile, { default_context: name });
      if (!written.ok) return written;

      log.info(`Default context set to ${name}`);
      return Success(undefined);
    },

    async getDefaultPattern() {
      const pointer = await readJsonFile(defaultContextFile, DefaultContextFileSchema);
      if (!pointer.ok) return pointer;
      if (!pointer.value) return Success(undefined);

      const contexts = await listContexts();
      if (!contexts.ok) return contexts;

      const name = pointer.value.default_context;
      return Success(Object.hasOwn(contexts.value, name) ? contexts.value[name] : undefined);
    },

    async promptForContext() {
      const contexts = await listContexts();
      if (!contexts.ok) return contexts;

      const names = Object.keys(contexts.value);
      if (names.length === 0) return noContexts<SelectedContext>();

      const name = await input.select('Select a context', names);
      const pattern = contexts.value[name];
      if (pattern === undefined) {
        return fatalFailure<SelectedContext>('CONTEXT_NOT_FOUND', ERROR_MESSAGES.CONTEXT_NOT_FOUND(name), {
          details: { name },
        });
      }
      return Success({ name, pattern });
    },
  };
}
