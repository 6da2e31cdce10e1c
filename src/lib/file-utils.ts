import { promises as fs } from 'node:fs';
import path from 'node:path';
import crypto from 'node:crypto';
import type { ZodType, ZodTypeDef } from 'zod';

import { Failure, Success, type Result } from '@/types';
import { extractErrorMessage } from '@/lib/errors';

function isMissingFileError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

/**
 * Read and validate a JSON document
 *
 * @returns `undefined` when the file does not exist; a failure when it exists
 * but cannot be read, parsed or validated
 */
export async function readJsonFile<T>(
  filePath: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Promise<Result<T | undefined>> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error)) {
      return Success(undefined);
    }
    return Failure(`Failed to read ${filePath}: ${extractErrorMessage(error)}`, {
      message: 'Failed to read file',
      hint: 'Check file permissions and path',
      resolution: `Ensure file is readable: ls -la ${filePath}`,
      details: { filePath },
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    return Failure(`Invalid JSON in ${filePath}: ${extractErrorMessage(error)}`, {
      message: 'Invalid JSON',
      hint: 'The file was edited by hand or truncated',
      resolution: `Fix or delete ${filePath}`,
      details: { filePath },
    });
  }

  const validated = schema.safeParse(parsed);
  if (!validated.success) {
    const issues = validated.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`);
    return Failure(`Unexpected content in ${filePath}: ${issues.join('; ')}`, {
      message: 'Unexpected file content',
      hint: 'The file does not have the expected shape',
      resolution: `Fix or delete ${filePath}`,
      details: { filePath, issues },
    });
  }
  return Success(validated.data);
}

/**
 * Write a JSON document by writing a sibling temp file and renaming it over
 * the target, so readers never observe a half-written file.
 */
export async function writeJsonFileAtomic(filePath: string, data: unknown): Promise<Result<void>> {
  const dir = path.dirname(filePath);
  const tempPath = path.join(dir, `.${path.basename(filePath)}.${crypto.randomUUID()}.tmp`);
  try {
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(tempPath, JSON.stringify(data), { encoding: 'utf-8', mode: 0o600 });
    await fs.rename(tempPath, filePath);
    return Success(undefined);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    return Failure(`Failed to write ${filePath}: ${extractErrorMessage(error)}`, {
      message: 'Failed to write file',
      hint: 'The multikube directory is not writable',
      resolution: `Check permissions on ${dir}`,
      details: { filePath },
    });
  }
}

/**
 * Text content of a file, or `undefined` when it does not exist
 */
export async function readTextFile(filePath: string): Promise<string | undefined> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error)) {
      return undefined;
    }
    throw error;
  }
}

/**
 * Age of a file in milliseconds from its modification time, or `undefined`
 * when it does not exist
 */
export async function fileAgeMs(filePath: string, now: number = Date.now()): Promise<number | undefined> {
  try {
    const stats = await fs.stat(filePath);
    return now - stats.mtimeMs;
  } catch (error) {
    if (isMissingFileError(error)) {
      return undefined;
    }
    throw error;
  }
}

/**
 * True iff the file exists and its age is strictly below `ttlMs`
 */
export async function isFileFresh(filePath: string, ttlMs: number, now: number = Date.now()): Promise<boolean> {
  const age = await fileAgeMs(filePath, now);
  return age !== undefined && age < ttlMs;
}

export async function ensureDirectories(...dirs: string[]): Promise<void> {
  for (const dir of dirs) {
    await fs.mkdir(dir, { recursive: true });
  }
}
