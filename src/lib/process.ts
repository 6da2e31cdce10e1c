/**
 * Child process helpers for the external CLIs (aws, kubectl).
 *
 * Arguments are always passed as an array through execFile/spawn, never through a shell.
 */

import { execFile, spawn } from 'node:child_process';
import { Failure, Success, type Result } from '@/types';

/** Output buffer limit; `kubectl logs` across a busy pod can be large */
const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

export interface CapturedRun {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  /** The deadline expired and the child was sent SIGTERM */
  timedOut: boolean;
  /** The process could not be started or its output could not be collected */
  spawnError?: string;
}

export interface RunCapturedOptions {
  /** 0 or absent: no deadline */
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
}

/**
 * Run a command to completion and capture its output. Never rejects; every
 * outcome is described by the returned record.
 */
export function runCaptured(
  command: string,
  args: readonly string[],
  options: RunCapturedOptions = {},
): Promise<CapturedRun> {
  const timeoutMs = options.timeoutMs ?? 0;
  return new Promise((resolve) => {
    execFile(
      command,
      [...args],
      {
        encoding: 'utf8',
        timeout: timeoutMs,
        killSignal: 'SIGTERM',
        maxBuffer: MAX_OUTPUT_BYTES,
        env: options.env ?? process.env,
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ stdout, stderr, exitCode: 0, timedOut: false });
          return;
        }

        const timedOut = timeoutMs > 0 && error.killed === true && error.signal === 'SIGTERM';
        if (typeof error.code === 'number') {
          resolve({ stdout, stderr, exitCode: error.code, timedOut });
          return;
        }
        // ENOENT, EACCES, maxBuffer overflow and kills without an exit code end up here
        resolve({
          stdout,
          stderr,
          exitCode: null,
          timedOut,
          ...(timedOut ? {} : { spawnError: error.message }),
        });
      },
    );
  });
}

/**
 * Run an interactive command attached to the current terminal
 */
export function runInteractive(
  command: string,
  args: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
): Promise<Result<void>> {
  return new Promise((resolve) => {
    const child = spawn(command, [...args], { stdio: 'inherit', env });
    child.once('error', (error) => {
      resolve(
        Failure(`Failed to start ${command}: ${error.message}`, {
          message: `Failed to start ${command}`,
          hint: `${command} is not installed or not on PATH`,
          resolution: `Install ${command} and make sure \`which ${command}\` finds it`,
        }),
      );
    });
    child.once('close', (code) => {
      if (code === 0) {
        resolve(Success(undefined));
        return;
      }
      resolve(Failure(`${command} ${args.join(' ')} exited with code ${code ?? 'null'}`));
    });
  });
}
