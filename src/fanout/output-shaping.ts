/**
 * Turning one cluster's kubectl stdout into rows of the merged result
 */

import type { ExecutionRow } from '@/types';
import { DEFAULT_COMMAND, LOG_COMMAND } from '@/config/constants';

/** The kubectl sub-command, which decides between log and table shaping */
export function commandKind(argv: readonly string[]): string {
  return argv[0] ?? DEFAULT_COMMAND;
}

export function isLogCommand(argv: readonly string[]): boolean {
  return commandKind(argv) === LOG_COMMAND;
}

const pad2 = (value: number): string => String(value).padStart(2, '0');

/** `YYYY-MM-DD HH:MM:SS` in local time */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
    `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`
  );
}

function splitLines(stdout: string): string[] {
  if (stdout.length === 0) return [];
  const lines = stdout.split(/\r?\n/);
  // A trailing newline does not start another line
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/**
 * Split on runs of whitespace into at most `maxFields` fields; the last field
 * keeps the rest of the line as-is. A `maxFields` below 1 splits every run.
 */
export function splitFields(line: string, maxFields: number): string[] {
  const fields: string[] = [];
  let rest = line.replace(/^\s+/, '');
  while (rest.length > 0) {
    if (maxFields >= 1 && fields.length === maxFields - 1) {
      fields.push(rest);
      break;
    }
    const gap = /\s+/.exec(rest);
    if (!gap) {
      fields.push(rest);
      break;
    }
    fields.push(rest.slice(0, gap.index));
    rest = rest.slice(gap.index + gap[0].length);
  }
  return fields;
}

/**
 * One row per stdout line: `[cluster][YYYY-MM-DD HH:MM:SS] line`
 */
export function shapeLogLines(clusterName: string, stdout: string, at: Date): ExecutionRow[] {
  const stamp = formatTimestamp(at);
  return splitLines(stdout).map((line) => [`[${clusterName}][${stamp}] ${line}`]);
}

/**
 * Tabular output: the header line is dropped after its token count bounds
 * the split of every later line. Each row starts with the cluster name.
 */
export function shapeTable(clusterName: string, stdout: string): ExecutionRow[] {
  const [header, ...body] = splitLines(stdout);
  if (header === undefined) return [];
  const columns = splitFields(header, 0).length;
  return body.map((line) => [clusterName, ...splitFields(line, columns)]);
}

export function shapeOutput(
  clusterName: string,
  argv: readonly string[],
  stdout: string,
  at: Date,
): ExecutionRow[] {
  return isLogCommand(argv) ? shapeLogLines(clusterName, stdout, at) : shapeTable(clusterName, stdout);
}
