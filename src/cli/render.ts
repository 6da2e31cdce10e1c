/**
 * Rendering of the merged fan-out result to stdout
 */

import type { Logger } from 'pino';
import type { ExecutionRow } from '@/types';
import { LOG_COMMAND, TABLE_HEADERS } from '@/config/constants';

export type WriteLine = (line: string) => void;

export interface RenderOptions {
  logger: Logger;
  /** Stable sort by cluster name before printing */
  sortByCluster?: boolean;
  write?: WriteLine;
}

const COLUMN_GAP = '  ';

const stdoutLine: WriteLine = (line) => {
  process.stdout.write(`${line}\n`);
};

/** `[cluster][...] line` carries its cluster in the first bracket */
function clusterOfLogRow(row: ExecutionRow): string {
  return /^\[([^\]]*)\]/.exec(row[0] ?? '')?.[1] ?? '';
}

export function sortRowsByCluster(rows: readonly ExecutionRow[], commandKind: string): ExecutionRow[] {
  const clusterOf =
    commandKind === LOG_COMMAND ? clusterOfLogRow : (row: ExecutionRow): string => row[0] ?? '';
  // Array.prototype.sort is stable, so rows keep their order within a cluster
  return [...rows].sort((a, b) => {
    const left = clusterOf(a);
    const right = clusterOf(b);
    return left < right ? -1 : left > right ? 1 : 0;
  });
}

/**
 * Plain table: no borders, columns separated by two spaces and padded to the
 * widest cell. Rows wider than the header get blank header cells.
 */
export function formatTable(
  rows: readonly ExecutionRow[],
  headers: readonly string[] = TABLE_HEADERS,
): string[] {
  const columnCount = rows.reduce((widest, row) => Math.max(widest, row.length), headers.length);
  const normalize = (cells: readonly string[]): string[] =>
    Array.from({ length: columnCount }, (_, i) => cells[i] ?? '');

  const grid = [normalize(headers)];
  for (const row of rows) {
    grid.push(normalize(row));
  }
  const widths = Array.from({ length: columnCount }, (_, i) =>
    grid.reduce((widest, cells) => Math.max(widest, (cells[i] ?? '').length), 0),
  );
  const last = columnCount - 1;

  return grid.map((cells) =>
    cells
      .map((cell, i) => (i === last ? cell : cell.padEnd(widths[i] ?? 0)))
      .join(COLUMN_GAP)
      .trimEnd(),
  );
}

/**
 * Print the merged rows: one line per row for `logs`, a table otherwise
 */
export function renderResults(
  rows: readonly ExecutionRow[],
  commandKind: string,
  options: RenderOptions,
): void {
  const write = options.write ?? stdoutLine;

  if (rows.length === 0) {
    options.logger.info('No data returned from the kubectl command.');
    return;
  }

  const ordered = options.sortByCluster ? sortRowsByCluster(rows, commandKind) : rows;

  if (commandKind === LOG_COMMAND) {
    for (const row of ordered) {
      write(row[0] ?? '');
    }
    return;
  }

  for (const line of formatTable(ordered)) {
    write(line);
  }
}
