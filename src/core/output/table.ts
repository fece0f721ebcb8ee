import { OBJECT_COLUMN_DEFINITIONS } from '../columns/definitions.js';
import type { ColumnDefinition, DisplayRow } from '../types/columns.js';

export interface TableOptions {
  columns?: readonly ColumnDefinition[];
  noHeaders?: boolean;
}

const COLUMN_PADDING = 3;

function displayWidth(value: string): number {
  return [...value].length;
}

/**
 * Lay rows out as a kubectl-style table with upper-case headers
 */
export function printTable(rows: readonly DisplayRow[], options: TableOptions = {}): string {
  const columns = options.columns ?? OBJECT_COLUMN_DEFINITIONS;
  const lines: string[][] = [];

  if (!options.noHeaders) {
    lines.push(columns.map((column) => column.name.toUpperCase()));
  }
  for (const row of rows) {
    lines.push(columns.map((_, index) => row.cells[index] ?? ''));
  }

  const widths = columns.map((_, index) =>
    Math.max(0, ...lines.map((cells) => displayWidth(cells[index] ?? '')))
  );

  return lines
    .map((cells) =>
      cells
        .map((cell, index) => {
          const pad = (widths[index] ?? 0) - displayWidth(cell) + COLUMN_PADDING;
          return cell + ' '.repeat(pad);
        })
        .join('')
        .trimEnd()
    )
    .join('\n');
}
