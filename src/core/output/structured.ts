import * as yaml from 'js-yaml';
import type { DisplayRow } from '../types/columns.js';
import type { LineageObject } from '../types/objects.js';
import { printTable, type TableOptions } from './table.js';

export type OutputFormat = 'table' | 'json' | 'yaml';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['table', 'json', 'yaml'];

export interface ObjectList {
  apiVersion: 'v1';
  kind: 'List';
  metadata: { resourceVersion: string };
  items: LineageObject[];
}

/**
 * The raw objects of a render, in tree order, as a Kubernetes List
 */
export function toStructuredList(rows: readonly DisplayRow[]): ObjectList {
  return {
    apiVersion: 'v1',
    kind: 'List',
    metadata: { resourceVersion: '' },
    items: rows.map((row) => row.object),
  };
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export function formatRows(
  rows: readonly DisplayRow[],
  format: OutputFormat,
  options: TableOptions = {}
): string {
  switch (format) {
    case 'table':
      return printTable(rows, options);
    case 'json':
      return JSON.stringify(toStructuredList(rows), null, 2);
    case 'yaml':
      return yaml.dump(toStructuredList(rows), { noRefs: true, sortKeys: false });
  }
}
