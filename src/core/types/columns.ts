import type { LineageObject } from './objects.js';

/**
 * Display column descriptor
 */
export interface ColumnDefinition {
  name: string;
  type: string;
  format?: string;
  description: string;
}

export interface ObjectColumns {
  name: string;
  status: string;
  reason: string;
  age: string;
}

export type RowCells = readonly [name: string, status: string, reason: string, age: string];

/**
 * One rendered line of the lineage tree
 */
export interface DisplayRow {
  uid: string;
  depth: number;
  /** Tree glyphs preceding the name, empty for the root */
  prefix: string;
  cells: RowCells;
  columns: ObjectColumns;
  /** Deep copy of the raw object, for structured output */
  object: LineageObject;
}
