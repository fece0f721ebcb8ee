export type FilterLiteral = string | number | boolean;

export type FilterOperator = '==' | '!=';

export type PathSegment =
  | { type: 'field'; name: string }
  | { type: 'index'; index: number }
  | { type: 'wildcard' }
  | { type: 'filter'; path: readonly string[]; operator: FilterOperator; value: FilterLiteral };

/**
 * A compiled field-path template
 */
export interface ParsedPath {
  expression: string;
  segments: readonly PathSegment[];
}
