import { parsePath } from './parser.js';
import type { FilterLiteral, ParsedPath, PathSegment } from './types.js';

type Indexable = Record<string, unknown>;

function isRecord(value: unknown): value is Indexable {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null;
}

function lookupField(value: unknown, path: readonly string[]): unknown {
  let current = value;
  for (const key of path) {
    if (!isRecord(current) || !Object.hasOwn(current, key)) return undefined;
    current = current[key];
  }
  return current;
}

function literalEquals(actual: unknown, expected: FilterLiteral): boolean {
  if (typeof actual === 'string' || typeof actual === 'number' || typeof actual === 'boolean') {
    return typeof actual === typeof expected ? actual === expected : String(actual) === String(expected);
  }
  return false;
}

function matchesFilter(
  candidate: unknown,
  segment: Extract<PathSegment, { type: 'filter' }>
): boolean {
  const actual = lookupField(candidate, segment.path);
  if (!isPresent(actual)) {
    return false;
  }
  const equal = literalEquals(actual, segment.value);
  return segment.operator === '==' ? equal : !equal;
}

function applySegment(value: unknown, segment: PathSegment): unknown[] {
  switch (segment.type) {
    case 'field':
      // Own keys only: nothing resolves through Object.prototype
      return isRecord(value) && Object.hasOwn(value, segment.name) && isPresent(value[segment.name])
        ? [value[segment.name]]
        : [];

    case 'index': {
      if (!Array.isArray(value)) return [];
      const index = segment.index < 0 ? value.length + segment.index : segment.index;
      const item: unknown = value[index];
      return index >= 0 && isPresent(item) ? [item] : [];
    }

    case 'wildcard':
      if (Array.isArray(value)) return value.filter(isPresent);
      if (isRecord(value)) return Object.values(value).filter(isPresent);
      return [];

    case 'filter':
      if (Array.isArray(value)) return value.filter((item) => matchesFilter(item, segment));
      // A single map is tested as a one-element list
      if (isRecord(value)) return matchesFilter(value, segment) ? [value] : [];
      return [];
  }
}

/**
 * Evaluate a field path against a document.
 *
 * Returns every selected value in document order. Missing keys, out-of-range
 * indexes and type mismatches select nothing; only a malformed expression
 * throws (a PathExpressionError, from parsing).
 */
export function evaluatePath(document: unknown, path: string | ParsedPath): unknown[] {
  const parsed = typeof path === 'string' ? parsePath(path) : path;

  let current: unknown[] = isPresent(document) ? [document] : [];
  for (const segment of parsed.segments) {
    if (current.length === 0) break;
    current = current.flatMap((value) => applySegment(value, segment));
  }
  return current;
}

function stringifyValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/**
 * Evaluate a field path and join the selected values with commas
 */
export function getNestedString(document: unknown, path: string | ParsedPath): string {
  return evaluatePath(document, path).map(stringifyValue).join(',');
}
