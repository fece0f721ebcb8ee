import { PathExpressionError } from '../errors.js';
import { getNestedString } from '../jsonpath/index.js';
import { getComponentLogger } from '../logging/index.js';
import type { ObjectColumns } from '../types/columns.js';
import type { LineageObject } from '../types/objects.js';
import { groupKindString, parseApiVersion } from '../kubernetes/gvk.js';
import { translateTimestampSince } from './age.js';

export const CELL_UNSET = '<none>';

export const DEFAULT_CONDITION_TYPE = 'Ready';

const logger = getComponentLogger('column-extractor');

export interface ColumnOptions {
  /** Render instant used for the Age column */
  now: Date;
  /** Condition whose status and reason fill the Status and Reason columns */
  conditionType?: string;
}

function quoteLiteral(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export function conditionPath(conditionType: string, field: 'status' | 'reason'): string {
  return `{.status.conditions[?(@.type==${quoteLiteral(conditionType)})].${field}}`;
}

function getCell(object: LineageObject, expression: string): string {
  try {
    const value = getNestedString(object, expression);
    return value.length > 0 ? value : CELL_UNSET;
  } catch (error) {
    if (error instanceof PathExpressionError) {
      logger.debug('Column expression could not be parsed', { expression, reason: error.message });
      return CELL_UNSET;
    }
    throw error;
  }
}

/**
 * Display name of an object: `Kind/name`, or `Kind.group/name` when the
 * group is shown
 */
export function getDisplayName(object: LineageObject, showGroup: boolean): string {
  const { group, kind } = parseApiVersion(object.apiVersion, object.kind);
  const qualifier = showGroup ? groupKindString({ group, kind }) : kind;
  return `${qualifier}/${object.metadata?.name ?? ''}`;
}

/**
 * Compute the Name, Status, Reason and Age columns of an object
 */
export function getObjectColumns(
  object: LineageObject,
  showGroup: boolean,
  options: ColumnOptions
): ObjectColumns {
  const conditionType = options.conditionType ?? DEFAULT_CONDITION_TYPE;

  return {
    name: getDisplayName(object, showGroup),
    status: getCell(object, conditionPath(conditionType, 'status')),
    reason: getCell(object, conditionPath(conditionType, 'reason')),
    age: translateTimestampSince(object.metadata?.creationTimestamp, options.now),
  };
}
