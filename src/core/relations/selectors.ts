/**
 * Label selector matching
 */

import type { V1LabelSelector, V1LabelSelectorRequirement } from '@kubernetes/client-node';
import { isRecord } from '../kubernetes/type-guards.js';

function isStringMap(value: unknown): value is Record<string, string> {
  return isRecord(value) && Object.values(value).every((entry) => typeof entry === 'string');
}

function toRequirement(value: unknown): V1LabelSelectorRequirement | undefined {
  if (!isRecord(value) || typeof value.key !== 'string' || typeof value.operator !== 'string') {
    return undefined;
  }
  const values = Array.isArray(value.values)
    ? value.values.filter((entry): entry is string => typeof entry === 'string')
    : undefined;
  return values ? { key: value.key, operator: value.operator, values } : { key: value.key, operator: value.operator };
}

/**
 * Interpret a value as a label selector. Accepts a full selector
 * (`matchLabels` / `matchExpressions`) or a plain label map, as used by
 * Service `spec.selector`.
 */
export function toLabelSelector(value: unknown): V1LabelSelector | undefined {
  if (!isRecord(value)) {
    return undefined;
  }

  if ('matchLabels' in value || 'matchExpressions' in value) {
    const selector: V1LabelSelector = {};
    if (isStringMap(value.matchLabels)) {
      selector.matchLabels = value.matchLabels;
    } else if (value.matchLabels !== undefined && value.matchLabels !== null) {
      // Unreadable labels never widen the selector
      return undefined;
    }
    if (Array.isArray(value.matchExpressions)) {
      const requirements: V1LabelSelectorRequirement[] = [];
      for (const entry of value.matchExpressions) {
        const requirement = toRequirement(entry);
        // An unreadable requirement must not widen the selector
        if (!requirement) return undefined;
        requirements.push(requirement);
      }
      selector.matchExpressions = requirements;
    }
    return selector;
  }

  return isStringMap(value) ? { matchLabels: value } : undefined;
}

export function isEmptySelector(selector: V1LabelSelector): boolean {
  return (
    Object.keys(selector.matchLabels ?? {}).length === 0 &&
    (selector.matchExpressions ?? []).length === 0
  );
}

function matchesRequirement(
  labels: Record<string, string>,
  requirement: V1LabelSelectorRequirement
): boolean {
  const has = Object.prototype.hasOwnProperty.call(labels, requirement.key);
  const value = labels[requirement.key];
  const values = requirement.values ?? [];

  switch (requirement.operator) {
    case 'In':
      return has && value !== undefined && values.includes(value);
    case 'NotIn':
      return !has || value === undefined || !values.includes(value);
    case 'Exists':
      return has;
    case 'DoesNotExist':
      return !has;
    default:
      return false;
  }
}

/**
 * Whether a label set satisfies a selector. An empty selector selects nothing.
 */
export function matchesLabelSelector(
  selector: V1LabelSelector,
  labels: Record<string, string> | undefined
): boolean {
  if (isEmptySelector(selector)) {
    return false;
  }
  const actual = labels ?? {};

  for (const [key, expected] of Object.entries(selector.matchLabels ?? {})) {
    if (actual[key] !== expected) return false;
  }
  return (selector.matchExpressions ?? []).every((requirement) =>
    matchesRequirement(actual, requirement)
  );
}
