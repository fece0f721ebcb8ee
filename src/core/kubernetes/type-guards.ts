/**
 * Type guards for objects coming back from the Kubernetes API
 */

import type { LineageObject } from '../types/objects.js';

export interface KubernetesListPage {
  items: unknown[];
  metadata?: { _continue?: string; continue?: string };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOptionalString(value: unknown): boolean {
  return value === undefined || typeof value === 'string';
}

/**
 * Check if a value has the shape of a Kubernetes object
 */
export function isLineageObject(value: unknown): value is LineageObject {
  return (
    isRecord(value) &&
    isOptionalString(value.apiVersion) &&
    isOptionalString(value.kind) &&
    (value.metadata === undefined || isRecord(value.metadata))
  );
}

/**
 * Check if a value is a list response from the Kubernetes API
 */
export function isKubernetesList(value: unknown): value is KubernetesListPage {
  if (!isRecord(value) || !Array.isArray(value.items)) {
    return false;
  }
  const { metadata } = value;
  return (
    metadata === undefined ||
    (isRecord(metadata) && isOptionalString(metadata._continue) && isOptionalString(metadata.continue))
  );
}
