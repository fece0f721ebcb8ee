import type { GroupKind, GroupVersionKind } from '../types/objects.js';

/**
 * Split an apiVersion such as `apps/v1` or `v1` into group and version
 */
export function parseApiVersion(apiVersion: string | undefined, kind: string | undefined): GroupVersionKind {
  const value = apiVersion ?? '';
  const slash = value.lastIndexOf('/');
  return {
    group: slash === -1 ? '' : value.slice(0, slash),
    version: slash === -1 ? value : value.slice(slash + 1),
    kind: kind ?? '',
  };
}

/**
 * `Kind.group`, or just `Kind` for the core group
 */
export function groupKindString({ group, kind }: GroupKind): string {
  return group.length > 0 ? `${kind}.${group}` : kind;
}

export function sameGroupKind(a: GroupKind, b: GroupKind): boolean {
  return a.group === b.group && a.kind === b.kind;
}
