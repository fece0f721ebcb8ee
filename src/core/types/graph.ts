import type { LineageObject } from './objects.js';

/**
 * One object participating in the lineage
 */
export interface LineageNode {
  readonly uid: string;
  readonly group: string;
  readonly version: string;
  readonly kind: string;
  readonly namespace: string;
  readonly name: string;
  readonly object: LineageObject;
  /** UIDs of the objects that depend on this one, in display order */
  readonly dependents: readonly string[];
}

/**
 * Immutable UID-keyed collection of nodes built for one invocation
 */
export type NodeMap = ReadonlyMap<string, LineageNode>;

export type RelationKind = 'owner-reference' | (string & {});

/**
 * Directed relationship: the dependent depends on the owner
 */
export interface LineageEdge {
  ownerUid: string;
  dependentUid: string;
  relation: RelationKind;
}
