/**
 * Cluster objects as handed to the lineage engine
 */

import type { V1ObjectMeta, V1OwnerReference } from '@kubernetes/client-node';

/**
 * Object metadata. Typed clients deserialize creationTimestamp to a Date;
 * unstructured reads leave it an RFC 3339 string.
 */
export interface LineageObjectMeta extends Omit<V1ObjectMeta, 'creationTimestamp'> {
  creationTimestamp?: Date | string;
}

/**
 * A fetched cluster object. Only the standard fields are typed; spec, status
 * and everything else are read schemalessly through field paths.
 */
export interface LineageObject {
  apiVersion?: string;
  kind?: string;
  metadata?: LineageObjectMeta;
}

export interface GroupVersionKind {
  group: string;
  version: string;
  kind: string;
}

export interface GroupKind {
  /** API group, empty for the core group */
  group: string;
  kind: string;
}

/**
 * Locates an object by type and name rather than by UID
 */
export interface ObjectReference {
  group?: string;
  kind: string;
  namespace?: string;
  name: string;
}

export type OwnerReference = V1OwnerReference;
