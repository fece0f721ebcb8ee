import type { GroupKind } from './objects.js';

/**
 * How the values selected by a rule's path identify the target
 */
export type RelationMatch = 'name' | 'uid' | 'labelSelector';

/**
 * `dependsOn`: the source object depends on the matched target.
 * `owns`: the matched target depends on the source object.
 */
export type RelationDirection = 'dependsOn' | 'owns';

/**
 * Declarative, non-ownership relationship between two object types
 */
export interface RelationRule {
  name: string;
  source: GroupKind;
  target: GroupKind;
  /** Field-path template evaluated against the source object */
  path: string;
  /**
   * For `name` matches: read the name from each item selected by `path`
   * instead of taking the item itself as the name
   */
  namePath?: string;
  /**
   * For `name` matches: read the target namespace from each item selected by
   * `path`. A non-empty value replaces the source object's namespace.
   */
  namespacePath?: string;
  match: RelationMatch;
  direction: RelationDirection;
}
