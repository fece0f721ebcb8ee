export type { ColumnDefinition, DisplayRow, ObjectColumns, RowCells } from './columns.js';
export type { LineageEdge, LineageNode, NodeMap, RelationKind } from './graph.js';
export type {
  GroupKind,
  GroupVersionKind,
  LineageObject,
  LineageObjectMeta,
  ObjectReference,
  OwnerReference,
} from './objects.js';
export type { RelationDirection, RelationMatch, RelationRule } from './relations.js';
