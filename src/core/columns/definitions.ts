import type { ColumnDefinition } from '../types/columns.js';

export const OBJECT_COLUMN_DEFINITIONS: readonly ColumnDefinition[] = [
  {
    name: 'Name',
    type: 'string',
    format: 'name',
    description:
      'Name must be unique within a namespace. Prefixed with the Kind, or with the Kind and API group when the Kind is ambiguous.',
  },
  { name: 'Status', type: 'string', description: 'The condition Ready status of the object.' },
  { name: 'Reason', type: 'string', description: 'The condition Ready reason of the object.' },
  {
    name: 'Age',
    type: 'string',
    description:
      'Time elapsed since the object was created, taken from its creationTimestamp.',
  },
];
