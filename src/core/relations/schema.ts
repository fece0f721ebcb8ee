import { type } from 'arktype';

export const GroupKindSchema = type({
  'group?': 'string',
  kind: 'string > 0',
});

export const RelationRuleSchema = type({
  name: 'string > 0',
  source: GroupKindSchema,
  target: GroupKindSchema,
  path: 'string > 0',
  'namePath?': 'string > 0',
  'namespacePath?': 'string > 0',
  'match?': "'name' | 'uid' | 'labelSelector'",
  'direction?': "'dependsOn' | 'owns'",
});

export const RelationRuleDocumentSchema = type({
  rules: RelationRuleSchema.array(),
});

export type RelationRuleInput = typeof RelationRuleSchema.infer;
