export {
  loadDefaultRelationRules,
  loadRelationRules,
  loadRelationRulesFile,
} from './loader.js';
export { type RelationshipResolution, RelationshipResolver } from './resolver.js';
export { GroupKindSchema, RelationRuleDocumentSchema, RelationRuleSchema } from './schema.js';
export { isEmptySelector, matchesLabelSelector, toLabelSelector } from './selectors.js';
