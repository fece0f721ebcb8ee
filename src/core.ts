/**
 * kube-lineage core - consolidated exports
 */

// =============================================================================
// Column Extraction
// =============================================================================
export {
  CELL_INVALID,
  CELL_UNKNOWN,
  CELL_UNSET,
  type ColumnOptions,
  conditionPath,
  DEFAULT_CONDITION_TYPE,
  getDisplayName,
  getObjectColumns,
  humanDuration,
  OBJECT_COLUMN_DEFINITIONS,
  translateTimestampSince,
} from './core/columns/index.js';
// =============================================================================
// Errors
// =============================================================================
export {
  type DiagnosticCode,
  formatArktypeError,
  type LineageDiagnostic,
  LineageError,
  NodeMapReferenceError,
  ObjectSourceError,
  PathExpressionError,
  RenderDepthExceededError,
  RuleValidationError,
} from './core/errors.js';
// =============================================================================
// Field Paths
// =============================================================================
export {
  evaluatePath,
  getNestedString,
  type ParsedPath,
  type PathSegment,
  parsePath,
} from './core/jsonpath/index.js';
// =============================================================================
// Kubernetes
// =============================================================================
export {
  type ClusterObjectSource,
  DEFAULT_RESOURCE_TYPES,
  formatKubernetesError,
  getErrorStatusCode,
  groupKindString,
  isLineageObject,
  KubernetesObjectSource,
  type KubernetesObjectSourceOptions,
  type ObjectListClient,
  parseApiVersion,
  type ResourceType,
  StaticObjectSource,
} from './core/kubernetes/index.js';
// =============================================================================
// Lineage Graph
// =============================================================================
export {
  buildKindGroupTable,
  buildNodeMap,
  compareNodes,
  DEFAULT_MAX_DEPTH,
  findObjects,
  findRoots,
  KindDisambiguator,
  LineageEngine,
  type LineageEngineOptions,
  type LineageGraph,
  type NodeMapBuild,
  type RenderOptions,
  type RenderResult,
  renderLineage,
  TREE_GLYPHS,
} from './core/lineage/index.js';
// =============================================================================
// Logging
// =============================================================================
export {
  createContextLogger,
  createLogger,
  getComponentLogger,
  getRenderLogger,
  type LineageLogger,
  type LoggerConfig,
} from './core/logging/index.js';
// =============================================================================
// Output
// =============================================================================
export {
  formatRows,
  isOutputFormat,
  type ObjectList,
  type OutputFormat,
  printTable,
  type TableOptions,
  toStructuredList,
} from './core/output/index.js';
// =============================================================================
// Relations
// =============================================================================
export {
  loadDefaultRelationRules,
  loadRelationRules,
  loadRelationRulesFile,
  matchesLabelSelector,
  type RelationshipResolution,
  RelationshipResolver,
  toLabelSelector,
} from './core/relations/index.js';
// =============================================================================
// Types
// =============================================================================
export type * from './core/types/index.js';
