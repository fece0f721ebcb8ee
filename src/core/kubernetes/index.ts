/**
 * Kubernetes Module
 *
 * Group/Version/Kind helpers, API error handling and the sources that
 * materialize cluster objects for the lineage engine.
 */

export {
  formatKubernetesError,
  getErrorStatusCode,
  isForbiddenError,
  isNotFoundError,
} from './errors.js';
export { groupKindString, parseApiVersion, sameGroupKind } from './gvk.js';
export {
  type ClusterObjectSource,
  DEFAULT_RESOURCE_TYPES,
  KubernetesObjectSource,
  type KubernetesObjectSourceOptions,
  type ObjectListClient,
  type ResourceType,
  StaticObjectSource,
} from './object-source.js';
export { isKubernetesList, isLineageObject, isRecord } from './type-guards.js';
