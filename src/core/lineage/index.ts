export { buildKindGroupTable, KindDisambiguator } from './disambiguator.js';
export {
  findObjects,
  LineageEngine,
  type LineageEngineOptions,
  type LineageGraph,
} from './lineage.js';
export { buildNodeMap, compareNodes, findRoots, type NodeMapBuild } from './node-map.js';
export {
  DEFAULT_MAX_DEPTH,
  type RenderOptions,
  type RenderResult,
  renderLineage,
  TREE_GLYPHS,
} from './renderer.js';
