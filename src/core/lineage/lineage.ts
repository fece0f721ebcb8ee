/**
 * Lineage engine
 *
 * Resolves relationships over one snapshot of cluster objects, freezes the
 * result into a NodeMap and renders it from any number of roots.
 */

import { type LineageDiagnostic, LineageError, NodeMapReferenceError } from '../errors.js';
import type { ClusterObjectSource } from '../kubernetes/object-source.js';
import { getComponentLogger } from '../logging/index.js';
import { loadDefaultRelationRules } from '../relations/loader.js';
import { RelationshipResolver } from '../relations/resolver.js';
import type { LineageEdge, LineageNode, NodeMap } from '../types/graph.js';
import type { LineageObject, ObjectReference } from '../types/objects.js';
import type { RelationRule } from '../types/relations.js';
import { KindDisambiguator } from './disambiguator.js';
import { buildNodeMap, compareNodes, findRoots } from './node-map.js';
import { type RenderOptions, type RenderResult, renderLineage } from './renderer.js';

export interface LineageGraph {
  readonly nodeMap: NodeMap;
  readonly edges: readonly LineageEdge[];
  readonly diagnostics: readonly LineageDiagnostic[];
  readonly disambiguator: KindDisambiguator;
}

export interface LineageEngineOptions {
  /** Relation rules in addition to ownerReferences (default: the built-in rules) */
  rules?: readonly RelationRule[];
}

/**
 * Nodes matching a reference. Group and namespace narrow the match only when
 * given.
 */
export function findObjects(nodeMap: NodeMap, reference: ObjectReference): LineageNode[] {
  return [...nodeMap.values()]
    .filter(
      (node) =>
        node.kind === reference.kind &&
        node.name === reference.name &&
        (reference.group === undefined || node.group === reference.group) &&
        (reference.namespace === undefined || node.namespace === reference.namespace)
    )
    .sort(compareNodes);
}

function describeReference(reference: ObjectReference): string {
  const kind = reference.group ? `${reference.kind}.${reference.group}` : reference.kind;
  return reference.namespace
    ? `${kind}/${reference.name} in namespace ${reference.namespace}`
    : `${kind}/${reference.name}`;
}

export class LineageEngine {
  private readonly logger = getComponentLogger('lineage-engine');
  private readonly resolver = new RelationshipResolver();
  private readonly rules: readonly RelationRule[];

  constructor(options: LineageEngineOptions = {}) {
    this.rules = options.rules ?? loadDefaultRelationRules();
  }

  /**
   * Resolve and assemble the lineage graph of a complete object snapshot
   */
  build(objects: readonly LineageObject[]): LineageGraph {
    const resolution = this.resolver.resolve(objects, this.rules);
    const { nodeMap, diagnostics } = buildNodeMap(objects, resolution.edges);

    this.logger.debug('Built lineage graph', {
      objects: objects.length,
      nodes: nodeMap.size,
      edges: resolution.edges.length,
    });

    return {
      nodeMap,
      edges: resolution.edges,
      diagnostics: [...resolution.diagnostics, ...diagnostics],
      disambiguator: new KindDisambiguator(nodeMap),
    };
  }

  async buildFromSource(source: ClusterObjectSource): Promise<LineageGraph> {
    return this.build(await source.fetchObjects());
  }

  /**
   * Render the tree below one object, given by UID or by reference
   */
  render(
    graph: LineageGraph,
    root: string | ObjectReference,
    options: Omit<RenderOptions, 'disambiguator'> = {}
  ): RenderResult {
    const rootUid = typeof root === 'string' ? root : this.resolveReference(graph, root);
    if (rootUid instanceof LineageError) {
      return { rows: [], error: rootUid };
    }
    return renderLineage(graph.nodeMap, rootUid, {
      ...options,
      disambiguator: graph.disambiguator,
    });
  }

  /**
   * Render every root of the graph, one tree after another
   */
  renderRoots(
    graph: LineageGraph,
    options: Omit<RenderOptions, 'disambiguator'> = {}
  ): RenderResult {
    const now = options.now ?? new Date();
    const rows: RenderResult['rows'] = [];

    for (const root of findRoots(graph.nodeMap)) {
      const result = renderLineage(graph.nodeMap, root.uid, {
        ...options,
        now,
        disambiguator: graph.disambiguator,
      });
      rows.push(...result.rows);
      if (result.error) {
        return { rows, error: result.error };
      }
    }
    return { rows };
  }

  private resolveReference(graph: LineageGraph, reference: ObjectReference): string | LineageError {
    const matches = findObjects(graph.nodeMap, reference);
    const [first, second] = matches;
    if (!first) {
      return new NodeMapReferenceError(
        `No object matches ${describeReference(reference)}`,
        describeReference(reference)
      );
    }
    if (second) {
      return new LineageError(
        `${describeReference(reference)} is ambiguous: ${matches.length} objects match`,
        'AMBIGUOUS_OBJECT',
        { matches: matches.map((node) => node.uid) }
      );
    }
    return first.uid;
  }
}
