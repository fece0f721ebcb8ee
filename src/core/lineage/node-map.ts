/**
 * Graph Builder
 *
 * Assembles fetched objects and resolved edges into an immutable NodeMap whose
 * dependents lists are sorted and free of cycles.
 */

import { diagnostic, type LineageDiagnostic } from '../errors.js';
import { parseApiVersion } from '../kubernetes/gvk.js';
import { getComponentLogger } from '../logging/index.js';
import type { LineageEdge, LineageNode, NodeMap } from '../types/graph.js';
import type { LineageObject } from '../types/objects.js';

const logger = getComponentLogger('graph-builder');

export interface NodeMapBuild {
  nodeMap: NodeMap;
  diagnostics: LineageDiagnostic[];
}

type SortKey = Pick<LineageNode, 'group' | 'kind' | 'namespace' | 'name' | 'uid'>;

function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Display order of sibling nodes: Group, Kind, Namespace, Name, then UID
 */
export function compareNodes(a: SortKey, b: SortKey): number {
  return (
    compareStrings(a.group, b.group) ||
    compareStrings(a.kind, b.kind) ||
    compareStrings(a.namespace, b.namespace) ||
    compareStrings(a.name, b.name) ||
    compareStrings(a.uid, b.uid)
  );
}

interface PendingNode extends SortKey {
  version: string;
  object: LineageObject;
  dependents: string[];
}

/**
 * Drop every edge that closes a cycle. The walk starts from nodes nobody
 * depends on, in display order, so the edge dropped is the one pointing back
 * at an ancestor of that walk.
 */
function breakCycles(
  pending: Map<string, PendingNode>,
  order: readonly string[],
  diagnostics: LineageDiagnostic[]
): void {
  const hasOwner = new Set<string>();
  for (const node of pending.values()) {
    for (const uid of node.dependents) hasOwner.add(uid);
  }
  const starts = [
    ...order.filter((uid) => !hasOwner.has(uid)),
    ...order.filter((uid) => hasOwner.has(uid)),
  ];

  const state = new Map<string, 'active' | 'done'>();

  for (const start of starts) {
    if (state.has(start)) continue;

    const stack: { uid: string; index: number; kept: string[] }[] = [
      { uid: start, index: 0, kept: [] },
    ];
    state.set(start, 'active');

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (!frame) break;
      const node = pending.get(frame.uid);
      const dependents = node?.dependents ?? [];

      if (frame.index >= dependents.length) {
        if (node) node.dependents = frame.kept;
        state.set(frame.uid, 'done');
        stack.pop();
        continue;
      }

      const child = dependents[frame.index];
      frame.index++;
      if (child === undefined) continue;

      const childState = state.get(child);
      if (childState === 'active') {
        const path = stack.map((entry) => entry.uid);
        diagnostics.push(
          diagnostic(
            'CYCLE_DROPPED',
            `Dropped relationship ${frame.uid} -> ${child}: it would revisit an ancestor`,
            { ownerUid: frame.uid, dependentUid: child, cycle: path.slice(path.indexOf(child)) }
          )
        );
        continue;
      }

      frame.kept.push(child);
      if (childState === undefined) {
        state.set(child, 'active');
        stack.push({ uid: child, index: 0, kept: [] });
      }
    }
  }
}

/**
 * Build the NodeMap for one invocation
 */
export function buildNodeMap(
  objects: readonly LineageObject[],
  edges: readonly LineageEdge[]
): NodeMapBuild {
  const diagnostics: LineageDiagnostic[] = [];
  const pending = new Map<string, PendingNode>();

  for (const object of objects) {
    const uid = object.metadata?.uid;
    if (!uid) {
      diagnostics.push(
        diagnostic('MISSING_UID', `Object ${object.kind ?? 'unknown'}/${object.metadata?.name ?? ''} has no UID`, {
          kind: object.kind,
          name: object.metadata?.name,
          namespace: object.metadata?.namespace,
        })
      );
      continue;
    }

    // Overlapping fetch batches: the later copy wins
    const { group, version, kind } = parseApiVersion(object.apiVersion, object.kind);
    pending.set(uid, {
      uid,
      group,
      version,
      kind,
      namespace: object.metadata?.namespace ?? '',
      name: object.metadata?.name ?? '',
      object,
      dependents: [],
    });
  }

  const wired = new Set<string>();
  for (const edge of edges) {
    const owner = pending.get(edge.ownerUid);
    if (!owner || !pending.has(edge.dependentUid)) {
      diagnostics.push(
        diagnostic(
          'DANGLING_EDGE',
          `Relationship ${edge.ownerUid} -> ${edge.dependentUid} references an unknown object`,
          { ...edge }
        )
      );
      continue;
    }
    const key = `${edge.ownerUid}->${edge.dependentUid}`;
    if (edge.ownerUid === edge.dependentUid || wired.has(key)) continue;
    wired.add(key);
    owner.dependents.push(edge.dependentUid);
  }

  const sortKey = (uid: string): PendingNode => {
    const node = pending.get(uid);
    if (!node) throw new Error(`Unknown node '${uid}'`);
    return node;
  };
  for (const node of pending.values()) {
    node.dependents.sort((a, b) => compareNodes(sortKey(a), sortKey(b)));
  }

  const order = [...pending.values()].sort(compareNodes).map((node) => node.uid);
  breakCycles(pending, order, diagnostics);

  const nodeMap = new Map<string, LineageNode>();
  for (const uid of order) {
    const node = sortKey(uid);
    nodeMap.set(
      uid,
      Object.freeze({
        uid: node.uid,
        group: node.group,
        version: node.version,
        kind: node.kind,
        namespace: node.namespace,
        name: node.name,
        object: structuredClone(node.object),
        dependents: Object.freeze([...node.dependents]),
      })
    );
  }

  for (const entry of diagnostics) {
    logger.warn(entry.message, { code: entry.code, ...entry.context });
  }
  logger.debug('Built node map', { nodes: nodeMap.size, edges: wired.size });

  return { nodeMap, diagnostics };
}

/**
 * Nodes that are no other node's dependent, in display order
 */
export function findRoots(nodeMap: NodeMap): LineageNode[] {
  const dependents = new Set<string>();
  for (const node of nodeMap.values()) {
    for (const uid of node.dependents) dependents.add(uid);
  }
  return [...nodeMap.values()].filter((node) => !dependents.has(node.uid)).sort(compareNodes);
}
