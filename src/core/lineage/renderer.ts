/**
 * Tree Renderer
 *
 * Walks a NodeMap from a root and produces one display row per reachable
 * object, prefixed with box-drawing glyphs:
 *
 *   Deployment.apps/web          True    MinimumReplicasAvailable   3d
 *   └── ReplicaSet.apps/web-7d   True    <none>                     3d
 *       ├── Pod/web-7d-abc       True    <none>                     3d
 *       └── Pod/web-7d-def       True    <none>                     3d
 *
 * The walk uses explicit work-lists rather than recursion, so its depth is
 * bounded by `maxDepth` instead of the call stack.
 */

import { getObjectColumns } from '../columns/extractor.js';
import {
  LineageError,
  NodeMapReferenceError,
  RenderDepthExceededError,
} from '../errors.js';
import { getRenderLogger } from '../logging/index.js';
import type { DisplayRow } from '../types/columns.js';
import type { LineageNode, NodeMap } from '../types/graph.js';
import { KindDisambiguator } from './disambiguator.js';

export const TREE_GLYPHS = {
  tee: '├── ',
  corner: '└── ',
  pipe: '│   ',
  blank: '    ',
} as const;

export const DEFAULT_MAX_DEPTH = 64;

export interface RenderOptions {
  /** Instant the Age column is measured against (default: now) */
  now?: Date;
  /** Qualify every name with its API group */
  showGroup?: boolean;
  maxDepth?: number;
  /** Condition reported in the Status and Reason columns (default: Ready) */
  conditionType?: string;
  /** Precomputed Kind/Group table for the NodeMap */
  disambiguator?: KindDisambiguator;
}

/**
 * Rows produced by a render. When `error` is set the walk stopped early and
 * `rows` holds everything emitted before the failure.
 */
export interface RenderResult {
  rows: DisplayRow[];
  error?: LineageError;
}

interface WorkItem {
  uid: string;
  parentUid: string;
  rowPrefix: string;
  childPrefix: string;
  inheritedShowGroup: boolean;
  depth: number;
}

/**
 * Assign every node reachable from the root to the first parent that reaches
 * it in depth-first order, so that each node is emitted once per render.
 * Children of nodes past `maxDepth` are not expanded.
 */
function claimTree(nodeMap: NodeMap, rootUid: string, maxDepth: number): Map<string, string[]> {
  const children = new Map<string, string[]>();
  const claimed = new Set<string>([rootUid]);
  const stack: { uid: string; index: number; depth: number }[] = [
    { uid: rootUid, index: 0, depth: 0 },
  ];

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    if (!frame) break;
    const dependents = nodeMap.get(frame.uid)?.dependents ?? [];

    if (frame.index >= dependents.length) {
      stack.pop();
      continue;
    }

    const child = dependents[frame.index];
    frame.index++;
    if (child === undefined || claimed.has(child)) continue;

    claimed.add(child);
    const list = children.get(frame.uid);
    if (list) {
      list.push(child);
    } else {
      children.set(frame.uid, [child]);
    }

    if (frame.depth + 1 <= maxDepth && nodeMap.has(child)) {
      stack.push({ uid: child, index: 0, depth: frame.depth + 1 });
    }
  }

  return children;
}

function toRow(
  node: LineageNode,
  prefix: string,
  depth: number,
  showGroup: boolean,
  now: Date,
  conditionType: string | undefined
): DisplayRow {
  const columns = getObjectColumns(node.object, showGroup, {
    now,
    ...(conditionType !== undefined && { conditionType }),
  });
  return {
    uid: node.uid,
    depth,
    prefix,
    cells: [prefix + columns.name, columns.status, columns.reason, columns.age],
    columns,
    object: structuredClone(node.object),
  };
}

/**
 * Render the lineage tree rooted at `rootUid`
 */
export function renderLineage(
  nodeMap: NodeMap,
  rootUid: string,
  options: RenderOptions = {}
): RenderResult {
  const logger = getRenderLogger(rootUid);
  const now = options.now ?? new Date();
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  const override = options.showGroup === true;
  const disambiguator = options.disambiguator ?? new KindDisambiguator(nodeMap);
  const rows: DisplayRow[] = [];

  const root = nodeMap.get(rootUid);
  if (!root) {
    return {
      rows,
      error: new NodeMapReferenceError(`Root object '${rootUid}' is not in the node map`, rootUid),
    };
  }

  const children = claimTree(nodeMap, rootUid, maxDepth);

  const pushChildren = (
    stack: WorkItem[],
    parentUid: string,
    prefix: string,
    inheritedShowGroup: boolean,
    depth: number
  ): void => {
    const list = children.get(parentUid) ?? [];
    // Pushed in reverse so the first dependent is visited first
    for (let i = list.length - 1; i >= 0; i--) {
      const uid = list[i];
      if (uid === undefined) continue;
      const last = i === list.length - 1;
      stack.push({
        uid,
        parentUid,
        rowPrefix: prefix + (last ? TREE_GLYPHS.corner : TREE_GLYPHS.tee),
        childPrefix: prefix + (last ? TREE_GLYPHS.blank : TREE_GLYPHS.pipe),
        inheritedShowGroup,
        depth,
      });
    }
  };

  const stack: WorkItem[] = [];
  try {
    rows.push(
      toRow(
        root,
        '',
        0,
        override || disambiguator.requiresGroup(root.kind),
        now,
        options.conditionType
      )
    );
    // The root's own disambiguation is not inherited, only the override
    pushChildren(stack, root.uid, '', override, 1);

    while (stack.length > 0) {
      const item = stack.pop();
      if (!item) break;

      const node = nodeMap.get(item.uid);
      if (!node) {
        throw new NodeMapReferenceError(
          `Object '${item.uid}' listed as a dependent of '${item.parentUid}' is not in the node map`,
          item.uid,
          item.parentUid
        );
      }
      if (item.depth > maxDepth) {
        throw new RenderDepthExceededError(maxDepth, item.uid);
      }

      // Sticky: once a branch shows groups, everything below it does too
      const showGroup = item.inheritedShowGroup || disambiguator.requiresGroup(node.kind);
      rows.push(toRow(node, item.rowPrefix, item.depth, showGroup, now, options.conditionType));
      pushChildren(stack, node.uid, item.childPrefix, showGroup, item.depth + 1);
    }
  } catch (error) {
    const failure =
      error instanceof LineageError
        ? error
        : new LineageError(
            `Failed to render lineage of '${rootUid}': ${error instanceof Error ? error.message : String(error)}`,
            'RENDER_FAILED',
            { rootUid }
          );
    logger.debug('Render stopped early', { reason: failure.message, rows: rows.length });
    return { rows, error: failure };
  }

  logger.debug('Rendered lineage', { rows: rows.length });
  return { rows };
}
