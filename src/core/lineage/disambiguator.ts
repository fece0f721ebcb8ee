/**
 * Kind/Group Disambiguator
 *
 * When the same Kind is served by more than one API group (`Service` in the
 * core group and in `serving.knative.dev`), names of that Kind are qualified
 * with the group. The decision is made once over the whole NodeMap so that a
 * Kind is rendered the same way throughout a report.
 */

import type { NodeMap } from '../types/graph.js';

export function buildKindGroupTable(nodeMap: NodeMap): Map<string, Set<string>> {
  const table = new Map<string, Set<string>>();
  for (const node of nodeMap.values()) {
    const groups = table.get(node.kind);
    if (groups) {
      groups.add(node.group);
    } else {
      table.set(node.kind, new Set([node.group]));
    }
  }
  return table;
}

export class KindDisambiguator {
  private readonly ambiguousKinds: ReadonlySet<string>;

  constructor(nodeMap: NodeMap) {
    const ambiguous = new Set<string>();
    for (const [kind, groups] of buildKindGroupTable(nodeMap)) {
      if (groups.size > 1) ambiguous.add(kind);
    }
    this.ambiguousKinds = ambiguous;
  }

  requiresGroup(kind: string): boolean {
    return this.ambiguousKinds.has(kind);
  }

  get kinds(): string[] {
    return [...this.ambiguousKinds].sort();
  }
}
