/**
 * Relationship Resolver
 *
 * Derives owner -> dependent edges from ownerReferences and from declarative
 * relation rules evaluated against the fetched objects.
 */

import { diagnostic, type LineageDiagnostic, PathExpressionError } from '../errors.js';
import { evaluatePath, type ParsedPath, parsePath } from '../jsonpath/index.js';
import { parseApiVersion, sameGroupKind } from '../kubernetes/gvk.js';
import { getComponentLogger } from '../logging/index.js';
import type { LineageEdge } from '../types/graph.js';
import type { GroupKind, LineageObject } from '../types/objects.js';
import type { RelationRule } from '../types/relations.js';
import { matchesLabelSelector, toLabelSelector } from './selectors.js';

export interface RelationshipResolution {
  edges: LineageEdge[];
  diagnostics: LineageDiagnostic[];
}

interface IndexedObject {
  uid: string;
  group: string;
  kind: string;
  namespace: string;
  name: string;
  object: LineageObject;
}

function groupKindKey({ group, kind }: GroupKind): string {
  return `${group}/${kind}`;
}

function objectKey(group: string, kind: string, namespace: string, name: string): string {
  return `${group}/${kind}/${namespace}/${name}`;
}

/**
 * Lookup tables over one snapshot of objects
 */
class ObjectIndex {
  readonly byUid = new Map<string, IndexedObject>();
  private readonly byName = new Map<string, IndexedObject>();
  private readonly byGroupKind = new Map<string, IndexedObject[]>();

  constructor(objects: readonly LineageObject[]) {
    for (const object of objects) {
      const uid = object.metadata?.uid;
      if (!uid) continue;
      const { group, kind } = parseApiVersion(object.apiVersion, object.kind);
      this.byUid.set(uid, {
        uid,
        group,
        kind,
        namespace: object.metadata?.namespace ?? '',
        name: object.metadata?.name ?? '',
        object,
      });
    }

    // Built from the deduplicated UID table so that a superseded copy of an
    // object never matches
    for (const entry of this.byUid.values()) {
      this.byName.set(objectKey(entry.group, entry.kind, entry.namespace, entry.name), entry);
      const key = groupKindKey(entry);
      const list = this.byGroupKind.get(key);
      if (list) {
        list.push(entry);
      } else {
        this.byGroupKind.set(key, [entry]);
      }
    }
  }

  findByName(target: GroupKind, namespace: string, name: string): IndexedObject | undefined {
    return (
      this.byName.get(objectKey(target.group, target.kind, namespace, name)) ??
      this.byName.get(objectKey(target.group, target.kind, '', name))
    );
  }

  ofGroupKind(target: GroupKind): readonly IndexedObject[] {
    return this.byGroupKind.get(groupKindKey(target)) ?? [];
  }
}

interface CompiledRule {
  rule: RelationRule;
  path: ParsedPath;
  namePath?: ParsedPath;
  namespacePath?: ParsedPath;
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

export class RelationshipResolver {
  private logger = getComponentLogger('relationship-resolver');

  /**
   * Resolve every edge among the given objects
   */
  resolve(
    objects: readonly LineageObject[],
    rules: readonly RelationRule[] = []
  ): RelationshipResolution {
    const index = new ObjectIndex(objects);
    const diagnostics: LineageDiagnostic[] = [];
    const edges: LineageEdge[] = [];
    const seenEdges = new Set<string>();

    const addEdge = (edge: LineageEdge): void => {
      if (edge.ownerUid === edge.dependentUid) return;
      const key = `${edge.ownerUid}->${edge.dependentUid}`;
      if (seenEdges.has(key)) return;
      seenEdges.add(key);
      edges.push(edge);
    };

    for (const entry of index.byUid.values()) {
      this.resolveOwnerReferences(entry, index, addEdge, diagnostics);
    }

    for (const compiled of this.compileRules(rules, diagnostics)) {
      for (const entry of index.ofGroupKind(compiled.rule.source)) {
        for (const target of this.matchTargets(compiled, entry, index)) {
          addEdge(
            compiled.rule.direction === 'owns'
              ? { ownerUid: entry.uid, dependentUid: target.uid, relation: compiled.rule.name }
              : { ownerUid: target.uid, dependentUid: entry.uid, relation: compiled.rule.name }
          );
        }
      }
    }

    this.logger.debug('Resolved relationships', {
      objects: index.byUid.size,
      rules: rules.length,
      edges: edges.length,
      diagnostics: diagnostics.length,
    });

    return { edges, diagnostics };
  }

  private resolveOwnerReferences(
    entry: IndexedObject,
    index: ObjectIndex,
    addEdge: (edge: LineageEdge) => void,
    diagnostics: LineageDiagnostic[]
  ): void {
    for (const ref of entry.object.metadata?.ownerReferences ?? []) {
      if (!ref.uid) continue;
      if (!index.byUid.has(ref.uid)) {
        // Filtered out by namespace or RBAC: the dependent becomes a root
        diagnostics.push(
          diagnostic(
            'UNRESOLVED_OWNER',
            `Owner ${ref.kind}/${ref.name} of ${entry.kind}/${entry.name} is not among the fetched objects`,
            { uid: entry.uid, ownerUid: ref.uid, ownerKind: ref.kind, ownerName: ref.name }
          )
        );
        continue;
      }
      addEdge({ ownerUid: ref.uid, dependentUid: entry.uid, relation: 'owner-reference' });
    }
  }

  private compileRules(
    rules: readonly RelationRule[],
    diagnostics: LineageDiagnostic[]
  ): CompiledRule[] {
    const compiled: CompiledRule[] = [];
    for (const rule of rules) {
      try {
        compiled.push({
          rule,
          path: parsePath(rule.path),
          ...(rule.namePath !== undefined && { namePath: parsePath(rule.namePath) }),
          ...(rule.namespacePath !== undefined && { namespacePath: parsePath(rule.namespacePath) }),
        });
      } catch (error) {
        if (!(error instanceof PathExpressionError)) throw error;
        this.logger.warn('Skipping relation rule with malformed path', {
          rule: rule.name,
          path: error.expression,
          reason: error.message,
        });
        diagnostics.push(
          diagnostic('MALFORMED_RULE', `Relation rule '${rule.name}' skipped: ${error.message}`, {
            rule: rule.name,
            path: error.expression,
          })
        );
      }
    }
    return compiled;
  }

  /**
   * Targets named by one selected item. The namespace is the item's own when
   * the rule reads one, the source object's otherwise.
   */
  private findNamedTargets(
    { rule, namePath, namespacePath }: CompiledRule,
    item: unknown,
    source: IndexedObject,
    index: ObjectIndex
  ): IndexedObject[] {
    const names = namePath ? evaluatePath(item, namePath) : [item];
    const namespace =
      (namespacePath && evaluatePath(item, namespacePath).find(isNonEmptyString)) || source.namespace;

    const targets: IndexedObject[] = [];
    for (const name of names) {
      if (!isNonEmptyString(name)) continue;
      const target = index.findByName(rule.target, namespace, name);
      if (target) targets.push(target);
    }
    return targets;
  }

  private matchTargets(compiled: CompiledRule, source: IndexedObject, index: ObjectIndex): IndexedObject[] {
    const { rule, path } = compiled;
    const values = evaluatePath(source.object, path);
    const targets: IndexedObject[] = [];

    for (const value of values) {
      switch (rule.match) {
        case 'name':
          targets.push(...this.findNamedTargets(compiled, value, source, index));
          break;
        case 'uid': {
          if (typeof value !== 'string') break;
          const target = index.byUid.get(value);
          if (target && sameGroupKind(target, rule.target)) {
            targets.push(target);
          }
          break;
        }
        case 'labelSelector': {
          const selector = toLabelSelector(value);
          if (!selector) break;
          for (const candidate of index.ofGroupKind(rule.target)) {
            if (
              candidate.namespace === source.namespace &&
              matchesLabelSelector(selector, candidate.object.metadata?.labels)
            ) {
              targets.push(candidate);
            }
          }
          break;
        }
      }
    }

    return targets;
  }
}
