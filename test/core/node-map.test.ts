/**
 * Unit tests for NodeMap assembly
 */

import { describe, expect, it } from 'vitest';
import { buildNodeMap, compareNodes, findRoots } from '../../src/core/lineage/index.js';
import type { LineageEdge } from '../../src/core/types/index.js';
import { createObject } from '../helpers/objects.js';

function edge(ownerUid: string, dependentUid: string): LineageEdge {
  return { ownerUid, dependentUid, relation: 'owner-reference' };
}

function dependentsOf(nodeMap: ReturnType<typeof buildNodeMap>['nodeMap'], uid: string): readonly string[] {
  return nodeMap.get(uid)?.dependents ?? [];
}

describe('buildNodeMap', () => {
  it('should create one node per UID with parsed group and version', () => {
    const { nodeMap, diagnostics } = buildNodeMap(
      [createObject({ uid: 'deploy', apiVersion: 'apps/v1', kind: 'Deployment', name: 'web', namespace: 'default' })],
      []
    );

    const node = nodeMap.get('deploy');
    expect(node).toMatchObject({
      uid: 'deploy',
      group: 'apps',
      version: 'v1',
      kind: 'Deployment',
      namespace: 'default',
      name: 'web',
      dependents: [],
    });
    expect(diagnostics).toEqual([]);
  });

  it('should keep the last copy of a duplicated UID', () => {
    const stale = createObject({ uid: 'cm', kind: 'ConfigMap', name: 'old-name', namespace: 'default' });
    const fresh = createObject({ uid: 'cm', kind: 'ConfigMap', name: 'new-name', namespace: 'default' });

    const { nodeMap } = buildNodeMap([stale, fresh], []);

    expect(nodeMap.size).toBe(1);
    expect(nodeMap.get('cm')?.name).toBe('new-name');
    expect(nodeMap.get('cm')?.object).toEqual(fresh);
  });

  it('should not follow changes to the input objects', () => {
    const configMap = createObject({ uid: 'cm', kind: 'ConfigMap', name: 'app-config', namespace: 'default' });

    const { nodeMap } = buildNodeMap([configMap], []);
    if (configMap.metadata) configMap.metadata.name = 'renamed';

    expect(nodeMap.get('cm')?.object.metadata?.name).toBe('app-config');
  });

  it('should skip objects without a UID', () => {
    const anonymous = createObject({ uid: '', kind: 'ConfigMap', name: 'ghost', namespace: 'default' });

    const { nodeMap, diagnostics } = buildNodeMap([anonymous], []);

    expect(nodeMap.size).toBe(0);
    expect(diagnostics.map((entry) => entry.code)).toEqual(['MISSING_UID']);
    expect(diagnostics[0]?.message).toBe('Object ConfigMap/ghost has no UID');
  });

  it('should sort dependents by group, kind, namespace, name and UID', () => {
    const objects = [
      createObject({ uid: 'owner', kind: 'Widget', name: 'owner' }),
      createObject({ uid: 'rs', apiVersion: 'apps/v1', kind: 'ReplicaSet', name: 'a', namespace: 'default' }),
      createObject({ uid: 'pod-b', kind: 'Pod', name: 'b', namespace: 'default' }),
      createObject({ uid: 'pod-a2', kind: 'Pod', name: 'a', namespace: 'default' }),
      createObject({ uid: 'pod-a1', kind: 'Pod', name: 'a', namespace: 'default' }),
      createObject({ uid: 'pod-kube', kind: 'Pod', name: 'a', namespace: 'kube-system' }),
      createObject({ uid: 'cm', kind: 'ConfigMap', name: 'z', namespace: 'default' }),
    ];
    const edges = ['rs', 'pod-b', 'pod-a2', 'pod-a1', 'pod-kube', 'cm'].map((uid) => edge('owner', uid));

    const { nodeMap } = buildNodeMap(objects, edges);

    expect(dependentsOf(nodeMap, 'owner')).toEqual(['cm', 'pod-a1', 'pod-a2', 'pod-b', 'pod-kube', 'rs']);
  });

  it('should report edges to unknown objects and ignore duplicates', () => {
    const objects = [
      createObject({ uid: 'a', kind: 'Widget', name: 'a' }),
      createObject({ uid: 'b', kind: 'Widget', name: 'b' }),
    ];

    const { nodeMap, diagnostics } = buildNodeMap(objects, [
      edge('a', 'b'),
      edge('a', 'b'),
      edge('a', 'missing'),
      edge('gone', 'b'),
    ]);

    expect(dependentsOf(nodeMap, 'a')).toEqual(['b']);
    expect(diagnostics.map((entry) => entry.code)).toEqual(['DANGLING_EDGE', 'DANGLING_EDGE']);
    expect(diagnostics[0]?.context).toEqual({ ownerUid: 'a', dependentUid: 'missing', relation: 'owner-reference' });
  });

  it('should drop the edge that closes a cycle', () => {
    const objects = ['a', 'b', 'c'].map((uid) => createObject({ uid, kind: 'Widget', name: uid }));

    const { nodeMap, diagnostics } = buildNodeMap(objects, [edge('a', 'b'), edge('b', 'c'), edge('c', 'a')]);

    expect(dependentsOf(nodeMap, 'a')).toEqual(['b']);
    expect(dependentsOf(nodeMap, 'b')).toEqual(['c']);
    expect(dependentsOf(nodeMap, 'c')).toEqual([]);
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]?.code).toBe('CYCLE_DROPPED');
    expect(diagnostics[0]?.context).toEqual({ ownerUid: 'c', dependentUid: 'a', cycle: ['a', 'b', 'c'] });
  });

  it('should walk from roots first when breaking cycles', () => {
    const objects = ['a', 'b', 'c', 'root'].map((uid) => createObject({ uid, kind: 'Widget', name: uid }));

    // root -> c -> a -> b -> c
    const { nodeMap, diagnostics } = buildNodeMap(objects, [
      edge('root', 'c'),
      edge('c', 'a'),
      edge('a', 'b'),
      edge('b', 'c'),
    ]);

    expect(dependentsOf(nodeMap, 'root')).toEqual(['c']);
    expect(dependentsOf(nodeMap, 'c')).toEqual(['a']);
    expect(dependentsOf(nodeMap, 'a')).toEqual(['b']);
    expect(dependentsOf(nodeMap, 'b')).toEqual([]);
    expect(diagnostics[0]?.context).toMatchObject({ ownerUid: 'b', dependentUid: 'c' });
  });

  it('should keep shared dependents that do not form a cycle', () => {
    const objects = ['a', 'b', 'c', 'd'].map((uid) => createObject({ uid, kind: 'Widget', name: uid }));

    const { nodeMap, diagnostics } = buildNodeMap(objects, [
      edge('a', 'b'),
      edge('a', 'c'),
      edge('b', 'd'),
      edge('c', 'd'),
    ]);

    expect(dependentsOf(nodeMap, 'b')).toEqual(['d']);
    expect(dependentsOf(nodeMap, 'c')).toEqual(['d']);
    expect(diagnostics).toEqual([]);
  });

  it('should freeze every node', () => {
    const { nodeMap } = buildNodeMap([createObject({ uid: 'a', kind: 'Widget', name: 'a' })], []);
    const node = nodeMap.get('a');

    expect(Object.isFrozen(node)).toBe(true);
    expect(Object.isFrozen(node?.dependents)).toBe(true);
  });
});

describe('findRoots', () => {
  it('should return nodes without owners in display order', () => {
    const objects = [
      createObject({ uid: 'pod', kind: 'Pod', name: 'web-0', namespace: 'default' }),
      createObject({ uid: 'sts', apiVersion: 'apps/v1', kind: 'StatefulSet', name: 'web', namespace: 'default' }),
      createObject({ uid: 'ns', kind: 'Namespace', name: 'default' }),
    ];

    const { nodeMap } = buildNodeMap(objects, [edge('sts', 'pod')]);

    expect(findRoots(nodeMap).map((node) => node.uid)).toEqual(['ns', 'sts']);
  });
});

describe('compareNodes', () => {
  it('should compare by code unit rather than locale', () => {
    const base = { group: '', kind: 'Pod', namespace: 'default', uid: 'x' };

    expect(compareNodes({ ...base, name: 'Zeta' }, { ...base, name: 'alpha' })).toBe(-1);
    expect(compareNodes({ ...base, name: 'alpha' }, { ...base, name: 'alpha' })).toBe(0);
  });
});
