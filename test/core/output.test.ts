/**
 * Unit tests for table, JSON and YAML output
 */

import * as yaml from 'js-yaml';
import { beforeAll, describe, expect, it } from 'vitest';
import { OBJECT_COLUMN_DEFINITIONS } from '../../src/core/columns/index.js';
import { buildNodeMap, renderLineage } from '../../src/core/lineage/index.js';
import {
  formatRows,
  isOutputFormat,
  printTable,
  toStructuredList,
} from '../../src/core/output/index.js';
import type { DisplayRow } from '../../src/core/types/index.js';
import { createObject } from '../helpers/objects.js';

describe('output formatting', () => {
  let rows: DisplayRow[];

  beforeAll(() => {
    const { nodeMap } = buildNodeMap(
      [
        createObject({
          uid: 'rs',
          apiVersion: 'apps/v1',
          kind: 'ReplicaSet',
          name: 'web-7d',
          namespace: 'default',
          creationTimestamp: '2024-04-28T12:00:00Z',
        }),
        createObject({
          uid: 'pod',
          kind: 'Pod',
          name: 'web-7d-abc',
          namespace: 'default',
          creationTimestamp: '2024-05-01T11:58:00Z',
          conditions: [{ type: 'Ready', status: 'True' }],
        }),
      ],
      [{ ownerUid: 'rs', dependentUid: 'pod', relation: 'owner-reference' }]
    );
    rows = renderLineage(nodeMap, 'rs', { now: new Date('2024-05-01T12:00:00Z') }).rows;
  });

  describe('printTable', () => {
    it('should align columns under upper-case headers', () => {
      expect(printTable(rows)).toBe(
        [
          'NAME                 STATUS   REASON   AGE',
          'ReplicaSet/web-7d    <none>   <none>   3d',
          '└── Pod/web-7d-abc   True     <none>   2m',
        ].join('\n')
      );
    });

    it('should omit headers on request', () => {
      expect(printTable(rows, { noHeaders: true }).split('\n')[0]).toBe(
        'ReplicaSet/web-7d    <none>   <none>   3d'
      );
    });

    it('should print only the requested columns', () => {
      expect(
        printTable(rows, { columns: OBJECT_COLUMN_DEFINITIONS.slice(0, 2), noHeaders: true })
      ).toBe(['ReplicaSet/web-7d    <none>', '└── Pod/web-7d-abc   True'].join('\n'));
    });

    it('should print only headers for no rows', () => {
      expect(printTable([])).toBe('NAME   STATUS   REASON   AGE');
    });
  });

  describe('structured output', () => {
    it('should wrap the raw objects in a List in tree order', () => {
      const list = toStructuredList(rows);

      expect(list.apiVersion).toBe('v1');
      expect(list.kind).toBe('List');
      expect(list.metadata).toEqual({ resourceVersion: '' });
      expect(list.items.map((item) => item.metadata?.uid)).toEqual(['rs', 'pod']);
    });

    it('should format JSON with two-space indentation', () => {
      const output = formatRows(rows, 'json');

      expect(output.startsWith('{\n  "apiVersion": "v1",\n  "kind": "List",\n')).toBe(true);
      expect(JSON.parse(output)).toEqual(toStructuredList(rows));
    });

    it('should format YAML', () => {
      const output = formatRows(rows, 'yaml');

      expect(output.startsWith('apiVersion: v1\nkind: List\n')).toBe(true);
      expect(yaml.load(output)).toEqual(toStructuredList(rows));
    });

    it('should format a table', () => {
      expect(formatRows(rows, 'table')).toBe(printTable(rows));
    });
  });

  it('should recognize output format names', () => {
    expect(isOutputFormat('yaml')).toBe(true);
    expect(isOutputFormat('wide')).toBe(false);
  });
});
