/**
 * Unit tests for column extraction and age formatting
 */

import { describe, expect, it } from 'vitest';
import {
  CELL_INVALID,
  CELL_UNKNOWN,
  CELL_UNSET,
  conditionPath,
  getDisplayName,
  getObjectColumns,
  humanDuration,
  OBJECT_COLUMN_DEFINITIONS,
  translateTimestampSince,
} from '../../src/core/columns/index.js';
import { createObject } from '../helpers/objects.js';

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

const NOW = new Date('2024-05-01T12:00:00Z');

function createdBefore(ms: number): string {
  return new Date(NOW.getTime() - ms).toISOString();
}

describe('humanDuration', () => {
  it.each([
    [0, '0s'],
    [45 * SECOND, '45s'],
    [90 * SECOND, '1m30s'],
    [2 * MINUTE, '2m'],
    [9 * MINUTE + 59 * SECOND, '9m59s'],
    [10 * MINUTE, '10m'],
    [179 * MINUTE, '179m'],
    [3 * HOUR + 4 * MINUTE, '3h4m'],
    [5 * HOUR, '5h'],
    [8 * HOUR, '8h'],
    [47 * HOUR, '47h'],
    [50 * HOUR, '2d2h'],
    [3 * DAY, '3d'],
    [400 * DAY, '400d'],
    [(3 * 365 + 10) * DAY, '3y10d'],
    [10 * 365 * DAY, '10y'],
  ])('should format %i ms as %s', (elapsed, expected) => {
    expect(humanDuration(elapsed)).toBe(expected);
  });

  it('should treat up to a second of clock skew as now', () => {
    expect(humanDuration(-500)).toBe('0s');
    expect(humanDuration(-1500)).toBe('0s');
  });

  it('should flag timestamps well in the future as invalid', () => {
    expect(humanDuration(-5 * SECOND)).toBe(CELL_INVALID);
  });

  it('should return the unknown sentinel for a duration that is not a number', () => {
    expect(humanDuration(Number.NaN)).toBe(CELL_UNKNOWN);
  });
});

describe('translateTimestampSince', () => {
  it('should return the unknown sentinel for absent or zero timestamps', () => {
    expect(translateTimestampSince(undefined, NOW)).toBe(CELL_UNKNOWN);
    expect(translateTimestampSince('', NOW)).toBe(CELL_UNKNOWN);
    expect(translateTimestampSince('not-a-time', NOW)).toBe(CELL_UNKNOWN);
    expect(translateTimestampSince('1970-01-01T00:00:00Z', NOW)).toBe(CELL_UNKNOWN);
  });

  it('should return the unknown sentinel for an invalid render instant', () => {
    expect(translateTimestampSince('2024-05-01T11:58:30Z', new Date('not-a-time'))).toBe(CELL_UNKNOWN);
  });

  it('should accept strings and dates', () => {
    expect(translateTimestampSince('2024-05-01T11:58:30Z', NOW)).toBe('1m30s');
    expect(translateTimestampSince(new Date('2024-05-01T09:00:00Z'), NOW)).toBe('3h');
  });
});

describe('getDisplayName', () => {
  const deployment = createObject({
    uid: 'd1',
    apiVersion: 'apps/v1',
    kind: 'Deployment',
    name: 'web',
    namespace: 'default',
  });

  it('should qualify with the Kind by default', () => {
    expect(getDisplayName(deployment, false)).toBe('Deployment/web');
  });

  it('should qualify with the GroupKind when groups are shown', () => {
    expect(getDisplayName(deployment, true)).toBe('Deployment.apps/web');
  });

  it('should not add a group suffix for the core group', () => {
    const pod = createObject({ uid: 'p1', kind: 'Pod', name: 'web-0', namespace: 'default' });
    expect(getDisplayName(pod, true)).toBe('Pod/web-0');
  });
});

describe('getObjectColumns', () => {
  it('should read the Ready condition status and reason', () => {
    const object = createObject({
      uid: 'k1',
      apiVersion: 'serving.knative.dev/v1',
      kind: 'Service',
      name: 'hello',
      namespace: 'default',
      creationTimestamp: createdBefore(400 * DAY),
      conditions: [
        { type: 'ConfigurationsReady', status: 'True' },
        { type: 'Ready', status: 'True', reason: 'Healthy' },
      ],
    });

    expect(getObjectColumns(object, true, { now: NOW })).toEqual({
      name: 'Service.serving.knative.dev/hello',
      status: 'True',
      reason: 'Healthy',
      age: '400d',
    });
  });

  it('should fall back to sentinels when data is missing', () => {
    const object = createObject({ uid: 'c1', kind: 'ConfigMap', name: 'settings' });

    expect(getObjectColumns(object, false, { now: NOW })).toEqual({
      name: 'ConfigMap/settings',
      status: CELL_UNSET,
      reason: CELL_UNSET,
      age: CELL_UNKNOWN,
    });
  });

  it('should join duplicate Ready conditions with a comma', () => {
    const object = createObject({
      uid: 'x1',
      kind: 'Widget',
      name: 'broken',
      conditions: [
        { type: 'Ready', status: 'True', reason: 'Fine' },
        { type: 'Ready', status: 'False' },
      ],
    });

    const columns = getObjectColumns(object, false, { now: NOW });
    expect(columns.status).toBe('True,False');
    expect(columns.reason).toBe('Fine');
  });

  it('should report a different condition type when asked', () => {
    const object = createObject({
      uid: 'd1',
      apiVersion: 'apps/v1',
      kind: 'Deployment',
      name: 'web',
      conditions: [
        { type: 'Available', status: 'True', reason: 'MinimumReplicasAvailable' },
        { type: 'Progressing', status: 'True', reason: 'NewReplicaSetAvailable' },
      ],
    });

    const columns = getObjectColumns(object, false, { now: NOW, conditionType: 'Available' });
    expect(columns.status).toBe('True');
    expect(columns.reason).toBe('MinimumReplicasAvailable');
  });

  it('should quote condition types in the generated path', () => {
    expect(conditionPath('Ready', 'status')).toBe('{.status.conditions[?(@.type=="Ready")].status}');
    expect(conditionPath('Say "hi"', 'reason')).toBe(
      '{.status.conditions[?(@.type=="Say \\"hi\\"")].reason}'
    );
  });

  it('should match condition types that need quoting', () => {
    const object = createObject({
      uid: 'q1',
      kind: 'Widget',
      name: 'quoted',
      conditions: [{ type: 'Say "hi"', status: 'Unknown' }],
    });

    expect(getObjectColumns(object, false, { now: NOW, conditionType: 'Say "hi"' }).status).toBe(
      'Unknown'
    );
  });
});

describe('OBJECT_COLUMN_DEFINITIONS', () => {
  it('should describe the four standard columns in order', () => {
    expect(OBJECT_COLUMN_DEFINITIONS.map((column) => column.name)).toEqual([
      'Name',
      'Status',
      'Reason',
      'Age',
    ]);
    expect(OBJECT_COLUMN_DEFINITIONS[0]?.format).toBe('name');
  });
});
