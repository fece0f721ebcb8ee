import type { V1Condition } from '@kubernetes/client-node';
import type { LineageObject } from '../../src/core/types/index.js';

export interface TestObject extends LineageObject {
  spec?: Record<string, unknown>;
  status?: { conditions?: Partial<V1Condition>[] };
}

export interface TestObjectOptions {
  uid: string;
  kind: string;
  name: string;
  apiVersion?: string;
  namespace?: string;
  owners?: { uid: string; kind?: string; name?: string }[];
  labels?: Record<string, string>;
  creationTimestamp?: string;
  conditions?: Partial<V1Condition>[];
  spec?: Record<string, unknown>;
}

/**
 * Build a plain cluster object the way an unstructured read returns it
 */
export function createObject(options: TestObjectOptions): TestObject {
  const object: TestObject = {
    apiVersion: options.apiVersion ?? 'v1',
    kind: options.kind,
    metadata: {
      uid: options.uid,
      name: options.name,
      ...(options.namespace !== undefined && { namespace: options.namespace }),
      ...(options.labels && { labels: options.labels }),
      ...(options.creationTimestamp && { creationTimestamp: options.creationTimestamp }),
      ...(options.owners && {
        ownerReferences: options.owners.map((owner) => ({
          apiVersion: 'v1',
          kind: owner.kind ?? 'Owner',
          name: owner.name ?? owner.uid,
          uid: owner.uid,
        })),
      }),
    },
  };
  if (options.spec) object.spec = options.spec;
  if (options.conditions) object.status = { conditions: options.conditions };
  return object;
}
