/**
 * Cluster object sources
 *
 * The lineage engine works on one materialized snapshot of cluster objects.
 * A source produces that snapshot; listing may fan out across resource types
 * concurrently, but callers only ever see the completed array.
 */

import { type KubeConfig, KubernetesObjectApi } from '@kubernetes/client-node';
import { ObjectSourceError } from '../errors.js';
import { getComponentLogger } from '../logging/index.js';
import type { LineageObject } from '../types/objects.js';
import { formatKubernetesError, isForbiddenError, isNotFoundError } from './errors.js';
import { isKubernetesList, isLineageObject, isRecord } from './type-guards.js';

export interface ClusterObjectSource {
  fetchObjects(): Promise<LineageObject[]>;
}

export interface ResourceType {
  apiVersion: string;
  kind: string;
}

/**
 * The list call of KubernetesObjectApi, narrowed to what the source uses
 */
export interface ObjectListClient {
  list(
    apiVersion: string,
    kind: string,
    namespace?: string,
    pretty?: string,
    exact?: boolean,
    exportt?: boolean,
    fieldSelector?: string,
    labelSelector?: string,
    limit?: number,
    continueToken?: string
  ): Promise<unknown>;
}

export interface KubernetesObjectSourceOptions {
  resourceTypes?: readonly ResourceType[];
  /** Restrict namespaced listings to one namespace */
  namespace?: string;
  labelSelector?: string;
  pageSize?: number;
}

export const DEFAULT_RESOURCE_TYPES: readonly ResourceType[] = [
  { apiVersion: 'v1', kind: 'Pod' },
  { apiVersion: 'v1', kind: 'Service' },
  { apiVersion: 'v1', kind: 'Endpoints' },
  { apiVersion: 'v1', kind: 'ConfigMap' },
  { apiVersion: 'v1', kind: 'Secret' },
  { apiVersion: 'v1', kind: 'ServiceAccount' },
  { apiVersion: 'v1', kind: 'PersistentVolumeClaim' },
  { apiVersion: 'v1', kind: 'PersistentVolume' },
  { apiVersion: 'v1', kind: 'Node' },
  { apiVersion: 'apps/v1', kind: 'Deployment' },
  { apiVersion: 'apps/v1', kind: 'ReplicaSet' },
  { apiVersion: 'apps/v1', kind: 'StatefulSet' },
  { apiVersion: 'apps/v1', kind: 'DaemonSet' },
  { apiVersion: 'apps/v1', kind: 'ControllerRevision' },
  { apiVersion: 'batch/v1', kind: 'Job' },
  { apiVersion: 'batch/v1', kind: 'CronJob' },
  { apiVersion: 'discovery.k8s.io/v1', kind: 'EndpointSlice' },
  { apiVersion: 'networking.k8s.io/v1', kind: 'Ingress' },
  { apiVersion: 'networking.k8s.io/v1', kind: 'IngressClass' },
  { apiVersion: 'networking.k8s.io/v1', kind: 'NetworkPolicy' },
  { apiVersion: 'policy/v1', kind: 'PodDisruptionBudget' },
  { apiVersion: 'rbac.authorization.k8s.io/v1', kind: 'Role' },
  { apiVersion: 'rbac.authorization.k8s.io/v1', kind: 'RoleBinding' },
  { apiVersion: 'rbac.authorization.k8s.io/v1', kind: 'ClusterRole' },
  { apiVersion: 'rbac.authorization.k8s.io/v1', kind: 'ClusterRoleBinding' },
  { apiVersion: 'storage.k8s.io/v1', kind: 'StorageClass' },
];

const DEFAULT_PAGE_SIZE = 500;

/**
 * The list payload, whether the client returned it directly or wrapped in
 * `{ body }`
 */
function unwrapList(response: unknown): { items: unknown[]; continueToken?: string } | undefined {
  const payload = isRecord(response) && isKubernetesList(response.body) ? response.body : response;
  if (!isKubernetesList(payload)) {
    return undefined;
  }
  const token = payload.metadata?._continue ?? payload.metadata?.continue;
  return token ? { items: payload.items, continueToken: token } : { items: payload.items };
}

/**
 * Lists objects through the Kubernetes API
 */
export class KubernetesObjectSource implements ClusterObjectSource {
  private readonly logger = getComponentLogger('object-source');
  private readonly resourceTypes: readonly ResourceType[];

  constructor(
    private readonly client: ObjectListClient,
    private readonly options: KubernetesObjectSourceOptions = {}
  ) {
    this.resourceTypes = options.resourceTypes ?? DEFAULT_RESOURCE_TYPES;
  }

  static fromKubeConfig(
    kubeConfig: KubeConfig,
    options?: KubernetesObjectSourceOptions
  ): KubernetesObjectSource {
    return new KubernetesObjectSource(KubernetesObjectApi.makeApiClient(kubeConfig), options);
  }

  async fetchObjects(): Promise<LineageObject[]> {
    const results = await Promise.allSettled(
      this.resourceTypes.map((resourceType) => this.listResourceType(resourceType))
    );

    const objects: LineageObject[] = [];
    const failures: { apiVersion: string; kind: string; message: string }[] = [];

    results.forEach((result, index) => {
      const resourceType = this.resourceTypes[index];
      if (!resourceType) return;

      if (result.status === 'fulfilled') {
        objects.push(...result.value);
        return;
      }

      const error: unknown = result.reason;
      if (isForbiddenError(error) || isNotFoundError(error)) {
        // Not served, or not visible to this user: lineage continues without it
        this.logger.debug('Skipping resource type', {
          ...resourceType,
          reason: formatKubernetesError(error),
        });
        return;
      }

      const message = formatKubernetesError(error);
      failures.push({ ...resourceType, message });
      this.logger.warn('Failed to list resource type', { ...resourceType, reason: message });
    });

    if (failures.length > 0 && failures.length === this.resourceTypes.length) {
      throw new ObjectSourceError(
        `Failed to list any resource type: ${failures[0]?.message ?? 'unknown error'}`,
        failures
      );
    }

    this.logger.debug('Fetched cluster objects', {
      objects: objects.length,
      resourceTypes: this.resourceTypes.length,
      failedTypes: failures.length,
    });

    return objects;
  }

  private async listResourceType(resourceType: ResourceType): Promise<LineageObject[]> {
    const objects: LineageObject[] = [];
    let continueToken: string | undefined;

    do {
      const response = await this.client.list(
        resourceType.apiVersion,
        resourceType.kind,
        this.options.namespace,
        undefined, // pretty
        undefined, // exact
        undefined, // export
        undefined, // fieldSelector
        this.options.labelSelector,
        this.options.pageSize ?? DEFAULT_PAGE_SIZE,
        continueToken
      );

      const page = unwrapList(response);
      if (!page) {
        throw new Error(
          `Unexpected list response for ${resourceType.kind} (${resourceType.apiVersion})`
        );
      }

      for (const item of page.items) {
        if (!isLineageObject(item)) continue;
        // List items usually omit their own apiVersion and kind
        objects.push({
          ...item,
          apiVersion: item.apiVersion ?? resourceType.apiVersion,
          kind: item.kind ?? resourceType.kind,
        });
      }
      continueToken = page.continueToken;
    } while (continueToken);

    return objects;
  }
}

/**
 * Serves an already materialized set of objects
 */
export class StaticObjectSource implements ClusterObjectSource {
  constructor(private readonly objects: readonly LineageObject[]) {}

  async fetchObjects(): Promise<LineageObject[]> {
    return [...this.objects];
  }
}
