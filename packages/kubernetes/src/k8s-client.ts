/**
 * Kubernetes Client
 * ClusterApi implementation on top of @kubernetes/client-node
 */

import * as k8s from '@kubernetes/client-node';
import { createChildLogger } from '@seqctl/shared';
import type { ClusterApi } from './cluster-api.js';
import { applyBatch } from './batch.js';
import { describeClusterError, isNotFound } from './errors.js';
import {
  countReadyEndpointAddresses,
  mapCronJob,
  mapDeployment,
  mapHorizontalPodAutoscaler,
  mapIngress,
  mapJob,
  mapPersistentVolume,
  mapPersistentVolumeClaim,
  mapPod,
} from './mappers.js';
import {
  resolveNamespace,
  type AppliedResource,
  type CronJobSnapshot,
  type DeleteResult,
  type DeploymentSnapshot,
  type HorizontalPodAutoscalerSnapshot,
  type IngressSnapshot,
  type JobSnapshot,
  type K8sClientConfig,
  type ListableKind,
  type ManifestDocument,
  type PersistentVolumeClaimSnapshot,
  type PersistentVolumeSnapshot,
  type PodSnapshot,
  type ResourceSummary,
} from './types.js';

const DEFAULT_CONFIG = {
  fieldManager: 'seqctl',
  dryRun: false,
};

/**
 * Resolve a read to null on 404; everything else propagates
 */
async function orNull<T>(read: () => Promise<T>): Promise<T | null> {
  try {
    return await read();
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
}

function names(items: Array<{ metadata?: k8s.V1ObjectMeta }>, detail?: (index: number) => string | undefined): ResourceSummary[] {
  return items.map((item, index) => {
    const text = detail?.(index);
    return { name: item.metadata?.name ?? '', ...(text !== undefined && { detail: text }) };
  });
}

export class K8sClusterClient implements ClusterApi {
  private kc: k8s.KubeConfig;
  private objectApi: k8s.KubernetesObjectApi;
  private coreApi: k8s.CoreV1Api;
  private appsApi: k8s.AppsV1Api;
  private batchApi: k8s.BatchV1Api;
  private networkingApi: k8s.NetworkingV1Api;
  private autoscalingApi: k8s.AutoscalingV2Api;
  private versionApi: k8s.VersionApi;
  private fieldManager: string;
  private dryRun: boolean;
  private logger = createChildLogger({ component: 'K8sClusterClient' });

  constructor(config: K8sClientConfig = {}) {
    this.fieldManager = config.fieldManager ?? DEFAULT_CONFIG.fieldManager;
    this.dryRun = config.dryRun ?? DEFAULT_CONFIG.dryRun;

    this.kc = new k8s.KubeConfig();

    if (config.kubeconfig) {
      this.kc.loadFromFile(config.kubeconfig);
    } else {
      this.kc.loadFromDefault();
    }

    if (config.context) {
      this.kc.setCurrentContext(config.context);
    }

    this.objectApi = k8s.KubernetesObjectApi.makeApiClient(this.kc);
    this.coreApi = this.kc.makeApiClient(k8s.CoreV1Api);
    this.appsApi = this.kc.makeApiClient(k8s.AppsV1Api);
    this.batchApi = this.kc.makeApiClient(k8s.BatchV1Api);
    this.networkingApi = this.kc.makeApiClient(k8s.NetworkingV1Api);
    this.autoscalingApi = this.kc.makeApiClient(k8s.AutoscalingV2Api);
    this.versionApi = this.kc.makeApiClient(k8s.VersionApi);

    this.logger.info({
      context: this.kc.getCurrentContext(),
      fieldManager: this.fieldManager,
      dryRun: this.dryRun,
    }, 'K8s client initialized');
  }

  // ============================================
  // Writes
  // ============================================

  async apply(documents: readonly ManifestDocument[], defaultNamespace: string): Promise<AppliedResource[]> {
    this.logger.info({
      documentCount: documents.length,
      namespace: defaultNamespace,
      dryRun: this.dryRun,
    }, 'Applying documents');

    const applied = await applyBatch(documents, defaultNamespace, (document, namespace) =>
      this.applyDocument(document, namespace)
    );

    this.logger.info({ resourceCount: applied.length }, 'Documents applied');
    return applied;
  }

  /**
   * Server-side apply of one document (kubectl apply --server-side equivalent).
   * The preliminary read only decides between "created" and "configured".
   */
  private async applyDocument(
    document: ManifestDocument,
    namespace: string | undefined
  ): Promise<AppliedResource['action']> {
    const spec: k8s.KubernetesObject = {
      ...document,
      metadata: { ...document.metadata, ...(namespace !== undefined && { namespace }) },
    };
    const header = {
      apiVersion: document.apiVersion,
      kind: document.kind,
      metadata: { name: document.metadata.name, namespace: namespace ?? '' },
    };

    const existing = await orNull(() => this.objectApi.read(header));

    try {
      await this.objectApi.patch(
        spec,
        undefined,
        this.dryRun ? 'All' : undefined,
        this.fieldManager,
        true,
        { headers: { 'content-type': k8s.PatchUtils.PATCH_FORMAT_APPLY_YAML } }
      );
    } catch (error) {
      this.logger.error({
        kind: document.kind,
        name: document.metadata.name,
        errorMessage: describeClusterError(error),
      }, 'Failed to apply resource');
      throw error;
    }

    this.logger.debug({ kind: document.kind, name: document.metadata.name, namespace }, 'Resource applied');
    return existing ? 'configured' : 'created';
  }

  async delete(document: ManifestDocument, defaultNamespace: string): Promise<DeleteResult> {
    const namespace = resolveNamespace(document, defaultNamespace);
    const spec: k8s.KubernetesObject = {
      apiVersion: document.apiVersion,
      kind: document.kind,
      metadata: { name: document.metadata.name, ...(namespace !== undefined && { namespace }) },
    };

    this.logger.info({
      kind: document.kind,
      name: document.metadata.name,
      namespace,
      dryRun: this.dryRun,
    }, 'Deleting resource');

    try {
      await this.objectApi.delete(spec, undefined, this.dryRun ? 'All' : undefined, undefined, undefined, 'Background');
      return 'deleted';
    } catch (error) {
      // 404 is OK - resource already deleted
      if (isNotFound(error)) {
        this.logger.info({ kind: document.kind, name: document.metadata.name }, 'Resource already deleted (404)');
        return 'not-found';
      }
      throw error;
    }
  }

  async forceDeletePods(namespace: string): Promise<number> {
    const pods = await this.listPods(namespace);
    let deleted = 0;

    for (const pod of pods) {
      try {
        await this.coreApi.deleteNamespacedPod(pod.name, namespace, undefined, this.dryRun ? 'All' : undefined, 0);
        deleted++;
      } catch (error) {
        if (!isNotFound(error)) {
          throw error;
        }
      }
    }

    this.logger.warn({ namespace, deleted }, 'Force deleted pods');
    return deleted;
  }

  async clearFinalizers(document: ManifestDocument, defaultNamespace: string): Promise<boolean> {
    const namespace = resolveNamespace(document, defaultNamespace);
    const spec: k8s.KubernetesObject = {
      apiVersion: document.apiVersion,
      kind: document.kind,
      metadata: { name: document.metadata.name, ...(namespace !== undefined && { namespace }), finalizers: [] },
    };

    try {
      await this.objectApi.patch(
        spec,
        undefined,
        this.dryRun ? 'All' : undefined,
        this.fieldManager,
        undefined,
        { headers: { 'content-type': k8s.PatchUtils.PATCH_FORMAT_JSON_MERGE_PATCH } }
      );
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }

    this.logger.warn({ kind: document.kind, name: document.metadata.name, namespace }, 'Cleared finalizers');
    return true;
  }

  async forceDeleteNamespace(name: string): Promise<DeleteResult> {
    const exists = await this.clearFinalizers({ apiVersion: 'v1', kind: 'Namespace', metadata: { name } }, '');
    if (!exists) {
      return 'not-found';
    }

    try {
      await this.coreApi.deleteNamespace(name, undefined, this.dryRun ? 'All' : undefined, 0);
    } catch (error) {
      if (isNotFound(error)) {
        return 'not-found';
      }
      throw error;
    }

    this.logger.warn({ namespace: name }, 'Force deleted namespace');
    return 'deleted';
  }

  // ============================================
  // Reads
  // ============================================

  async getServerVersion(): Promise<string> {
    const response = await this.versionApi.getCode();
    return response.body.gitVersion;
  }

  async listPods(namespace: string, labelSelector?: string): Promise<PodSnapshot[]> {
    const response = await this.coreApi.listNamespacedPod(
      namespace,
      undefined,
      undefined,
      undefined,
      undefined,
      labelSelector
    );
    return response.body.items.map(mapPod);
  }

  async getJobLogs(name: string, namespace: string, tailLines: number): Promise<string | null> {
    const { body } = await this.coreApi.listNamespacedPod(
      namespace,
      undefined,
      undefined,
      undefined,
      undefined,
      `job-name=${name}`
    );
    const created = (pod: k8s.V1Pod): number => pod.metadata?.creationTimestamp?.getTime() ?? 0;
    const newest = [...body.items].sort((a, b) => created(b) - created(a))[0];
    const podName = newest?.metadata?.name;
    if (!podName) {
      return null;
    }

    const response = await orNull(() =>
      this.coreApi.readNamespacedPodLog(
        podName,
        namespace,
        undefined,
        undefined,
        undefined,
        undefined,
        undefined,
        undefined,
        undefined,
        tailLines
      )
    );
    return response ? response.body : null;
  }

  async getDeployment(name: string, namespace: string): Promise<DeploymentSnapshot | null> {
    const response = await orNull(() => this.appsApi.readNamespacedDeployment(name, namespace));
    return response ? mapDeployment(response.body) : null;
  }

  async getJob(name: string, namespace: string): Promise<JobSnapshot | null> {
    const response = await orNull(() => this.batchApi.readNamespacedJob(name, namespace));
    return response ? mapJob(response.body) : null;
  }

  async getPersistentVolumeClaim(name: string, namespace: string): Promise<PersistentVolumeClaimSnapshot | null> {
    const response = await orNull(() => this.coreApi.readNamespacedPersistentVolumeClaim(name, namespace));
    return response ? mapPersistentVolumeClaim(response.body) : null;
  }

  async getPersistentVolume(name: string): Promise<PersistentVolumeSnapshot | null> {
    const response = await orNull(() => this.coreApi.readPersistentVolume(name));
    return response ? mapPersistentVolume(response.body) : null;
  }

  async getNamespace(name: string): Promise<boolean> {
    const response = await orNull(() => this.coreApi.readNamespace(name));
    return response !== null;
  }

  async getServiceEndpointCount(name: string, namespace: string): Promise<number | null> {
    const response = await orNull(() => this.coreApi.readNamespacedEndpoints(name, namespace));
    return response ? countReadyEndpointAddresses(response.body) : null;
  }

  async getIngress(name: string, namespace: string): Promise<IngressSnapshot | null> {
    const response = await orNull(() => this.networkingApi.readNamespacedIngress(name, namespace));
    return response ? mapIngress(response.body) : null;
  }

  async getHorizontalPodAutoscaler(name: string, namespace: string): Promise<HorizontalPodAutoscalerSnapshot | null> {
    const response = await orNull(() => this.autoscalingApi.readNamespacedHorizontalPodAutoscaler(name, namespace));
    return response ? mapHorizontalPodAutoscaler(response.body) : null;
  }

  async getCronJob(name: string, namespace: string): Promise<CronJobSnapshot | null> {
    const response = await orNull(() => this.batchApi.readNamespacedCronJob(name, namespace));
    return response ? mapCronJob(response.body) : null;
  }

  async getSecret(name: string, namespace: string): Promise<boolean> {
    const response = await orNull(() => this.coreApi.readNamespacedSecret(name, namespace));
    return response !== null;
  }

  async listResources(kind: ListableKind, namespace: string): Promise<ResourceSummary[]> {
    switch (kind) {
      case 'Namespace': {
        const { body } = await this.coreApi.listNamespace();
        return names(body.items, (i) => body.items[i]?.status?.phase);
      }
      case 'Node': {
        const { body } = await this.coreApi.listNode();
        return names(body.items, (i) => {
          const ready = body.items[i]?.status?.conditions?.find((c) => c.type === 'Ready');
          return ready?.status === 'True' ? 'Ready' : 'NotReady';
        });
      }
      case 'PersistentVolume': {
        const { body } = await this.coreApi.listPersistentVolume();
        return names(body.items, (i) => body.items[i]?.status?.phase);
      }
      case 'PersistentVolumeClaim': {
        const { body } = await this.coreApi.listNamespacedPersistentVolumeClaim(namespace);
        return names(body.items, (i) => body.items[i]?.status?.phase);
      }
      case 'ConfigMap': {
        const { body } = await this.coreApi.listNamespacedConfigMap(namespace);
        return names(body.items);
      }
      case 'Secret': {
        const { body } = await this.coreApi.listNamespacedSecret(namespace);
        return names(body.items, (i) => body.items[i]?.type);
      }
      case 'ServiceAccount': {
        const { body } = await this.coreApi.listNamespacedServiceAccount(namespace);
        return names(body.items);
      }
      case 'Deployment': {
        const { body } = await this.appsApi.listNamespacedDeployment(namespace);
        return body.items.map((item) => {
          const snapshot = mapDeployment(item);
          return { name: snapshot.name, detail: `${snapshot.readyReplicas}/${snapshot.desiredReplicas} ready` };
        });
      }
      case 'Service': {
        const { body } = await this.coreApi.listNamespacedService(namespace);
        return names(body.items, (i) => body.items[i]?.spec?.type);
      }
      case 'Ingress': {
        const { body } = await this.networkingApi.listNamespacedIngress(namespace);
        return body.items.map((item) => {
          const snapshot = mapIngress(item);
          return { name: snapshot.name, detail: snapshot.address ?? 'no address' };
        });
      }
      case 'HorizontalPodAutoscaler': {
        const { body } = await this.autoscalingApi.listNamespacedHorizontalPodAutoscaler(namespace);
        return body.items.map((item) => {
          const snapshot = mapHorizontalPodAutoscaler(item);
          return {
            name: snapshot.name,
            detail: `${snapshot.currentReplicas} replicas (min ${snapshot.minReplicas}, max ${snapshot.maxReplicas})`,
          };
        });
      }
      case 'Job': {
        const { body } = await this.batchApi.listNamespacedJob(namespace);
        return body.items.map((item) => {
          const snapshot = mapJob(item);
          const done = snapshot.conditions.find((c) => c.status === 'True' && (c.type === 'Complete' || c.type === 'Failed'));
          return { name: snapshot.name, detail: done?.type ?? 'Running' };
        });
      }
      case 'CronJob': {
        const { body } = await this.batchApi.listNamespacedCronJob(namespace);
        return body.items.map((item) => {
          const snapshot = mapCronJob(item);
          return { name: snapshot.name, detail: snapshot.schedule };
        });
      }
      case 'Pod': {
        const pods = await this.listPods(namespace);
        return pods.map((pod) => ({
          name: pod.name,
          detail: `${pod.phase}, ${pod.containers.filter((c) => c.ready).length}/${pod.containers.length} ready`,
        }));
      }
      case 'NetworkPolicy': {
        const { body } = await this.networkingApi.listNamespacedNetworkPolicy(namespace);
        return names(body.items);
      }
    }
  }
}
