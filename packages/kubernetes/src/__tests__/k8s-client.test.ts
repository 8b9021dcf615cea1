/**
 * K8sClusterClient tests against a stubbed @kubernetes/client-node
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ApplyError } from '@seqctl/shared';
import { K8sClusterClient } from '../k8s-client.js';
import type { ListableKind, ManifestDocument, ResourceSummary } from '../types.js';

const mocks = vi.hoisted(() => ({
  kubeConfig: {
    loadFromDefault: vi.fn(),
    loadFromFile: vi.fn(),
    setCurrentContext: vi.fn(),
  },
  objectApi: { read: vi.fn(), patch: vi.fn(), delete: vi.fn() },
  coreApi: {
    listNamespacedPod: vi.fn(),
    deleteNamespacedPod: vi.fn(),
    deleteNamespace: vi.fn(),
    readNamespacedPodLog: vi.fn(),
    listNamespace: vi.fn(),
    listNode: vi.fn(),
    listPersistentVolume: vi.fn(),
    listNamespacedPersistentVolumeClaim: vi.fn(),
    listNamespacedConfigMap: vi.fn(),
    listNamespacedSecret: vi.fn(),
    listNamespacedServiceAccount: vi.fn(),
    listNamespacedService: vi.fn(),
  },
  appsApi: { listNamespacedDeployment: vi.fn(), readNamespacedDeployment: vi.fn() },
  batchApi: { listNamespacedJob: vi.fn(), listNamespacedCronJob: vi.fn() },
  networkingApi: { listNamespacedIngress: vi.fn(), listNamespacedNetworkPolicy: vi.fn() },
  autoscalingApi: { listNamespacedHorizontalPodAutoscaler: vi.fn() },
  versionApi: { getCode: vi.fn() },
}));

vi.mock('@kubernetes/client-node', () => {
  class CoreV1Api {}
  class AppsV1Api {}
  class BatchV1Api {}
  class NetworkingV1Api {}
  class AutoscalingV2Api {}
  class VersionApi {}

  const clients = new Map<unknown, unknown>([
    [CoreV1Api, mocks.coreApi],
    [AppsV1Api, mocks.appsApi],
    [BatchV1Api, mocks.batchApi],
    [NetworkingV1Api, mocks.networkingApi],
    [AutoscalingV2Api, mocks.autoscalingApi],
    [VersionApi, mocks.versionApi],
  ]);

  class KubeConfig {
    loadFromDefault(): void {
      mocks.kubeConfig.loadFromDefault();
    }
    loadFromFile(path: string): void {
      mocks.kubeConfig.loadFromFile(path);
    }
    setCurrentContext(context: string): void {
      mocks.kubeConfig.setCurrentContext(context);
    }
    getCurrentContext(): string {
      return 'test-context';
    }
    makeApiClient(apiClass: unknown): unknown {
      return clients.get(apiClass);
    }
  }

  return {
    KubeConfig,
    CoreV1Api,
    AppsV1Api,
    BatchV1Api,
    NetworkingV1Api,
    AutoscalingV2Api,
    VersionApi,
    KubernetesObjectApi: { makeApiClient: () => mocks.objectApi },
    PatchUtils: {
      PATCH_FORMAT_APPLY_YAML: 'application/apply-patch+yaml',
      PATCH_FORMAT_JSON_MERGE_PATCH: 'application/merge-patch+json',
    },
  };
});

const httpError = (statusCode: number, message = 'HTTP request failed') =>
  Object.assign(new Error('HTTP request failed'), { statusCode, body: { message } });

const items = (list: unknown[]) => ({ body: { items: list } });

const configMap: ManifestDocument = {
  apiVersion: 'v1',
  kind: 'ConfigMap',
  metadata: { name: 'app-config' },
  data: { LOG_LEVEL: 'info' },
};

const namespaceDoc: ManifestDocument = { apiVersion: 'v1', kind: 'Namespace', metadata: { name: 'production' } };

describe('K8sClusterClient', () => {
  let client: K8sClusterClient;

  beforeEach(() => {
    vi.clearAllMocks();
    client = new K8sClusterClient();
  });

  describe('construction', () => {
    it('should load the default kubeconfig', () => {
      expect(mocks.kubeConfig.loadFromDefault).toHaveBeenCalledTimes(1);
      expect(mocks.kubeConfig.setCurrentContext).not.toHaveBeenCalled();
    });

    it('should load an explicit kubeconfig and context', () => {
      vi.clearAllMocks();
      new K8sClusterClient({ kubeconfig: '/tmp/kubeconfig', context: 'staging' });

      expect(mocks.kubeConfig.loadFromFile).toHaveBeenCalledWith('/tmp/kubeconfig');
      expect(mocks.kubeConfig.loadFromDefault).not.toHaveBeenCalled();
      expect(mocks.kubeConfig.setCurrentContext).toHaveBeenCalledWith('staging');
    });
  });

  describe('apply', () => {
    it('should inject the default namespace and report a new object as created', async () => {
      mocks.objectApi.read.mockRejectedValue(httpError(404));
      mocks.objectApi.patch.mockResolvedValue({ body: {} });

      const applied = await client.apply([configMap], 'production');

      expect(applied).toEqual([{ kind: 'ConfigMap', name: 'app-config', namespace: 'production', action: 'created' }]);
      expect(mocks.objectApi.read).toHaveBeenCalledWith({
        apiVersion: 'v1',
        kind: 'ConfigMap',
        metadata: { name: 'app-config', namespace: 'production' },
      });
      expect(mocks.objectApi.patch).toHaveBeenCalledWith(
        { ...configMap, metadata: { name: 'app-config', namespace: 'production' } },
        undefined,
        undefined,
        'seqctl',
        true,
        { headers: { 'content-type': 'application/apply-patch+yaml' } }
      );
    });

    it('should leave cluster-scoped kinds without a namespace and report configured', async () => {
      mocks.objectApi.read.mockResolvedValue({ body: namespaceDoc });
      mocks.objectApi.patch.mockResolvedValue({ body: {} });

      const applied = await client.apply([namespaceDoc], 'production');

      expect(applied).toEqual([{ kind: 'Namespace', name: 'production', namespace: undefined, action: 'configured' }]);
      expect(mocks.objectApi.read).toHaveBeenCalledWith({
        apiVersion: 'v1',
        kind: 'Namespace',
        metadata: { name: 'production', namespace: '' },
      });
      expect(mocks.objectApi.patch.mock.calls[0]?.[0]).toEqual({
        apiVersion: 'v1',
        kind: 'Namespace',
        metadata: { name: 'production' },
      });
    });

    it('should rethrow a refused patch so the batch reports it', async () => {
      mocks.objectApi.read.mockRejectedValue(httpError(404));
      mocks.objectApi.patch.mockRejectedValue(httpError(422, 'ConfigMap "app-config" is invalid'));

      const error = await client.apply([configMap], 'production').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ApplyError);
      expect(error).toMatchObject({
        failures: [
          {
            kind: 'ConfigMap',
            name: 'app-config',
            namespace: 'production',
            statusCode: 422,
            message: 'ConfigMap "app-config" is invalid',
          },
        ],
      });
    });

    it('should send writes as a dry run when configured', async () => {
      mocks.objectApi.read.mockRejectedValue(httpError(404));
      mocks.objectApi.patch.mockResolvedValue({ body: {} });

      await new K8sClusterClient({ dryRun: true }).apply([configMap], 'production');

      expect(mocks.objectApi.patch.mock.calls[0]?.[2]).toBe('All');
    });
  });

  describe('delete', () => {
    it('should delete in the background', async () => {
      mocks.objectApi.delete.mockResolvedValue({ body: {} });

      await expect(client.delete(configMap, 'production')).resolves.toBe('deleted');
      expect(mocks.objectApi.delete).toHaveBeenCalledWith(
        { apiVersion: 'v1', kind: 'ConfigMap', metadata: { name: 'app-config', namespace: 'production' } },
        undefined,
        undefined,
        undefined,
        undefined,
        'Background'
      );
    });

    it('should report an object that is already gone as not-found', async () => {
      mocks.objectApi.delete.mockRejectedValue(httpError(404));

      await expect(client.delete(configMap, 'production')).resolves.toBe('not-found');
    });

    it('should propagate other failures', async () => {
      const forbidden = httpError(403);
      mocks.objectApi.delete.mockRejectedValue(forbidden);

      await expect(client.delete(configMap, 'production')).rejects.toBe(forbidden);
    });
  });

  describe('reads', () => {
    it('should resolve a missing deployment to null', async () => {
      mocks.appsApi.readNamespacedDeployment.mockRejectedValue(httpError(404));

      await expect(client.getDeployment('backend', 'production')).resolves.toBeNull();
    });

    it('should propagate read errors other than not found', async () => {
      const unavailable = httpError(503);
      mocks.appsApi.readNamespacedDeployment.mockRejectedValue(unavailable);

      await expect(client.getDeployment('backend', 'production')).rejects.toBe(unavailable);
    });

    it('should return the server git version', async () => {
      mocks.versionApi.getCode.mockResolvedValue({ body: { gitVersion: 'v1.29.2' } });

      await expect(client.getServerVersion()).resolves.toBe('v1.29.2');
    });

    it('should pass the label selector when listing pods', async () => {
      mocks.coreApi.listNamespacedPod.mockResolvedValue(items([]));

      await client.listPods('production', 'app=backend');

      expect(mocks.coreApi.listNamespacedPod).toHaveBeenCalledWith(
        'production',
        undefined,
        undefined,
        undefined,
        undefined,
        'app=backend'
      );
    });
  });

  describe('forceDeletePods', () => {
    it('should count deleted pods and tolerate pods that are already gone', async () => {
      mocks.coreApi.listNamespacedPod.mockResolvedValue(
        items([{ metadata: { name: 'backend-0' } }, { metadata: { name: 'backend-1' } }])
      );
      mocks.coreApi.deleteNamespacedPod.mockRejectedValueOnce(httpError(404)).mockResolvedValueOnce({ body: {} });

      await expect(client.forceDeletePods('production')).resolves.toBe(1);
      expect(mocks.coreApi.deleteNamespacedPod).toHaveBeenLastCalledWith('backend-1', 'production', undefined, undefined, 0);
    });

    it('should propagate other delete failures', async () => {
      mocks.coreApi.listNamespacedPod.mockResolvedValue(items([{ metadata: { name: 'backend-0' } }]));
      mocks.coreApi.deleteNamespacedPod.mockRejectedValue(httpError(403));

      await expect(client.forceDeletePods('production')).rejects.toMatchObject({ statusCode: 403 });
    });
  });

  describe('forceDeleteNamespace', () => {
    it('should clear finalizers, then delete with a zero grace period', async () => {
      mocks.objectApi.patch.mockResolvedValue({ body: {} });
      mocks.coreApi.deleteNamespace.mockResolvedValue({ body: {} });

      await expect(client.forceDeleteNamespace('production')).resolves.toBe('deleted');
      expect(mocks.objectApi.patch).toHaveBeenCalledWith(
        { apiVersion: 'v1', kind: 'Namespace', metadata: { name: 'production', finalizers: [] } },
        undefined,
        undefined,
        'seqctl',
        undefined,
        { headers: { 'content-type': 'application/merge-patch+json' } }
      );
      expect(mocks.coreApi.deleteNamespace).toHaveBeenCalledWith('production', undefined, undefined, 0);
    });

    it('should report a namespace that does not exist as not-found', async () => {
      mocks.objectApi.patch.mockRejectedValue(httpError(404));

      await expect(client.forceDeleteNamespace('production')).resolves.toBe('not-found');
      expect(mocks.coreApi.deleteNamespace).not.toHaveBeenCalled();
    });
  });

  describe('clearFinalizers', () => {
    it('should patch namespaced objects in their namespace', async () => {
      mocks.objectApi.patch.mockResolvedValue({ body: {} });
      const claim: ManifestDocument = { apiVersion: 'v1', kind: 'PersistentVolumeClaim', metadata: { name: 'postgres-pvc' } };

      await expect(client.clearFinalizers(claim, 'production')).resolves.toBe(true);
      expect(mocks.objectApi.patch.mock.calls[0]?.[0]).toEqual({
        apiVersion: 'v1',
        kind: 'PersistentVolumeClaim',
        metadata: { name: 'postgres-pvc', namespace: 'production', finalizers: [] },
      });
    });
  });

  describe('getJobLogs', () => {
    it('should read the tail of the newest pod of the job', async () => {
      mocks.coreApi.listNamespacedPod.mockResolvedValue(
        items([
          { metadata: { name: 'migrate-aaaaa', creationTimestamp: new Date('2026-01-01T10:00:00Z') } },
          { metadata: { name: 'migrate-bbbbb', creationTimestamp: new Date('2026-01-01T10:05:00Z') } },
        ])
      );
      mocks.coreApi.readNamespacedPodLog.mockResolvedValue({ body: 'migration failed\n' });

      await expect(client.getJobLogs('migrate', 'production', 50)).resolves.toBe('migration failed\n');
      expect(mocks.coreApi.listNamespacedPod.mock.calls[0]?.[5]).toBe('job-name=migrate');
      const [podName, namespace, ...rest] = mocks.coreApi.readNamespacedPodLog.mock.calls[0] ?? [];
      expect([podName, namespace, rest[7]]).toEqual(['migrate-bbbbb', 'production', 50]);
    });

    it('should return null when the job has no pods', async () => {
      mocks.coreApi.listNamespacedPod.mockResolvedValue(items([]));

      await expect(client.getJobLogs('migrate', 'production', 50)).resolves.toBeNull();
      expect(mocks.coreApi.readNamespacedPodLog).not.toHaveBeenCalled();
    });
  });

  describe('listResources', () => {
    const cases: Array<{ kind: ListableKind; stub: ReturnType<typeof vi.fn>; list: unknown[]; expected: ResourceSummary[] }> = [
      {
        kind: 'Namespace',
        stub: mocks.coreApi.listNamespace,
        list: [{ metadata: { name: 'production' }, status: { phase: 'Active' } }],
        expected: [{ name: 'production', detail: 'Active' }],
      },
      {
        kind: 'Node',
        stub: mocks.coreApi.listNode,
        list: [
          { metadata: { name: 'node-1' }, status: { conditions: [{ type: 'Ready', status: 'True' }] } },
          { metadata: { name: 'node-2' } },
        ],
        expected: [
          { name: 'node-1', detail: 'Ready' },
          { name: 'node-2', detail: 'NotReady' },
        ],
      },
      {
        kind: 'PersistentVolume',
        stub: mocks.coreApi.listPersistentVolume,
        list: [{ metadata: { name: 'postgres-pv' }, status: { phase: 'Bound' } }],
        expected: [{ name: 'postgres-pv', detail: 'Bound' }],
      },
      {
        kind: 'PersistentVolumeClaim',
        stub: mocks.coreApi.listNamespacedPersistentVolumeClaim,
        list: [{ metadata: { name: 'postgres-pvc' }, status: { phase: 'Pending' } }],
        expected: [{ name: 'postgres-pvc', detail: 'Pending' }],
      },
      {
        kind: 'ConfigMap',
        stub: mocks.coreApi.listNamespacedConfigMap,
        list: [{ metadata: { name: 'app-config' } }],
        expected: [{ name: 'app-config' }],
      },
      {
        kind: 'Secret',
        stub: mocks.coreApi.listNamespacedSecret,
        list: [{ metadata: { name: 'postgres-secret' }, type: 'Opaque' }],
        expected: [{ name: 'postgres-secret', detail: 'Opaque' }],
      },
      {
        kind: 'ServiceAccount',
        stub: mocks.coreApi.listNamespacedServiceAccount,
        list: [{ metadata: { name: 'default' } }],
        expected: [{ name: 'default' }],
      },
      {
        kind: 'Deployment',
        stub: mocks.appsApi.listNamespacedDeployment,
        list: [{ metadata: { name: 'backend' }, spec: { replicas: 2 }, status: { readyReplicas: 1 } }],
        expected: [{ name: 'backend', detail: '1/2 ready' }],
      },
      {
        kind: 'Service',
        stub: mocks.coreApi.listNamespacedService,
        list: [{ metadata: { name: 'backend-service' }, spec: { type: 'ClusterIP' } }],
        expected: [{ name: 'backend-service', detail: 'ClusterIP' }],
      },
      {
        kind: 'Ingress',
        stub: mocks.networkingApi.listNamespacedIngress,
        list: [{ metadata: { name: 'app-ingress' } }],
        expected: [{ name: 'app-ingress', detail: 'no address' }],
      },
      {
        kind: 'HorizontalPodAutoscaler',
        stub: mocks.autoscalingApi.listNamespacedHorizontalPodAutoscaler,
        list: [{ metadata: { name: 'backend-hpa' }, spec: { minReplicas: 2, maxReplicas: 5 }, status: { currentReplicas: 3 } }],
        expected: [{ name: 'backend-hpa', detail: '3 replicas (min 2, max 5)' }],
      },
      {
        kind: 'Job',
        stub: mocks.batchApi.listNamespacedJob,
        list: [
          { metadata: { name: 'migrate' }, status: { conditions: [{ type: 'Complete', status: 'True' }] } },
          { metadata: { name: 'seed' } },
        ],
        expected: [
          { name: 'migrate', detail: 'Complete' },
          { name: 'seed', detail: 'Running' },
        ],
      },
      {
        kind: 'CronJob',
        stub: mocks.batchApi.listNamespacedCronJob,
        list: [{ metadata: { name: 'log-cleanup' }, spec: { schedule: '0 2 * * *' } }],
        expected: [{ name: 'log-cleanup', detail: '0 2 * * *' }],
      },
      {
        kind: 'Pod',
        stub: mocks.coreApi.listNamespacedPod,
        list: [
          {
            metadata: { name: 'backend-0' },
            status: {
              phase: 'Running',
              containerStatuses: [{ name: 'app', image: '', imageID: '', ready: true, restartCount: 0 }],
            },
          },
        ],
        expected: [{ name: 'backend-0', detail: 'Running, 1/1 ready' }],
      },
      {
        kind: 'NetworkPolicy',
        stub: mocks.networkingApi.listNamespacedNetworkPolicy,
        list: [{ metadata: { name: 'default-deny' } }],
        expected: [{ name: 'default-deny' }],
      },
    ];

    it.each(cases)('should summarize $kind', async ({ kind, stub, list, expected }) => {
      stub.mockResolvedValue(items(list));

      await expect(client.listResources(kind, 'production')).resolves.toEqual(expected);
      if (kind !== 'Namespace' && kind !== 'Node' && kind !== 'PersistentVolume') {
        expect(stub.mock.calls[0]?.[0]).toBe('production');
      }
    });
  });
});
