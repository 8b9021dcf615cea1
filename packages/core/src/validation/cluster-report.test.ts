import { describe, it, expect, beforeEach } from 'vitest';
import type { ListableKind, ResourceSummary } from '@seqctl/kubernetes';
import { FakeCluster, claimSnapshot, readyPod } from '../../../../tests/mocks/fake-cluster.js';
import { buildClusterReport, collectStatus, STATUS_KINDS } from './cluster-report.js';

class ForbiddenIngressCluster extends FakeCluster {
  async listResources(kind: ListableKind, namespace: string): Promise<ResourceSummary[]> {
    if (kind === 'Ingress') {
      throw Object.assign(new Error('HTTP request failed'), {
        statusCode: 403,
        body: { message: 'ingresses.networking.k8s.io is forbidden' },
      });
    }
    return super.listResources(kind, namespace);
  }
}

describe('buildClusterReport', () => {
  let cluster: FakeCluster;

  beforeEach(() => {
    cluster = new FakeCluster();
    cluster.listings.set('Node', [{ name: 'node-1', detail: 'Ready' }]);
    cluster.listings.set('Namespace', [{ name: 'default' }, { name: 'production' }, { name: 'kube-system' }]);
    cluster.listings.set('Deployment', [
      { name: 'backend-deployment', detail: '2/2 ready' },
      { name: 'frontend-deployment', detail: '1/2 ready' },
    ]);
    cluster.listings.set('Service', [{ name: 'backend-service', detail: 'ClusterIP' }]);
    cluster.pods = [readyPod('backend-0', { app: 'backend' })];
    cluster.claims.set('postgres-pvc', claimSnapshot('postgres-pvc', 'Bound'));
  });

  it('should count resources per kind', async () => {
    const report = await buildClusterReport(cluster, 'production');

    expect(report.serverVersion).toBe('v1.29.2');
    expect(report.nodeCount).toBe(1);
    expect(report.namespaceCount).toBe(3);
    expect(report.counts).toEqual({
      Deployment: 2,
      Service: 1,
      Pod: 1,
      PersistentVolumeClaim: 1,
      ConfigMap: 0,
      Secret: 0,
      Ingress: 0,
      HorizontalPodAutoscaler: 0,
      Job: 0,
      CronJob: 0,
      NetworkPolicy: 0,
    });
    expect(report.services).toEqual([{ name: 'backend-service', detail: 'ClusterIP' }]);
    expect(report.pods).toEqual([{ name: 'backend-0', detail: 'Running' }]);
  });

  it('should fail when the cluster is unreachable', async () => {
    cluster.serverVersion = new Error('connect ECONNREFUSED 127.0.0.1:6443');

    await expect(buildClusterReport(cluster, 'production')).rejects.toThrow('connect ECONNREFUSED');
  });
});

describe('collectStatus', () => {
  it('should list every kind and isolate failed listings', async () => {
    const cluster = new ForbiddenIngressCluster();
    cluster.listings.set('Deployment', [{ name: 'backend-deployment', detail: '2/2 ready' }]);

    const status = await collectStatus(cluster, 'production');

    expect(status.sections.map((s) => s.kind)).toEqual(STATUS_KINDS);
    expect(status.sections.find((s) => s.kind === 'Ingress')).toEqual({
      kind: 'Ingress',
      items: [],
      error: 'ingresses.networking.k8s.io is forbidden',
    });
    expect(status.sections.find((s) => s.kind === 'Deployment')?.items).toEqual([
      { name: 'backend-deployment', detail: '2/2 ready' },
    ]);
  });
});
