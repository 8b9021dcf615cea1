/**
 * Cluster report and status listings
 */

import { createChildLogger } from '@seqctl/shared';
import { describeClusterError, type ClusterApi, type ListableKind } from '@seqctl/kubernetes';
import type { ClusterReport, StatusReport, StatusSection } from './types.js';

const logger = createChildLogger({ component: 'ClusterReport' });

/** Kinds counted by `validate report`, in output order */
export const REPORT_KINDS: readonly ListableKind[] = [
  'Deployment',
  'Service',
  'Pod',
  'PersistentVolumeClaim',
  'ConfigMap',
  'Secret',
  'Ingress',
  'HorizontalPodAutoscaler',
  'Job',
  'CronJob',
  'NetworkPolicy',
];

/** Kinds listed by `status`, in output order */
export const STATUS_KINDS: readonly ListableKind[] = [
  'Namespace',
  'PersistentVolume',
  'PersistentVolumeClaim',
  'Deployment',
  'Service',
  'Ingress',
  'HorizontalPodAutoscaler',
  'Job',
  'CronJob',
  'Pod',
  'NetworkPolicy',
];

/**
 * Inventory of the cluster and namespace. Read failures propagate: a report
 * with holes in it would read as an empty cluster.
 */
export async function buildClusterReport(cluster: ClusterApi, namespace: string): Promise<ClusterReport> {
  const serverVersion = await cluster.getServerVersion();
  const [nodes, namespaces] = await Promise.all([
    cluster.listResources('Node', namespace),
    cluster.listResources('Namespace', namespace),
  ]);

  const listings = await Promise.all(
    REPORT_KINDS.map(async (kind) => [kind, await cluster.listResources(kind, namespace)] as const)
  );
  const byKind = new Map(listings);

  const counts: ClusterReport['counts'] = {};
  for (const [kind, items] of listings) {
    counts[kind] = items.length;
  }

  logger.debug({ namespace, serverVersion, counts }, 'Cluster report built');

  return {
    namespace,
    serverVersion,
    nodeCount: nodes.length,
    namespaceCount: namespaces.length,
    counts,
    services: byKind.get('Service') ?? [],
    ingresses: byKind.get('Ingress') ?? [],
    pods: byKind.get('Pod') ?? [],
  };
}

/**
 * Per-kind listing. A failed listing is reported on its own section and does
 * not hide the others.
 */
export async function collectStatus(cluster: ClusterApi, namespace: string): Promise<StatusReport> {
  const sections = await Promise.all(
    STATUS_KINDS.map(async (kind): Promise<StatusSection> => {
      try {
        return { kind, items: await cluster.listResources(kind, namespace) };
      } catch (error) {
        const message = describeClusterError(error);
        logger.warn({ kind, namespace, errorMessage: message }, 'Listing failed');
        return { kind, items: [], error: message };
      }
    })
  );

  return { namespace, sections };
}
