/**
 * Cluster API contract
 *
 * Everything the sequencer, validator and teardown need from a cluster.
 * K8sClusterClient implements it against a live API server; tests use an
 * in-process fake.
 */

import type {
  AppliedResource,
  CronJobSnapshot,
  DeleteResult,
  DeploymentSnapshot,
  HorizontalPodAutoscalerSnapshot,
  IngressSnapshot,
  JobSnapshot,
  ListableKind,
  ManifestDocument,
  PersistentVolumeClaimSnapshot,
  PersistentVolumeSnapshot,
  PodSnapshot,
  ResourceSummary,
} from './types.js';

export interface ClusterApi {
  /**
   * Upsert every document. All documents are attempted; afterwards the call
   * rejects with ApplyError if any document was refused, or TransportError if
   * only communication failures occurred.
   */
  apply(documents: readonly ManifestDocument[], defaultNamespace: string): Promise<AppliedResource[]>;

  delete(document: ManifestDocument, defaultNamespace: string): Promise<DeleteResult>;

  /** Returns the server git version; rejects when the cluster is unreachable */
  getServerVersion(): Promise<string>;

  listPods(namespace: string, labelSelector?: string): Promise<PodSnapshot[]>;
  getDeployment(name: string, namespace: string): Promise<DeploymentSnapshot | null>;
  getJob(name: string, namespace: string): Promise<JobSnapshot | null>;
  getPersistentVolumeClaim(name: string, namespace: string): Promise<PersistentVolumeClaimSnapshot | null>;
  getPersistentVolume(name: string): Promise<PersistentVolumeSnapshot | null>;
  getNamespace(name: string): Promise<boolean>;
  /** Number of ready endpoint addresses behind a Service, or null if it has no Endpoints object */
  getServiceEndpointCount(name: string, namespace: string): Promise<number | null>;
  getIngress(name: string, namespace: string): Promise<IngressSnapshot | null>;
  getHorizontalPodAutoscaler(name: string, namespace: string): Promise<HorizontalPodAutoscalerSnapshot | null>;
  getCronJob(name: string, namespace: string): Promise<CronJobSnapshot | null>;
  getSecret(name: string, namespace: string): Promise<boolean>;

  listResources(kind: ListableKind, namespace: string): Promise<ResourceSummary[]>;

  /** Delete every pod in the namespace with a zero grace period; returns the count */
  forceDeletePods(namespace: string): Promise<number>;

  /** Empty metadata.finalizers on the object; false when it does not exist */
  clearFinalizers(document: ManifestDocument, defaultNamespace: string): Promise<boolean>;

  /** Clear the namespace's finalizers, then delete it with a zero grace period */
  forceDeleteNamespace(name: string): Promise<DeleteResult>;

  /**
   * Last `tailLines` lines logged by the newest pod of a Job, or null when the
   * job has no pods.
   */
  getJobLogs(name: string, namespace: string, tailLines: number): Promise<string | null>;
}
