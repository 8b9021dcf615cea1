/**
 * Kubernetes client types
 */

export interface K8sClientConfig {
  /** Kubernetes context to use (default: current context) */
  context?: string;
  /** Kubeconfig path (default: ~/.kube/config) */
  kubeconfig?: string;
  /** Field manager name recorded by server-side apply */
  fieldManager?: string;
  /** Send every write with dryRun=All (default: false) */
  dryRun?: boolean;
}

// ============================================
// Manifest Documents
// ============================================

export interface ManifestMetadata {
  name: string;
  namespace?: string;
}

/**
 * An opaque declarative document. Only the identifying fields are typed;
 * everything else is passed to the API server untouched.
 */
export interface ManifestDocument {
  apiVersion: string;
  kind: string;
  metadata: ManifestMetadata;
  [key: string]: unknown;
}

export interface AppliedResource {
  kind: string;
  name: string;
  namespace?: string;
  action: 'created' | 'configured';
}

export type DeleteResult = 'deleted' | 'not-found';

/** Built-in kinds that never take a namespace */
const CLUSTER_SCOPED_MANIFEST_KINDS = new Set([
  'Namespace',
  'Node',
  'PersistentVolume',
  'StorageClass',
  'ClusterRole',
  'ClusterRoleBinding',
  'CustomResourceDefinition',
  'IngressClass',
  'PriorityClass',
  'RuntimeClass',
  'CSIDriver',
  'APIService',
  'ValidatingWebhookConfiguration',
  'MutatingWebhookConfiguration',
]);

export function isClusterScopedKind(kind: string): boolean {
  return CLUSTER_SCOPED_MANIFEST_KINDS.has(kind);
}

/**
 * Namespace a document lands in: its own, the default for namespaced kinds,
 * none for cluster-scoped kinds.
 */
export function resolveNamespace(document: ManifestDocument, defaultNamespace: string): string | undefined {
  if (document.metadata.namespace) {
    return document.metadata.namespace;
  }
  return isClusterScopedKind(document.kind) ? undefined : defaultNamespace;
}

// ============================================
// Status Snapshots
// ============================================

export type PodPhase = 'Pending' | 'Running' | 'Succeeded' | 'Failed' | 'Unknown';

export interface ContainerSnapshot {
  name: string;
  ready: boolean;
  restartCount: number;
  /** Running, Completed, or the waiting/terminated reason (e.g. CrashLoopBackOff) */
  state: string;
}

export interface PodSnapshot {
  name: string;
  namespace: string;
  phase: PodPhase;
  containers: ContainerSnapshot[];
  /** Pod-level securityContext.runAsUser, when set */
  runAsUser?: number;
}

export interface DeploymentSnapshot {
  name: string;
  namespace: string;
  desiredReplicas: number;
  readyReplicas: number;
  updatedReplicas: number;
  availableReplicas: number;
  /** metadata.generation; 0 when the server has not set it */
  generation: number;
  /** Generation the deployment controller last acted on */
  observedGeneration: number;
}

export interface ConditionSnapshot {
  type: string;
  status: 'True' | 'False' | 'Unknown';
  reason?: string;
  message?: string;
}

export interface JobSnapshot {
  name: string;
  namespace: string;
  conditions: ConditionSnapshot[];
  succeeded: number;
  failed: number;
}

export interface PersistentVolumeClaimSnapshot {
  name: string;
  namespace: string;
  phase: string;
}

export interface PersistentVolumeSnapshot {
  name: string;
  phase: string;
}

export interface IngressSnapshot {
  name: string;
  namespace: string;
  /** Hosts named by the ingress rules */
  hosts: string[];
  /** First load balancer IP or hostname, when assigned */
  address?: string;
}

export interface HorizontalPodAutoscalerSnapshot {
  name: string;
  namespace: string;
  currentReplicas: number;
  minReplicas: number;
  maxReplicas: number;
}

export interface CronJobSnapshot {
  name: string;
  namespace: string;
  schedule: string;
  lastScheduleTime?: Date;
}

// ============================================
// Listing
// ============================================

export const LISTABLE_KINDS = [
  'Namespace',
  'Node',
  'PersistentVolume',
  'PersistentVolumeClaim',
  'ConfigMap',
  'Secret',
  'ServiceAccount',
  'Deployment',
  'Service',
  'Ingress',
  'HorizontalPodAutoscaler',
  'Job',
  'CronJob',
  'Pod',
  'NetworkPolicy',
] as const;

export type ListableKind = (typeof LISTABLE_KINDS)[number];

/** Kinds that are not namespaced; the namespace argument is ignored for them */
export const CLUSTER_SCOPED_KINDS: ReadonlySet<ListableKind> = new Set<ListableKind>([
  'Namespace',
  'Node',
  'PersistentVolume',
]);

export interface ResourceSummary {
  name: string;
  /** Short human-readable state, e.g. "2/2 ready" or "Bound" */
  detail?: string;
}
