/**
 * @seqctl/kubernetes
 * Cluster API contract, Kubernetes client and manifest loading
 */

export { K8sClusterClient } from './k8s-client.js';
export type { ClusterApi } from './cluster-api.js';
export { applyBatch, type ApplyOne } from './batch.js';
export {
  classifyClusterError,
  describeClusterError,
  getStatusCode,
  isNotFound,
  isTransientClusterError,
} from './errors.js';
export { loadManifestFile, loadManifests, parseManifests } from './manifest-loader.js';
export * from './mappers.js';
export * from './types.js';
