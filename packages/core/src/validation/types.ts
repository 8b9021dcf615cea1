/**
 * Cluster validation types
 */

import type { CheckSeverity, CheckSummary, ValidationMode } from '@seqctl/shared';
import type { ListableKind, ResourceSummary } from '@seqctl/kubernetes';

/**
 * What a deployed stack is expected to contain. Every list may be empty;
 * an empty list skips its section.
 */
export interface ValidationTargets {
  namespaces: string[];
  persistentVolumes: string[];
  persistentVolumeClaims: string[];
  deployments: string[];
  services: string[];
  /** Pod health per `app=<name>` label */
  apps: string[];
  ingresses: string[];
  horizontalPodAutoscalers: string[];
  jobs: string[];
  cronJobs: string[];
  secrets: string[];
  /** Apps whose pods must not run as uid 0 */
  nonRootApps: string[];
  requireNetworkPolicies: boolean;
}

export const VALIDATION_SECTIONS = {
  PREREQUISITES: 'prerequisites',
  NAMESPACES: 'namespaces',
  STORAGE: 'storage',
  DEPLOYMENTS: 'deployments',
  SERVICES: 'services',
  PODS: 'pods',
  INGRESS: 'ingress',
  AUTOSCALING: 'autoscaling',
  JOBS: 'jobs',
  SECURITY: 'security',
} as const;

export type ValidationSection = (typeof VALIDATION_SECTIONS)[keyof typeof VALIDATION_SECTIONS];

export interface CheckResult {
  section: ValidationSection;
  /** What was checked, e.g. `deployment/backend-deployment` */
  name: string;
  severity: CheckSeverity;
  message: string;
}

export interface ValidationReport {
  mode: Exclude<ValidationMode, 'report'>;
  namespace: string;
  checks: CheckResult[];
  summary: CheckSummary;
}

export interface ClusterReport {
  namespace: string;
  serverVersion: string;
  nodeCount: number;
  namespaceCount: number;
  /** Resource counts in the namespace (cluster-wide for cluster-scoped kinds) */
  counts: Partial<Record<ListableKind, number>>;
  services: ResourceSummary[];
  ingresses: ResourceSummary[];
  pods: ResourceSummary[];
}

export interface StatusSection {
  kind: ListableKind;
  items: ResourceSummary[];
  /** Set when the listing itself failed */
  error?: string;
}

export interface StatusReport {
  namespace: string;
  sections: StatusSection[];
}
