/**
 * Resource group model types
 */

import type { FailurePolicy, READINESS_KINDS } from '@seqctl/shared';
import type { ManifestDocument } from '@seqctl/kubernetes';

interface PredicateBase {
  namespace: string;
  /** Positive integer; exceeding it yields TIMEOUT */
  timeoutSeconds: number;
}

export interface PodsReadyPredicate extends PredicateBase {
  kind: typeof READINESS_KINDS.PODS_READY;
  labelSelector: string;
}

export interface DeploymentRolledOutPredicate extends PredicateBase {
  kind: typeof READINESS_KINDS.DEPLOYMENT_ROLLED_OUT;
  name: string;
}

export interface JobCompletePredicate extends PredicateBase {
  kind: typeof READINESS_KINDS.JOB_COMPLETE;
  name: string;
}

export interface PvcBoundPredicate extends PredicateBase {
  kind: typeof READINESS_KINDS.PVC_BOUND;
  names: readonly string[];
}

export type ReadinessPredicate =
  | PodsReadyPredicate
  | DeploymentRolledOutPredicate
  | JobCompletePredicate
  | PvcBoundPredicate;

export interface ResourceGroup {
  readonly name: string;
  readonly resources: readonly ManifestDocument[];
  /** Absent means fire-and-forget */
  readonly readinessCheck?: ReadinessPredicate;
  readonly onFailure: FailurePolicy;
}

export interface ResourceGroupInput {
  name: string;
  resources: readonly ManifestDocument[];
  readinessCheck?: ReadinessPredicate;
  onFailure?: FailurePolicy;
}

// ============================================
// Label selectors
// ============================================

export type LabelOperator = 'Equals' | 'NotEquals' | 'In' | 'NotIn' | 'Exists' | 'DoesNotExist';

export interface LabelRequirement {
  key: string;
  operator: LabelOperator;
  values: readonly string[];
}
