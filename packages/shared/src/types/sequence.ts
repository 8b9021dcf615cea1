/**
 * Sequencing vocabulary shared by the core engine and the CLI
 */

export const FAILURE_POLICIES = {
  ABORT: 'ABORT',
  WARN_AND_CONTINUE: 'WARN_AND_CONTINUE',
} as const;

export type FailurePolicy = (typeof FAILURE_POLICIES)[keyof typeof FAILURE_POLICIES];

export const READINESS_KINDS = {
  PODS_READY: 'PODS_READY',
  DEPLOYMENT_ROLLED_OUT: 'DEPLOYMENT_ROLLED_OUT',
  JOB_COMPLETE: 'JOB_COMPLETE',
  PVC_BOUND: 'PVC_BOUND',
} as const;

export type ReadinessKind = (typeof READINESS_KINDS)[keyof typeof READINESS_KINDS];

export const READINESS_STATUSES = {
  READY: 'READY',
  TIMEOUT: 'TIMEOUT',
  PREDICATE_FAILED: 'PREDICATE_FAILED',
} as const;

export type ReadinessStatus = (typeof READINESS_STATUSES)[keyof typeof READINESS_STATUSES];

export const GROUP_OUTCOMES = {
  APPLIED_READY: 'APPLIED_READY',
  APPLIED_TIMEOUT: 'APPLIED_TIMEOUT',
  APPLIED_NO_CHECK: 'APPLIED_NO_CHECK',
  FAILED_APPLY: 'FAILED_APPLY',
} as const;

export type GroupOutcome = (typeof GROUP_OUTCOMES)[keyof typeof GROUP_OUTCOMES];

export const RUN_STATUSES = {
  RUNNING: 'RUNNING',
  COMPLETED: 'COMPLETED',
  ABORTED: 'ABORTED',
  CANCELLED: 'CANCELLED',
} as const;

export type RunStatus = (typeof RUN_STATUSES)[keyof typeof RUN_STATUSES];

/**
 * Stages a group passes through inside a run (used for transition logging)
 */
export const GROUP_STAGES = {
  PENDING: 'PENDING',
  APPLYING: 'APPLYING',
  WAITING: 'WAITING',
  DONE: 'DONE',
} as const;

export type GroupStage = (typeof GROUP_STAGES)[keyof typeof GROUP_STAGES];
