/**
 * Readiness predicates
 * Pure functions over cluster snapshots; the evaluator does the polling.
 */

import type {
  DeploymentSnapshot,
  JobSnapshot,
  PersistentVolumeClaimSnapshot,
  PodSnapshot,
} from '@seqctl/kubernetes';

export type PredicateState = 'ready' | 'pending' | 'failed';

export interface PredicateCheck {
  state: PredicateState;
  message: string;
}

function isPodReady(pod: PodSnapshot): boolean {
  return pod.phase === 'Running' && pod.containers.length > 0 && pod.containers.every((c) => c.ready);
}

/**
 * Ready when at least one pod matches and every matching pod is Running
 * with all containers ready.
 */
export function evaluatePodsReady(pods: readonly PodSnapshot[]): PredicateCheck {
  if (pods.length === 0) {
    return { state: 'pending', message: 'no pods match the selector' };
  }

  const ready = pods.filter(isPodReady).length;
  if (ready === pods.length) {
    return { state: 'ready', message: `${ready}/${pods.length} pods ready` };
  }

  const blocked = pods
    .filter((pod) => !isPodReady(pod))
    .map((pod) => {
      const waiting = pod.containers.find((c) => !c.ready && c.state !== 'Running');
      return `${pod.name} (${waiting ? waiting.state : pod.phase})`;
    });
  return { state: 'pending', message: `${ready}/${pods.length} pods ready; waiting on ${blocked.join(', ')}` };
}

export function evaluateDeploymentRolledOut(deployment: DeploymentSnapshot | null): PredicateCheck {
  if (!deployment) {
    return { state: 'pending', message: 'deployment not found' };
  }

  const { desiredReplicas: desired, readyReplicas: ready, updatedReplicas: updated } = deployment;
  // Replica counts describe the previous spec until the controller catches up
  if (deployment.observedGeneration < deployment.generation) {
    return {
      state: 'pending',
      message: `deployment ${deployment.name} rolling out (generation ${deployment.generation} not yet observed)`,
    };
  }
  const progress = `${ready}/${desired} ready, ${updated}/${desired} updated`;

  if (ready === desired && updated === desired) {
    return { state: 'ready', message: `deployment ${deployment.name} rolled out (${progress})` };
  }
  return { state: 'pending', message: `deployment ${deployment.name} rolling out (${progress})` };
}

/**
 * A Failed=True condition is terminal and reported as 'failed', never as a
 * timeout.
 */
export function evaluateJobComplete(job: JobSnapshot | null): PredicateCheck {
  if (!job) {
    return { state: 'pending', message: 'job not found' };
  }

  const failed = job.conditions.find((c) => c.type === 'Failed' && c.status === 'True');
  if (failed) {
    const detail = failed.message ?? failed.reason ?? `${job.failed} failed pods`;
    return { state: 'failed', message: `job ${job.name} failed: ${detail}` };
  }

  const complete = job.conditions.some((c) => c.type === 'Complete' && c.status === 'True');
  if (complete) {
    return { state: 'ready', message: `job ${job.name} complete (${job.succeeded} succeeded)` };
  }
  return { state: 'pending', message: `job ${job.name} running` };
}

export function evaluatePvcsBound(
  names: readonly string[],
  claims: readonly PersistentVolumeClaimSnapshot[]
): PredicateCheck {
  const phases = new Map(claims.map((claim) => [claim.name, claim.phase]));
  const unbound = names
    .filter((name) => phases.get(name) !== 'Bound')
    .map((name) => `${name} (${phases.get(name) ?? 'missing'})`);

  if (unbound.length === 0) {
    return { state: 'ready', message: `${names.length}/${names.length} claims bound` };
  }
  return {
    state: 'pending',
    message: `${names.length - unbound.length}/${names.length} claims bound; waiting on ${unbound.join(', ')}`,
  };
}
