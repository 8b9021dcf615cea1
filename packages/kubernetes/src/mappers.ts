/**
 * Map client-node resource objects to the typed snapshots consumers read
 */

import type * as k8s from '@kubernetes/client-node';
import type {
  ConditionSnapshot,
  ContainerSnapshot,
  CronJobSnapshot,
  DeploymentSnapshot,
  HorizontalPodAutoscalerSnapshot,
  IngressSnapshot,
  JobSnapshot,
  PersistentVolumeClaimSnapshot,
  PersistentVolumeSnapshot,
  PodPhase,
  PodSnapshot,
} from './types.js';

const POD_PHASES: readonly PodPhase[] = ['Pending', 'Running', 'Succeeded', 'Failed', 'Unknown'];

function toPodPhase(phase: string | undefined): PodPhase {
  return POD_PHASES.find((p) => p === phase) ?? 'Unknown';
}

function toConditionStatus(status: string): ConditionSnapshot['status'] {
  if (status === 'True' || status === 'False') {
    return status;
  }
  return 'Unknown';
}

function describeContainerState(status: k8s.V1ContainerStatus): string {
  if (status.state?.running) {
    return 'Running';
  }
  if (status.state?.waiting) {
    return status.state.waiting.reason ?? 'Waiting';
  }
  if (status.state?.terminated) {
    return status.state.terminated.reason ?? 'Terminated';
  }
  return 'Unknown';
}

export function mapContainer(status: k8s.V1ContainerStatus): ContainerSnapshot {
  return {
    name: status.name,
    ready: status.ready,
    restartCount: status.restartCount,
    state: describeContainerState(status),
  };
}

export function mapPod(pod: k8s.V1Pod): PodSnapshot {
  const runAsUser = pod.spec?.securityContext?.runAsUser;
  return {
    name: pod.metadata?.name ?? '',
    namespace: pod.metadata?.namespace ?? '',
    phase: toPodPhase(pod.status?.phase),
    containers: (pod.status?.containerStatuses ?? []).map(mapContainer),
    ...(runAsUser !== undefined && { runAsUser }),
  };
}

export function mapDeployment(deployment: k8s.V1Deployment): DeploymentSnapshot {
  return {
    name: deployment.metadata?.name ?? '',
    namespace: deployment.metadata?.namespace ?? '',
    // spec.replicas defaults to 1 server-side when omitted
    desiredReplicas: deployment.spec?.replicas ?? 1,
    readyReplicas: deployment.status?.readyReplicas ?? 0,
    updatedReplicas: deployment.status?.updatedReplicas ?? 0,
    availableReplicas: deployment.status?.availableReplicas ?? 0,
    generation: deployment.metadata?.generation ?? 0,
    observedGeneration: deployment.status?.observedGeneration ?? 0,
  };
}

export function mapJob(job: k8s.V1Job): JobSnapshot {
  return {
    name: job.metadata?.name ?? '',
    namespace: job.metadata?.namespace ?? '',
    conditions: (job.status?.conditions ?? []).map((c) => ({
      type: c.type,
      status: toConditionStatus(c.status),
      ...(c.reason && { reason: c.reason }),
      ...(c.message && { message: c.message }),
    })),
    succeeded: job.status?.succeeded ?? 0,
    failed: job.status?.failed ?? 0,
  };
}

export function mapPersistentVolumeClaim(pvc: k8s.V1PersistentVolumeClaim): PersistentVolumeClaimSnapshot {
  return {
    name: pvc.metadata?.name ?? '',
    namespace: pvc.metadata?.namespace ?? '',
    phase: pvc.status?.phase ?? 'Unknown',
  };
}

export function mapPersistentVolume(pv: k8s.V1PersistentVolume): PersistentVolumeSnapshot {
  return {
    name: pv.metadata?.name ?? '',
    phase: pv.status?.phase ?? 'Unknown',
  };
}

export function mapIngress(ingress: k8s.V1Ingress): IngressSnapshot {
  const entry = ingress.status?.loadBalancer?.ingress?.[0];
  const address = entry?.ip ?? entry?.hostname;
  return {
    name: ingress.metadata?.name ?? '',
    namespace: ingress.metadata?.namespace ?? '',
    hosts: (ingress.spec?.rules ?? []).flatMap((rule) => (rule.host ? [rule.host] : [])),
    ...(address && { address }),
  };
}

export function mapHorizontalPodAutoscaler(hpa: k8s.V2HorizontalPodAutoscaler): HorizontalPodAutoscalerSnapshot {
  return {
    name: hpa.metadata?.name ?? '',
    namespace: hpa.metadata?.namespace ?? '',
    currentReplicas: hpa.status?.currentReplicas ?? 0,
    // spec.minReplicas defaults to 1
    minReplicas: hpa.spec?.minReplicas ?? 1,
    maxReplicas: hpa.spec?.maxReplicas ?? 0,
  };
}

export function mapCronJob(cronJob: k8s.V1CronJob): CronJobSnapshot {
  const lastScheduleTime = cronJob.status?.lastScheduleTime;
  return {
    name: cronJob.metadata?.name ?? '',
    namespace: cronJob.metadata?.namespace ?? '',
    schedule: cronJob.spec?.schedule ?? '',
    ...(lastScheduleTime && { lastScheduleTime: new Date(lastScheduleTime) }),
  };
}

export function countReadyEndpointAddresses(endpoints: k8s.V1Endpoints): number {
  return (endpoints.subsets ?? []).reduce((sum, subset) => sum + (subset.addresses?.length ?? 0), 0);
}
