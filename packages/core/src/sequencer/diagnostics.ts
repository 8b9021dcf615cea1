/**
 * Post-run diagnostics
 *
 * After a deploy, fetch what an operator looks at next: the logs of any Job
 * whose completion check did not pass, and the addresses of the ingresses the
 * run created. Read failures become part of the result; they never fail the
 * deploy.
 */

import {
  GROUP_OUTCOMES,
  READINESS_KINDS,
  READINESS_STATUSES,
  RUN_STATUSES,
  createChildLogger,
  getErrorMessage,
} from '@seqctl/shared';
import { resolveNamespace, type ClusterApi } from '@seqctl/kubernetes';
import { systemClock, type Clock } from '../readiness/clock.js';
import { readWithin } from '../readiness/poll.js';
import type { SequenceRunRecord } from './sequence-run.js';

export interface JobLogExcerpt {
  group: string;
  job: string;
  /** Tail of the newest pod's log; null when the job has no pods */
  logs: string | null;
  error?: string;
}

export interface AccessPoint {
  ingress: string;
  hosts: string[];
  /** Load balancer IP or hostname; absent until assigned */
  address?: string;
  error?: string;
}

export interface RunDiagnostics {
  jobLogs: JobLogExcerpt[];
  accessPoints: AccessPoint[];
}

export interface DiagnosticsOptions {
  cluster: ClusterApi;
  namespace: string;
  clock?: Clock;
  /** Log lines fetched per job (default: 50) */
  tailLines?: number;
}

const READ_TIMEOUT_MS = 10_000;

const logger = createChildLogger({ component: 'Diagnostics' });

export async function collectRunDiagnostics(run: SequenceRunRecord, options: DiagnosticsOptions): Promise<RunDiagnostics> {
  const { cluster, namespace, clock = systemClock, tailLines = 50 } = options;
  const diagnostics: RunDiagnostics = { jobLogs: [], accessPoints: [] };
  if (run.status === RUN_STATUSES.CANCELLED) {
    return diagnostics;
  }

  const read = <T>(check: () => Promise<T>): Promise<T> => readWithin(check, READ_TIMEOUT_MS, clock, undefined);

  for (const group of run.groups) {
    const result = run.results.get(group.name);
    const check = group.readinessCheck;
    if (!result?.readiness || check?.kind !== READINESS_KINDS.JOB_COMPLETE) {
      continue;
    }
    if (result.readiness.status === READINESS_STATUSES.READY) {
      continue;
    }

    const excerpt: JobLogExcerpt = { group: group.name, job: check.name, logs: null };
    try {
      excerpt.logs = await read(() => cluster.getJobLogs(check.name, check.namespace, tailLines));
    } catch (error) {
      excerpt.error = getErrorMessage(error);
      logger.debug({ job: check.name, errorMessage: excerpt.error }, 'Job log read failed');
    }
    diagnostics.jobLogs.push(excerpt);
  }

  if (run.status !== RUN_STATUSES.COMPLETED) {
    return diagnostics;
  }

  for (const group of run.groups) {
    if (run.results.get(group.name)?.outcome === GROUP_OUTCOMES.FAILED_APPLY) {
      continue;
    }
    for (const document of group.resources.filter((d) => d.kind === 'Ingress')) {
      const name = document.metadata.name;
      const point: AccessPoint = { ingress: name, hosts: [] };
      try {
        const ingress = await read(() => cluster.getIngress(name, resolveNamespace(document, namespace) ?? namespace));
        if (ingress) {
          point.hosts = ingress.hosts;
          if (ingress.address) {
            point.address = ingress.address;
          }
        } else {
          point.error = 'not found';
        }
      } catch (error) {
        point.error = getErrorMessage(error);
      }
      diagnostics.accessPoints.push(point);
    }
  }

  return diagnostics;
}
