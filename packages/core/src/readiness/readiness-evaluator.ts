/**
 * Readiness Predicate Evaluator
 * Polls a readiness predicate against the cluster until READY, TIMEOUT or PREDICATE_FAILED
 */

import {
  createChildLogger,
  getErrorMessage,
  READINESS_KINDS,
  READINESS_STATUSES,
  type ReadinessStatus,
} from '@seqctl/shared';
import type { ClusterApi, PersistentVolumeClaimSnapshot } from '@seqctl/kubernetes';
import { validateReadinessPredicate } from '../model/resource-group.js';
import type { ReadinessPredicate } from '../model/types.js';
import { systemClock, type Clock } from './clock.js';
import { pollUntil } from './poll.js';
import {
  evaluateDeploymentRolledOut,
  evaluateJobComplete,
  evaluatePodsReady,
  evaluatePvcsBound,
  type PredicateCheck,
} from './predicates.js';

export interface ReadinessResult {
  status: ReadinessStatus;
  message: string;
  /** Number of predicate checks performed */
  attempts: number;
  elapsedMs: number;
}

export interface ReadinessEvaluatorConfig {
  /** Delay between checks (default: 2000) */
  pollIntervalMs: number;
}

export interface WaitOptions {
  signal?: AbortSignal;
}

const DEFAULT_CONFIG: ReadinessEvaluatorConfig = {
  pollIntervalMs: 2000,
};

export class ReadinessEvaluator {
  private config: ReadinessEvaluatorConfig;
  private logger = createChildLogger({ component: 'ReadinessEvaluator' });

  constructor(
    private cluster: ClusterApi,
    config: Partial<ReadinessEvaluatorConfig> = {},
    private clock: Clock = systemClock
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Poll until the predicate resolves or its timeout elapses.
   * Throws ConfigurationError for a malformed predicate and CancellationError
   * when the signal aborts; transient read errors are retried until timeout.
   */
  async waitFor(predicate: ReadinessPredicate, options: WaitOptions = {}): Promise<ReadinessResult> {
    // Setup errors surface before the first read
    validateReadinessPredicate(predicate);

    const target = describePredicate(predicate);
    this.logger.info({
      kind: predicate.kind,
      target,
      namespace: predicate.namespace,
      timeoutSeconds: predicate.timeoutSeconds,
    }, 'Waiting for readiness');

    const outcome = await pollUntil<PredicateCheck>({
      check: () => this.check(predicate),
      isDone: (result) => result.state !== 'pending',
      onError: (error) => {
        this.logger.debug({ target, errorMessage: getErrorMessage(error) }, 'Readiness read failed, retrying');
      },
      timeoutMs: predicate.timeoutSeconds * 1000,
      intervalMs: this.config.pollIntervalMs,
      clock: this.clock,
      signal: options.signal,
    });

    const base = { attempts: outcome.attempts, elapsedMs: outcome.elapsedMs };

    if (outcome.done && outcome.last?.state === 'ready') {
      this.logger.info({ target, ...base }, 'Readiness reached');
      return { status: READINESS_STATUSES.READY, message: outcome.last.message, ...base };
    }

    if (outcome.done && outcome.last?.state === 'failed') {
      this.logger.warn({ target, ...base, reason: outcome.last.message }, 'Readiness predicate failed');
      return { status: READINESS_STATUSES.PREDICATE_FAILED, message: outcome.last.message, ...base };
    }

    const lastSeen = outcome.lastError !== undefined
      ? `last read failed: ${getErrorMessage(outcome.lastError)}`
      : outcome.last?.message ?? 'no successful read';
    const message = `${target} not ready after ${predicate.timeoutSeconds}s (${lastSeen})`;
    this.logger.warn({ target, ...base }, 'Readiness timed out');
    return { status: READINESS_STATUSES.TIMEOUT, message, ...base };
  }

  private async check(predicate: ReadinessPredicate): Promise<PredicateCheck> {
    switch (predicate.kind) {
      case READINESS_KINDS.PODS_READY:
        return evaluatePodsReady(await this.cluster.listPods(predicate.namespace, predicate.labelSelector));
      case READINESS_KINDS.DEPLOYMENT_ROLLED_OUT:
        return evaluateDeploymentRolledOut(await this.cluster.getDeployment(predicate.name, predicate.namespace));
      case READINESS_KINDS.JOB_COMPLETE:
        return evaluateJobComplete(await this.cluster.getJob(predicate.name, predicate.namespace));
      case READINESS_KINDS.PVC_BOUND: {
        const claims = await Promise.all(
          predicate.names.map((name) => this.cluster.getPersistentVolumeClaim(name, predicate.namespace))
        );
        return evaluatePvcsBound(
          predicate.names,
          claims.filter((claim): claim is PersistentVolumeClaimSnapshot => claim !== null)
        );
      }
    }
  }
}

export function describePredicate(predicate: ReadinessPredicate): string {
  switch (predicate.kind) {
    case READINESS_KINDS.PODS_READY:
      return `pods "${predicate.labelSelector}"`;
    case READINESS_KINDS.DEPLOYMENT_ROLLED_OUT:
      return `deployment/${predicate.name}`;
    case READINESS_KINDS.JOB_COMPLETE:
      return `job/${predicate.name}`;
    case READINESS_KINDS.PVC_BOUND:
      return `pvc/${predicate.names.join(',')}`;
  }
}
