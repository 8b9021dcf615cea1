/**
 * Deployment Sequencer
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Drives resource groups strictly in order:
 *
 *   apply (retry on transport errors) ──▶ readiness wait (optional) ──▶ outcome
 *
 *   APPLIED_READY / APPLIED_NO_CHECK   continue
 *   APPLIED_TIMEOUT                    continue (warning, whatever the policy)
 *   FAILED_APPLY / PREDICATE_FAILED    stop under ABORT, continue under WARN_AND_CONTINUE
 *
 * Cancellation takes effect before the next group's apply or at the next poll
 * tick; an in-flight apply call is never interrupted.
 */

import { EventEmitter } from 'eventemitter3';
import { randomUUID } from 'node:crypto';
import {
  ApplyError,
  CancellationError,
  CHECK_SEVERITIES,
  createChildLogger,
  FAILURE_POLICIES,
  GROUP_OUTCOMES,
  GROUP_STAGES,
  isRetryableError,
  logGroupOutcome,
  logGroupTransition,
  PredicateFailureError,
  READINESS_STATUSES,
  ReadinessTimeoutError,
  RUN_STATUSES,
  TransportError,
  wrapError,
  type CheckSeverity,
  type GroupOutcome,
  type SeqctlError,
} from '@seqctl/shared';
import { classifyClusterError, type AppliedResource, type ClusterApi } from '@seqctl/kubernetes';
import { validateGroupSequence } from '../model/resource-group.js';
import type { ResourceGroup } from '../model/types.js';
import { systemClock, throwIfCancelled, type Clock } from '../readiness/clock.js';
import { ReadinessEvaluator, type ReadinessResult } from '../readiness/readiness-evaluator.js';
import { SequenceRun, type GroupResult, type SequenceRunRecord } from './sequence-run.js';

// ===========================================
// Types
// ===========================================

export interface SequencerConfig {
  /** Namespace for documents that do not name one */
  namespace: string;
  /** Total apply attempts per group, first try included (default: 3) */
  applyMaxAttempts: number;
  /** Delay before the first retry, doubled for each further one (default: 1000) */
  applyBackoffMs: number;
  /** Readiness poll interval, used when no evaluator is injected (default: 2000) */
  pollIntervalMs: number;
}

export interface SequencerDependencies {
  cluster: ClusterApi;
  evaluator?: ReadinessEvaluator;
  clock?: Clock;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export interface SequencerEvents {
  'group:started': (event: { runId: string; group: ResourceGroup; index: number }) => void;
  'group:applied': (event: { runId: string; group: ResourceGroup; resources: readonly AppliedResource[]; attempts: number }) => void;
  'group:completed': (event: { runId: string; result: GroupResult }) => void;
  'run:finished': (event: { run: SequenceRunRecord }) => void;
}

const DEFAULT_CONFIG: SequencerConfig = {
  namespace: 'default',
  applyMaxAttempts: 3,
  applyBackoffMs: 1000,
  pollIntervalMs: 2000,
};

type ApplyAttempt =
  | { ok: true; resources: AppliedResource[]; attempts: number }
  | { ok: false; error: TransportError | ApplyError; attempts: number };

// ===========================================
// Sequencer
// ===========================================

export class Sequencer extends EventEmitter<SequencerEvents> {
  private config: SequencerConfig;
  private cluster: ClusterApi;
  private evaluator: ReadinessEvaluator;
  private clock: Clock;
  private logger = createChildLogger({ component: 'Sequencer' });

  constructor(deps: SequencerDependencies, config: Partial<SequencerConfig> = {}) {
    super();
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.cluster = deps.cluster;
    this.clock = deps.clock ?? systemClock;
    this.evaluator =
      deps.evaluator ?? new ReadinessEvaluator(deps.cluster, { pollIntervalMs: this.config.pollIntervalMs }, this.clock);
  }

  /**
   * Run every group in order. Only ConfigurationError escapes, and only
   * before the first apply; every other failure becomes a group result.
   */
  async run(groups: readonly ResourceGroup[], options: RunOptions = {}): Promise<SequenceRunRecord> {
    validateGroupSequence(groups);

    const { signal } = options;
    const run = new SequenceRun(randomUUID(), groups, new Date(this.clock.now()));

    this.logger.info({
      runId: run.id,
      groupCount: groups.length,
      namespace: this.config.namespace,
    }, 'Starting sequence run');

    for (const [index, group] of groups.entries()) {
      if (signal?.aborted) {
        this.logger.warn({ runId: run.id, nextGroup: group.name }, 'Run cancelled before group');
        run.finalize(RUN_STATUSES.CANCELLED, new Date(this.clock.now()));
        break;
      }

      let result: GroupResult;
      try {
        result = await this.runGroup(run.id, group, index, signal);
      } catch (error) {
        if (error instanceof CancellationError) {
          this.logger.warn({ runId: run.id, group: group.name }, 'Run cancelled during group; result omitted');
          run.finalize(RUN_STATUSES.CANCELLED, new Date(this.clock.now()));
          break;
        }
        throw error;
      }

      run.record(result);
      logGroupOutcome(run.id, group.name, result.outcome, result.durationMs);
      this.emit('group:completed', { runId: run.id, result });

      if (result.outcome === GROUP_OUTCOMES.FAILED_APPLY && group.onFailure === FAILURE_POLICIES.ABORT) {
        this.logger.error({
          runId: run.id,
          group: group.name,
          skipped: groups.length - index - 1,
          errorMessage: result.error?.message,
        }, 'Group failed under ABORT policy; stopping run');
        run.finalize(RUN_STATUSES.ABORTED, new Date(this.clock.now()), group.name);
        break;
      }
    }

    if (!run.isFinalized) {
      run.finalize(RUN_STATUSES.COMPLETED, new Date(this.clock.now()));
    }

    this.logger.info({
      runId: run.id,
      status: run.status,
      attempted: run.results.size,
      total: groups.length,
    }, 'Sequence run finished');
    this.emit('run:finished', { run });
    return run;
  }

  /**
   * Apply one group and wait for it. CancellationError propagates so the
   * group is left out of the results.
   */
  private async runGroup(
    runId: string,
    group: ResourceGroup,
    index: number,
    signal: AbortSignal | undefined
  ): Promise<GroupResult> {
    const startedAt = this.clock.now();
    const elapsed = (): number => this.clock.now() - startedAt;

    this.emit('group:started', { runId, group, index });
    logGroupTransition(runId, group.name, GROUP_STAGES.PENDING, GROUP_STAGES.APPLYING);

    const applied = await this.applyWithRetry(runId, group, signal);
    if (!applied.ok) {
      logGroupTransition(runId, group.name, GROUP_STAGES.APPLYING, GROUP_STAGES.DONE);
      return this.buildResult(group, GROUP_OUTCOMES.FAILED_APPLY, applied.attempts, elapsed(), {
        error: applied.error,
      });
    }

    this.emit('group:applied', { runId, group, resources: applied.resources, attempts: applied.attempts });

    if (!group.readinessCheck) {
      logGroupTransition(runId, group.name, GROUP_STAGES.APPLYING, GROUP_STAGES.DONE);
      return this.buildResult(group, GROUP_OUTCOMES.APPLIED_NO_CHECK, applied.attempts, elapsed(), {
        applied: applied.resources,
      });
    }

    logGroupTransition(runId, group.name, GROUP_STAGES.APPLYING, GROUP_STAGES.WAITING);

    let readiness: ReadinessResult;
    try {
      readiness = await this.evaluator.waitFor(group.readinessCheck, { signal });
    } catch (error) {
      if (error instanceof CancellationError) {
        throw error;
      }
      logGroupTransition(runId, group.name, GROUP_STAGES.WAITING, GROUP_STAGES.DONE);
      return this.buildResult(group, GROUP_OUTCOMES.FAILED_APPLY, applied.attempts, elapsed(), {
        applied: applied.resources,
        error: wrapError(error, { group: group.name }),
      });
    }

    logGroupTransition(runId, group.name, GROUP_STAGES.WAITING, GROUP_STAGES.DONE);
    const common = { applied: applied.resources, readiness };

    switch (readiness.status) {
      case READINESS_STATUSES.READY:
        return this.buildResult(group, GROUP_OUTCOMES.APPLIED_READY, applied.attempts, elapsed(), common);
      case READINESS_STATUSES.TIMEOUT:
        return this.buildResult(group, GROUP_OUTCOMES.APPLIED_TIMEOUT, applied.attempts, elapsed(), {
          ...common,
          error: new ReadinessTimeoutError(group.readinessCheck.timeoutSeconds, { group: group.name }),
        });
      case READINESS_STATUSES.PREDICATE_FAILED:
        return this.buildResult(group, GROUP_OUTCOMES.FAILED_APPLY, applied.attempts, elapsed(), {
          ...common,
          error: new PredicateFailureError(readiness.message, { group: group.name }),
        });
    }
  }

  /**
   * Only TransportError is retried; a rejected document would be rejected again.
   */
  private async applyWithRetry(
    runId: string,
    group: ResourceGroup,
    signal: AbortSignal | undefined
  ): Promise<ApplyAttempt> {
    const maxAttempts = Math.max(1, this.config.applyMaxAttempts);

    for (let attempt = 1; ; attempt++) {
      try {
        const resources = await this.cluster.apply(group.resources, this.config.namespace);
        this.logger.debug({ runId, group: group.name, attempt, resourceCount: resources.length }, 'Group applied');
        return { ok: true, resources, attempts: attempt };
      } catch (error) {
        const classified = classifyClusterError(error);

        if (!isRetryableError(classified) || attempt >= maxAttempts) {
          this.logger.error({
            runId,
            group: group.name,
            attempt,
            code: classified.code,
            errorMessage: classified.message,
          }, 'Group apply failed');
          return { ok: false, error: classified, attempts: attempt };
        }

        const delayMs = this.config.applyBackoffMs * 2 ** (attempt - 1);
        this.logger.warn({
          runId,
          group: group.name,
          attempt,
          maxAttempts,
          delayMs,
          errorMessage: classified.message,
        }, 'Transient apply failure, retrying');

        await this.clock.sleep(delayMs, signal);
        throwIfCancelled(signal);
      }
    }
  }

  private buildResult(
    group: ResourceGroup,
    outcome: GroupOutcome,
    attempts: number,
    durationMs: number,
    extra: { applied?: readonly AppliedResource[]; readiness?: ReadinessResult; error?: SeqctlError }
  ): GroupResult {
    return {
      group: group.name,
      outcome,
      severity: outcomeSeverity(outcome, group),
      attempts,
      durationMs,
      ...extra,
    };
  }
}

// ===========================================
// Run helpers
// ===========================================

export function outcomeSeverity(outcome: GroupOutcome, group: Pick<ResourceGroup, 'onFailure'>): CheckSeverity {
  switch (outcome) {
    case GROUP_OUTCOMES.APPLIED_READY:
    case GROUP_OUTCOMES.APPLIED_NO_CHECK:
      return CHECK_SEVERITIES.PASS;
    case GROUP_OUTCOMES.APPLIED_TIMEOUT:
      return CHECK_SEVERITIES.WARN;
    case GROUP_OUTCOMES.FAILED_APPLY:
      return group.onFailure === FAILURE_POLICIES.ABORT ? CHECK_SEVERITIES.FAIL : CHECK_SEVERITIES.WARN;
  }
}

export interface RunSummary {
  passed: number;
  warnings: number;
  failed: number;
  /** Groups attempted */
  total: number;
  /** Groups never attempted (abort or cancellation) */
  skipped: number;
}

export function summarizeRun(run: SequenceRunRecord): RunSummary {
  const summary: RunSummary = { passed: 0, warnings: 0, failed: 0, total: 0, skipped: 0 };

  for (const result of run.results.values()) {
    summary.total++;
    if (result.severity === CHECK_SEVERITIES.PASS) summary.passed++;
    else if (result.severity === CHECK_SEVERITIES.WARN) summary.warnings++;
    else summary.failed++;
  }
  summary.skipped = run.groups.length - summary.total;

  return summary;
}

/**
 * 0 on full success (warnings allowed); 1 when a failure stopped the run or
 * the operator cancelled it.
 */
export function runExitCode(run: SequenceRunRecord): number {
  return run.status === RUN_STATUSES.COMPLETED ? 0 : 1;
}
