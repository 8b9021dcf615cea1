/**
 * SequenceRun
 * Runtime record of one sequencer invocation
 */

import {
  RUN_STATUSES,
  type CheckSeverity,
  type GroupOutcome,
  type RunStatus,
  type SeqctlError,
} from '@seqctl/shared';
import type { AppliedResource } from '@seqctl/kubernetes';
import type { ResourceGroup } from '../model/types.js';
import type { ReadinessResult } from '../readiness/readiness-evaluator.js';

export interface GroupResult {
  readonly group: string;
  readonly outcome: GroupOutcome;
  /** PASS, WARN (timeout, or failure under WARN_AND_CONTINUE) or FAIL */
  readonly severity: CheckSeverity;
  /** Apply attempts, including retries */
  readonly attempts: number;
  readonly durationMs: number;
  readonly applied?: readonly AppliedResource[];
  readonly readiness?: ReadinessResult;
  readonly error?: SeqctlError;
}

export interface SequenceRunRecord {
  readonly id: string;
  readonly groups: readonly ResourceGroup[];
  /** Insertion order is execution order */
  readonly results: ReadonlyMap<string, GroupResult>;
  readonly status: RunStatus;
  readonly startedAt: Date;
  readonly finishedAt?: Date;
  /** Name of the group whose failure stopped an ABORTED run */
  readonly abortedBy?: string;
}

export class SequenceRun implements SequenceRunRecord {
  private entries = new Map<string, GroupResult>();
  private currentStatus: RunStatus = RUN_STATUSES.RUNNING;
  private finishedAtValue?: Date;
  private abortedByValue?: string;

  constructor(
    readonly id: string,
    readonly groups: readonly ResourceGroup[],
    readonly startedAt: Date
  ) {}

  get results(): ReadonlyMap<string, GroupResult> {
    return this.entries;
  }

  get status(): RunStatus {
    return this.currentStatus;
  }

  get finishedAt(): Date | undefined {
    return this.finishedAtValue;
  }

  get abortedBy(): string | undefined {
    return this.abortedByValue;
  }

  get isFinalized(): boolean {
    return this.currentStatus !== RUN_STATUSES.RUNNING;
  }

  record(result: GroupResult): void {
    if (this.isFinalized) {
      throw new Error(`Run ${this.id} is finalized; cannot record group "${result.group}"`);
    }
    if (this.entries.has(result.group)) {
      throw new Error(`Run ${this.id} already has a result for group "${result.group}"`);
    }
    this.entries.set(result.group, Object.freeze(result));
  }

  finalize(status: Exclude<RunStatus, 'RUNNING'>, finishedAt: Date, abortedBy?: string): void {
    if (this.isFinalized) {
      throw new Error(`Run ${this.id} is already finalized as ${this.currentStatus}`);
    }
    this.currentStatus = status;
    this.finishedAtValue = finishedAt;
    this.abortedByValue = abortedBy;
  }
}

/** Groups never attempted, in input order */
export function pendingGroups(run: SequenceRunRecord): ResourceGroup[] {
  return run.groups.filter((group) => !run.results.has(group.name));
}
