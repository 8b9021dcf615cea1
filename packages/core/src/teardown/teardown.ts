/**
 * Teardown
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Removes a stack in the reverse of its deployment order:
 *
 *   namespaced documents, last group first
 *     ──▶ wait for pods to go (force delete on timeout)
 *     ──▶ wait for claims to go
 *     ──▶ PersistentVolumes and other cluster-scoped documents
 *     ──▶ Namespaces
 *
 * Cluster-scoped documents are held back so a Namespace is not deleted while
 * its workloads are still draining. A document that is already gone counts as
 * removed; any other delete failure is a warning and teardown moves on.
 *
 * `inspect` lists what is left behind. `force` is the last resort for a
 * teardown that got stuck: pods go with a zero grace period, claim and volume
 * finalizers are emptied, and the stack's namespaces are deleted without
 * waiting on their finalizers.
 */

import { EventEmitter } from 'eventemitter3';
import { CancellationError, createChildLogger, getErrorMessage } from '@seqctl/shared';
import {
  describeClusterError,
  isClusterScopedKind,
  type ClusterApi,
  type DeleteResult,
  type ManifestDocument,
  type ResourceSummary,
} from '@seqctl/kubernetes';
import type { ResourceGroup } from '../model/types.js';
import { systemClock, throwIfCancelled, type Clock } from '../readiness/clock.js';
import { pollUntil, readWithin } from '../readiness/poll.js';

// ===========================================
// Types
// ===========================================

export interface TeardownConfig {
  /** Namespace for documents that do not name one */
  namespace: string;
  /** How long to wait for pods to terminate before force deleting them (default: 180) */
  podTimeoutSeconds: number;
  /** How long to wait for claims to be released (default: 120) */
  pvcTimeoutSeconds: number;
  pollIntervalMs: number;
}

export interface TeardownDependencies {
  cluster: ClusterApi;
  clock?: Clock;
}

export interface TeardownGroupResult {
  group: string;
  deleted: number;
  notFound: number;
  failed: number;
}

export interface TeardownReport {
  namespace: string;
  /** Reverse deployment order */
  groups: TeardownGroupResult[];
  podsForceDeleted: number;
  /** Pods still listed after the wait and any force delete; -1 when unknown */
  remainingPods: number;
  /** Claims still listed after the wait; -1 when unknown */
  remainingClaims: number;
  warnings: string[];
  cancelled: boolean;
}

export interface RemainingResources {
  namespace: string;
  /** Namespaces the stack declares */
  namespaces: Array<{ name: string; present: boolean }>;
  /** PersistentVolumes the stack declares; phase is null once gone */
  volumes: Array<{ name: string; phase: string | null }>;
  pods: ResourceSummary[];
  claims: ResourceSummary[];
}

export interface ForceCleanupReport {
  namespace: string;
  podsForceDeleted: number;
  /** Kind/name of every object whose finalizers were emptied */
  finalizersCleared: string[];
  namespaces: Array<{ name: string; result: DeleteResult }>;
  warnings: string[];
}

export interface TeardownEvents {
  'group:deleted': (event: { result: TeardownGroupResult }) => void;
  'wait:started': (event: { target: 'pods' | 'claims'; timeoutSeconds: number }) => void;
}

const DEFAULT_CONFIG: TeardownConfig = {
  namespace: 'default',
  podTimeoutSeconds: 180,
  pvcTimeoutSeconds: 120,
  pollIntervalMs: 2000,
};

// Budget for one-off reads outside a polling loop
const RECOUNT_TIMEOUT_MS = 10_000;

// Cluster-scoped kinds removed after everything else; Namespace goes last
const LAST_KINDS = ['Namespace'];

interface DeferredDocument {
  group: string;
  document: ManifestDocument;
}

// ===========================================
// Teardown
// ===========================================

export class Teardown extends EventEmitter<TeardownEvents> {
  private config: TeardownConfig;
  private cluster: ClusterApi;
  private clock: Clock;
  private logger = createChildLogger({ component: 'Teardown' });

  constructor(deps: TeardownDependencies, config: Partial<TeardownConfig> = {}) {
    super();
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.cluster = deps.cluster;
    this.clock = deps.clock ?? systemClock;
  }

  async run(groups: readonly ResourceGroup[], options: { signal?: AbortSignal } = {}): Promise<TeardownReport> {
    const { signal } = options;
    const { namespace } = this.config;
    const report: TeardownReport = {
      namespace,
      groups: [],
      podsForceDeleted: 0,
      remainingPods: -1,
      remainingClaims: -1,
      warnings: [],
      cancelled: false,
    };

    this.logger.info({ namespace, groupCount: groups.length }, 'Starting teardown');

    try {
      const deferred: DeferredDocument[] = [];
      const results = new Map<string, TeardownGroupResult>();

      for (const group of [...groups].reverse()) {
        throwIfCancelled(signal);
        const result: TeardownGroupResult = { group: group.name, deleted: 0, notFound: 0, failed: 0 };
        results.set(group.name, result);
        report.groups.push(result);

        for (const document of [...group.resources].reverse()) {
          if (isClusterScopedKind(document.kind)) {
            deferred.push({ group: group.name, document });
            continue;
          }
          await this.deleteDocument(document, result, report);
        }

        this.logger.info({ ...result }, 'Group deleted');
        this.emit('group:deleted', { result });
      }

      await this.drainPods(report, signal);
      await this.drainClaims(report, signal);

      const ordered = [
        ...deferred.filter((d) => !LAST_KINDS.includes(d.document.kind)),
        ...deferred.filter((d) => LAST_KINDS.includes(d.document.kind)),
      ];
      for (const { group, document } of ordered) {
        throwIfCancelled(signal);
        const result = results.get(group);
        if (result) {
          await this.deleteDocument(document, result, report);
        }
      }
    } catch (error) {
      if (!(error instanceof CancellationError)) {
        throw error;
      }
      this.logger.warn({ namespace }, 'Teardown cancelled');
      report.cancelled = true;
    }

    this.logger.info({
      namespace,
      warnings: report.warnings.length,
      remainingPods: report.remainingPods,
      remainingClaims: report.remainingClaims,
      cancelled: report.cancelled,
    }, 'Teardown finished');

    return report;
  }

  /**
   * What the stack left behind: its declared namespaces and volumes, plus any
   * pods and claims still in the target namespace.
   */
  async inspect(groups: readonly ResourceGroup[], options: { signal?: AbortSignal } = {}): Promise<RemainingResources> {
    const { signal } = options;
    const { namespace } = this.config;
    const declared = (kind: string): string[] =>
      groups.flatMap((group) => group.resources.filter((d) => d.kind === kind).map((d) => d.metadata.name));

    const namespaces: RemainingResources['namespaces'] = [];
    for (const name of declared('Namespace')) {
      namespaces.push({ name, present: await this.read(() => this.cluster.getNamespace(name), signal) });
    }
    const volumes: RemainingResources['volumes'] = [];
    for (const name of declared('PersistentVolume')) {
      const volume = await this.read(() => this.cluster.getPersistentVolume(name), signal);
      volumes.push({ name, phase: volume?.phase ?? null });
    }
    const pods = await this.read(() => this.cluster.listResources('Pod', namespace), signal);
    const claims = await this.read(() => this.cluster.listResources('PersistentVolumeClaim', namespace), signal);

    this.logger.info({ namespace, pods: pods.length, claims: claims.length }, 'Remaining resources listed');
    return { namespace, namespaces, volumes, pods, claims };
  }

  async force(groups: readonly ResourceGroup[], options: { signal?: AbortSignal } = {}): Promise<ForceCleanupReport> {
    const { signal } = options;
    const { namespace } = this.config;
    const report: ForceCleanupReport = {
      namespace,
      podsForceDeleted: 0,
      finalizersCleared: [],
      namespaces: [],
      warnings: [],
    };

    this.logger.warn({ namespace }, 'Starting forced cleanup');

    try {
      report.podsForceDeleted = await this.cluster.forceDeletePods(namespace);
    } catch (error) {
      report.warnings.push(`Force delete in ${namespace} failed: ${describeClusterError(error)}`);
    }

    const stuck: ManifestDocument[] = [];
    try {
      const claims = await this.read(() => this.cluster.listResources('PersistentVolumeClaim', namespace), signal);
      stuck.push(...claims.map((claim) => ({ apiVersion: 'v1', kind: 'PersistentVolumeClaim', metadata: { name: claim.name } })));
    } catch (error) {
      throwIfCancelled(signal);
      report.warnings.push(`Could not list claims in ${namespace}: ${describeClusterError(error)}`);
    }
    for (const group of groups) {
      stuck.push(...group.resources.filter((document) => document.kind === 'PersistentVolume'));
    }

    for (const document of stuck) {
      throwIfCancelled(signal);
      const target = `${document.kind}/${document.metadata.name}`;
      try {
        if (await this.cluster.clearFinalizers(document, namespace)) {
          report.finalizersCleared.push(target);
        }
      } catch (error) {
        report.warnings.push(`Failed to clear finalizers on ${target}: ${describeClusterError(error)}`);
      }
    }

    const declared = groups.flatMap((group) => group.resources.filter((document) => document.kind === 'Namespace'));
    for (const document of declared) {
      throwIfCancelled(signal);
      const name = document.metadata.name;
      try {
        report.namespaces.push({ name, result: await this.cluster.forceDeleteNamespace(name) });
      } catch (error) {
        report.warnings.push(`Failed to force delete namespace ${name}: ${describeClusterError(error)}`);
      }
    }

    this.logger.warn({
      namespace,
      podsForceDeleted: report.podsForceDeleted,
      finalizersCleared: report.finalizersCleared.length,
      warnings: report.warnings.length,
    }, 'Forced cleanup finished');

    return report;
  }

  private read<T>(check: () => Promise<T>, signal: AbortSignal | undefined): Promise<T> {
    return readWithin(check, RECOUNT_TIMEOUT_MS, this.clock, signal);
  }

  private async deleteDocument(
    document: ManifestDocument,
    result: TeardownGroupResult,
    report: TeardownReport
  ): Promise<void> {
    const target = `${document.kind}/${document.metadata.name}`;
    try {
      const outcome = await this.cluster.delete(document, this.config.namespace);
      if (outcome === 'deleted') {
        result.deleted++;
      } else {
        result.notFound++;
      }
      this.logger.debug({ group: result.group, target, outcome }, 'Document deleted');
    } catch (error) {
      result.failed++;
      const message = `Failed to delete ${target}: ${describeClusterError(error)}`;
      report.warnings.push(message);
      this.logger.warn({ group: result.group, target, errorMessage: message }, 'Delete failed');
    }
  }

  private async drainPods(report: TeardownReport, signal: AbortSignal | undefined): Promise<void> {
    const { namespace, podTimeoutSeconds, pollIntervalMs } = this.config;
    this.emit('wait:started', { target: 'pods', timeoutSeconds: podTimeoutSeconds });

    const outcome = await pollUntil({
      check: () => this.cluster.listPods(namespace),
      isDone: (pods) => pods.length === 0,
      onError: (error) => this.logger.debug({ errorMessage: getErrorMessage(error) }, 'Pod listing failed'),
      timeoutMs: podTimeoutSeconds * 1000,
      intervalMs: pollIntervalMs,
      clock: this.clock,
      signal,
    });

    if (outcome.done) {
      report.remainingPods = 0;
      return;
    }

    const stuck = outcome.last?.length;
    report.warnings.push(
      stuck === undefined
        ? `Could not list pods in ${namespace}: ${getErrorMessage(outcome.lastError)}; force deleting`
        : `${stuck} pods still present after ${podTimeoutSeconds}s; force deleting`
    );
    this.logger.warn({ namespace, stuck }, 'Pods did not terminate in time; force deleting');

    try {
      report.podsForceDeleted = await this.cluster.forceDeletePods(namespace);
      const pods = await this.read(() => this.cluster.listPods(namespace), signal);
      report.remainingPods = pods.length;
    } catch (error) {
      throwIfCancelled(signal);
      report.warnings.push(`Force delete in ${namespace} failed: ${describeClusterError(error)}`);
    }
  }

  private async drainClaims(report: TeardownReport, signal: AbortSignal | undefined): Promise<void> {
    const { namespace, pvcTimeoutSeconds, pollIntervalMs } = this.config;
    this.emit('wait:started', { target: 'claims', timeoutSeconds: pvcTimeoutSeconds });

    const outcome = await pollUntil({
      check: () => this.cluster.listResources('PersistentVolumeClaim', namespace),
      isDone: (claims) => claims.length === 0,
      onError: (error) => this.logger.debug({ errorMessage: getErrorMessage(error) }, 'Claim listing failed'),
      timeoutMs: pvcTimeoutSeconds * 1000,
      intervalMs: pollIntervalMs,
      clock: this.clock,
      signal,
    });

    if (outcome.done) {
      report.remainingClaims = 0;
      return;
    }

    if (outcome.last) {
      report.remainingClaims = outcome.last.length;
      const names = outcome.last.map((claim) => claim.name).join(', ');
      report.warnings.push(`${outcome.last.length} claims still present after ${pvcTimeoutSeconds}s: ${names}`);
    } else {
      report.warnings.push(`Could not list claims in ${namespace}: ${getErrorMessage(outcome.lastError)}`);
    }
    this.logger.warn({ namespace, remaining: report.remainingClaims }, 'Claims were not released in time');
  }
}
