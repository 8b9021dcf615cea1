/**
 * Plain-text rendering of run, validation, teardown and status results.
 * Every function returns lines; callers decide where they go.
 */

import { CHECK_SEVERITIES, type CheckSeverity } from '@seqctl/shared';
import type { ResourceSummary } from '@seqctl/kubernetes';
import type { RunDiagnostics } from '../sequencer/diagnostics.js';
import { pendingGroups, type GroupResult, type SequenceRunRecord } from '../sequencer/sequence-run.js';
import { summarizeRun } from '../sequencer/sequencer.js';
import type { ForceCleanupReport, RemainingResources, TeardownReport } from '../teardown/teardown.js';
import type { ClusterReport, StatusReport, ValidationReport } from '../validation/types.js';

const tag = (severity: CheckSeverity): string => `[${severity}]`;

const seconds = (ms: number): string => `${(ms / 1000).toFixed(1)}s`;

const describeItem = (item: ResourceSummary): string => (item.detail ? `${item.name} (${item.detail})` : item.name);

function listing(items: readonly ResourceSummary[]): string[] {
  return items.length === 0 ? ['  (none)'] : items.map((item) => `  ${describeItem(item)}`);
}

// ===========================================
// Deploy
// ===========================================

export function formatGroupResult(result: GroupResult): string {
  let line = `${tag(result.severity)} ${result.group}: ${result.outcome} in ${seconds(result.durationMs)}`;
  if (result.attempts > 1) {
    line += `, ${result.attempts} attempts`;
  }
  const detail = result.readiness?.message ?? result.error?.message;
  if (detail) {
    line += ` - ${detail}`;
  }
  return line;
}

export function formatRunSummary(run: SequenceRunRecord): string[] {
  const summary = summarizeRun(run);
  const lines = [
    run.abortedBy ? `Run ${run.status} by group "${run.abortedBy}"` : `Run ${run.status}`,
    `Groups passed: ${summary.passed}`,
    `Warnings: ${summary.warnings}`,
    `Groups failed: ${summary.failed}`,
    `Total attempted: ${summary.total} of ${run.groups.length}`,
  ];

  const skipped = pendingGroups(run);
  if (skipped.length > 0) {
    lines.push(`Not attempted: ${skipped.map((group) => group.name).join(', ')}`);
  }
  return lines;
}

export function formatRunDiagnostics(diagnostics: RunDiagnostics): string[] {
  const lines: string[] = [];

  for (const excerpt of diagnostics.jobLogs) {
    const header = `Logs of job ${excerpt.job} (group ${excerpt.group})`;
    if (excerpt.error) {
      lines.push(`${header}: could not be read: ${excerpt.error}`);
    } else if (excerpt.logs === null || excerpt.logs.trim() === '') {
      lines.push(`${header}: no output`);
    } else {
      lines.push(`${header}:`, ...excerpt.logs.trimEnd().split('\n').map((line) => `  ${line}`));
    }
  }

  if (diagnostics.accessPoints.length > 0) {
    lines.push('Access:');
  }
  for (const point of diagnostics.accessPoints) {
    const hosts = point.hosts.length > 0 ? ` (${point.hosts.join(', ')})` : '';
    if (point.error) {
      lines.push(`  ingress/${point.ingress}: ${point.error}`);
    } else if (point.address) {
      lines.push(`  ingress/${point.ingress}${hosts}: ${point.address}`);
    } else {
      lines.push(`  ingress/${point.ingress}${hosts}: address not assigned yet`);
    }
  }
  return lines;
}

// ===========================================
// Validate
// ===========================================

export function formatValidationReport(report: ValidationReport): string[] {
  const lines = [`Validating namespace ${report.namespace} (${report.mode})`];
  let section: string | undefined;

  for (const check of report.checks) {
    if (check.section !== section) {
      section = check.section;
      lines.push('', `== ${section} ==`);
    }
    lines.push(`${tag(check.severity)} ${check.name}: ${check.message}`);
  }

  lines.push(
    '',
    `Tests Passed: ${report.summary.passed}`,
    `Warnings: ${report.summary.warnings}`,
    `Tests Failed: ${report.summary.failed}`,
    `Total Tests: ${report.summary.total}`
  );
  return lines;
}

export function formatClusterReport(report: ClusterReport): string[] {
  const counts = Object.entries(report.counts).map(([kind, count]) => `  ${kind}: ${count}`);

  return [
    `Cluster report for namespace ${report.namespace}`,
    `Server version: ${report.serverVersion}`,
    `Nodes: ${report.nodeCount}`,
    `Namespaces: ${report.namespaceCount}`,
    'Resources:',
    ...counts,
    'Services:',
    ...listing(report.services),
    'Ingresses:',
    ...listing(report.ingresses),
    'Pods:',
    ...listing(report.pods),
  ];
}

// ===========================================
// Status
// ===========================================

export function formatStatus(status: StatusReport): string[] {
  const lines = [`Status of namespace ${status.namespace}`];

  for (const section of status.sections) {
    if (section.error) {
      lines.push(`${section.kind}: listing failed: ${section.error}`);
      continue;
    }
    lines.push(`${section.kind} (${section.items.length}):`, ...listing(section.items));
  }
  return lines;
}

// ===========================================
// Cleanup
// ===========================================

const remaining = (count: number): string => (count < 0 ? 'unknown' : String(count));

export function formatTeardownReport(report: TeardownReport): string[] {
  const lines = [`Tearing down namespace ${report.namespace}`];

  for (const group of report.groups) {
    const severity = group.failed > 0 ? CHECK_SEVERITIES.WARN : CHECK_SEVERITIES.PASS;
    let line = `${tag(severity)} ${group.group}: ${group.deleted} deleted, ${group.notFound} already gone`;
    if (group.failed > 0) {
      line += `, ${group.failed} failed`;
    }
    lines.push(line);
  }

  for (const warning of report.warnings) {
    lines.push(`${tag(CHECK_SEVERITIES.WARN)} ${warning}`);
  }
  if (report.podsForceDeleted > 0) {
    lines.push(`Force deleted pods: ${report.podsForceDeleted}`);
  }
  lines.push(`Pods remaining: ${remaining(report.remainingPods)}`);
  lines.push(`Claims remaining: ${remaining(report.remainingClaims)}`);
  if (report.cancelled) {
    lines.push('Teardown cancelled');
  }
  return lines;
}

/** True when anything the stack created is still there */
export function hasRemainingResources(remaining: RemainingResources): boolean {
  return (
    remaining.pods.length > 0 ||
    remaining.claims.length > 0 ||
    remaining.namespaces.some((ns) => ns.present) ||
    remaining.volumes.some((volume) => volume.phase !== null)
  );
}

export function formatRemainingResources(remaining: RemainingResources): string[] {
  const lines = [
    `Remaining resources for namespace ${remaining.namespace}`,
    'Namespaces:',
    ...listing(remaining.namespaces.map(({ name, present }) => ({ name, detail: present ? 'present' : 'gone' }))),
    'Persistent volumes:',
    ...listing(remaining.volumes.map(({ name, phase }) => ({ name, detail: phase ?? 'gone' }))),
    'Pods:',
    ...listing(remaining.pods),
    'Claims:',
    ...listing(remaining.claims),
  ];

  const { pods, claims } = remaining;
  if (pods.length > 0 || claims.length > 0) {
    lines.push(`${tag(CHECK_SEVERITIES.WARN)} ${pods.length} pods and ${claims.length} claims still in ${remaining.namespace}`);
  } else {
    lines.push(`${tag(CHECK_SEVERITIES.PASS)} No pods or claims left in ${remaining.namespace}`);
  }
  return lines;
}

export function formatForceCleanupReport(report: ForceCleanupReport): string[] {
  const lines = [
    `Force cleaning namespace ${report.namespace}`,
    `Force deleted pods: ${report.podsForceDeleted}`,
    `Finalizers cleared: ${report.finalizersCleared.length > 0 ? report.finalizersCleared.join(', ') : 'none'}`,
  ];
  for (const { name, result } of report.namespaces) {
    lines.push(`Namespace ${name}: ${result === 'deleted' ? 'force deleted' : 'already gone'}`);
  }
  for (const warning of report.warnings) {
    lines.push(`${tag(CHECK_SEVERITIES.WARN)} ${warning}`);
  }
  return lines;
}
