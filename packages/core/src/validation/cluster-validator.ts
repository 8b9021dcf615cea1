/**
 * Cluster Validator
 * Post-deployment health checks for a stack's namespace
 *
 * Sections (full mode):
 *   prerequisites → namespaces → storage → deployments → services → pods
 *   → ingress → autoscaling → jobs → security
 *
 * Quick mode runs deployments, services and pods only. An unreachable cluster
 * fails the prerequisites section and ends the run there.
 */

import {
  CHECK_SEVERITIES,
  createChildLogger,
  VALIDATION_MODES,
  type CheckSeverity,
  type CheckSummary,
} from '@seqctl/shared';
import { describeClusterError, type ClusterApi, type PodSnapshot } from '@seqctl/kubernetes';
import {
  VALIDATION_SECTIONS,
  type CheckResult,
  type ValidationReport,
  type ValidationSection,
  type ValidationTargets,
} from './types.js';

// Restart counts at or above this fail the pod health check
const RESTART_FAIL_THRESHOLD = 3;

type CheckOutcome = Pick<CheckResult, 'severity' | 'message'>;

const pass = (message: string): CheckOutcome => ({ severity: CHECK_SEVERITIES.PASS, message });
const warn = (message: string): CheckOutcome => ({ severity: CHECK_SEVERITIES.WARN, message });
const fail = (message: string): CheckOutcome => ({ severity: CHECK_SEVERITIES.FAIL, message });

export function summarizeChecks(checks: readonly CheckResult[]): CheckSummary {
  const count = (severity: CheckSeverity) => checks.filter((c) => c.severity === severity).length;
  return {
    passed: count(CHECK_SEVERITIES.PASS),
    warnings: count(CHECK_SEVERITIES.WARN),
    failed: count(CHECK_SEVERITIES.FAIL),
    total: checks.length,
  };
}

export class ClusterValidator {
  private logger = createChildLogger({ component: 'ClusterValidator' });

  constructor(
    private cluster: ClusterApi,
    private namespace: string
  ) {}

  async validate(
    targets: ValidationTargets,
    mode: ValidationReport['mode'] = VALIDATION_MODES.FULL
  ): Promise<ValidationReport> {
    const checks: CheckResult[] = [];
    const record = async (section: ValidationSection, name: string, run: () => Promise<CheckOutcome>) => {
      checks.push({ section, name, ...(await this.guard(run)) });
    };

    this.logger.info({ namespace: this.namespace, mode }, 'Starting cluster validation');

    const reachable = await this.guard(async () => {
      const version = await this.cluster.getServerVersion();
      return pass(`cluster reachable (${version})`);
    });
    checks.push({ section: VALIDATION_SECTIONS.PREREQUISITES, name: 'cluster', ...reachable });

    if (reachable.severity === CHECK_SEVERITIES.FAIL) {
      this.logger.error({ errorMessage: reachable.message }, 'Cluster unreachable; skipping remaining checks');
      return { mode, namespace: this.namespace, checks, summary: summarizeChecks(checks) };
    }

    const full = mode === VALIDATION_MODES.FULL;

    if (full) {
      for (const name of targets.namespaces) {
        await record(VALIDATION_SECTIONS.NAMESPACES, `namespace/${name}`, () => this.checkNamespace(name));
      }
      for (const name of targets.persistentVolumes) {
        await record(VALIDATION_SECTIONS.STORAGE, `pv/${name}`, () => this.checkPersistentVolume(name));
      }
      for (const name of targets.persistentVolumeClaims) {
        await record(VALIDATION_SECTIONS.STORAGE, `pvc/${name}`, () => this.checkPersistentVolumeClaim(name));
      }
    }

    for (const name of targets.deployments) {
      await record(VALIDATION_SECTIONS.DEPLOYMENTS, `deployment/${name}`, () => this.checkDeployment(name));
    }
    for (const name of targets.services) {
      await record(VALIDATION_SECTIONS.SERVICES, `service/${name}`, () => this.checkService(name));
    }
    for (const app of targets.apps) {
      await this.checkPods(app, checks);
    }

    if (full) {
      for (const name of targets.ingresses) {
        await this.checkIngress(name, checks);
      }
      for (const name of targets.horizontalPodAutoscalers) {
        await record(VALIDATION_SECTIONS.AUTOSCALING, `hpa/${name}`, () => this.checkAutoscaler(name));
      }
      for (const name of targets.jobs) {
        await record(VALIDATION_SECTIONS.JOBS, `job/${name}`, () => this.checkJob(name));
      }
      for (const name of targets.cronJobs) {
        await this.checkCronJob(name, checks);
      }
      if (targets.requireNetworkPolicies) {
        await record(VALIDATION_SECTIONS.SECURITY, 'network-policies', () => this.checkNetworkPolicies());
      }
      for (const name of targets.secrets) {
        await record(VALIDATION_SECTIONS.SECURITY, `secret/${name}`, () => this.checkSecret(name));
      }
      for (const app of targets.nonRootApps) {
        await record(VALIDATION_SECTIONS.SECURITY, `non-root/${app}`, () => this.checkNonRoot(app));
      }
    }

    const summary = summarizeChecks(checks);
    this.logger.info({ namespace: this.namespace, mode, ...summary }, 'Cluster validation finished');
    return { mode, namespace: this.namespace, checks, summary };
  }

  // ===========================================
  // Individual checks
  // ===========================================

  private async checkNamespace(name: string): Promise<CheckOutcome> {
    return (await this.cluster.getNamespace(name)) ? pass('exists') : fail('not found');
  }

  private async checkPersistentVolume(name: string): Promise<CheckOutcome> {
    const volume = await this.cluster.getPersistentVolume(name);
    if (!volume) return fail('not found');
    if (volume.phase === 'Bound') return pass('Bound');
    if (volume.phase === 'Available') return warn('Available (not bound)');
    return fail(volume.phase);
  }

  private async checkPersistentVolumeClaim(name: string): Promise<CheckOutcome> {
    const claim = await this.cluster.getPersistentVolumeClaim(name, this.namespace);
    if (!claim) return fail('not found');
    return claim.phase === 'Bound' ? pass('Bound') : fail(claim.phase);
  }

  private async checkDeployment(name: string): Promise<CheckOutcome> {
    const deployment = await this.cluster.getDeployment(name, this.namespace);
    if (!deployment) return fail('not found');

    const message = `${deployment.readyReplicas}/${deployment.desiredReplicas} replicas ready`;
    return deployment.desiredReplicas > 0 && deployment.readyReplicas === deployment.desiredReplicas
      ? pass(message)
      : fail(message);
  }

  private async checkService(name: string): Promise<CheckOutcome> {
    const endpoints = await this.cluster.getServiceEndpointCount(name, this.namespace);
    if (endpoints === null) return fail('no endpoints object');
    return endpoints > 0 ? pass(`${endpoints} endpoints`) : fail('no ready endpoints');
  }

  private async checkPods(app: string, checks: CheckResult[]): Promise<void> {
    const section = VALIDATION_SECTIONS.PODS;
    try {
      const pods = await this.cluster.listPods(this.namespace, `app=${app}`);
      checks.push({ section, name: `pods/${app}`, ...checkPodsRunning(pods) });
      if (pods.length > 0) {
        checks.push({ section, name: `pods/${app} restarts`, ...checkRestarts(pods) });
      }
    } catch (error) {
      checks.push({ section, name: `pods/${app}`, ...this.readFailure(error) });
    }
  }

  private async checkIngress(name: string, checks: CheckResult[]): Promise<void> {
    const section = VALIDATION_SECTIONS.INGRESS;
    try {
      const ingress = await this.cluster.getIngress(name, this.namespace);
      if (!ingress) {
        checks.push({ section, name: `ingress/${name}`, ...fail('not found') });
        return;
      }
      checks.push({ section, name: `ingress/${name}`, ...pass('exists') });
      checks.push({
        section,
        name: `ingress/${name} address`,
        ...(ingress.address ? pass(ingress.address) : warn('no address assigned yet')),
      });
    } catch (error) {
      checks.push({ section, name: `ingress/${name}`, ...this.readFailure(error) });
    }
  }

  private async checkAutoscaler(name: string): Promise<CheckOutcome> {
    const hpa = await this.cluster.getHorizontalPodAutoscaler(name, this.namespace);
    if (!hpa) return fail('not found');

    const message = `${hpa.currentReplicas} replicas (min ${hpa.minReplicas}, max ${hpa.maxReplicas})`;
    return hpa.currentReplicas >= hpa.minReplicas ? pass(message) : warn(message);
  }

  private async checkJob(name: string): Promise<CheckOutcome> {
    const job = await this.cluster.getJob(name, this.namespace);
    if (!job) return fail('not found');

    const isTrue = (type: string) => job.conditions.some((c) => c.type === type && c.status === 'True');
    if (isTrue('Complete')) return pass(`complete (${job.succeeded} succeeded)`);
    if (isTrue('Failed')) return fail(`failed (${job.failed} failed pods)`);
    return warn('not finished');
  }

  private async checkCronJob(name: string, checks: CheckResult[]): Promise<void> {
    const section = VALIDATION_SECTIONS.JOBS;
    try {
      const cronJob = await this.cluster.getCronJob(name, this.namespace);
      if (!cronJob) {
        checks.push({ section, name: `cronjob/${name}`, ...fail('not found') });
        return;
      }
      checks.push({ section, name: `cronjob/${name}`, ...pass(`schedule "${cronJob.schedule}"`) });
      checks.push({
        section,
        name: `cronjob/${name} last run`,
        ...(cronJob.lastScheduleTime
          ? pass(`last scheduled ${cronJob.lastScheduleTime.toISOString()}`)
          : warn('not scheduled yet')),
      });
    } catch (error) {
      checks.push({ section, name: `cronjob/${name}`, ...this.readFailure(error) });
    }
  }

  private async checkNetworkPolicies(): Promise<CheckOutcome> {
    const policies = await this.cluster.listResources('NetworkPolicy', this.namespace);
    return policies.length > 0 ? pass(`${policies.length} network policies`) : warn('no network policies');
  }

  private async checkSecret(name: string): Promise<CheckOutcome> {
    return (await this.cluster.getSecret(name, this.namespace)) ? pass('exists') : fail('not found');
  }

  private async checkNonRoot(app: string): Promise<CheckOutcome> {
    const pods = await this.cluster.listPods(this.namespace, `app=${app}`);
    const root = pods.filter((pod) => pod.runAsUser === 0).map((pod) => pod.name);
    return root.length === 0 ? pass('no pods run as root') : warn(`running as root: ${root.join(', ')}`);
  }

  // ===========================================
  // Helpers
  // ===========================================

  /** A read failure fails the check it belongs to, not the whole run */
  private async guard(run: () => Promise<CheckOutcome>): Promise<CheckOutcome> {
    try {
      return await run();
    } catch (error) {
      return this.readFailure(error);
    }
  }

  private readFailure(error: unknown): CheckOutcome {
    const message = describeClusterError(error);
    this.logger.debug({ errorMessage: message }, 'Validation read failed');
    return fail(`read failed: ${message}`);
  }
}

function checkPodsRunning(pods: readonly PodSnapshot[]): CheckOutcome {
  if (pods.length === 0) return fail('no pods found');
  const running = pods.filter((pod) => pod.phase === 'Running').length;
  const message = `${running}/${pods.length} running`;
  return running === pods.length ? pass(message) : fail(message);
}

function checkRestarts(pods: readonly PodSnapshot[]): CheckOutcome {
  const restarts = pods.flatMap((pod) => pod.containers.map((c) => c.restartCount));
  const max = Math.max(0, ...restarts);
  if (max === 0) return pass('no restarts');
  const message = `max ${max} restarts`;
  return max < RESTART_FAIL_THRESHOLD ? warn(message) : fail(message);
}
