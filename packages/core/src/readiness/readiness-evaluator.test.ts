/**
 * Readiness Evaluator Tests
 * Polling cadence, timeouts, fast failure and cancellation against the fake cluster
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { CancellationError, ConfigurationError } from '@seqctl/shared';
import { FakeCluster, claimSnapshot, deploymentSnapshot, jobSnapshot, readyPod } from '../../../../tests/mocks/fake-cluster.js';
import { ManualClock } from '../../../../tests/mocks/manual-clock.js';
import { ReadinessEvaluator } from './readiness-evaluator.js';

describe('ReadinessEvaluator', () => {
  let cluster: FakeCluster;
  let clock: ManualClock;
  let evaluator: ReadinessEvaluator;

  beforeEach(() => {
    cluster = new FakeCluster();
    clock = new ManualClock();
    evaluator = new ReadinessEvaluator(cluster, { pollIntervalMs: 2000 }, clock);
  });

  describe('PODS_READY', () => {
    it('should time out exactly at the deadline when no pods match', async () => {
      const result = await evaluator.waitFor({
        kind: 'PODS_READY',
        labelSelector: 'app=database',
        namespace: 'production',
        timeoutSeconds: 5,
      });

      expect(result).toEqual({
        status: 'TIMEOUT',
        message: 'pods "app=database" not ready after 5s (no pods match the selector)',
        attempts: 4,
        elapsedMs: 5000,
      });
      expect(clock.sleeps).toEqual([2000, 2000, 1000]);
    });

    it('should report READY once every matching pod is ready', async () => {
      cluster.pods = [
        readyPod('redis-0', { app: 'redis' }),
        readyPod('other-0', { app: 'other' }, { phase: 'Pending', containers: [] }),
      ];

      const result = await evaluator.waitFor({
        kind: 'PODS_READY',
        labelSelector: 'app=redis',
        namespace: 'production',
        timeoutSeconds: 30,
      });

      expect(result.status).toBe('READY');
      expect(result.message).toBe('1/1 pods ready');
      expect(result.attempts).toBe(1);
    });

    it('should retry transient read errors silently', async () => {
      cluster.readError = new Error('connection reset');
      clock.onSleep = (now) => {
        if (now === 2000) {
          cluster.readError = undefined;
          cluster.pods = [readyPod('backend-0', { app: 'backend' })];
        }
      };

      const result = await evaluator.waitFor({
        kind: 'PODS_READY',
        labelSelector: 'app=backend',
        namespace: 'production',
        timeoutSeconds: 30,
      });

      expect(result).toEqual({ status: 'READY', message: '1/1 pods ready', attempts: 2, elapsedMs: 2000 });
    });

    it('should fail setup on a malformed selector before reading', async () => {
      await expect(
        evaluator.waitFor({ kind: 'PODS_READY', labelSelector: 'app in (', namespace: 'production', timeoutSeconds: 5 })
      ).rejects.toThrow(ConfigurationError);
      expect(cluster.reads).toBe(0);
    });
  });

  describe('DEPLOYMENT_ROLLED_OUT', () => {
    it('should wait for ready and updated replicas to match', async () => {
      cluster.deployments.set('backend', deploymentSnapshot('backend', 2, 1, 1));
      clock.onSleep = (now) => {
        if (now === 2000) {
          cluster.deployments.set('backend', deploymentSnapshot('backend', 2, 2, 2));
        }
      };

      const result = await evaluator.waitFor({
        kind: 'DEPLOYMENT_ROLLED_OUT',
        name: 'backend',
        namespace: 'production',
        timeoutSeconds: 60,
      });

      expect(result).toEqual({
        status: 'READY',
        message: 'deployment backend rolled out (2/2 ready, 2/2 updated)',
        attempts: 2,
        elapsedMs: 2000,
      });
    });

    it('should report the last read error on timeout', async () => {
      cluster.readError = new Error('connection reset');

      const result = await evaluator.waitFor({
        kind: 'DEPLOYMENT_ROLLED_OUT',
        name: 'backend',
        namespace: 'production',
        timeoutSeconds: 3,
      });

      expect(result).toEqual({
        status: 'TIMEOUT',
        message: 'deployment/backend not ready after 3s (last read failed: connection reset)',
        attempts: 3,
        elapsedMs: 3000,
      });
    });
  });

  describe('JOB_COMPLETE', () => {
    it('should fail fast when the job fails before completing', async () => {
      cluster.jobs.set('migrate', jobSnapshot('migrate'));
      clock.onSleep = (now) => {
        if (now === 4000) {
          cluster.jobs.set('migrate', jobSnapshot('migrate', 'Failed'));
        }
      };

      const result = await evaluator.waitFor({
        kind: 'JOB_COMPLETE',
        name: 'migrate',
        namespace: 'production',
        timeoutSeconds: 30,
      });

      expect(result).toEqual({
        status: 'PREDICATE_FAILED',
        message: 'job migrate failed: 1 failed pods',
        attempts: 3,
        elapsedMs: 4000,
      });
    });

    it('should report READY on the Complete condition', async () => {
      cluster.jobs.set('migrate', jobSnapshot('migrate', 'Complete'));

      const result = await evaluator.waitFor({
        kind: 'JOB_COMPLETE',
        name: 'migrate',
        namespace: 'production',
        timeoutSeconds: 30,
      });

      expect(result.status).toBe('READY');
      expect(result.elapsedMs).toBe(0);
    });
  });

  describe('PVC_BOUND', () => {
    it('should require every named claim to be bound', async () => {
      cluster.claims.set('postgres-pvc', claimSnapshot('postgres-pvc', 'Bound'));
      cluster.claims.set('redis-pvc', claimSnapshot('redis-pvc', 'Pending'));

      const result = await evaluator.waitFor({
        kind: 'PVC_BOUND',
        names: ['postgres-pvc', 'redis-pvc'],
        namespace: 'production',
        timeoutSeconds: 2,
      });

      expect(result.status).toBe('TIMEOUT');
      expect(result.message).toBe(
        'pvc/postgres-pvc,redis-pvc not ready after 2s (1/2 claims bound; waiting on redis-pvc (Pending))'
      );
    });
  });

  describe('unresponsive reads', () => {
    it('should count a read that never answers as failed at the deadline', async () => {
      cluster.listPods = () => new Promise(() => {});

      const result = await evaluator.waitFor({
        kind: 'PODS_READY',
        labelSelector: 'app=database',
        namespace: 'production',
        timeoutSeconds: 1,
      });

      expect(result).toEqual({
        status: 'TIMEOUT',
        message: 'pods "app=database" not ready after 1s (last read failed: read did not answer within 1000ms)',
        attempts: 1,
        elapsedMs: 1000,
      });
      expect(clock.sleeps).toEqual([1000]);
    });

    it('should give a read issued on the deadline a short grace period', async () => {
      let calls = 0;
      cluster.listPods = () => {
        calls++;
        return calls === 1 ? Promise.resolve([]) : new Promise(() => {});
      };

      const result = await evaluator.waitFor({
        kind: 'PODS_READY',
        labelSelector: 'app=database',
        namespace: 'production',
        timeoutSeconds: 2,
      });

      expect(result.status).toBe('TIMEOUT');
      expect(result.attempts).toBe(2);
      expect(clock.sleeps).toEqual([2000, 1000]);
      expect(result.elapsedMs).toBe(3000);
    });

    it('should throw CancellationError while a read is outstanding', async () => {
      cluster.listPods = () => new Promise(() => {});
      const realTime = new ReadinessEvaluator(cluster, { pollIntervalMs: 2000 });
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 20);

      await expect(
        realTime.waitFor(
          { kind: 'PODS_READY', labelSelector: 'app=frontend', namespace: 'production', timeoutSeconds: 60 },
          { signal: controller.signal }
        )
      ).rejects.toBeInstanceOf(CancellationError);
    });
  });

  describe('cancellation', () => {
    it('should throw CancellationError at the next poll tick', async () => {
      const controller = new AbortController();
      clock.onSleep = (now) => {
        if (now === 2000) {
          controller.abort();
        }
      };

      await expect(
        evaluator.waitFor(
          { kind: 'PODS_READY', labelSelector: 'app=frontend', namespace: 'production', timeoutSeconds: 60 },
          { signal: controller.signal }
        )
      ).rejects.toBeInstanceOf(CancellationError);
      expect(cluster.reads).toBe(1);
    });
  });
});
