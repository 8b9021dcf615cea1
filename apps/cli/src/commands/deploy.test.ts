import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@seqctl/shared';
import { jobSnapshot, readyPod } from '../../../../tests/mocks/fake-cluster.js';
import { createTestContext } from '../../../../tests/mocks/command-context.js';
import { runDeploy } from './deploy.js';

describe('runDeploy', () => {
  it('should print progress, results and the summary', async () => {
    const { ctx, cluster, lines } = createTestContext();
    cluster.pods = [readyPod('postgres-0', { app: 'postgres' })];
    cluster.jobs.set('database-migration-job', {
      ...jobSnapshot('database-migration-job', 'Complete'),
      namespace: 'jobs',
    });

    const exitCode = await runDeploy(ctx);

    expect(exitCode).toBe(0);
    expect(lines).toEqual([
      'Deploying stack webapp to namespace production',
      '(1/3) config: applying 2 resources',
      '[PASS] config: APPLIED_NO_CHECK in 0.0s',
      '(2/3) database: applying 2 resources, waiting up to 300s',
      '[PASS] database: APPLIED_READY in 0.0s - 1/1 pods ready',
      '(3/3) migration: applying 1 resources, waiting up to 600s',
      '[PASS] migration: APPLIED_READY in 0.0s - job database-migration-job complete (1 succeeded)',
      '',
      'Run COMPLETED',
      'Groups passed: 3',
      'Warnings: 0',
      'Groups failed: 0',
      'Total attempted: 3 of 3',
    ]);
  });

  it('should print the logs of a migration job that failed', async () => {
    const { ctx, cluster, lines } = createTestContext();
    cluster.pods = [readyPod('postgres-0', { app: 'postgres' })];
    cluster.jobs.set('database-migration-job', {
      ...jobSnapshot('database-migration-job', 'Failed'),
      namespace: 'jobs',
    });
    cluster.jobLogs.set('database-migration-job', 'Running migrations\nERROR: relation "users" already exists\n');

    const exitCode = await runDeploy(ctx);

    expect(exitCode).toBe(0);
    expect(lines).toContain('[WARN] migration: FAILED_APPLY in 0.0s - job database-migration-job failed: 1 failed pods');
    expect(lines.slice(-5)).toEqual([
      'Total attempted: 3 of 3',
      '',
      'Logs of job database-migration-job (group migration):',
      '  Running migrations',
      '  ERROR: relation "users" already exists',
    ]);
  });

  it('should exit 1 when a group fails under ABORT', async () => {
    const { ctx, cluster, lines } = createTestContext();
    cluster.rejections.set('backend-config', Object.assign(new Error('invalid'), { statusCode: 422 }));

    const exitCode = await runDeploy(ctx);

    expect(exitCode).toBe(1);
    expect(lines).toContain('[FAIL] config: FAILED_APPLY in 0.0s - 1 of 2 resources rejected: ConfigMap/backend-config');
    expect(lines.slice(-2)).toEqual(['Total attempted: 1 of 3', 'Not attempted: database, migration']);
  });

  it('should exit 1 when cancelled', async () => {
    const { ctx, cluster, lines } = createTestContext();
    const controller = new AbortController();
    controller.abort();

    const exitCode = await runDeploy(ctx, controller.signal);

    expect(exitCode).toBe(1);
    expect(lines).toContain('Run CANCELLED');
    expect(cluster.applyCalls).toHaveLength(0);
  });

  it('should surface stack file problems as configuration errors', async () => {
    const { ctx } = createTestContext('/nonexistent/stack.yaml');

    await expect(runDeploy(ctx)).rejects.toBeInstanceOf(ConfigurationError);
  });
});
