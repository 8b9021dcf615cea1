import { describe, it, expect } from 'vitest';
import { deploymentSnapshot } from '../../../../tests/mocks/fake-cluster.js';
import { createTestContext } from '../../../../tests/mocks/command-context.js';
import { parseValidationMode, runValidate } from './validate.js';

describe('parseValidationMode', () => {
  it('should default to full', () => {
    expect(parseValidationMode(undefined)).toBe('full');
  });

  it('should reject unknown modes', () => {
    expect(() => parseValidationMode('deep')).toThrow('Unknown validation mode "deep" (expected full, quick, report)');
  });
});

describe('runValidate', () => {
  it('should pass with warnings in full mode', async () => {
    const { ctx, cluster, lines } = createTestContext();
    cluster.deployments.set('postgres-deployment', deploymentSnapshot('postgres-deployment', 1, 1));

    const exitCode = await runValidate(ctx, 'full');

    expect(exitCode).toBe(0);
    expect(lines.slice(-4)).toEqual(['Tests Passed: 2', 'Warnings: 1', 'Tests Failed: 0', 'Total Tests: 3']);
  });

  it('should exit 1 when a check fails', async () => {
    const { ctx, lines } = createTestContext();

    const exitCode = await runValidate(ctx, 'quick');

    expect(exitCode).toBe(1);
    expect(lines).toContain('[FAIL] deployment/postgres-deployment: not found');
  });

  it('should print the cluster report without loading the stack', async () => {
    const { ctx, lines } = createTestContext('/nonexistent/stack.yaml');

    const exitCode = await runValidate(ctx, 'report');

    expect(exitCode).toBe(0);
    expect(lines.slice(0, 4)).toEqual([
      'Cluster report for namespace production',
      'Server version: v1.29.2',
      'Nodes: 0',
      'Namespaces: 0',
    ]);
  });
});
