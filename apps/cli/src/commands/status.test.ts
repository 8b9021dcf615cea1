import { describe, it, expect } from 'vitest';
import { createTestContext } from '../../../../tests/mocks/command-context.js';
import { runStatus } from './status.js';

describe('runStatus', () => {
  it('should list each kind in the namespace', async () => {
    const { ctx, cluster, lines } = createTestContext();
    cluster.listings.set('Deployment', [{ name: 'backend-deployment', detail: '2/2 ready' }]);

    const exitCode = await runStatus(ctx);

    expect(exitCode).toBe(0);
    expect(lines[0]).toBe('Status of namespace production');
    expect(lines).toContain('  backend-deployment (2/2 ready)');
  });

  it('should exit 1 when listings fail', async () => {
    const { ctx, cluster, lines } = createTestContext();
    cluster.readError = new Error('connection refused');

    const exitCode = await runStatus(ctx);

    expect(exitCode).toBe(1);
    expect(lines).toContain('Deployment: listing failed: connection refused');
  });
});
