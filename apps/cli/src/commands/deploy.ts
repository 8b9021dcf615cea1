import { createChildLogger } from '@seqctl/shared';
import {
  collectRunDiagnostics,
  formatGroupResult,
  formatRunDiagnostics,
  formatRunSummary,
  runExitCode,
  Sequencer,
} from '@seqctl/core';
import type { CommandContext } from '../context.js';

const logger = createChildLogger({ component: 'DeployCommand' });

/**
 * Apply every group of the stack in order. Aborting the signal cancels the
 * run at the next group boundary or readiness poll.
 */
export async function runDeploy(ctx: CommandContext, signal?: AbortSignal): Promise<number> {
  const stack = await ctx.loadStack();
  const { sequencer: settings } = ctx.config;

  const sequencer = new Sequencer(
    { cluster: ctx.cluster, clock: ctx.clock },
    {
      namespace: stack.namespace,
      applyMaxAttempts: settings.applyMaxAttempts,
      applyBackoffMs: settings.applyBackoffMs,
      pollIntervalMs: settings.pollIntervalMs,
    }
  );

  const total = stack.groups.length;
  sequencer.on('group:started', ({ group, index }) => {
    const wait = group.readinessCheck ? `, waiting up to ${group.readinessCheck.timeoutSeconds}s` : '';
    ctx.out(`(${index + 1}/${total}) ${group.name}: applying ${group.resources.length} resources${wait}`);
  });
  sequencer.on('group:completed', ({ result }) => ctx.out(formatGroupResult(result)));

  ctx.out(`Deploying stack ${stack.name} to namespace ${stack.namespace}`);
  const run = await sequencer.run(stack.groups, { signal });

  ctx.out('');
  formatRunSummary(run).forEach((line) => ctx.out(line));

  const diagnostics = await collectRunDiagnostics(run, {
    cluster: ctx.cluster,
    namespace: stack.namespace,
    clock: ctx.clock,
  });
  const details = formatRunDiagnostics(diagnostics);
  if (details.length > 0) {
    ctx.out('');
    details.forEach((line) => ctx.out(line));
  }

  logger.info({ runId: run.id, status: run.status }, 'Deploy finished');
  return runExitCode(run);
}
