import {
  formatForceCleanupReport,
  formatRemainingResources,
  formatTeardownReport,
  hasRemainingResources,
  Teardown,
} from '@seqctl/core';
import { ConfigurationError } from '@seqctl/shared';
import { EXIT_CODES, type CommandContext } from '../context.js';

export interface CleanupOptions {
  /** Skip the confirmation prompt */
  yes?: boolean;
  /** Only list what is left behind; deletes nothing */
  check?: boolean;
  /** Force delete stuck pods, clear finalizers and force delete the stack's namespaces */
  force?: boolean;
  confirm: (question: string) => Promise<boolean>;
}

/**
 * Default mode tears the stack down in reverse order. `check` and `force`
 * both finish with the remaining-resources listing and exit 1 while anything
 * is left.
 */
export async function runCleanup(ctx: CommandContext, options: CleanupOptions, signal?: AbortSignal): Promise<number> {
  if (options.check && options.force) {
    throw new ConfigurationError('--check and --force cannot be combined');
  }
  const stack = await ctx.loadStack();

  const teardown = new Teardown(
    { cluster: ctx.cluster, clock: ctx.clock },
    {
      namespace: stack.namespace,
      podTimeoutSeconds: ctx.config.cleanup.podTimeoutSeconds,
      pvcTimeoutSeconds: ctx.config.cleanup.pvcTimeoutSeconds,
      pollIntervalMs: ctx.config.sequencer.pollIntervalMs,
    }
  );

  const showRemaining = async (): Promise<number> => {
    const remaining = await teardown.inspect(stack.groups, { signal });
    formatRemainingResources(remaining).forEach((line) => ctx.out(line));
    return hasRemainingResources(remaining) ? EXIT_CODES.FAILURE : EXIT_CODES.SUCCESS;
  };

  if (options.check) {
    return showRemaining();
  }

  if (!options.yes) {
    const question = options.force
      ? `Force delete everything left of stack ${stack.name} in namespace ${stack.namespace}, bypassing finalizers?`
      : `Delete all ${stack.groups.length} groups of stack ${stack.name} from namespace ${stack.namespace}?`;
    if (!(await options.confirm(question))) {
      ctx.out('Cleanup cancelled');
      return EXIT_CODES.SUCCESS;
    }
  }

  if (options.force) {
    const report = await teardown.force(stack.groups, { signal });
    formatForceCleanupReport(report).forEach((line) => ctx.out(line));
    ctx.out('');
    return showRemaining();
  }

  teardown.on('wait:started', ({ target, timeoutSeconds }) => {
    ctx.out(`Waiting up to ${timeoutSeconds}s for ${target} in ${stack.namespace} to go away`);
  });

  const report = await teardown.run(stack.groups, { signal });
  formatTeardownReport(report).forEach((line) => ctx.out(line));

  return report.cancelled ? EXIT_CODES.FAILURE : EXIT_CODES.SUCCESS;
}
