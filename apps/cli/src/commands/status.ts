import { collectStatus, formatStatus } from '@seqctl/core';
import { EXIT_CODES, type CommandContext } from '../context.js';

export async function runStatus(ctx: CommandContext): Promise<number> {
  const status = await collectStatus(ctx.cluster, ctx.namespace);
  formatStatus(status).forEach((line) => ctx.out(line));

  return status.sections.some((section) => section.error) ? EXIT_CODES.FAILURE : EXIT_CODES.SUCCESS;
}
