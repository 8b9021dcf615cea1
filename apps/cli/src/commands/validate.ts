import { ConfigurationError, VALIDATION_MODES, type ValidationMode } from '@seqctl/shared';
import {
  buildClusterReport,
  ClusterValidator,
  formatClusterReport,
  formatValidationReport,
} from '@seqctl/core';
import { EXIT_CODES, type CommandContext } from '../context.js';

const MODES: readonly ValidationMode[] = Object.values(VALIDATION_MODES);

export function parseValidationMode(value: string | undefined): ValidationMode {
  const mode = MODES.find((candidate) => candidate === (value ?? VALIDATION_MODES.FULL));
  if (!mode) {
    throw new ConfigurationError(`Unknown validation mode "${value}" (expected ${MODES.join(', ')})`);
  }
  return mode;
}

/**
 * `full` and `quick` check the stack's expectations; `report` describes the
 * namespace without judging it.
 */
export async function runValidate(ctx: CommandContext, modeArgument?: string): Promise<number> {
  const mode = parseValidationMode(modeArgument);

  if (mode === VALIDATION_MODES.REPORT) {
    const report = await buildClusterReport(ctx.cluster, ctx.namespace);
    formatClusterReport(report).forEach((line) => ctx.out(line));
    return EXIT_CODES.SUCCESS;
  }

  const stack = await ctx.loadStack();
  const validator = new ClusterValidator(ctx.cluster, stack.namespace);
  const report = await validator.validate(stack.validation, mode);
  formatValidationReport(report).forEach((line) => ctx.out(line));

  return report.summary.failed > 0 ? EXIT_CODES.FAILURE : EXIT_CODES.SUCCESS;
}
