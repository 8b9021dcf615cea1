/**
 * seqctl CLI
 * Deploy, inspect, validate and tear down a Kubernetes application stack
 */

import { readFileSync } from 'node:fs';
import { Command, Option } from 'commander';
import { z } from 'zod';
import { createChildLogger } from '@seqctl/shared';
import { runCleanup } from './commands/cleanup.js';
import { runDeploy } from './commands/deploy.js';
import { runStatus } from './commands/status.js';
import { runValidate } from './commands/validate.js';
import { createContext, describeCommandError, exitCodeFor, type GlobalOptions } from './context.js';
import { confirm } from './prompt.js';

const logger = createChildLogger({ component: 'cli' });

const packageJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8')));

async function execute(action: () => Promise<number>): Promise<void> {
  try {
    process.exitCode = await action();
  } catch (error) {
    logger.debug({ err: error }, 'Command failed');
    process.stderr.write(`${describeCommandError(error)}\n`);
    process.exitCode = exitCodeFor(error);
  }
}

/**
 * First Ctrl-C cancels cleanly; a second one falls through to the default handler.
 */
function interruptSignal(): AbortSignal {
  const controller = new AbortController();
  process.once('SIGINT', () => {
    process.stderr.write('\nCancelling after the current step...\n');
    controller.abort();
  });
  return controller.signal;
}

const program = new Command();

program
  .name('seqctl')
  .description('Ordered, readiness-aware deployment of a Kubernetes application stack')
  .version(packageJson.version)
  .option('-s, --stack <file>', 'stack definition file (default: SEQCTL_STACK_FILE or deploy/stack.yaml)')
  .option('-n, --namespace <namespace>', 'target namespace (overrides the stack file and K8S_NAMESPACE)')
  .option('--context <context>', 'kubeconfig context (default: current context)')
  .option('--kubeconfig <path>', 'kubeconfig file (default: KUBECONFIG or ~/.kube/config)')
  .addOption(new Option('--log-level <level>', 'log level for stderr logs').choices(['debug', 'info', 'warn', 'error']))
  .addHelpText(
    'after',
    `
Exit codes:
  0  success (warnings allowed)
  1  a group failed under ABORT, a check failed, or the run was cancelled
  2  invalid configuration or stack file

Environment Variables:
  K8S_NAMESPACE                  Default namespace (default: production)
  K8S_CONTEXT                    Kubeconfig context
  SEQCTL_STACK_FILE              Stack definition file
  READINESS_POLL_INTERVAL_MS     Readiness poll interval (500-5000)
  APPLY_MAX_ATTEMPTS             Apply attempts per group on transport errors
  LOG_LEVEL                      debug, info, warn, error
`
  );

const globals = (): GlobalOptions => program.opts<GlobalOptions>();

program
  .command('deploy')
  .description('apply each resource group in order, waiting for readiness between groups')
  .option('--dry-run', 'send every write as a server-side dry run')
  .action(async (options: { dryRun?: boolean }) => {
    await execute(() => runDeploy(createContext(globals(), { dryRun: options.dryRun }), interruptSignal()));
  });

program
  .command('status')
  .description('list the resources in the namespace')
  .action(async () => {
    await execute(() => runStatus(createContext(globals())));
  });

program
  .command('cleanup')
  .description('delete the stack in reverse order')
  .option('-y, --yes', 'do not ask for confirmation')
  .option('--check', 'only list the resources still present')
  .option('--force', 'force delete stuck pods and namespaces, clearing finalizers')
  .action(async (options: { yes?: boolean; check?: boolean; force?: boolean }) => {
    await execute(() =>
      runCleanup(
        createContext(globals()),
        { yes: options.yes, check: options.check, force: options.force, confirm },
        interruptSignal()
      )
    );
  });

program
  .command('validate')
  .description('check the deployed stack: full (default), quick, or report')
  .argument('[mode]', 'full, quick or report')
  .action(async (mode: string | undefined) => {
    await execute(() => runValidate(createContext(globals()), mode));
  });

await program.parseAsync(process.argv);
