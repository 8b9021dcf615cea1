/**
 * Shared command wiring: configuration, cluster client, stack loading and exit codes
 */

import { ZodError } from 'zod';
import {
  ConfigurationError,
  getConfig,
  setLogLevel,
  type Config,
  type LogLevel,
} from '@seqctl/shared';
import { K8sClusterClient, type ClusterApi } from '@seqctl/kubernetes';
import { loadStack, type Clock, type Stack } from '@seqctl/core';

export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURE: 1,
  CONFIGURATION: 2,
} as const;

export type GlobalOptions = {
  stack?: string;
  namespace?: string;
  context?: string;
  kubeconfig?: string;
  logLevel?: LogLevel;
};

export interface CommandContext {
  config: Config;
  cluster: ClusterApi;
  /** --namespace, else K8S_NAMESPACE; used by commands that need no stack file */
  namespace: string;
  loadStack: () => Promise<Stack>;
  /** Human-readable output (stdout) */
  out: (line: string) => void;
  clock?: Clock;
}

export function createContext(options: GlobalOptions, overrides: { dryRun?: boolean } = {}): CommandContext {
  const config = getConfig();
  if (options.logLevel) {
    setLogLevel(options.logLevel);
  }

  const cluster = new K8sClusterClient({
    kubeconfig: options.kubeconfig ?? config.kubernetes.kubeconfig,
    context: options.context ?? config.kubernetes.context,
    fieldManager: config.kubernetes.fieldManager,
    dryRun: overrides.dryRun ?? config.kubernetes.dryRun,
  });

  return {
    config,
    cluster,
    namespace: options.namespace ?? config.kubernetes.namespace,
    loadStack: () =>
      loadStack(options.stack ?? config.sequencer.stackFile, {
        namespace: options.namespace,
        defaultNamespace: config.kubernetes.namespace,
      }),
    out: (line) => process.stdout.write(`${line}\n`),
  };
}

/**
 * Exit code for an error that escaped a command
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigurationError || error instanceof ZodError) {
    return EXIT_CODES.CONFIGURATION;
  }
  return EXIT_CODES.FAILURE;
}

export function describeCommandError(error: unknown): string {
  if (error instanceof ZodError) {
    const issues = error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    return `Invalid configuration: ${issues.join('; ')}`;
  }
  if (error instanceof ConfigurationError) {
    return `Configuration error: ${error.message}`;
  }
  return error instanceof Error ? `Error: ${error.message}` : `Error: ${String(error)}`;
}
