/**
 * Configuration management for seqctl
 */

import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'node:path';

dotenvConfig({ path: resolve(process.cwd(), '.env') });

// Accepts true/false/1/0 rather than treating every non-empty string as true
const booleanFlag = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((value) => value === true || value === 'true' || value === '1');

const configSchema = z.object({
  nodeEnv: z.enum(['development', 'production', 'test']).default('production'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  kubernetes: z.object({
    /** Kubeconfig path (default: loadFromDefault resolution) */
    kubeconfig: z.string().min(1).optional(),
    /** Kubernetes context to use (default: current context) */
    context: z.string().min(1).optional(),
    /** Namespace used for documents and predicates that name none */
    namespace: z.string().min(1).default('production'),
    fieldManager: z.string().min(1).default('seqctl'),
    /** Server-side dry run for every write */
    dryRun: booleanFlag.default(false),
  }),

  sequencer: z.object({
    stackFile: z.string().min(1).default('deploy/stack.yaml'),
    pollIntervalMs: z.coerce.number().int().min(500).max(5000).default(2000),
    applyMaxAttempts: z.coerce.number().int().min(1).max(10).default(3),
    applyBackoffMs: z.coerce.number().int().min(0).default(1000),
  }),

  cleanup: z.object({
    podTimeoutSeconds: z.coerce.number().int().positive().default(180),
    pvcTimeoutSeconds: z.coerce.number().int().positive().default(120),
  }),
});

export type Config = z.infer<typeof configSchema>;

// Parse and validate configuration
function loadConfig(): Config {
  const rawConfig = {
    nodeEnv: process.env.NODE_ENV,
    logLevel: process.env.LOG_LEVEL,

    kubernetes: {
      kubeconfig: process.env.KUBECONFIG,
      context: process.env.K8S_CONTEXT,
      namespace: process.env.K8S_NAMESPACE,
      fieldManager: process.env.K8S_FIELD_MANAGER,
      dryRun: process.env.K8S_DRY_RUN,
    },

    sequencer: {
      stackFile: process.env.SEQCTL_STACK_FILE,
      pollIntervalMs: process.env.READINESS_POLL_INTERVAL_MS,
      applyMaxAttempts: process.env.APPLY_MAX_ATTEMPTS,
      applyBackoffMs: process.env.APPLY_BACKOFF_MS,
    },

    cleanup: {
      podTimeoutSeconds: process.env.CLEANUP_POD_TIMEOUT_SECONDS,
      pvcTimeoutSeconds: process.env.CLEANUP_PVC_TIMEOUT_SECONDS,
    },
  };

  return configSchema.parse(rawConfig);
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

// For testing - reset config
export function resetConfig(): void {
  configInstance = null;
}
