/**
 * Stack definition files
 *
 * A stack file names the resource groups of an application in deployment
 * order, the manifests each group applies, and what `validate` should expect
 * to find once the stack is up.
 */

import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import {
  ConfigurationError,
  createChildLogger,
  FAILURE_POLICIES,
  getErrorMessage,
  READINESS_KINDS,
} from '@seqctl/shared';
import { loadManifests } from '@seqctl/kubernetes';
import { createResourceGroup, validateGroupSequence } from '../model/resource-group.js';
import type { ReadinessPredicate, ResourceGroup } from '../model/types.js';
import type { ValidationTargets } from '../validation/types.js';

const logger = createChildLogger({ component: 'StackLoader' });

// ===========================================
// Schema
// ===========================================

const timeoutSeconds = z.number().int().positive();
const optionalNamespace = z.string().min(1).optional();

const readinessSchema = z.discriminatedUnion('kind', [
  z
    .object({
      kind: z.literal(READINESS_KINDS.PODS_READY),
      labelSelector: z.string().min(1),
      namespace: optionalNamespace,
      timeoutSeconds,
    })
    .strict(),
  z
    .object({
      kind: z.literal(READINESS_KINDS.DEPLOYMENT_ROLLED_OUT),
      name: z.string().min(1),
      namespace: optionalNamespace,
      timeoutSeconds,
    })
    .strict(),
  z
    .object({
      kind: z.literal(READINESS_KINDS.JOB_COMPLETE),
      name: z.string().min(1),
      namespace: optionalNamespace,
      timeoutSeconds,
    })
    .strict(),
  z
    .object({
      kind: z.literal(READINESS_KINDS.PVC_BOUND),
      names: z.array(z.string().min(1)).min(1),
      namespace: optionalNamespace,
      timeoutSeconds,
    })
    .strict(),
]);

const groupSchema = z
  .object({
    name: z.string().min(1),
    /** Files or directories, relative to the stack file */
    manifests: z.array(z.string().min(1)).min(1),
    readiness: readinessSchema.optional(),
    onFailure: z.nativeEnum(FAILURE_POLICIES).default(FAILURE_POLICIES.ABORT),
  })
  .strict();

const nameList = z.array(z.string().min(1)).default([]);

const validationSchema = z
  .object({
    namespaces: nameList,
    persistentVolumes: nameList,
    persistentVolumeClaims: nameList,
    deployments: nameList,
    services: nameList,
    apps: nameList,
    ingresses: nameList,
    horizontalPodAutoscalers: nameList,
    jobs: nameList,
    cronJobs: nameList,
    secrets: nameList,
    nonRootApps: nameList,
    requireNetworkPolicies: z.boolean().default(false),
  })
  .strict();

const stackSchema = z
  .object({
    name: z.string().min(1),
    namespace: optionalNamespace,
    groups: z.array(groupSchema).min(1),
    validation: validationSchema.default({}),
  })
  .strict();

export type StackDefinition = z.infer<typeof stackSchema>;

// ===========================================
// Types
// ===========================================

export interface Stack {
  name: string;
  namespace: string;
  /** Directory manifest paths were resolved against */
  baseDir: string;
  groups: ResourceGroup[];
  validation: ValidationTargets;
}

export interface LoadStackOptions {
  /** Overrides the stack file's namespace (CLI --namespace) */
  namespace?: string;
  /** Used when neither the override nor the stack file names one */
  defaultNamespace?: string;
}

// ===========================================
// Loading
// ===========================================

/**
 * Validate a parsed stack document. Throws ConfigurationError listing every issue.
 */
export function parseStackDefinition(raw: unknown, source: string): StackDefinition {
  const parsed = stackSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`);
    throw new ConfigurationError(`Invalid stack file ${source}: ${issues.join('; ')}`, { source });
  }
  return parsed.data;
}

export async function loadStack(path: string, options: LoadStackOptions = {}): Promise<Stack> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read stack file ${path}: ${getErrorMessage(error)}`, { path });
  }

  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (error) {
    throw new ConfigurationError(`Invalid YAML in ${path}: ${getErrorMessage(error)}`, { path });
  }

  const definition = parseStackDefinition(raw, path);
  const namespace = options.namespace ?? definition.namespace ?? options.defaultNamespace ?? 'default';
  const baseDir = dirname(resolve(path));

  const groups: ResourceGroup[] = [];
  for (const group of definition.groups) {
    const resources = await loadManifests(group.manifests.map((manifest) => resolve(baseDir, manifest)));
    groups.push(
      createResourceGroup({
        name: group.name,
        resources,
        readinessCheck: group.readiness && withNamespace(group.readiness, namespace),
        onFailure: group.onFailure,
      })
    );
  }
  validateGroupSequence(groups);

  logger.debug({
    stack: definition.name,
    namespace,
    groups: groups.map((g) => `${g.name} (${g.resources.length})`),
  }, 'Stack loaded');

  return {
    name: definition.name,
    namespace,
    baseDir,
    groups,
    validation: definition.validation,
  };
}

type ReadinessDefinition = z.infer<typeof readinessSchema>;

function withNamespace(readiness: ReadinessDefinition, namespace: string): ReadinessPredicate {
  return { ...readiness, namespace: readiness.namespace ?? namespace };
}
