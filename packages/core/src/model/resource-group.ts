/**
 * Resource group construction and sequence validation
 */

import { ConfigurationError, FAILURE_POLICIES, READINESS_KINDS } from '@seqctl/shared';
import type { ManifestDocument } from '@seqctl/kubernetes';
import { parseLabelSelector } from './label-selector.js';
import type { ReadinessPredicate, ResourceGroup, ResourceGroupInput } from './types.js';

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim() !== '';
}

function validateDocument(group: string, document: ManifestDocument, index: number): void {
  const missing = [
    isNonEmptyString(document.apiVersion) ? null : 'apiVersion',
    isNonEmptyString(document.kind) ? null : 'kind',
    isNonEmptyString(document.metadata.name) ? null : 'metadata.name',
  ].filter((field): field is string => field !== null);

  if (missing.length > 0) {
    throw new ConfigurationError(
      `Group "${group}" resource #${index + 1} is missing ${missing.join(', ')}`,
      { group }
    );
  }
}

/**
 * Validate a predicate on its own. `owner` prefixes error messages.
 */
export function validateReadinessPredicate(predicate: ReadinessPredicate, owner = 'Readiness check'): void {
  if (!Number.isInteger(predicate.timeoutSeconds) || predicate.timeoutSeconds <= 0) {
    throw new ConfigurationError(
      `${owner}: readiness timeoutSeconds must be a positive integer (got ${predicate.timeoutSeconds})`
    );
  }
  if (!isNonEmptyString(predicate.namespace)) {
    throw new ConfigurationError(`${owner}: readiness check has no namespace`);
  }

  switch (predicate.kind) {
    case READINESS_KINDS.PODS_READY:
      parseLabelSelector(predicate.labelSelector);
      break;
    case READINESS_KINDS.DEPLOYMENT_ROLLED_OUT:
    case READINESS_KINDS.JOB_COMPLETE:
      if (!isNonEmptyString(predicate.name)) {
        throw new ConfigurationError(`${owner}: ${predicate.kind} check has no resource name`);
      }
      break;
    case READINESS_KINDS.PVC_BOUND:
      if (predicate.names.length === 0 || !predicate.names.every(isNonEmptyString)) {
        throw new ConfigurationError(`${owner}: PVC_BOUND check needs at least one claim name`);
      }
      break;
  }
}

/**
 * Build an immutable group. Throws ConfigurationError on malformed input.
 */
export function createResourceGroup(input: ResourceGroupInput): ResourceGroup {
  if (!isNonEmptyString(input.name)) {
    throw new ConfigurationError('Resource group name must not be empty');
  }
  if (input.resources.length === 0) {
    throw new ConfigurationError(`Resource group "${input.name}" has no resources`, { group: input.name });
  }

  input.resources.forEach((document, index) => validateDocument(input.name, document, index));
  if (input.readinessCheck) {
    validateReadinessPredicate(input.readinessCheck, `Group "${input.name}"`);
  }

  return Object.freeze({
    name: input.name,
    resources: Object.freeze([...input.resources]),
    ...(input.readinessCheck && { readinessCheck: Object.freeze({ ...input.readinessCheck }) }),
    onFailure: input.onFailure ?? FAILURE_POLICIES.ABORT,
  });
}

/**
 * Check a whole sequence before anything is applied: each group valid and
 * names unique, since results are keyed by group name.
 */
export function validateGroupSequence(groups: readonly ResourceGroup[]): void {
  const seen = new Set<string>();

  for (const group of groups) {
    createResourceGroup(group);
    if (seen.has(group.name)) {
      throw new ConfigurationError(`Duplicate resource group name "${group.name}"`, { group: group.name });
    }
    seen.add(group.name);
  }
}
