/**
 * Batch apply semantics shared by every ClusterApi implementation
 *
 * Each document is applied independently (a rejected document does not stop
 * the rest), then the batch resolves to a single binary outcome.
 */

import { ApplyError, TransportError, type ResourceFailure } from '@seqctl/shared';
import { classifyClusterError } from './errors.js';
import { resolveNamespace, type AppliedResource, type ManifestDocument } from './types.js';

export type ApplyOne = (
  document: ManifestDocument,
  namespace: string | undefined
) => Promise<AppliedResource['action']>;

export async function applyBatch(
  documents: readonly ManifestDocument[],
  defaultNamespace: string,
  applyOne: ApplyOne
): Promise<AppliedResource[]> {
  const applied: AppliedResource[] = [];
  const rejected: ResourceFailure[] = [];
  const transient: TransportError[] = [];

  for (const document of documents) {
    const namespace = resolveNamespace(document, defaultNamespace);
    const identity = { kind: document.kind, name: document.metadata.name, namespace };

    try {
      const action = await applyOne(document, namespace);
      applied.push({ ...identity, action });
    } catch (error) {
      const classified = classifyClusterError(error, identity);
      if (classified instanceof TransportError) {
        transient.push(classified);
      } else if (classified.failures.length > 0) {
        rejected.push(...classified.failures);
      } else {
        rejected.push({ ...identity, message: classified.message });
      }
    }
  }

  if (rejected.length > 0) {
    const names = rejected.map((f) => `${f.kind}/${f.name}`).join(', ');
    throw new ApplyError(`${rejected.length} of ${documents.length} resources rejected: ${names}`, rejected, {
      appliedCount: applied.length,
      transientCount: transient.length,
    });
  }

  const firstTransient = transient[0];
  if (firstTransient) {
    throw new TransportError(
      `${transient.length} of ${documents.length} resources not applied: ${firstTransient.message}`,
      firstTransient.statusCode,
      { appliedCount: applied.length }
    );
  }

  return applied;
}
