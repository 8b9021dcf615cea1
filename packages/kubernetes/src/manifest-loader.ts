/**
 * Manifest loading
 * Reads multi-document YAML files and directories the way `kubectl apply -f` does
 */

import { readFile, readdir, stat } from 'node:fs/promises';
import { extname, join } from 'node:path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigurationError, getErrorMessage } from '@seqctl/shared';
import type { ManifestDocument } from './types.js';

const MANIFEST_EXTENSIONS = new Set(['.yaml', '.yml']);

// Well-formedness only; semantic validation is the API server's job
const manifestSchema = z
  .object({
    apiVersion: z.string().min(1),
    kind: z.string().min(1),
    metadata: z
      .object({
        name: z.string().min(1),
        namespace: z.string().min(1).optional(),
      })
      .passthrough(),
  })
  .passthrough();

/**
 * Parse a YAML stream into documents. Empty documents (e.g. a trailing `---`) are skipped.
 */
export function parseManifests(text: string, source: string): ManifestDocument[] {
  let raw: unknown[];
  try {
    raw = yaml.loadAll(text);
  } catch (error) {
    throw new ConfigurationError(`Invalid YAML in ${source}: ${getErrorMessage(error)}`, { source });
  }

  const documents: ManifestDocument[] = [];
  raw.forEach((doc, index) => {
    if (doc === null || doc === undefined) {
      return;
    }
    const parsed = manifestSchema.safeParse(doc);
    if (!parsed.success) {
      const issues = parsed.error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`);
      throw new ConfigurationError(
        `Malformed manifest #${index + 1} in ${source}: ${issues.join('; ')}`,
        { source, documentIndex: index }
      );
    }
    documents.push(parsed.data);
  });

  return documents;
}

export async function loadManifestFile(path: string): Promise<ManifestDocument[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read manifest ${path}: ${getErrorMessage(error)}`, { path });
  }
  return parseManifests(text, path);
}

/**
 * Load files and directories in the given order. A directory contributes its
 * *.yaml / *.yml files (non-recursive) in lexical order.
 */
export async function loadManifests(paths: readonly string[]): Promise<ManifestDocument[]> {
  const documents: ManifestDocument[] = [];

  for (const path of paths) {
    let isDirectory: boolean;
    try {
      isDirectory = (await stat(path)).isDirectory();
    } catch (error) {
      throw new ConfigurationError(`Manifest path not found: ${path} (${getErrorMessage(error)})`, { path });
    }

    if (!isDirectory) {
      documents.push(...(await loadManifestFile(path)));
      continue;
    }

    const entries = (await readdir(path))
      .filter((entry) => MANIFEST_EXTENSIONS.has(extname(entry)))
      .sort();
    for (const entry of entries) {
      documents.push(...(await loadManifestFile(join(path, entry))));
    }
  }

  return documents;
}
