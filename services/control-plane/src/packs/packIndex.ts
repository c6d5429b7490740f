import { existsSync } from 'node:fs';
import { readFile, readdir } from 'node:fs/promises';
import path from 'node:path';
import {
  isJsonObject,
  normalizeStringValue,
  parseJsonOrString,
  resolveOverrides,
  type IndexedEntry,
  type OverrideSelectors
} from '@flowbench/shared';

export const PACK_MANIFEST = 'pack.json';

export class PackManifestError extends Error {
  readonly manifestPath: string;

  constructor(manifestPath: string, reason: string) {
    super(`invalid pack manifest ${manifestPath}: ${reason}`);
    this.name = 'PackManifestError';
    this.manifestPath = manifestPath;
  }
}

export type PackListing = {
  count: number;
  packs: IndexedEntry[];
  resolvedKeys: string[];
  missingKeys: string[];
};

function readField(manifest: Record<string, unknown>, field: string): string | null {
  return normalizeStringValue(manifest[field]);
}

/**
 * Every direct subdirectory of `root` holding a pack.json becomes one entry. A
 * missing root is an empty index.
 */
export async function buildPackIndex(root: string): Promise<IndexedEntry[]> {
  if (!existsSync(root)) {
    return [];
  }

  const dirents = await readdir(root, { withFileTypes: true });
  const entries: IndexedEntry[] = [];
  for (const dirent of dirents.sort((a, b) => a.name.localeCompare(b.name))) {
    if (!dirent.isDirectory()) {
      continue;
    }
    const packPath = path.join(root, dirent.name);
    const manifestPath = path.join(packPath, PACK_MANIFEST);
    if (!existsSync(manifestPath)) {
      continue;
    }

    const raw = await readFile(manifestPath, 'utf8');
    const manifest = parseJsonOrString(raw);
    if (!isJsonObject(manifest)) {
      throw new PackManifestError(manifestPath, 'expected a JSON object');
    }

    entries.push({
      id: readField(manifest, 'id') ?? 'unknown',
      name: readField(manifest, 'name'),
      kind: readField(manifest, 'kind'),
      path: packPath
    });
  }
  return entries;
}

export function listPacks(entries: readonly IndexedEntry[], selectors: OverrideSelectors): PackListing {
  const resolution = resolveOverrides(entries, selectors);
  return {
    count: resolution.matched.length,
    packs: resolution.matched.map((entry) => ({ ...entry })),
    resolvedKeys: resolution.matchedKeys,
    missingKeys: resolution.missingKeys
  };
}
