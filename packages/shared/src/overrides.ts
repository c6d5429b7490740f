import { mergeJson, type JsonValue } from './json';

export const OVERRIDE_SEPARATOR = ':';

export type OverrideSelectors = {
  tenant?: string | null;
  team?: string | null;
  user?: string | null;
};

export type IndexedEntry = {
  id: string;
  name: string | null;
  kind: string | null;
  path: string;
};

export type OverrideResolution<T> = {
  matched: T[];
  matchedKeys: string[];
  missingKeys: string[];
};

/**
 * Candidate keys from most to least specific. Team and user only contribute when
 * the selectors above them are present.
 */
export function buildOverrideKeys(selectors: OverrideSelectors): string[] {
  const { tenant, team, user } = selectors;
  if (!tenant) {
    return [];
  }
  const keys: string[] = [];
  if (team) {
    if (user) {
      keys.push([tenant, team, user].join(OVERRIDE_SEPARATOR));
    }
    keys.push([tenant, team].join(OVERRIDE_SEPARATOR));
  }
  keys.push(tenant);
  return keys;
}

/**
 * When no candidate key matches, the whole unfiltered collection comes back
 * together with the missing keys: "no override applies" means "use the defaults".
 */
export function resolveOverrides<T extends { id: string }>(
  entries: readonly T[],
  selectors: OverrideSelectors
): OverrideResolution<T> {
  const keys = buildOverrideKeys(selectors);
  if (keys.length === 0) {
    return { matched: [...entries], matchedKeys: [], missingKeys: [] };
  }

  const matched: T[] = [];
  const matchedKeys: string[] = [];
  const missingKeys: string[] = [];
  for (const key of keys) {
    const entry = entries.find((candidate) => candidate.id === key);
    if (entry) {
      matched.push(entry);
      matchedKeys.push(key);
    } else {
      missingKeys.push(key);
    }
  }

  if (matched.length === 0) {
    return { matched: [...entries], matchedKeys: [], missingKeys };
  }
  return { matched, matchedKeys, missingKeys };
}

export type ConfigOverrideEntry = {
  id: string;
  value: JsonValue;
};

export type ConfigOverrideResult = {
  value: JsonValue;
  appliedKeys: string[];
  missingKeys: string[];
};

/**
 * Layers the matched override documents over `base`, least specific first. A total
 * miss leaves `base` untouched instead of merging every entry.
 */
export function resolveConfigOverrides(
  base: JsonValue,
  entries: readonly ConfigOverrideEntry[],
  selectors: OverrideSelectors
): ConfigOverrideResult {
  const resolution = resolveOverrides(entries, selectors);
  if (resolution.matchedKeys.length === 0) {
    return { value: base, appliedKeys: [], missingKeys: resolution.missingKeys };
  }
  let value = base;
  for (const entry of [...resolution.matched].reverse()) {
    value = mergeJson(value, entry.value);
  }
  return { value, appliedKeys: resolution.matchedKeys, missingKeys: resolution.missingKeys };
}
