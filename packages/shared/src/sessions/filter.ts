import { normalizeStringValue } from '../json';
import type { SessionFilter, SessionRecord } from './types';

/**
 * Conjunctive match: every present filter field must equal the record field.
 * Only `undefined` and `null` count as absent; an empty string matches only an
 * empty field.
 */
export function matchesSessionFilter(filter: SessionFilter, record: SessionRecord): boolean {
  for (const field of ['tenant', 'team', 'user'] as const) {
    const expected = filter[field];
    if (expected !== undefined && expected !== null && record[field] !== expected) {
      return false;
    }
  }
  return true;
}

export type SessionFilterDefaults = {
  tenant?: string | null;
  team?: string | null;
};

/**
 * Trims the selectors and fills tenant/team from the defaults. User never has a
 * default.
 */
export function buildSessionFilter(
  input: SessionFilter,
  defaults: SessionFilterDefaults = {}
): SessionFilter {
  return {
    tenant: normalizeStringValue(input.tenant) ?? normalizeStringValue(defaults.tenant),
    team: normalizeStringValue(input.team) ?? normalizeStringValue(defaults.team),
    user: normalizeStringValue(input.user)
  };
}

/**
 * Later inputs override earlier ones field by field when they carry a value.
 */
export function mergeSessionFilters(...inputs: Array<SessionFilter | null | undefined>): SessionFilter {
  const merged: SessionFilter = {};
  for (const input of inputs) {
    if (!input) {
      continue;
    }
    for (const field of ['tenant', 'team', 'user'] as const) {
      const value = input[field];
      if (value !== undefined && value !== null) {
        merged[field] = value;
      }
    }
  }
  return merged;
}
