import { isDeepStrictEqual } from 'node:util';
import { z } from 'zod';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema)
  ])
);

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep object union with right-hand precedence. Only object/object pairs merge;
 * any other pairing (scalars, arrays, null) takes the overlay as-is. Keys are
 * defined as own properties, so `__proto__` from parsed JSON stays data.
 */
export function mergeJson(base: JsonValue, overlay: JsonValue): JsonValue {
  if (!isJsonObject(base) || !isJsonObject(overlay)) {
    return overlay;
  }
  const merged: JsonObject = {};
  for (const [key, value] of Object.entries(base)) {
    defineEntry(merged, key, value);
  }
  for (const [key, value] of Object.entries(overlay)) {
    const existing = Object.hasOwn(merged, key) ? merged[key] : undefined;
    defineEntry(merged, key, existing === undefined ? value : mergeJson(existing, value));
  }
  return merged;
}

function defineEntry(target: JsonObject, key: string, value: JsonValue): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

export function jsonEquals(left: JsonValue, right: JsonValue): boolean {
  return isDeepStrictEqual(left, right);
}

/**
 * Parses a bus payload as JSON, falling back to the raw string when it is not
 * valid JSON.
 */
export function parseJsonOrString(raw: string): JsonValue {
  try {
    const parsed: unknown = JSON.parse(raw);
    const result = jsonValueSchema.safeParse(parsed);
    return result.success ? result.data : raw;
  } catch {
    return raw;
  }
}

export function normalizeStringValue(value: unknown): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}
