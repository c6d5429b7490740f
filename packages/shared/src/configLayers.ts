import { mergeJson, type JsonValue } from './json';

export type ConfigLayers = {
  defaults: JsonValue;
  user?: JsonValue | null;
  project?: JsonValue | null;
  env?: JsonValue | null;
  cli?: JsonValue | null;
};

export const CONFIG_LAYER_ORDER = ['user', 'project', 'env', 'cli'] as const;

/**
 * Merges configuration layers with precedence defaults < user < project < env < cli.
 * Absent layers are skipped.
 */
export function mergeConfigLayers(layers: ConfigLayers): JsonValue {
  let merged = layers.defaults;
  for (const name of CONFIG_LAYER_ORDER) {
    const layer = layers[name];
    if (layer === undefined || layer === null) {
      continue;
    }
    merged = mergeJson(merged, layer);
  }
  return merged;
}

export type SecretCheck = {
  required: string[];
  provided: string[];
  missing: string[];
};

export class MissingSecretError extends Error {
  readonly required: string[];
  readonly provided: string[];
  readonly missing: string[];

  constructor(check: SecretCheck) {
    super(
      `missing secrets: ${check.missing.join(', ')}. Remedy: set via CLI/env/config/secret store`
    );
    this.name = 'MissingSecretError';
    this.required = check.required;
    this.provided = check.provided;
    this.missing = check.missing;
  }
}

export function checkSecrets(
  required: readonly string[],
  secrets: Readonly<Record<string, string | undefined>>
): SecretCheck {
  const provided: string[] = [];
  const missing: string[] = [];
  for (const key of required) {
    const value = Object.prototype.hasOwnProperty.call(secrets, key) ? secrets[key] : undefined;
    if (typeof value === 'string' && value.trim().length > 0) {
      provided.push(key);
    } else {
      missing.push(key);
    }
  }
  return { required: [...required], provided, missing };
}

/**
 * Throws MissingSecretError listing every missing key rather than stopping at the
 * first one.
 */
export function applySecrets(
  required: readonly string[],
  secrets: Readonly<Record<string, string | undefined>>
): SecretCheck {
  const check = checkSecrets(required, secrets);
  if (check.missing.length > 0) {
    throw new MissingSecretError(check);
  }
  return check;
}
