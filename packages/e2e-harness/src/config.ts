import { z } from 'zod';
import { envParsers, loadEnvConfig, type EnvSource } from '@flowbench/shared';

export const DEFAULT_BUS_PORT = 6390;
export const DEFAULT_STORE_PORT = 55432;

const harnessEnvSchema = z
  .object({
    FLOWBENCH_E2E_NAME: envParsers.string(),
    FLOWBENCH_E2E_ROOT: envParsers.path(),
    FLOWBENCH_E2E_BUS_PORT: envParsers.port({ defaultPort: DEFAULT_BUS_PORT }),
    FLOWBENCH_E2E_STORE_PORT: envParsers.port({ defaultPort: DEFAULT_STORE_PORT }),
    FLOWBENCH_STRICT: envParsers.boolean({ defaultValue: false })
  })
  .transform((env) => ({
    pinnedName: env.FLOWBENCH_E2E_NAME ?? null,
    baseDir: env.FLOWBENCH_E2E_ROOT ?? null,
    busPort: env.FLOWBENCH_E2E_BUS_PORT ?? DEFAULT_BUS_PORT,
    storePort: env.FLOWBENCH_E2E_STORE_PORT ?? DEFAULT_STORE_PORT,
    strict: env.FLOWBENCH_STRICT ?? false
  }));

export type HarnessConfig = z.infer<typeof harnessEnvSchema>;

export function loadHarnessConfig(env: EnvSource = process.env): HarnessConfig {
  return loadEnvConfig(harnessEnvSchema, { env, context: 'e2e-harness' });
}

/**
 * Strict mode disables every fallback when locating dependent binaries. Binary
 * discovery itself lives outside the harness; this only exposes the switch.
 */
export function isStrictMode(env: EnvSource = process.env): boolean {
  return loadHarnessConfig(env).strict;
}
