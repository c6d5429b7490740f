import { z } from 'zod';
import {
  DEFAULT_SESSION_STORE_PATH,
  envParsers,
  loadEnvConfig,
  type EnvSource,
  type SessionStoreBackend
} from '@flowbench/shared';

export type ScopeDefaults = {
  tenant: string | null;
  team: string | null;
};

export type ServiceConfig = {
  host: string;
  port: number;
  logLevel: string;
  packsRoot: string;
  packsWatch: boolean;
  sessionStore: {
    backend: SessionStoreBackend;
    filePath: string;
  };
  defaults: ScopeDefaults;
};

const serviceEnvSchema = z
  .object({
    FLOWBENCH_HOST: envParsers.host({ defaultHost: '0.0.0.0' }),
    FLOWBENCH_PORT: envParsers.port({ defaultPort: 8080 }),
    FLOWBENCH_PACKS_ROOT: envParsers.path({ defaultValue: 'packs' }),
    FLOWBENCH_PACKS_WATCH: envParsers.boolean({ defaultValue: false }),
    FLOWBENCH_SESSION_BACKEND: envParsers.enum<SessionStoreBackend>(['memory', 'file'] as const, { defaultValue: 'file' }),
    FLOWBENCH_SESSION_STORE_PATH: envParsers.path({ defaultValue: DEFAULT_SESSION_STORE_PATH }),
    FLOWBENCH_DEFAULT_TENANT: envParsers.string(),
    FLOWBENCH_DEFAULT_TEAM: envParsers.string(),
    LOG_LEVEL: envParsers.string({ defaultValue: 'info', lowercase: true })
  })
  .transform(
    (env): ServiceConfig => ({
      host: env.FLOWBENCH_HOST ?? '0.0.0.0',
      port: env.FLOWBENCH_PORT ?? 8080,
      logLevel: env.LOG_LEVEL ?? 'info',
      packsRoot: env.FLOWBENCH_PACKS_ROOT ?? 'packs',
      packsWatch: env.FLOWBENCH_PACKS_WATCH ?? false,
      sessionStore: {
        backend: env.FLOWBENCH_SESSION_BACKEND ?? 'file',
        filePath: env.FLOWBENCH_SESSION_STORE_PATH ?? DEFAULT_SESSION_STORE_PATH
      },
      defaults: {
        tenant: env.FLOWBENCH_DEFAULT_TENANT ?? null,
        team: env.FLOWBENCH_DEFAULT_TEAM ?? null
      }
    })
  );

export function loadServiceConfig(env: EnvSource = process.env): ServiceConfig {
  return loadEnvConfig(serviceEnvSchema, { env, context: 'control-plane' });
}
