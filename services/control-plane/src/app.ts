import Fastify, { type FastifyInstance } from 'fastify';
import { createLogger, createSessionStore, type Logger, type SessionStore } from '@flowbench/shared';
import { loadServiceConfig, type ServiceConfig } from './config/serviceConfig';
import { mapErrorToResponse } from './errors';
import { buildPackIndex } from './packs/packIndex';
import { PackWatcher } from './packs/watcher';
import { registerPackRoutes } from './routes/packs';
import { registerRunnerRoutes } from './routes/runner';
import { registerSessionRoutes } from './routes/sessions';
import { registerSystemRoutes } from './routes/system';
import { RunnerEventProxy } from './runner/proxy';
import type { AppContext } from './types';

export type BuildAppOptions = {
  config?: ServiceConfig;
  sessionStore?: SessionStore;
  logger?: Logger;
  now?: () => number;
  packWatchDebounceMs?: number;
};

export async function buildApp(options?: BuildAppOptions): Promise<{
  app: FastifyInstance;
  config: ServiceConfig;
  proxy: RunnerEventProxy;
  sessionStore: SessionStore;
  packWatcher: PackWatcher | null;
}> {
  const config = options?.config ?? loadServiceConfig();
  const app = Fastify({
    logger: {
      level: config.logLevel
    }
  });

  const sessionStore = options?.sessionStore ?? (await createSessionStore(config.sessionStore, { now: options?.now }));
  const logger = options?.logger ?? createLogger({ name: 'control-plane', level: config.logLevel });
  const proxy = new RunnerEventProxy({
    logger,
    now: options?.now,
    initialIndex: await buildPackIndex(config.packsRoot),
    defaults: config.defaults
  });
  proxy.submit({ kind: 'emit', message: 'control plane started' });

  const packWatcher = config.packsWatch
    ? new PackWatcher({
        root: config.packsRoot,
        proxy,
        defaults: config.defaults,
        logger,
        debounceMs: options?.packWatchDebounceMs
      })
    : null;

  const ctx: AppContext = { config, sessionStore, proxy, packWatcher };

  app.setErrorHandler((error, request, reply) => {
    const mapped = mapErrorToResponse(error);
    if (mapped.statusCode >= 500) {
      request.log.error({ err: error }, 'Unhandled error');
    }
    reply.status(mapped.statusCode).send({ error: mapped.error, message: mapped.message, details: mapped.details });
  });

  await registerSystemRoutes(app, ctx);
  await registerPackRoutes(app, ctx);
  await registerRunnerRoutes(app, ctx);
  await registerSessionRoutes(app, ctx);

  app.addHook('onClose', async () => {
    await packWatcher?.close();
    await proxy.stop();
  });

  return { app, config, proxy, sessionStore, packWatcher };
}
