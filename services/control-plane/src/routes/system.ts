import type { FastifyInstance } from 'fastify';
import type { AppContext } from '../types';

export async function registerSystemRoutes(app: FastifyInstance, ctx: AppContext): Promise<void> {
  app.get('/healthz', async () => {
    const snapshot = ctx.proxy.index();
    return {
      status: 'ok',
      packs: snapshot.entries.length,
      sessionBackend: ctx.sessionStore.backend,
      packWatcher: ctx.packWatcher?.state ?? 'disabled'
    };
  });
}
