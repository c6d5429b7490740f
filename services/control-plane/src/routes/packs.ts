import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { normalizeStringValue } from '@flowbench/shared';
import { buildPackIndex, listPacks } from '../packs/packIndex';
import type { AppContext } from '../types';

const packQuerySchema = z.object({
  tenant: z.string().optional(),
  team: z.string().optional(),
  user: z.string().optional()
});

export async function registerPackRoutes(app: FastifyInstance, ctx: AppContext): Promise<void> {
  app.get('/packs', async (request) => {
    const query = packQuerySchema.parse(request.query);
    await ctx.proxy.whenIdle();
    const snapshot = ctx.proxy.index();
    return listPacks(snapshot.entries, {
      tenant: normalizeStringValue(query.tenant) ?? ctx.config.defaults.tenant,
      team: normalizeStringValue(query.team) ?? ctx.config.defaults.team,
      user: normalizeStringValue(query.user)
    });
  });

  app.post('/packs/reload', async (request) => {
    const index = await buildPackIndex(ctx.config.packsRoot);
    ctx.proxy.submit({ kind: 'reload-index', index, defaults: ctx.config.defaults });
    request.log.info({ packs: index.length, root: ctx.config.packsRoot }, 'pack index rebuilt');
    return listPacks(index, {
      tenant: ctx.config.defaults.tenant,
      team: ctx.config.defaults.team
    });
  });
}
