import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { jsonValueSchema, normalizeStringValue } from '@flowbench/shared';
import type { AppContext } from '../types';

const emitBodySchema = z.object({
  flow: z.string().trim().min(1),
  tenant: z.string().nullable().optional(),
  team: z.string().nullable().optional(),
  user: z.string().nullable().optional(),
  payload: jsonValueSchema.optional()
});

export async function registerRunnerRoutes(app: FastifyInstance, ctx: AppContext): Promise<void> {
  app.get('/runner/events', async () => {
    await ctx.proxy.whenIdle();
    return ctx.proxy.events();
  });

  app.delete('/runner/events', async (_request, reply) => {
    await ctx.proxy.clearEvents();
    return reply.status(204).send();
  });

  app.post('/runner/emit', async (request) => {
    const body = emitBodySchema.parse(request.body);
    return ctx.proxy.emitActivity({
      flow: body.flow,
      tenant: normalizeStringValue(body.tenant) ?? ctx.config.defaults.tenant,
      team: normalizeStringValue(body.team) ?? ctx.config.defaults.team,
      user: normalizeStringValue(body.user),
      payload: body.payload ?? null
    });
  });
}
