import type { FastifyInstance } from 'fastify';
import {
  buildSessionFilter,
  jsonValueSchema,
  mergeSessionFilters,
  normalizeStringValue,
  requireSession
} from '@flowbench/shared';
import { HttpError } from '../errors';
import {
  normalizeUpsertPayload,
  sessionFilterInputSchema,
  sessionUpsertRequestSchema,
  toSessionView
} from '../sessions/normalize';
import type { AppContext } from '../types';

const resumeBodySchema = sessionFilterInputSchema.extend({
  payload: jsonValueSchema.optional()
});

export async function registerSessionRoutes(app: FastifyInstance, ctx: AppContext): Promise<void> {
  const defaults = ctx.config.defaults;

  app.get('/sessions', async (request) => {
    const query = sessionFilterInputSchema.parse(request.query);
    const records = await ctx.sessionStore.list(buildSessionFilter(query, defaults));
    const sessions = records.map(toSessionView);
    return { count: sessions.length, sessions };
  });

  app.post('/sessions', async (request) => {
    const body = sessionUpsertRequestSchema.parse(request.body ?? {});
    const record = await ctx.sessionStore.upsert(normalizeUpsertPayload(body, defaults));
    return toSessionView(record);
  });

  app.delete('/sessions', async (request) => {
    const query = sessionFilterInputSchema.parse(request.query);
    const body = sessionFilterInputSchema.optional().parse(request.body ?? undefined);
    const filter = buildSessionFilter(mergeSessionFilters(query, body), defaults);
    const removed = await ctx.sessionStore.purge(filter);
    request.log.info({ removed, filter }, 'purged sessions');
    return { removed };
  });

  app.post('/sessions/resume', async (request) => {
    const body = resumeBodySchema.parse(request.body ?? {});
    const user = normalizeStringValue(body.user);
    if (!user) {
      throw new HttpError(400, 'invalid_request', 'user is required');
    }
    const tenant = normalizeStringValue(body.tenant) ?? defaults.tenant;
    const session = await requireSession(ctx.sessionStore, {
      tenant,
      team: normalizeStringValue(body.team) ?? defaults.team,
      user
    });
    if (!session.flowId) {
      throw new HttpError(400, 'invalid_request', `session ${session.key} has no flow cursor`);
    }

    await ctx.sessionStore.remove(session.key);
    return ctx.proxy.emitActivity({
      flow: session.flowId,
      tenant,
      team: session.team,
      user,
      payload: body.payload ?? null
    });
  });
}
