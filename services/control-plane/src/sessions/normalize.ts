import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import {
  jsonValueSchema,
  normalizeStringValue,
  type SessionCursor,
  type SessionRecord,
  type SessionUpsert
} from '@flowbench/shared';
import type { ScopeDefaults } from '../config/serviceConfig';
import { HttpError } from '../errors';

const optionalText = z.string().nullable().optional();

export const sessionFilterInputSchema = z.object({
  tenant: optionalText,
  team: optionalText,
  user: optionalText
});

export type SessionFilterInput = z.infer<typeof sessionFilterInputSchema>;

export const sessionUpsertRequestSchema = z.object({
  key: optionalText,
  tenant: optionalText,
  team: optionalText,
  user: optionalText,
  flowId: optionalText,
  nodeId: optionalText,
  context: jsonValueSchema.optional()
});

export type SessionUpsertRequest = z.infer<typeof sessionUpsertRequestSchema>;

export function normalizeUpsertPayload(payload: SessionUpsertRequest, defaults: ScopeDefaults): SessionUpsert {
  const tenant = normalizeStringValue(payload.tenant) ?? normalizeStringValue(defaults.tenant);
  if (!tenant) {
    throw new HttpError(400, 'invalid_request', 'tenant is required');
  }
  const user = normalizeStringValue(payload.user);
  if (!user) {
    throw new HttpError(400, 'invalid_request', 'user is required');
  }

  return {
    key: normalizeStringValue(payload.key) ?? randomUUID(),
    tenant,
    team: normalizeStringValue(payload.team) ?? normalizeStringValue(defaults.team),
    user,
    flowId: normalizeStringValue(payload.flowId),
    nodeId: normalizeStringValue(payload.nodeId),
    context: payload.context ?? null
  };
}

export type SessionView = {
  key: string;
  tenant: string;
  team: string | null;
  user: string | null;
  cursor: SessionCursor;
  context: SessionRecord['context'];
  updatedAtEpochMs: number;
};

export function toSessionView(record: SessionRecord): SessionView {
  return {
    key: record.key,
    tenant: record.tenant,
    team: record.team,
    user: record.user,
    cursor: { flowId: record.flowId, nodeId: record.nodeId },
    context: record.context,
    updatedAtEpochMs: record.updatedAtEpochMs
  };
}
