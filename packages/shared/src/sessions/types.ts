import type { JsonValue } from '../json';

export type SessionCursor = {
  flowId: string | null;
  nodeId: string | null;
};

export type SessionUpsert = {
  key: string;
  tenant: string;
  team: string | null;
  user: string | null;
  flowId: string | null;
  nodeId: string | null;
  context: JsonValue;
};

export type SessionRecord = SessionUpsert & {
  updatedAtEpochMs: number;
};

export type SessionFilter = {
  tenant?: string | null;
  team?: string | null;
  user?: string | null;
};

export interface SessionStore {
  readonly backend: SessionStoreBackend;
  list(filter: SessionFilter): Promise<SessionRecord[]>;
  find(filter: SessionFilter): Promise<SessionRecord | null>;
  upsert(payload: SessionUpsert): Promise<SessionRecord>;
  purge(filter: SessionFilter): Promise<number>;
  remove(key: string): Promise<void>;
}

export type SessionStoreBackend = 'memory' | 'file';

export class SessionNotFoundError extends Error {
  readonly filter: SessionFilter;

  constructor(filter: SessionFilter) {
    super(`No session matches ${describeSessionFilter(filter)}`);
    this.name = 'SessionNotFoundError';
    this.filter = filter;
  }
}

export class InvalidSessionError extends Error {
  readonly field: keyof SessionUpsert;

  constructor(field: keyof SessionUpsert, message: string) {
    super(message);
    this.name = 'InvalidSessionError';
    this.field = field;
  }
}

export class SessionStoreLoadError extends Error {
  readonly path: string;

  constructor(path: string, reason: string) {
    super(`Failed to load session store ${path}: ${reason}`);
    this.name = 'SessionStoreLoadError';
    this.path = path;
  }
}

export function describeSessionFilter(filter: SessionFilter): string {
  const parts = (['tenant', 'team', 'user'] as const)
    .filter((field) => filter[field])
    .map((field) => `${field}=${filter[field]}`);
  return parts.length > 0 ? parts.join(' ') : '<any>';
}
