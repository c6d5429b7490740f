import { FileSessionStore } from './fileStore';
import { MemorySessionStore } from './memoryStore';
import type { SessionStoreOptions } from './baseStore';
import {
  SessionNotFoundError,
  type SessionFilter,
  type SessionRecord,
  type SessionStore,
  type SessionStoreBackend
} from './types';

export * from './types';
export * from './filter';
export { MapSessionStore, type SessionStoreOptions } from './baseStore';
export { MemorySessionStore } from './memoryStore';
export { FileSessionStore } from './fileStore';

export type SessionStoreConfig = {
  backend: SessionStoreBackend;
  filePath?: string | null;
};

export const DEFAULT_SESSION_STORE_PATH = '.data/sessions.json';

export async function createSessionStore(
  config: SessionStoreConfig,
  options: SessionStoreOptions = {}
): Promise<SessionStore> {
  switch (config.backend) {
    case 'memory':
      return new MemorySessionStore(options);
    case 'file':
      return FileSessionStore.open(config.filePath ?? DEFAULT_SESSION_STORE_PATH, options);
    default: {
      const unknownBackend: never = config.backend;
      throw new Error(`Unsupported session store backend: ${String(unknownBackend)}`);
    }
  }
}

export async function requireSession(store: SessionStore, filter: SessionFilter): Promise<SessionRecord> {
  const record = await store.find(filter);
  if (!record) {
    throw new SessionNotFoundError(filter);
  }
  return record;
}
