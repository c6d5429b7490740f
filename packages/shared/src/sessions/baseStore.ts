import { randomUUID } from 'node:crypto';
import { Mutex } from 'async-mutex';
import { normalizeStringValue } from '../json';
import { matchesSessionFilter } from './filter';
import {
  InvalidSessionError,
  type SessionFilter,
  type SessionRecord,
  type SessionStore,
  type SessionStoreBackend,
  type SessionUpsert
} from './types';

export type SessionStoreOptions = {
  now?: () => number;
};

/**
 * Map-backed store. Every operation, including the persistence hook, runs under
 * one mutex so readers never observe a half-applied mutation.
 */
export abstract class MapSessionStore implements SessionStore {
  abstract readonly backend: SessionStoreBackend;

  protected readonly records = new Map<string, SessionRecord>();
  private readonly mutex = new Mutex();
  private readonly now: () => number;

  constructor(options: SessionStoreOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  /** Called after every mutation that changed the map, while the lock is held. */
  protected abstract persist(): Promise<void>;

  list(filter: SessionFilter): Promise<SessionRecord[]> {
    return this.mutex.runExclusive(() =>
      Array.from(this.records.values())
        .filter((record) => matchesSessionFilter(filter, record))
        .map((record) => structuredClone(record))
    );
  }

  find(filter: SessionFilter): Promise<SessionRecord | null> {
    return this.mutex.runExclusive(() => {
      for (const record of this.records.values()) {
        if (matchesSessionFilter(filter, record)) {
          return structuredClone(record);
        }
      }
      return null;
    });
  }

  /** A blank key is replaced by a generated one; a blank tenant is rejected. */
  async upsert(payload: SessionUpsert): Promise<SessionRecord> {
    const tenant = normalizeStringValue(payload.tenant);
    if (!tenant) {
      throw new InvalidSessionError('tenant', 'tenant is required');
    }
    const key = normalizeStringValue(payload.key) ?? randomUUID();
    return this.mutex.runExclusive(async () => {
      const record: SessionRecord = {
        key,
        tenant,
        team: payload.team,
        user: payload.user,
        flowId: payload.flowId,
        nodeId: payload.nodeId,
        context: structuredClone(payload.context),
        updatedAtEpochMs: this.now()
      };
      this.records.set(record.key, record);
      await this.persist();
      return structuredClone(record);
    });
  }

  purge(filter: SessionFilter): Promise<number> {
    return this.mutex.runExclusive(async () => {
      let removed = 0;
      for (const [key, record] of this.records) {
        if (matchesSessionFilter(filter, record)) {
          this.records.delete(key);
          removed += 1;
        }
      }
      if (removed > 0) {
        await this.persist();
      }
      return removed;
    });
  }

  remove(key: string): Promise<void> {
    return this.mutex.runExclusive(async () => {
      if (this.records.delete(key)) {
        await this.persist();
      }
    });
  }
}
