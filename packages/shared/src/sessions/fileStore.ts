import { existsSync } from 'node:fs';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { jsonValueSchema } from '../json';
import { MapSessionStore, type SessionStoreOptions } from './baseStore';
import { SessionStoreLoadError, type SessionRecord } from './types';

const storedSessionSchema = z.object({
  key: z.string().min(1),
  tenant: z.string().min(1),
  team: z.string().nullable().optional(),
  user: z.string().nullable().optional(),
  flow_id: z.string().nullable().optional(),
  node_id: z.string().nullable().optional(),
  context: jsonValueSchema.optional(),
  updated_at_epoch_ms: z.number().int().nonnegative().optional()
});

type StoredSession = z.infer<typeof storedSessionSchema>;

function fromStored(row: StoredSession): SessionRecord {
  return {
    key: row.key,
    tenant: row.tenant,
    team: row.team ?? null,
    user: row.user ?? null,
    flowId: row.flow_id ?? null,
    nodeId: row.node_id ?? null,
    context: row.context ?? null,
    updatedAtEpochMs: row.updated_at_epoch_ms ?? 0
  };
}

function toStored(record: SessionRecord): StoredSession {
  return {
    key: record.key,
    tenant: record.tenant,
    team: record.team,
    user: record.user,
    flow_id: record.flowId,
    node_id: record.nodeId,
    context: record.context,
    updated_at_epoch_ms: record.updatedAtEpochMs
  };
}

/**
 * Write-through store: the whole map is rewritten to one JSON array on every
 * mutation. Suitable for harness volumes only.
 */
export class FileSessionStore extends MapSessionStore {
  readonly backend = 'file' as const;
  readonly filePath: string;

  private constructor(filePath: string, options: SessionStoreOptions) {
    super(options);
    this.filePath = filePath;
  }

  static async open(filePath: string, options: SessionStoreOptions = {}): Promise<FileSessionStore> {
    const absolute = path.resolve(filePath);
    const store = new FileSessionStore(absolute, options);
    for (const record of await loadSessionFile(absolute)) {
      store.records.set(record.key, record);
    }
    return store;
  }

  protected async persist(): Promise<void> {
    const rows = Array.from(this.records.values()).map(toStored);
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, JSON.stringify(rows, null, 2), 'utf8');
  }
}

async function loadSessionFile(filePath: string): Promise<SessionRecord[]> {
  if (!existsSync(filePath)) {
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, '[]', 'utf8');
    return [];
  }

  const raw = await readFile(filePath, 'utf8');
  if (raw.trim().length === 0) {
    return [];
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new SessionStoreLoadError(filePath, error instanceof Error ? error.message : String(error));
  }

  const result = z.array(storedSessionSchema).safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const location = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new SessionStoreLoadError(filePath, `${location}${issue?.message ?? 'invalid session rows'}`);
  }
  return result.data.map(fromStored);
}
