import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { TestContext } from 'node:test';
import pino from 'pino';
import { MemorySessionStore } from '@flowbench/shared';
import { buildApp, type ServiceConfig } from '../src';

export const NOW = 5_000;
export const silentLogger = pino({ level: 'silent' });

export async function makePacksRoot(t: TestContext): Promise<string> {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'control-plane-packs-'));
  t.after(async () => rm(dir, { recursive: true, force: true }));
  return dir;
}

export async function writePack(root: string, dirName: string, manifest: unknown): Promise<string> {
  const dir = path.join(root, dirName);
  await mkdir(dir, { recursive: true });
  await writeFile(path.join(dir, 'pack.json'), JSON.stringify(manifest), 'utf8');
  return dir;
}

export function testConfig(packsRoot: string, overrides: Partial<ServiceConfig> = {}): ServiceConfig {
  return {
    host: '127.0.0.1',
    port: 0,
    logLevel: 'silent',
    packsRoot,
    packsWatch: false,
    sessionStore: { backend: 'memory', filePath: path.join(packsRoot, 'sessions.json') },
    defaults: { tenant: null, team: null },
    ...overrides
  };
}

export async function createTestApp(t: TestContext, config: ServiceConfig, options: { packWatchDebounceMs?: number } = {}) {
  const built = await buildApp({
    config,
    sessionStore: new MemorySessionStore({ now: () => NOW }),
    logger: silentLogger,
    now: () => NOW,
    packWatchDebounceMs: options.packWatchDebounceMs
  });
  t.after(async () => built.app.close());
  return built;
}
