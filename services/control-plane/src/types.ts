import type { SessionStore } from '@flowbench/shared';
import type { ServiceConfig } from './config/serviceConfig';
import type { PackWatcher } from './packs/watcher';
import type { RunnerEventProxy } from './runner/proxy';

export interface AppContext {
  config: ServiceConfig;
  sessionStore: SessionStore;
  proxy: RunnerEventProxy;
  packWatcher: PackWatcher | null;
}
