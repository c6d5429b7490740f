import { watch, type FSWatcher } from 'chokidar';
import type { Logger } from '@flowbench/shared';
import type { ScopeDefaults } from '../config/serviceConfig';
import type { RunnerEventProxy } from '../runner/proxy';
import { buildPackIndex } from './packIndex';

export const PACK_WATCH_DEBOUNCE_MS = 250;

export type PackWatcherState = 'starting' | 'ready' | 'failed' | 'closed';

export type PackWatcherOptions = {
  root: string;
  proxy: RunnerEventProxy;
  defaults: ScopeDefaults;
  logger: Logger;
  debounceMs?: number;
};

/**
 * Watches the packs root and, once filesystem events settle, rebuilds the index
 * and submits it to the proxy. A rebuild that fails keeps the previous snapshot.
 */
export class PackWatcher {
  readonly ready: Promise<void>;
  private readonly options: PackWatcherOptions;
  private readonly watcher: FSWatcher;
  private debounceTimer: NodeJS.Timeout | null = null;
  private currentState: PackWatcherState = 'starting';

  constructor(options: PackWatcherOptions) {
    this.options = options;
    this.watcher = watch(options.root, {
      ignoreInitial: true,
      depth: 1
    });

    this.ready = new Promise((resolve) => {
      this.watcher.once('ready', () => {
        if (this.currentState === 'starting') {
          this.currentState = 'ready';
        }
        options.logger.info({ root: options.root }, 'pack watcher ready');
        resolve();
      });
    });

    this.watcher.on('all', (event, filePath) => {
      options.logger.debug({ event, filePath }, 'pack directory changed');
      this.schedule();
    });

    this.watcher.on('error', (err) => {
      this.currentState = 'failed';
      options.logger.error({ err, root: options.root }, 'pack watcher error');
    });
  }

  get state(): PackWatcherState {
    return this.currentState;
  }

  /** Rebuilds the index now. Resolves false when the rebuild failed. */
  async refresh(reason: string): Promise<boolean> {
    try {
      const index = await buildPackIndex(this.options.root);
      this.options.proxy.submit({ kind: 'reload-index', index, defaults: this.options.defaults });
      this.options.logger.info({ reason, packs: index.length }, 'pack index rebuilt from watcher');
      return true;
    } catch (err) {
      this.options.logger.error({ err, reason, root: this.options.root }, 'pack index rebuild failed; keeping previous snapshot');
      return false;
    }
  }

  async close(): Promise<void> {
    this.currentState = 'closed';
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }
    await this.watcher.close();
  }

  private schedule(): void {
    if (this.currentState === 'closed') {
      return;
    }
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
    }
    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = null;
      this.refresh('filesystem change').catch((err: unknown) => {
        this.options.logger.error({ err }, 'pack watcher refresh crashed');
      });
    }, this.options.debounceMs ?? PACK_WATCH_DEBOUNCE_MS);
  }
}
