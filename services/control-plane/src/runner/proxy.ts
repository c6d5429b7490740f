import type { IndexedEntry, JsonValue, Logger } from '@flowbench/shared';
import type { ScopeDefaults } from '../config/serviceConfig';

export const RUNNER_EVENT_CAPACITY = 100;

export type RunnerEvent = {
  timestampMs: number;
  flow: string;
  tenant: string | null;
  team: string | null;
  user: string | null;
  payload: JsonValue;
  result: JsonValue;
};

export type ActivityInput = {
  flow: string;
  tenant?: string | null;
  team?: string | null;
  user?: string | null;
  payload?: JsonValue;
};

export type IndexSnapshot = {
  entries: IndexedEntry[];
  defaults: ScopeDefaults;
  reloadedAtEpochMs: number | null;
};

export type RunnerCommand =
  | { kind: 'reload-index'; index: IndexedEntry[]; defaults: ScopeDefaults }
  | { kind: 'emit-activity'; activity: ActivityInput; onRecorded?: (event: RunnerEvent) => void }
  | { kind: 'emit'; message: string }
  | { kind: 'clear-events'; onCleared?: () => void };

export class RunnerProxyStoppedError extends Error {
  constructor() {
    super('runner proxy is stopped');
    this.name = 'RunnerProxyStoppedError';
  }
}

export type RunnerEventProxyOptions = {
  logger: Logger;
  capacity?: number;
  now?: () => number;
  initialIndex?: IndexedEntry[];
  defaults?: ScopeDefaults;
};

export function synthesizeRunnerEvent(activity: ActivityInput, timestampMs: number): RunnerEvent {
  const payload = activity.payload ?? null;
  return {
    timestampMs,
    flow: activity.flow,
    tenant: activity.tenant ?? null,
    team: activity.team ?? null,
    user: activity.user ?? null,
    payload,
    result: { flow: activity.flow, echo: payload, status: 'ok' }
  };
}

/**
 * Single-consumer command queue in front of the pack index snapshot and the
 * runner event ring. Handlers submit commands; only the drain loop mutates
 * state, one command at a time in submission order.
 */
export class RunnerEventProxy {
  private readonly logger: Logger;
  private readonly capacity: number;
  private readonly now: () => number;
  private readonly queue: RunnerCommand[] = [];
  private draining: Promise<void> | null = null;
  private stopped = false;
  private ring: RunnerEvent[] = [];
  private snapshot: IndexSnapshot;

  constructor(options: RunnerEventProxyOptions) {
    this.logger = options.logger;
    this.capacity = options.capacity ?? RUNNER_EVENT_CAPACITY;
    this.now = options.now ?? Date.now;
    this.snapshot = {
      entries: options.initialIndex ?? [],
      defaults: options.defaults ?? { tenant: null, team: null },
      reloadedAtEpochMs: null
    };
  }

  /** Enqueues without blocking. Returns false (and logs) when the proxy is stopped. */
  submit(command: RunnerCommand): boolean {
    if (this.stopped) {
      this.logger.error({ command: command.kind }, 'failed to submit command to runner proxy');
      return false;
    }
    this.queue.push(command);
    this.schedule();
    return true;
  }

  emitActivity(activity: ActivityInput): Promise<RunnerEvent> {
    return new Promise((resolve, reject) => {
      if (!this.submit({ kind: 'emit-activity', activity, onRecorded: resolve })) {
        reject(new RunnerProxyStoppedError());
      }
    });
  }

  clearEvents(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.submit({ kind: 'clear-events', onCleared: resolve })) {
        reject(new RunnerProxyStoppedError());
      }
    });
  }

  events(): RunnerEvent[] {
    return structuredClone(this.ring);
  }

  index(): IndexSnapshot {
    return structuredClone(this.snapshot);
  }

  async whenIdle(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  /** Rejects further submissions; commands already queued still run. */
  async stop(): Promise<void> {
    this.stopped = true;
    await this.whenIdle();
  }

  private schedule(): void {
    if (this.draining) {
      return;
    }
    this.draining = this.drain()
      .catch((err: unknown) => {
        this.logger.error({ err }, 'runner proxy consumer failed');
      })
      .finally(() => {
        this.draining = null;
        if (this.queue.length > 0) {
          this.schedule();
        }
      });
  }

  private async drain(): Promise<void> {
    // Yield first so submit() never applies a command on the caller's stack.
    await Promise.resolve();
    for (let command = this.queue.shift(); command; command = this.queue.shift()) {
      this.apply(command);
    }
  }

  private apply(command: RunnerCommand): void {
    switch (command.kind) {
      case 'reload-index':
        this.snapshot = {
          entries: structuredClone(command.index),
          defaults: { ...command.defaults },
          reloadedAtEpochMs: this.now()
        };
        this.logger.info(
          { packs: command.index.length, tenant: command.defaults.tenant, team: command.defaults.team },
          'runner proxy reloaded pack index'
        );
        return;
      case 'emit-activity': {
        const event = synthesizeRunnerEvent(command.activity, this.now());
        this.ring.push(event);
        if (this.ring.length > this.capacity) {
          this.ring.splice(0, this.ring.length - this.capacity);
        }
        this.logger.debug({ flow: event.flow, tenant: event.tenant }, 'runner proxy recorded activity');
        command.onRecorded?.(structuredClone(event));
        return;
      }
      case 'emit':
        this.logger.info({ message: command.message }, 'runner proxy emit');
        return;
      case 'clear-events':
        this.ring = [];
        command.onCleared?.();
        return;
    }
  }
}
