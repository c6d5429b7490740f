import { MapSessionStore } from './baseStore';

export class MemorySessionStore extends MapSessionStore {
  readonly backend = 'memory' as const;

  protected persist(): Promise<void> {
    return Promise.resolve();
  }
}
