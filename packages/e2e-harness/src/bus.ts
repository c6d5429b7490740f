import IORedis, { type Redis } from 'ioredis';
import type { Logger } from '@flowbench/shared';

export interface BusSubscription {
  readonly subject: string;
  /** Resolves with the next payload, or null when nothing arrives within `timeoutMs`. */
  next(timeoutMs: number): Promise<string | null>;
  unsubscribe(): Promise<void>;
}

export interface BusConnection {
  subscribe(subject: string): Promise<BusSubscription>;
  /** Resolves once the broker has accepted the message. */
  publish(subject: string, payload: string): Promise<void>;
  close(): Promise<void>;
}

export type BusConnector = () => Promise<BusConnection>;

class MessageQueue {
  private readonly buffered: string[] = [];
  private readonly waiters: Array<(message: string | null) => void> = [];
  private closed = false;

  push(message: string): void {
    if (this.closed) {
      return;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(message);
    } else {
      this.buffered.push(message);
    }
  }

  next(timeoutMs: number): Promise<string | null> {
    const message = this.buffered.shift();
    if (message !== undefined) {
      return Promise.resolve(message);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      const waiter = (value: string | null) => {
        clearTimeout(timer);
        resolve(value);
      };
      const timer = setTimeout(() => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) {
          this.waiters.splice(index, 1);
        }
        resolve(null);
      }, timeoutMs);
      this.waiters.push(waiter);
    });
  }

  close(): void {
    this.closed = true;
    this.buffered.length = 0;
    for (const waiter of this.waiters.splice(0)) {
      waiter(null);
    }
  }
}

class QueueSubscription implements BusSubscription {
  readonly queue = new MessageQueue();

  constructor(
    readonly subject: string,
    private readonly onUnsubscribe: (subscription: QueueSubscription) => Promise<void>
  ) {}

  next(timeoutMs: number): Promise<string | null> {
    return this.queue.next(timeoutMs);
  }

  async unsubscribe(): Promise<void> {
    this.queue.close();
    await this.onUnsubscribe(this);
  }
}

class SubscriptionRegistry {
  private readonly bySubject = new Map<string, Set<QueueSubscription>>();

  add(subscription: QueueSubscription): boolean {
    const existing = this.bySubject.get(subscription.subject);
    if (existing) {
      existing.add(subscription);
      return false;
    }
    this.bySubject.set(subscription.subject, new Set([subscription]));
    return true;
  }

  /** Returns true when the subject has no subscribers left. */
  delete(subscription: QueueSubscription): boolean {
    const set = this.bySubject.get(subscription.subject);
    if (!set) {
      return false;
    }
    set.delete(subscription);
    if (set.size === 0) {
      this.bySubject.delete(subscription.subject);
      return true;
    }
    return false;
  }

  dispatch(subject: string, payload: string): void {
    for (const subscription of this.bySubject.get(subject) ?? []) {
      subscription.queue.push(payload);
    }
  }

  closeAll(): void {
    for (const set of this.bySubject.values()) {
      for (const subscription of set) {
        subscription.queue.close();
      }
    }
    this.bySubject.clear();
  }
}

class RedisBusConnection implements BusConnection {
  private readonly registry = new SubscriptionRegistry();

  constructor(
    private readonly publisher: Redis,
    private readonly subscriber: Redis
  ) {
    subscriber.on('message', (channel: string, payload: string) => {
      this.registry.dispatch(channel, payload);
    });
  }

  async subscribe(subject: string): Promise<BusSubscription> {
    const subscription = new QueueSubscription(subject, async (closing) => {
      if (this.registry.delete(closing)) {
        await this.subscriber.unsubscribe(subject);
      }
    });
    if (this.registry.add(subscription)) {
      await this.subscriber.subscribe(subject);
    }
    return subscription;
  }

  async publish(subject: string, payload: string): Promise<void> {
    await this.publisher.publish(subject, payload);
  }

  async close(): Promise<void> {
    this.registry.closeAll();
    await Promise.allSettled([this.subscriber.quit(), this.publisher.quit()]);
  }
}

export type RedisBusOptions = {
  logger?: Logger;
};

/**
 * Pub/sub over Redis: one connection publishes, a second one holds the
 * subscriptions (a subscribed Redis connection cannot issue other commands).
 */
export function redisBusConnector(url: string, options: RedisBusOptions = {}): BusConnector {
  return async () => {
    const create = (role: string) => {
      const client = new IORedis(url, { lazyConnect: true, maxRetriesPerRequest: 1 });
      client.on('error', (err: Error) => {
        options.logger?.warn({ err, role }, 'redis bus connection error');
      });
      return client;
    };
    const publisher = create('publisher');
    const subscriber = create('subscriber');
    try {
      await Promise.all([publisher.connect(), subscriber.connect()]);
    } catch (error) {
      publisher.disconnect();
      subscriber.disconnect();
      throw error;
    }
    return new RedisBusConnection(publisher, subscriber);
  };
}

class InMemoryBusConnection implements BusConnection {
  private closed = false;
  private readonly subscriptions = new Set<QueueSubscription>();

  constructor(private readonly broker: InMemoryBus) {}

  async subscribe(subject: string): Promise<BusSubscription> {
    this.assertOpen();
    const subscription = new QueueSubscription(subject, async (closing) => {
      this.subscriptions.delete(closing);
      this.broker.registry.delete(closing);
    });
    this.subscriptions.add(subscription);
    this.broker.registry.add(subscription);
    return subscription;
  }

  async publish(subject: string, payload: string): Promise<void> {
    this.assertOpen();
    this.broker.published.push({ subject, payload });
    this.broker.registry.dispatch(subject, payload);
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.broker.closedConnections += 1;
    for (const subscription of this.subscriptions) {
      subscription.queue.close();
      this.broker.registry.delete(subscription);
    }
    this.subscriptions.clear();
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error('bus connection is closed');
    }
  }
}

/** In-process broker with Redis pub/sub delivery semantics (no replay for late subscribers). */
export class InMemoryBus {
  readonly registry = new SubscriptionRegistry();
  readonly published: Array<{ subject: string; payload: string }> = [];
  connections = 0;
  closedConnections = 0;

  readonly connect: BusConnector = async () => {
    this.connections += 1;
    return new InMemoryBusConnection(this);
  };
}

export function createInMemoryBus(): InMemoryBus {
  return new InMemoryBus();
}
