import { createClient } from 'redis';
import type { Logger } from '../core/logging/logger';
import { silentLogger } from '../core/logging/logger';
import type { BusTransport, TransportListener, TransportSubscription } from './transport';

type RedisConnection = ReturnType<typeof createClient>;

interface TopicEntry {
  listeners: Set<TransportListener>;
  /** Settles once Redis has acknowledged the topic's SUBSCRIBE. */
  ready: Promise<void>;
}

export interface RedisTransportOptions {
  url: string;
  logger?: Logger;
  /** Prefix for claim keys, so several fleets can share one Redis. */
  keyPrefix?: string;
}

/**
 * Redis pub/sub transport. Publishing and subscribing need separate
 * connections because a subscribed connection accepts no other commands.
 */
export class RedisTransport implements BusTransport {
  private readonly publisher: RedisConnection;
  private readonly subscriber: RedisConnection;
  private readonly logger: Logger;
  private readonly keyPrefix: string;
  private readonly topics = new Map<string, TopicEntry>();
  private connecting: Promise<void> | null = null;

  constructor(options: RedisTransportOptions) {
    this.logger = options.logger ?? silentLogger;
    this.keyPrefix = options.keyPrefix ?? 'fleet:';
    this.publisher = createClient({ url: options.url });
    this.subscriber = createClient({ url: options.url });

    this.publisher.on('error', (error: unknown) => this.logger.error('Redis publisher error', { error }));
    this.subscriber.on('error', (error: unknown) => this.logger.error('Redis subscriber error', { error }));
  }

  connect(): Promise<void> {
    if (!this.connecting) {
      this.connecting = Promise.all([this.publisher.connect(), this.subscriber.connect()])
        .then(() => {
          this.logger.info('Redis transport connected');
        })
        .catch((error: unknown) => {
          this.connecting = null;
          throw error;
        });
    }
    return this.connecting;
  }

  async publish(topic: string, data: string): Promise<void> {
    await this.connect();
    await this.publisher.publish(topic, data);
  }

  /**
   * Every caller on a topic waits for the one SUBSCRIBE the topic needs, so a
   * subscription is live in Redis by the time any of them resolves.
   */
  async subscribe(topic: string, listener: TransportListener): Promise<TransportSubscription> {
    await this.connect();

    let entry = this.topics.get(topic);
    if (!entry) {
      const created: TopicEntry = { listeners: new Set(), ready: Promise.resolve() };
      created.ready = this.subscriber.subscribe(topic, (message) => this.dispatch(topic, message)).catch(
        (error: unknown) => {
          if (this.topics.get(topic) === created) {
            this.topics.delete(topic);
          }
          throw error;
        }
      );
      this.topics.set(topic, created);
      entry = created;
    }
    entry.listeners.add(listener);

    const owner = entry;
    try {
      await owner.ready;
    } catch (error) {
      owner.listeners.delete(listener);
      throw error;
    }

    return {
      unsubscribe: async () => {
        owner.listeners.delete(listener);
        if (owner.listeners.size === 0 && this.topics.get(topic) === owner) {
          this.topics.delete(topic);
          await this.subscriber.unsubscribe(topic);
        }
      }
    };
  }

  async claim(group: string, messageId: string, ttlMs: number): Promise<boolean> {
    await this.connect();
    const result = await this.publisher.set(`${this.keyPrefix}claim:${group}:${messageId}`, '1', {
      NX: true,
      PX: ttlMs
    });
    return result === 'OK';
  }

  async close(): Promise<void> {
    if (!this.connecting) {
      return;
    }
    this.connecting = null;
    this.topics.clear();
    await Promise.all([this.publisher.quit(), this.subscriber.quit()]);
  }

  private dispatch(topic: string, data: string): void {
    const entry = this.topics.get(topic);
    if (!entry) {
      return;
    }
    for (const listener of [...entry.listeners]) {
      try {
        listener(data);
      } catch (error) {
        this.logger.error('Transport listener failed', { topic, error });
      }
    }
  }
}
