import type { Logger } from '../core/logging/logger';
import { silentLogger } from '../core/logging/logger';
import type { BusTransport, TransportListener, TransportSubscription } from './transport';

/**
 * Process-local transport. Every bus client built on the same instance sees
 * the same topics, which is how a single-node fleet and the tests run.
 */
export class InMemoryTransport implements BusTransport {
  private readonly listeners = new Map<string, Set<TransportListener>>();
  private readonly claims = new Map<string, number>();
  private readonly logger: Logger;
  private readonly getTime: () => number;
  private closed = false;

  constructor(options: { logger?: Logger; getTime?: () => number } = {}) {
    this.logger = options.logger ?? silentLogger;
    this.getTime = options.getTime ?? (() => Date.now());
  }

  async connect(): Promise<void> {
    this.closed = false;
  }

  async publish(topic: string, data: string): Promise<void> {
    if (this.closed) {
      throw new Error('In-memory transport is closed');
    }

    const listeners = this.listeners.get(topic);
    if (!listeners) {
      return;
    }

    // Snapshot: listeners added while delivering do not receive this frame.
    for (const listener of [...listeners]) {
      try {
        listener(data);
      } catch (error) {
        this.logger.error('Transport listener failed', { topic, error });
      }
    }
  }

  async subscribe(topic: string, listener: TransportListener): Promise<TransportSubscription> {
    if (this.closed) {
      throw new Error('In-memory transport is closed');
    }

    let set = this.listeners.get(topic);
    if (!set) {
      set = new Set();
      this.listeners.set(topic, set);
    }
    set.add(listener);

    const owner = set;
    return {
      unsubscribe: async () => {
        owner.delete(listener);
        if (owner.size === 0 && this.listeners.get(topic) === owner) {
          this.listeners.delete(topic);
        }
      }
    };
  }

  async claim(group: string, messageId: string, ttlMs: number): Promise<boolean> {
    const now = this.getTime();
    this.pruneClaims(now);
    const key = `${group}\u0000${messageId}`;
    if (this.claims.has(key)) {
      return false;
    }
    this.claims.set(key, now + ttlMs);
    return true;
  }

  async close(): Promise<void> {
    this.closed = true;
    this.listeners.clear();
    this.claims.clear();
  }

  /** Number of live listeners on a topic. */
  listenerCount(topic: string): number {
    return this.listeners.get(topic)?.size ?? 0;
  }

  private pruneClaims(now: number): void {
    for (const [key, expiresAt] of this.claims) {
      if (expiresAt <= now) {
        this.claims.delete(key);
      }
    }
  }
}
