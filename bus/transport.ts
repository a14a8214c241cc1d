export type TransportListener = (data: string) => void;

export interface TransportSubscription {
  unsubscribe(): Promise<void>;
}

/**
 * Broker capability consumed by the bus client: raw topic fan-out plus an
 * atomic claim used to elect a single consumer inside a group.
 */
export interface BusTransport {
  connect(): Promise<void>;
  publish(topic: string, data: string): Promise<void>;
  subscribe(topic: string, listener: TransportListener): Promise<TransportSubscription>;
  /**
   * Returns true for exactly one caller per (group, messageId) while the claim lives.
   */
  claim(group: string, messageId: string, ttlMs: number): Promise<boolean>;
  close(): Promise<void>;
}
