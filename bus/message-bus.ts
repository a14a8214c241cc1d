import type { Message, Payload } from './message';

/**
 * How a subscription shares a topic with other subscribers. Callers always
 * state it: `broadcast` hands every subscriber its own copy, a consumer `group`
 * hands each message to exactly one member of the group.
 */
export type SubscriptionMode = { mode: 'broadcast' } | { mode: 'group'; group: string };

export const BROADCAST: SubscriptionMode = { mode: 'broadcast' };

export function consumerGroup(group: string): SubscriptionMode {
  return { mode: 'group', group };
}

export type MessageHandler = (message: Message) => void | Promise<void>;

export interface Subscription {
  readonly topic: string;
  readonly mode: SubscriptionMode;
  unsubscribe(): Promise<void>;
}

export interface RequestOptions {
  /** Overrides the client's default request timeout. */
  timeoutMs?: number;
  /** Cancels the wait; the reply subscription is torn down and the signal's reason is thrown. */
  signal?: AbortSignal;
}

export interface MessageBus {
  readonly clientId: string;
  publish(topic: string, payload: Payload): Promise<void>;
  subscribe(topic: string, handler: MessageHandler, mode: SubscriptionMode): Promise<Subscription>;
  request(topic: string, payload: Payload, options?: RequestOptions): Promise<Message>;
  respond(request: Message, payload: Payload): Promise<void>;
}
