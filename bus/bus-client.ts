import { randomUUID } from 'crypto';
import { BusUnavailableError, InvalidArgumentError, RequestTimeoutError } from '../core/errors';
import { KeyedLock } from '../core/keyed-lock';
import type { Logger } from '../core/logging/logger';
import { silentLogger } from '../core/logging/logger';
import { assertSafePayload } from '../core/validation';
import { DedupeWindow } from './dedupe-window';
import { assertTopic, decodeMessage, encodeMessage, type Message, type MessageKind, type Payload } from './message';
import type { MessageBus, MessageHandler, RequestOptions, Subscription, SubscriptionMode } from './message-bus';
import { RetryExhaustedError, retryWithBackoff } from './retry';
import type { BusTransport, TransportSubscription } from './transport';

export interface BusClientOptions {
  transport: BusTransport;
  /** Identifies this publisher on the wire. Default: random. */
  clientId?: string;
  logger?: Logger;
  /** Transport attempts per publish before BusUnavailableError. Default: 5. */
  publishMaxAttempts?: number;
  /** First retry delay; doubles per attempt. Default: 100ms. */
  publishBackoffMs?: number;
  /** Ceiling for a single retry delay. Default: 5000ms. */
  publishMaxBackoffMs?: number;
  /** Default: 30000ms. */
  defaultRequestTimeoutMs?: number;
  /** Message ids remembered per subscription for duplicate suppression. Default: 1000. */
  dedupeWindowSize?: number;
  /** How long a consumer-group claim is held on the transport. Default: 60000ms. */
  claimTtlMs?: number;
  getTime?: () => number;
  generateId?: () => string;
}

interface Subscriber {
  readonly handler: MessageHandler;
  active: boolean;
}

/**
 * One transport subscription feeding its subscribers. A broadcast subscriber
 * owns its channel; all local members of a consumer group share one.
 * Messages on a channel are delivered one at a time in arrival order.
 */
interface Channel {
  readonly topic: string;
  readonly group?: string;
  readonly members: Subscriber[];
  readonly seen: DedupeWindow;
  cursor: number;
  chain: Promise<void>;
  ready: Promise<TransportSubscription>;
}

export class BusClient implements MessageBus {
  readonly clientId: string;

  private readonly transport: BusTransport;
  private readonly logger: Logger;
  private readonly publishMaxAttempts: number;
  private readonly publishBackoffMs: number;
  private readonly publishMaxBackoffMs: number;
  private readonly defaultRequestTimeoutMs: number;
  private readonly dedupeWindowSize: number;
  private readonly claimTtlMs: number;
  private readonly getTime: () => number;
  private readonly generateId: () => string;

  private readonly sendLock = new KeyedLock();
  private readonly channels = new Set<Channel>();
  private readonly groups = new Map<string, Channel>();
  private readonly pendingRequests = new Set<(reason: unknown) => void>();
  /** Aborted by close() to cut short transport retries still backing off. */
  private readonly lifecycle = new AbortController();
  private closed = false;

  constructor(options: BusClientOptions) {
    this.transport = options.transport;
    this.generateId = options.generateId ?? (() => randomUUID());
    this.clientId = options.clientId ?? `bus-${this.generateId()}`;
    this.logger = (options.logger ?? silentLogger).child('bus');
    this.publishMaxAttempts = positiveInteger('publishMaxAttempts', options.publishMaxAttempts ?? 5);
    this.publishBackoffMs = nonNegative('publishBackoffMs', options.publishBackoffMs ?? 100);
    this.publishMaxBackoffMs = nonNegative('publishMaxBackoffMs', options.publishMaxBackoffMs ?? 5_000);
    this.defaultRequestTimeoutMs = positiveInteger('defaultRequestTimeoutMs', options.defaultRequestTimeoutMs ?? 30_000);
    this.dedupeWindowSize = positiveInteger('dedupeWindowSize', options.dedupeWindowSize ?? 1_000);
    this.claimTtlMs = positiveInteger('claimTtlMs', options.claimTtlMs ?? 60_000);
    this.getTime = options.getTime ?? (() => Date.now());

    if (!/^[\w:-]+$/.test(this.clientId)) {
      throw new InvalidArgumentError(`Invalid client id "${this.clientId}"`);
    }
  }

  async connect(): Promise<void> {
    await this.withTransportRetry('connect', () => this.transport.connect());
  }

  async publish(topic: string, payload: Payload): Promise<void> {
    this.assertOpen();
    const id = this.generateId();
    await this.send(this.createMessage(topic, 'event', payload, { id, correlationId: id }));
  }

  async subscribe(topic: string, handler: MessageHandler, mode: SubscriptionMode): Promise<Subscription> {
    this.assertOpen();
    assertTopic(topic);

    const subscriber: Subscriber = { handler, active: true };
    let channel: Channel;

    if (mode.mode === 'group') {
      const group = mode.group.trim();
      if (!group) {
        throw new InvalidArgumentError('Consumer group name is required');
      }
      const key = `${topic}\u0000${group}`;
      const existing = this.groups.get(key);
      if (existing) {
        channel = existing;
      } else {
        channel = this.openChannel(topic, group);
        this.groups.set(key, channel);
      }
    } else {
      channel = this.openChannel(topic);
    }

    channel.members.push(subscriber);
    try {
      await channel.ready;
    } catch (error) {
      await this.detach(channel, subscriber);
      throw error;
    }

    return {
      topic,
      mode,
      unsubscribe: () => this.detach(channel, subscriber)
    };
  }

  async request(topic: string, payload: Payload, options: RequestOptions = {}): Promise<Message> {
    this.assertOpen();
    const timeoutMs = options.timeoutMs ?? this.defaultRequestTimeoutMs;
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new InvalidArgumentError(`Request timeout must be a positive number. Got: ${timeoutMs}`);
    }
    const { signal } = options;
    if (signal?.aborted) {
      throw signal.reason;
    }

    const correlationId = this.generateId();
    const replyTo = `reply.${this.clientId}.${correlationId}`;
    const request = this.createMessage(topic, 'request', payload, {
      id: this.generateId(),
      correlationId,
      replyTo
    });

    let resolveReply: (message: Message) => void = () => {};
    let rejectReply: (reason: unknown) => void = () => {};
    const reply = new Promise<Message>((resolve, reject) => {
      resolveReply = resolve;
      rejectReply = reject;
    });
    // A timeout or abort can land while the request is still being published.
    reply.catch(() => undefined);

    let settled = false;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const onAbort = () => settle(() => rejectReply(signal?.reason));
    const cancel = (reason: unknown) => settle(() => rejectReply(reason));
    const settle = (action: () => void) => {
      if (settled) {
        return;
      }
      settled = true;
      if (timer !== undefined) {
        clearTimeout(timer);
      }
      signal?.removeEventListener('abort', onAbort);
      this.pendingRequests.delete(cancel);
      action();
    };

    const replySubscription = await this.withTransportRetry(`subscribe ${replyTo}`, () =>
      this.transport.subscribe(replyTo, (data) => {
        const message = this.tryDecode(data, replyTo);
        if (!message) {
          return;
        }
        if (message.kind !== 'response' || message.correlationId !== correlationId) {
          this.logger.debug('Discarding unmatched reply', { replyTo, correlationId: message.correlationId });
          return;
        }
        settle(() => resolveReply(message));
      })
    );

    this.pendingRequests.add(cancel);
    timer = setTimeout(() => settle(() => rejectReply(new RequestTimeoutError(topic, timeoutMs))), timeoutMs);
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      try {
        await this.send(request);
      } catch (error) {
        settle(() => rejectReply(error));
      }
      return await reply;
    } finally {
      await replySubscription.unsubscribe().catch((error: unknown) => {
        this.logger.warn('Failed to remove reply subscription', { replyTo, error });
      });
    }
  }

  async respond(request: Message, payload: Payload): Promise<void> {
    this.assertOpen();
    if (request.kind !== 'request' || !request.replyTo) {
      throw new InvalidArgumentError('Only request messages with a reply topic can be answered');
    }
    await this.send(
      this.createMessage(request.replyTo, 'response', payload, {
        id: this.generateId(),
        correlationId: request.correlationId
      })
    );
  }

  /**
   * Drops every subscription made through this client and fails pending
   * requests. The transport itself stays open for other clients sharing it.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.lifecycle.abort(new BusUnavailableError('Bus client closed', { attempts: 0 }));

    for (const cancel of [...this.pendingRequests]) {
      cancel(new BusUnavailableError('Bus client closed', { attempts: 0 }));
    }

    const channels = [...this.channels];
    this.channels.clear();
    this.groups.clear();
    await Promise.all(
      channels.map(async (channel) => {
        channel.members.forEach((member) => {
          member.active = false;
        });
        channel.members.length = 0;
        await this.release(channel);
      })
    );
  }

  private openChannel(topic: string, group?: string): Channel {
    const channel: Channel = {
      topic,
      group,
      members: [],
      seen: new DedupeWindow(this.dedupeWindowSize),
      cursor: 0,
      chain: Promise.resolve(),
      ready: Promise.resolve({ unsubscribe: async () => {} })
    };
    channel.ready = this.withTransportRetry(`subscribe ${topic}`, () =>
      this.transport.subscribe(topic, (data) => this.onFrame(channel, data))
    );
    // Failures surface to the subscriber awaiting `ready`.
    channel.ready.catch(() => undefined);
    this.channels.add(channel);
    return channel;
  }

  private async detach(channel: Channel, subscriber: Subscriber): Promise<void> {
    subscriber.active = false;
    const index = channel.members.indexOf(subscriber);
    if (index >= 0) {
      channel.members.splice(index, 1);
    }
    if (channel.members.length > 0) {
      return;
    }

    this.channels.delete(channel);
    if (channel.group !== undefined) {
      const key = `${channel.topic}\u0000${channel.group}`;
      if (this.groups.get(key) === channel) {
        this.groups.delete(key);
      }
    }
    await this.release(channel);
  }

  private async release(channel: Channel): Promise<void> {
    let subscription: TransportSubscription;
    try {
      subscription = await channel.ready;
    } catch {
      // Never attached, nothing to remove.
      return;
    }
    try {
      await subscription.unsubscribe();
    } catch (error) {
      this.logger.warn('Failed to remove transport subscription', { topic: channel.topic, error });
    }
  }

  private onFrame(channel: Channel, data: string): void {
    const message = this.tryDecode(data, channel.topic);
    if (!message) {
      return;
    }
    if (channel.seen.check(message.id)) {
      this.logger.debug('Dropping duplicate delivery', { topic: channel.topic, messageId: message.id });
      return;
    }
    channel.chain = channel.chain.then(() => this.deliver(channel, message));
  }

  private async deliver(channel: Channel, message: Message): Promise<void> {
    if (channel.group === undefined) {
      for (const member of [...channel.members]) {
        if (member.active) {
          await this.invoke(member, message);
        }
      }
      return;
    }

    if (!channel.members.some((member) => member.active)) {
      return;
    }

    let claimed: boolean;
    try {
      claimed = await this.transport.claim(channel.group, message.id, this.claimTtlMs);
    } catch (error) {
      // Delivering twice is allowed, never delivering is not.
      this.logger.warn('Consumer-group claim failed, delivering anyway', {
        topic: channel.topic,
        group: channel.group,
        error
      });
      claimed = true;
    }
    if (!claimed) {
      return;
    }

    const member = this.nextMember(channel);
    if (member) {
      await this.invoke(member, message);
    }
  }

  private nextMember(channel: Channel): Subscriber | undefined {
    const active = channel.members.filter((member) => member.active);
    if (active.length === 0) {
      return undefined;
    }
    const member = active[channel.cursor % active.length];
    channel.cursor = (channel.cursor + 1) % active.length;
    return member;
  }

  private async invoke(subscriber: Subscriber, message: Message): Promise<void> {
    try {
      await subscriber.handler(message);
    } catch (error) {
      this.logger.error('Subscriber handler failed', { topic: message.topic, messageId: message.id, error });
    }
  }

  private tryDecode(data: string, topic: string): Message | undefined {
    try {
      return decodeMessage(data);
    } catch (error) {
      this.logger.warn('Dropping malformed frame', { topic, error });
      return undefined;
    }
  }

  private createMessage(
    topic: string,
    kind: MessageKind,
    payload: Payload,
    fields: { id: string; correlationId: string; replyTo?: string }
  ): Message {
    assertTopic(topic);
    if (payload === null || typeof payload !== 'object' || Array.isArray(payload)) {
      throw new InvalidArgumentError('Payload must be a plain object');
    }
    assertSafePayload(payload);

    return {
      id: fields.id,
      topic,
      kind,
      payload,
      correlationId: fields.correlationId,
      ...(fields.replyTo ? { replyTo: fields.replyTo } : {}),
      sender: this.clientId,
      sentAt: this.getTime()
    };
  }

  /**
   * Publishes in call order per topic, so FIFO holds for this publisher even
   * while an earlier message is backing off.
   */
  private async send(message: Message): Promise<void> {
    const data = encodeMessage(message);
    await this.sendLock.run(message.topic, () =>
      this.withTransportRetry(`publish ${message.topic}`, () => this.transport.publish(message.topic, data))
    );
  }

  private async withTransportRetry<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await retryWithBackoff(fn, {
        attempts: this.publishMaxAttempts,
        baseDelayMs: this.publishBackoffMs,
        maxDelayMs: this.publishMaxBackoffMs,
        signal: this.lifecycle.signal,
        onRetry: (attempt, error, delayMs) => {
          this.logger.warn('Transport operation failed, retrying', { operation, attempt, delayMs, error });
        }
      });
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        throw new BusUnavailableError(`Transport unavailable: ${operation} failed after ${error.attempts} attempts`, {
          attempts: error.attempts,
          cause: error.lastError
        });
      }
      throw error;
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new BusUnavailableError('Bus client closed', { attempts: 0 });
    }
  }
}

function positiveInteger(name: string, value: number): number {
  const n = Math.floor(Number(value));
  if (!Number.isFinite(n) || n < 1) {
    throw new InvalidArgumentError(`${name} must be a finite integer >= 1. Got: ${value}`);
  }
  return n;
}

function nonNegative(name: string, value: number): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0) {
    throw new InvalidArgumentError(`${name} must be a finite non-negative number. Got: ${value}`);
  }
  return n;
}
