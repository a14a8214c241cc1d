import { BusClient } from '../../bus/bus-client';
import { InMemoryTransport } from '../../bus/in-memory-transport';
import type { Message } from '../../bus/message';
import { BROADCAST, consumerGroup } from '../../bus/message-bus';
import { BusUnavailableError, InvalidArgumentError, RequestTimeoutError } from '../../core/errors';
import { FlakyTransport, flush, sequentialIds } from './helpers';

describe('BusClient', () => {
  let transport: InMemoryTransport;

  beforeEach(() => {
    transport = new InMemoryTransport();
  });

  it('fans an event out to every broadcast subscriber', async () => {
    const publisher = new BusClient({ transport, clientId: 'publisher' });
    const first = new BusClient({ transport, clientId: 'first' });
    const second = new BusClient({ transport, clientId: 'second' });
    const received: string[] = [];

    await first.subscribe('orders.created', (message) => {
      received.push(`first:${String(message.payload.orderId)}`);
    }, BROADCAST);
    await second.subscribe('orders.created', (message) => {
      received.push(`second:${String(message.payload.orderId)}`);
    }, BROADCAST);

    await publisher.publish('orders.created', { orderId: 'o-1' });
    await flush();

    expect(received.sort()).toEqual(['first:o-1', 'second:o-1']);
  });

  it('stamps events with kind, sender and a correlation id equal to the message id', async () => {
    const bus = new BusClient({ transport, clientId: 'stamper', generateId: sequentialIds(), getTime: () => 1234 });
    const received: Message[] = [];
    await bus.subscribe('orders.created', (message) => {
      received.push(message);
    }, BROADCAST);

    await bus.publish('orders.created', { orderId: 'o-2' });
    await flush();

    expect(received).toEqual([
      {
        id: 'id-1',
        topic: 'orders.created',
        kind: 'event',
        payload: { orderId: 'o-2' },
        correlationId: 'id-1',
        sender: 'stamper',
        sentAt: 1234
      }
    ]);
  });

  it('delivers each message to exactly one consumer-group member across clients', async () => {
    const publisher = new BusClient({ transport, clientId: 'publisher' });
    const left = new BusClient({ transport, clientId: 'left' });
    const right = new BusClient({ transport, clientId: 'right' });
    const handled: string[] = [];
    const record = (message: Message) => {
      handled.push(String(message.payload.n));
    };

    await left.subscribe('jobs.created', record, consumerGroup('workers'));
    await left.subscribe('jobs.created', record, consumerGroup('workers'));
    await right.subscribe('jobs.created', record, consumerGroup('workers'));

    for (let n = 1; n <= 6; n++) {
      await publisher.publish('jobs.created', { n });
    }
    await flush();

    expect(handled.sort()).toEqual(['1', '2', '3', '4', '5', '6']);
  });

  it('rotates group deliveries among local members', async () => {
    const bus = new BusClient({ transport, clientId: 'pool' });
    const counts = { a: 0, b: 0 };

    await bus.subscribe('jobs.created', () => {
      counts.a++;
    }, consumerGroup('workers'));
    await bus.subscribe('jobs.created', () => {
      counts.b++;
    }, consumerGroup('workers'));

    for (let n = 0; n < 4; n++) {
      await bus.publish('jobs.created', { n });
    }
    await flush();

    expect(counts).toEqual({ a: 2, b: 2 });
  });

  it('gives every group its own copy alongside broadcast subscribers', async () => {
    const bus = new BusClient({ transport, clientId: 'mixed' });
    const handled: string[] = [];

    await bus.subscribe('jobs.created', () => {
      handled.push('audit');
    }, BROADCAST);
    await bus.subscribe('jobs.created', () => {
      handled.push('billing');
    }, consumerGroup('billing'));
    await bus.subscribe('jobs.created', () => {
      handled.push('shipping');
    }, consumerGroup('shipping'));

    await bus.publish('jobs.created', { n: 1 });
    await flush();

    expect(handled.sort()).toEqual(['audit', 'billing', 'shipping']);
  });

  it('keeps publish order for a single publisher even when handlers are slow', async () => {
    const bus = new BusClient({ transport, clientId: 'ordered' });
    const seen: number[] = [];

    await bus.subscribe('ticks.emitted', async (message) => {
      const n = Number(message.payload.n);
      await new Promise((resolve) => setTimeout(resolve, 6 - n));
      seen.push(n);
    }, BROADCAST);

    await Promise.all([1, 2, 3, 4, 5].map((n) => bus.publish('ticks.emitted', { n })));
    await new Promise((resolve) => setTimeout(resolve, 100));

    expect(seen).toEqual([1, 2, 3, 4, 5]);
  });

  it('drops a redelivered copy of the same message', async () => {
    const bus = new BusClient({ transport, clientId: 'dedupe' });
    let calls = 0;
    await bus.subscribe('orders.created', () => {
      calls++;
    }, BROADCAST);

    const frame = JSON.stringify({
      id: 'dup-1',
      topic: 'orders.created',
      kind: 'event',
      payload: {},
      correlationId: 'dup-1',
      sender: 'elsewhere',
      sentAt: 1
    });
    await transport.publish('orders.created', frame);
    await transport.publish('orders.created', frame);
    await flush();

    expect(calls).toBe(1);
  });

  it('ignores malformed frames', async () => {
    const bus = new BusClient({ transport, clientId: 'strict' });
    let calls = 0;
    await bus.subscribe('orders.created', () => {
      calls++;
    }, BROADCAST);

    await transport.publish('orders.created', 'not json');
    await transport.publish('orders.created', JSON.stringify({ id: 'x' }));
    await flush();

    expect(calls).toBe(0);
  });

  it('keeps delivering to other subscribers when one handler throws', async () => {
    const bus = new BusClient({ transport, clientId: 'isolated' });
    const received: string[] = [];

    await bus.subscribe('orders.created', () => {
      throw new Error('boom');
    }, BROADCAST);
    await bus.subscribe('orders.created', () => {
      received.push('ok');
    }, BROADCAST);

    await bus.publish('orders.created', {});
    await flush();

    expect(received).toEqual(['ok']);
  });

  it('stops delivery and releases the transport listener on unsubscribe', async () => {
    const bus = new BusClient({ transport, clientId: 'leaver' });
    let calls = 0;
    const subscription = await bus.subscribe('orders.created', () => {
      calls++;
    }, BROADCAST);
    expect(transport.listenerCount('orders.created')).toBe(1);

    await subscription.unsubscribe();
    await bus.publish('orders.created', {});
    await flush();

    expect(calls).toBe(0);
    expect(transport.listenerCount('orders.created')).toBe(0);
  });

  it('rejects topics that are not <domain>.<event>', async () => {
    const bus = new BusClient({ transport, clientId: 'topics' });

    await expect(bus.publish('orders', {})).rejects.toBeInstanceOf(InvalidArgumentError);
    await expect(bus.subscribe('', () => undefined, BROADCAST)).rejects.toBeInstanceOf(InvalidArgumentError);
  });

  it('rejects payloads carrying prototype keys', async () => {
    const bus = new BusClient({ transport, clientId: 'guarded' });
    const payload: Record<string, unknown> = JSON.parse('{"__proto__": {"polluted": true}}');

    await expect(bus.publish('orders.created', payload)).rejects.toThrow('Unsafe payload');
  });

  it('requires a group name for consumer groups', async () => {
    const bus = new BusClient({ transport, clientId: 'groups' });

    await expect(bus.subscribe('jobs.created', () => undefined, consumerGroup('  '))).rejects.toBeInstanceOf(
      InvalidArgumentError
    );
  });

  describe('request/response', () => {
    it('returns the correlated response', async () => {
      const responder = new BusClient({ transport, clientId: 'calculator' });
      const requester = new BusClient({ transport, clientId: 'asker' });

      await responder.subscribe('math.add', async (message) => {
        const a = Number(message.payload.a);
        const b = Number(message.payload.b);
        await responder.respond(message, { sum: a + b });
      }, consumerGroup('calculator'));

      const reply = await requester.request('math.add', { a: 1, b: 2 }, { timeoutMs: 1_000 });

      expect(reply.kind).toBe('response');
      expect(reply.payload).toEqual({ sum: 3 });
      expect(reply.sender).toBe('calculator');
    });

    it('skips replies whose correlation id does not match', async () => {
      const responder = new BusClient({ transport, clientId: 'echo' });
      const requester = new BusClient({ transport, clientId: 'asker' });

      await responder.subscribe('svc.echo', async (message) => {
        if (!message.replyTo) {
          return;
        }
        await transport.publish(
          message.replyTo,
          JSON.stringify({
            id: 'stray',
            topic: message.replyTo,
            kind: 'response',
            payload: { text: 'stray' },
            correlationId: 'someone-else',
            sender: 'echo',
            sentAt: 0
          })
        );
        await responder.respond(message, { text: String(message.payload.text) });
      }, BROADCAST);

      const reply = await requester.request('svc.echo', { text: 'hello' }, { timeoutMs: 1_000 });

      expect(reply.payload).toEqual({ text: 'hello' });
    });

    it('times out and tears down the reply subscription', async () => {
      const requester = new BusClient({ transport, clientId: 'asker', generateId: sequentialIds() });

      await expect(requester.request('svc.silent', {}, { timeoutMs: 20 })).rejects.toBeInstanceOf(RequestTimeoutError);
      expect(transport.listenerCount('reply.asker.id-1')).toBe(0);
    });

    it('rejects with the abort reason when the signal fires', async () => {
      const requester = new BusClient({ transport, clientId: 'asker' });
      const controller = new AbortController();

      const pending = requester.request('svc.silent', {}, { timeoutMs: 5_000, signal: controller.signal });
      await flush();
      controller.abort(new Error('caller gave up'));

      await expect(pending).rejects.toThrow('caller gave up');
    });

    it('refuses to answer anything but a request', async () => {
      const bus = new BusClient({ transport, clientId: 'picky' });
      const event: Message = {
        id: 'e-1',
        topic: 'orders.created',
        kind: 'event',
        payload: {},
        correlationId: 'e-1',
        sender: 'someone',
        sentAt: 0
      };

      await expect(bus.respond(event, {})).rejects.toBeInstanceOf(InvalidArgumentError);
    });
  });

  describe('transport failures', () => {
    it('retries a failed publish with backoff', async () => {
      const flaky = new FlakyTransport(2);
      const bus = new BusClient({ transport: flaky, clientId: 'retrier', publishBackoffMs: 1 });
      let calls = 0;
      await bus.subscribe('orders.created', () => {
        calls++;
      }, BROADCAST);

      await bus.publish('orders.created', {});
      await flush();

      expect(flaky.publishAttempts).toBe(3);
      expect(calls).toBe(1);
    });

    it('raises BusUnavailableError once the retry budget is spent', async () => {
      const flaky = new FlakyTransport(Number.POSITIVE_INFINITY);
      const bus = new BusClient({ transport: flaky, clientId: 'doomed', publishMaxAttempts: 3, publishBackoffMs: 1 });

      const error = await bus.publish('orders.created', {}).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(BusUnavailableError);
      expect(error).toMatchObject({ attempts: 3, code: 'BUS_UNAVAILABLE' });
      expect(flaky.publishAttempts).toBe(3);
    });

    it('abandons a publish that is backing off when the client closes', async () => {
      const flaky = new FlakyTransport(Number.POSITIVE_INFINITY);
      const bus = new BusClient({ transport: flaky, clientId: 'quitter', publishMaxAttempts: 5, publishBackoffMs: 60_000 });

      const outcome = bus.publish('orders.created', {}).catch((caught: unknown) => caught);
      await flush();
      await bus.close();

      const error = await outcome;
      expect(error).toBeInstanceOf(BusUnavailableError);
      expect(error).toMatchObject({ attempts: 0, code: 'BUS_UNAVAILABLE' });
      expect(flaky.publishAttempts).toBe(1);
    });
  });

  describe('close', () => {
    it('fails pending requests and refuses further use', async () => {
      const bus = new BusClient({ transport, clientId: 'closer' });

      const pending = bus.request('svc.silent', {}, { timeoutMs: 5_000 });
      const outcome = expect(pending).rejects.toBeInstanceOf(BusUnavailableError);
      await flush();
      await bus.close();

      await outcome;
      await expect(bus.publish('orders.created', {})).rejects.toBeInstanceOf(BusUnavailableError);
    });

    it('removes its subscriptions but leaves the shared transport usable', async () => {
      const closing = new BusClient({ transport, clientId: 'closing' });
      const staying = new BusClient({ transport, clientId: 'staying' });
      let stayingCalls = 0;

      await closing.subscribe('orders.created', () => undefined, BROADCAST);
      await staying.subscribe('orders.created', () => {
        stayingCalls++;
      }, BROADCAST);
      await closing.close();

      expect(transport.listenerCount('orders.created')).toBe(1);
      await staying.publish('orders.created', {});
      await flush();
      expect(stayingCalls).toBe(1);
    });
  });
});
