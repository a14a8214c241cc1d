import { InMemoryTransport } from '../../bus/in-memory-transport';

/** Lets queued deliveries run to completion. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export function sequentialIds(prefix = 'id'): () => string {
  let next = 0;
  return () => `${prefix}-${++next}`;
}

/** Fails the first `failures` publishes, or every publish when `failures` is Infinity. */
export class FlakyTransport extends InMemoryTransport {
  publishAttempts = 0;

  constructor(private failures: number) {
    super();
  }

  override async publish(topic: string, data: string): Promise<void> {
    this.publishAttempts++;
    if (this.failures > 0) {
      this.failures--;
      throw new Error('connection refused');
    }
    await super.publish(topic, data);
  }
}
