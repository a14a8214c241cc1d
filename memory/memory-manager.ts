import { z } from 'zod';
import { InvalidArgumentError, NotFoundError } from '../core/errors';
import { KeyedLock } from '../core/keyed-lock';
import { silentLogger, type Logger } from '../core/logging/logger';
import { assertSafePayload } from '../core/validation';
import { matchesFilter } from './memory-filter';
import type { ListCursor, MemoryRepository } from './repositories/memory-repository';
import {
  MEMORY_TYPES,
  isExpired,
  jsonValueSchema,
  memoryTypeSchema,
  type JsonValue,
  type MemoryFilter,
  type MemoryItem,
  type MemoryStats,
  type MemoryType,
  type StoreOptions
} from './types';

const MAX_KEY_LENGTH = 512;

const storeOptionsSchema = z
  .object({
    ttlMs: z.number().int().positive().optional(),
    metadata: z.record(z.string()).optional()
  })
  .strict();

const filterSchema = z
  .object({
    keyPrefix: z.string().optional(),
    metadata: z.record(z.string()).optional(),
    where: z.record(jsonValueSchema).optional(),
    storedAfter: z.number().finite().optional(),
    storedBefore: z.number().finite().optional()
  })
  .strict();

export interface IMemoryManager {
  store(type: MemoryType, key: string, value: JsonValue, options?: StoreOptions): Promise<void>;
  retrieve(type: MemoryType, key: string): Promise<JsonValue>;
  retrieveItem(type: MemoryType, key: string): Promise<MemoryItem>;
  list(type: MemoryType, filter?: MemoryFilter): AsyncIterable<MemoryItem>;
  delete(type: MemoryType, key: string): Promise<boolean>;
  stats(): Promise<MemoryStats>;
}

export interface SweepTimers {
  setInterval: typeof setInterval;
  clearInterval: typeof clearInterval;
}

export interface MemoryManagerOptions {
  /** Holds episodic, semantic, procedural and emotional memory. */
  durable: MemoryRepository;
  /** Holds working memory. Usually in-process even when `durable` is Postgres. */
  working: MemoryRepository;
  logger?: Logger;
  getTime?: () => number;
  timers?: SweepTimers;
  /** Rows fetched per repository round trip while listing. */
  pageSize?: number;
}

export class MemoryManager implements IMemoryManager {
  private readonly durable: MemoryRepository;
  private readonly working: MemoryRepository;
  private readonly logger: Logger;
  private readonly getTime: () => number;
  private readonly timers: SweepTimers;
  private readonly pageSize: number;
  private readonly locks = new KeyedLock();
  private sweepHandle: ReturnType<typeof setInterval> | null = null;

  constructor(options: MemoryManagerOptions) {
    const pageSize = options.pageSize ?? 100;
    if (!Number.isInteger(pageSize) || pageSize < 1) {
      throw new Error(`pageSize must be a positive integer. Got: ${options.pageSize}`);
    }
    this.durable = options.durable;
    this.working = options.working;
    this.logger = (options.logger ?? silentLogger).child('memory');
    this.getTime = options.getTime ?? (() => Date.now());
    this.timers = options.timers ?? {
      setInterval: globalThis.setInterval.bind(globalThis),
      clearInterval: globalThis.clearInterval.bind(globalThis)
    };
    this.pageSize = pageSize;
  }

  /**
   * Stores `value` under (type, key), replacing any previous item. Working
   * memory requires a TTL; the other types reject one.
   */
  async store(type: MemoryType, key: string, value: JsonValue, options: StoreOptions = {}): Promise<void> {
    assertType(type);
    assertKey(key);

    const parsedOptions = storeOptionsSchema.safeParse(options);
    if (!parsedOptions.success) {
      throw new InvalidArgumentError(`Invalid store options: ${parsedOptions.error.issues[0]?.message ?? 'unknown'}`);
    }
    const { ttlMs, metadata } = parsedOptions.data;
    if (type === 'working' && ttlMs === undefined) {
      throw new InvalidArgumentError('Working memory requires ttlMs');
    }
    if (type !== 'working' && ttlMs !== undefined) {
      throw new InvalidArgumentError(`ttlMs is only accepted for working memory, not ${type}`);
    }

    assertSafePayload({ value });
    if (!jsonValueSchema.safeParse(value).success) {
      throw new InvalidArgumentError('Memory value must be JSON-serializable');
    }

    await this.locks.run(lockKey(type, key), async () => {
      const item: MemoryItem = {
        type,
        key,
        value,
        storedAt: this.getTime(),
        metadata: { ...(metadata ?? {}) }
      };
      if (ttlMs !== undefined) {
        item.ttlMs = ttlMs;
      }
      await this.repositoryFor(type).save(item);
    });
    this.logger.debug('Stored memory item', { type, key });
  }

  async retrieve(type: MemoryType, key: string): Promise<JsonValue> {
    const item = await this.retrieveItem(type, key);
    return item.value;
  }

  /**
   * Expired working memory is treated as absent and removed on the way out.
   */
  async retrieveItem(type: MemoryType, key: string): Promise<MemoryItem> {
    assertType(type);
    assertKey(key);

    return this.locks.run(lockKey(type, key), async () => {
      const repository = this.repositoryFor(type);
      const item = await repository.get(type, key);
      if (!item) {
        throw new NotFoundError(`No ${type} memory stored under "${key}"`);
      }
      if (isExpired(item, this.getTime())) {
        await repository.delete(type, key);
        throw new NotFoundError(`No ${type} memory stored under "${key}"`);
      }
      return item;
    });
  }

  /**
   * Lazily pages through the items of one type, oldest first. Each iteration
   * starts over from the beginning. Each page resumes after the last (storedAt, key)
   * seen.
   */
  list(type: MemoryType, filter: MemoryFilter = {}): AsyncIterable<MemoryItem> {
    assertType(type);
    const parsed = filterSchema.safeParse(filter);
    if (!parsed.success) {
      throw new InvalidArgumentError(`Invalid memory filter: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    }
    const repository = this.repositoryFor(type);
    return {
      [Symbol.asyncIterator]: () => this.iterate(repository, type, filter)
    };
  }

  async delete(type: MemoryType, key: string): Promise<boolean> {
    assertType(type);
    assertKey(key);
    return this.locks.run(lockKey(type, key), () => this.repositoryFor(type).delete(type, key));
  }

  async stats(): Promise<MemoryStats> {
    const now = this.getTime();
    const entries = await Promise.all(
      MEMORY_TYPES.map(async (type) => [type, await this.repositoryFor(type).stats(type, now)] as const)
    );
    return {
      episodic: lookup(entries, 'episodic'),
      semantic: lookup(entries, 'semantic'),
      procedural: lookup(entries, 'procedural'),
      emotional: lookup(entries, 'emotional'),
      working: lookup(entries, 'working')
    };
  }

  /** Removes expired working memory. Returns how many items were dropped. */
  async sweepExpired(): Promise<number> {
    const removed = await this.working.deleteExpired(this.getTime());
    if (removed > 0) {
      this.logger.debug('Swept expired working memory', { removed });
    }
    return removed;
  }

  startSweep(intervalMs: number): void {
    if (this.sweepHandle) {
      return;
    }
    if (!Number.isFinite(intervalMs) || intervalMs < 1) {
      throw new Error(`Sweep interval must be a positive number. Got: ${intervalMs}`);
    }
    this.sweepHandle = this.timers.setInterval(() => {
      this.sweepExpired().catch((error: unknown) => {
        this.logger.warn('Working memory sweep failed', { error });
      });
    }, intervalMs);
  }

  stopSweep(): void {
    if (this.sweepHandle) {
      this.timers.clearInterval(this.sweepHandle);
      this.sweepHandle = null;
    }
  }

  private async *iterate(
    repository: MemoryRepository,
    type: MemoryType,
    filter: MemoryFilter
  ): AsyncGenerator<MemoryItem> {
    let after: ListCursor | undefined;
    for (;;) {
      const page = await repository.list(type, after ? { limit: this.pageSize, after } : { limit: this.pageSize });
      const now = this.getTime();
      for (const item of page) {
        if (!isExpired(item, now) && matchesFilter(item, filter)) {
          yield item;
        }
      }
      const last = page[page.length - 1];
      if (page.length < this.pageSize || !last) {
        return;
      }
      after = { storedAt: last.storedAt, key: last.key };
    }
  }

  private repositoryFor(type: MemoryType): MemoryRepository {
    return type === 'working' ? this.working : this.durable;
  }
}

/** Drains an async sequence into an array, stopping after `limit` items when given. */
export async function collect<T>(source: AsyncIterable<T>, limit?: number): Promise<T[]> {
  const items: T[] = [];
  if (limit !== undefined && limit <= 0) {
    return items;
  }
  for await (const item of source) {
    items.push(item);
    if (limit !== undefined && items.length >= limit) {
      break;
    }
  }
  return items;
}

function assertType(type: string): asserts type is MemoryType {
  if (!memoryTypeSchema.safeParse(type).success) {
    throw new InvalidArgumentError(`Unknown memory type: ${type}`);
  }
}

function assertKey(key: string): void {
  if (typeof key !== 'string' || key.length === 0) {
    throw new InvalidArgumentError('Memory key must be a non-empty string');
  }
  if (key.length > MAX_KEY_LENGTH) {
    throw new InvalidArgumentError(`Memory key exceeds ${MAX_KEY_LENGTH} characters`);
  }
}

function lockKey(type: MemoryType, key: string): string {
  return `${type}\u0000${key}`;
}

function lookup<V>(entries: ReadonlyArray<readonly [MemoryType, V]>, type: MemoryType): V {
  const entry = entries.find(([candidate]) => candidate === type);
  if (!entry) {
    throw new Error(`Missing stats for ${type}`);
  }
  return entry[1];
}
