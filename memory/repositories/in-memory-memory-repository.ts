import { isExpired, type MemoryItem, type MemoryType, type MemoryTypeStats } from '../types';
import type { ListCursor, ListPage, MemoryRepository } from './memory-repository';

export class InMemoryMemoryRepository implements MemoryRepository {
  private readonly items = new Map<string, MemoryItem>();

  async save(item: MemoryItem): Promise<void> {
    // Stored and returned as copies so callers cannot mutate repository state.
    this.items.set(itemKey(item.type, item.key), structuredClone(item));
  }

  async get(type: MemoryType, key: string): Promise<MemoryItem | undefined> {
    const item = this.items.get(itemKey(type, key));
    return item ? structuredClone(item) : undefined;
  }

  async delete(type: MemoryType, key: string): Promise<boolean> {
    return this.items.delete(itemKey(type, key));
  }

  async list(type: MemoryType, page: ListPage): Promise<MemoryItem[]> {
    const { after } = page;
    return [...this.items.values()]
      .filter((item) => item.type === type && (!after || compareItems(item, after) > 0))
      .sort(compareItems)
      .slice(0, page.limit)
      .map((item) => structuredClone(item));
  }

  async stats(type: MemoryType, now: number): Promise<MemoryTypeStats> {
    let count = 0;
    let oldest: number | null = null;
    let newest: number | null = null;
    for (const item of this.items.values()) {
      if (item.type !== type || isExpired(item, now)) {
        continue;
      }
      count++;
      oldest = oldest === null ? item.storedAt : Math.min(oldest, item.storedAt);
      newest = newest === null ? item.storedAt : Math.max(newest, item.storedAt);
    }
    return { count, oldest, newest };
  }

  async deleteExpired(now: number): Promise<number> {
    let removed = 0;
    for (const [id, item] of this.items) {
      if (isExpired(item, now)) {
        this.items.delete(id);
        removed++;
      }
    }
    return removed;
  }
}

function itemKey(type: MemoryType, key: string): string {
  return `${type}\u0000${key}`;
}

function compareItems(a: ListCursor, b: ListCursor): number {
  if (a.storedAt !== b.storedAt) {
    return a.storedAt - b.storedAt;
  }
  return a.key < b.key ? -1 : a.key > b.key ? 1 : 0;
}
