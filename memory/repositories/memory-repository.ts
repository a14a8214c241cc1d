import type { MemoryItem, MemoryType, MemoryTypeStats } from '../types';

/** Position in the (storedAt, key) listing order. */
export interface ListCursor {
  storedAt: number;
  key: string;
}

export interface ListPage {
  limit: number;
  /** Only items strictly after this position are returned. */
  after?: ListCursor;
}

/**
 * Storage keyed by (type, key). Listing is ordered by storedAt, then key.
 * Expiry is not applied here: callers decide what an expired item means.
 */
export interface MemoryRepository {
  save(item: MemoryItem): Promise<void>;
  get(type: MemoryType, key: string): Promise<MemoryItem | undefined>;
  delete(type: MemoryType, key: string): Promise<boolean>;
  list(type: MemoryType, page: ListPage): Promise<MemoryItem[]>;
  /** Counts items of the type that are unexpired at `now`. */
  stats(type: MemoryType, now: number): Promise<MemoryTypeStats>;
  deleteExpired(now: number): Promise<number>;
}
