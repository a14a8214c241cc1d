import { z } from 'zod';

export const MEMORY_TYPES = ['episodic', 'semantic', 'procedural', 'emotional', 'working'] as const;

/**
 * - episodic: a specific, timestamped event
 * - semantic: general knowledge or a fact
 * - procedural: a reusable process or recipe
 * - emotional: preferences and affective context
 * - working: scratch state for an active task, always TTL-bound
 */
export type MemoryType = (typeof MEMORY_TYPES)[number];

export type DurableMemoryType = Exclude<MemoryType, 'working'>;

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema)
  ])
);

export const memoryTypeSchema = z.enum(MEMORY_TYPES);

export interface MemoryItem {
  type: MemoryType;
  key: string;
  value: JsonValue;
  storedAt: number;
  /** Present on working memory only. */
  ttlMs?: number;
  metadata: Record<string, string>;
}

export interface StoreOptions {
  ttlMs?: number;
  metadata?: Record<string, string>;
}

export interface MemoryFilter {
  keyPrefix?: string;
  /** Every listed metadata entry must match exactly. */
  metadata?: Record<string, string>;
  /**
   * Matched against the top-level fields of an object value: strings match
   * case-insensitively as substrings, anything else must be deeply equal.
   */
  where?: Record<string, JsonValue>;
  /** Exclusive lower bound on storedAt. */
  storedAfter?: number;
  /** Exclusive upper bound on storedAt. */
  storedBefore?: number;
}

export interface MemoryTypeStats {
  count: number;
  oldest: number | null;
  newest: number | null;
}

export type MemoryStats = Record<MemoryType, MemoryTypeStats>;

export function isMemoryType(value: string): value is MemoryType {
  return MEMORY_TYPES.some((type) => type === value);
}

export function expiresAt(item: MemoryItem): number | null {
  return item.ttlMs === undefined ? null : item.storedAt + item.ttlMs;
}

export function isExpired(item: MemoryItem, now: number): boolean {
  const expiry = expiresAt(item);
  return expiry !== null && expiry <= now;
}
