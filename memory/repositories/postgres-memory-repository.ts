import type { Pool } from 'pg';
import { isMemoryType, type JsonValue, type MemoryItem, type MemoryType, type MemoryTypeStats } from '../types';
import type { ListPage, MemoryRepository } from './memory-repository';

export class PostgresMemoryRepository implements MemoryRepository {
  constructor(private readonly pool: Pool) {}

  async ensureSchema(): Promise<void> {
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS memory_items (
        id TEXT PRIMARY KEY,
        type TEXT NOT NULL,
        item_key TEXT NOT NULL,
        value_json TEXT NOT NULL,
        metadata_json TEXT NOT NULL,
        stored_at BIGINT NOT NULL,
        ttl_ms BIGINT,
        expires_at BIGINT
      );
    `);
  }

  async save(item: MemoryItem): Promise<void> {
    await this.pool.query(
      `
      INSERT INTO memory_items (id, type, item_key, value_json, metadata_json, stored_at, ttl_ms, expires_at)
      VALUES ($1,$2,$3,$4,$5,$6,$7,$8)
      ON CONFLICT (id) DO UPDATE SET
        value_json = EXCLUDED.value_json,
        metadata_json = EXCLUDED.metadata_json,
        stored_at = EXCLUDED.stored_at,
        ttl_ms = EXCLUDED.ttl_ms,
        expires_at = EXCLUDED.expires_at
      `,
      [
        rowId(item.type, item.key),
        item.type,
        item.key,
        JSON.stringify(item.value),
        JSON.stringify(item.metadata),
        item.storedAt,
        item.ttlMs ?? null,
        item.ttlMs === undefined ? null : item.storedAt + item.ttlMs
      ]
    );
  }

  async get(type: MemoryType, key: string): Promise<MemoryItem | undefined> {
    const result = await this.pool.query<MemoryRow>(`SELECT * FROM memory_items WHERE id = $1`, [rowId(type, key)]);
    const row = result.rows[0];
    return row ? toMemoryItem(row) : undefined;
  }

  async delete(type: MemoryType, key: string): Promise<boolean> {
    const result = await this.pool.query<{ id: string }>(`DELETE FROM memory_items WHERE id = $1 RETURNING id`, [
      rowId(type, key)
    ]);
    return result.rows.length > 0;
  }

  async list(type: MemoryType, page: ListPage): Promise<MemoryItem[]> {
    if (!Number.isInteger(page.limit) || page.limit <= 0) {
      throw new Error('Invalid page');
    }
    const { after } = page;
    const result = after
      ? await this.pool.query<MemoryRow>(
          `SELECT * FROM memory_items
           WHERE type = $1 AND (stored_at > $2 OR (stored_at = $2 AND item_key > $3))
           ORDER BY stored_at ASC, item_key ASC LIMIT ${page.limit}`,
          [type, after.storedAt, after.key]
        )
      : await this.pool.query<MemoryRow>(
          `SELECT * FROM memory_items WHERE type = $1 ORDER BY stored_at ASC, item_key ASC LIMIT ${page.limit}`,
          [type]
        );
    return result.rows.map(toMemoryItem);
  }

  async stats(type: MemoryType, now: number): Promise<MemoryTypeStats> {
    const result = await this.pool.query<StatsRow>(
      `
      SELECT COUNT(*) AS total, MIN(stored_at) AS oldest, MAX(stored_at) AS newest
      FROM memory_items
      WHERE type = $1 AND (expires_at IS NULL OR expires_at > $2)
      `,
      [type, now]
    );
    const row = result.rows[0];
    if (!row) {
      return { count: 0, oldest: null, newest: null };
    }
    return {
      count: Number(row.total),
      oldest: row.oldest === null ? null : Number(row.oldest),
      newest: row.newest === null ? null : Number(row.newest)
    };
  }

  async deleteExpired(now: number): Promise<number> {
    const result = await this.pool.query<{ id: string }>(
      `DELETE FROM memory_items WHERE expires_at IS NOT NULL AND expires_at <= $1 RETURNING id`,
      [now]
    );
    return result.rows.length;
  }
}

// BIGINT columns come back as strings from pg.
type MemoryRow = {
  id: string;
  type: string;
  item_key: string;
  value_json: string;
  metadata_json: string;
  stored_at: number | string;
  ttl_ms: number | string | null;
};

type StatsRow = {
  total: number | string;
  oldest: number | string | null;
  newest: number | string | null;
};

function rowId(type: MemoryType, key: string): string {
  return `${type}:${key}`;
}

function toMemoryItem(row: MemoryRow): MemoryItem {
  if (!isMemoryType(row.type)) {
    throw new Error(`Unknown memory type in row ${row.id}: ${row.type}`);
  }
  const value: JsonValue = JSON.parse(row.value_json);
  const metadata = parseMetadata(row.metadata_json);
  const item: MemoryItem = {
    type: row.type,
    key: row.item_key,
    value,
    storedAt: Number(row.stored_at),
    metadata
  };
  if (row.ttl_ms !== null && row.ttl_ms !== undefined) {
    item.ttlMs = Number(row.ttl_ms);
  }
  return item;
}

function parseMetadata(json: string): Record<string, string> {
  const parsed: unknown = JSON.parse(json);
  const metadata: Record<string, string> = {};
  if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
    for (const [name, value] of Object.entries(parsed)) {
      if (typeof value === 'string') {
        metadata[name] = value;
      }
    }
  }
  return metadata;
}
