import { newDb } from 'pg-mem';
import { PostgresMemoryRepository } from '../../memory/repositories/postgres-memory-repository';
import type { MemoryItem } from '../../memory/types';

async function createRepository(): Promise<PostgresMemoryRepository> {
  const db = newDb();
  const pg = db.adapters.createPg();
  const pool = new pg.Pool();
  const repo = new PostgresMemoryRepository(pool);
  await repo.ensureSchema();
  return repo;
}

describe('PostgresMemoryRepository', () => {
  it('persists and retrieves items with their metadata', async () => {
    const repo = await createRepository();
    const memory: MemoryItem = {
      type: 'semantic',
      key: 'earth',
      value: { shape: 'round', confidence: 0.9 },
      storedAt: 1_000,
      metadata: { source: 'atlas' }
    };

    await repo.save(memory);
    const stored = await repo.get('semantic', 'earth');

    expect(stored).toEqual(memory);
  });

  it('round-trips scalar values without reinterpreting strings', async () => {
    const repo = await createRepository();

    await repo.save({ type: 'semantic', key: 'quote', value: "O'Reilly publishes books", storedAt: 1, metadata: {} });
    await repo.save({ type: 'semantic', key: 'numeric-text', value: '42', storedAt: 2, metadata: {} });

    expect((await repo.get('semantic', 'quote'))?.value).toBe("O'Reilly publishes books");
    expect((await repo.get('semantic', 'numeric-text'))?.value).toBe('42');
  });

  it('overwrites on save and keeps types apart', async () => {
    const repo = await createRepository();

    await repo.save({ type: 'procedural', key: 'deploy', value: ['build'], storedAt: 1, metadata: {} });
    await repo.save({ type: 'procedural', key: 'deploy', value: ['build', 'ship'], storedAt: 2, metadata: {} });
    await repo.save({ type: 'episodic', key: 'deploy', value: 'ran once', storedAt: 3, metadata: {} });

    expect((await repo.get('procedural', 'deploy'))?.value).toEqual(['build', 'ship']);
    expect((await repo.get('episodic', 'deploy'))?.value).toBe('ran once');
  });

  it('returns undefined for a missing key and reports deletes', async () => {
    const repo = await createRepository();
    await repo.save({ type: 'emotional', key: 'likes', value: 'tea', storedAt: 1, metadata: {} });

    expect(await repo.get('emotional', 'missing')).toBeUndefined();
    expect(await repo.delete('emotional', 'likes')).toBe(true);
    expect(await repo.delete('emotional', 'likes')).toBe(false);
  });

  it('lists pages ordered by storedAt then key, resuming after a cursor', async () => {
    const repo = await createRepository();
    await repo.save({ type: 'episodic', key: 'c', value: 3, storedAt: 20, metadata: {} });
    await repo.save({ type: 'episodic', key: 'b', value: 2, storedAt: 10, metadata: {} });
    await repo.save({ type: 'episodic', key: 'a', value: 1, storedAt: 20, metadata: {} });

    const firstPage = await repo.list('episodic', { limit: 2 });
    const secondPage = await repo.list('episodic', { limit: 2, after: { storedAt: 20, key: 'a' } });

    expect(firstPage.map((entry) => entry.key)).toEqual(['b', 'a']);
    expect(secondPage.map((entry) => entry.key)).toEqual(['c']);
  });

  it('computes stats and sweeps expired working memory', async () => {
    const repo = await createRepository();
    await repo.save({ type: 'working', key: 'live', value: 1, storedAt: 100, ttlMs: 1_000, metadata: {} });
    await repo.save({ type: 'working', key: 'stale', value: 2, storedAt: 50, ttlMs: 10, metadata: {} });

    expect(await repo.stats('working', 500)).toEqual({ count: 1, oldest: 100, newest: 100 });
    expect(await repo.stats('semantic', 500)).toEqual({ count: 0, oldest: null, newest: null });
    expect(await repo.deleteExpired(500)).toBe(1);
    expect((await repo.get('working', 'live'))?.ttlMs).toBe(1_000);
  });
});
