import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { HashedEmbedder } from './embeddings.js';
import { LanceVectorDatabase } from './lancedb.js';
import { MEMORY_TABLE_NAME, MemoryStore, SENTINEL_ID } from './memoryStore.js';

describe('lancedb engine', () => {
  let directory: string;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    directory = await mkdtemp(join(tmpdir(), 'clip-lancedb-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('stores and searches items on disk, excluding the sentinel', async () => {
    const store = new MemoryStore(await LanceVectorDatabase.connect(directory), new HashedEmbedder());

    const id = await store.addItem('rsync -avz ./site server:/var/www', 'Terminal', ['deploy']);
    await store.addItem('lunch order for friday', 'Slack');

    const hits = await store.search('rsync -avz ./site server:/var/www', 5);
    expect(hits[0]).toMatchObject({ id, sourceApp: 'Terminal', tags: ['deploy'] });
    expect(hits.map((hit) => hit.id)).not.toContain(SENTINEL_ID);
    await expect(store.count()).resolves.toBe(2);

    await store.close();
  });

  it('keeps searching after symbol-only and non-latin items are stored', async () => {
    const store = new MemoryStore(await LanceVectorDatabase.connect(directory), new HashedEmbedder());

    const docker = await store.addItem('docker compose up', 'Terminal');
    const japanese = await store.addItem('日本語のメモ', 'Notes');
    await store.addItem('---', 'Notes');

    const hits = await store.search('docker compose up', 5);
    expect(hits[0]?.id).toBe(docker);
    expect(hits).toHaveLength(3);
    await expect(store.search('日本語のメモ', 1)).resolves.toMatchObject([{ id: japanese }]);

    await store.close();
  });

  it('drops rows whose distance is not a number instead of failing the search', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const database = await LanceVectorDatabase.connect(directory);
    const row = (id: string, vector: number[]) => ({
      id,
      text: id,
      timestamp: 1,
      source_app: 'Notes',
      tags: '[]',
      vector,
    });
    const table = await database.createTable('vectors', [row('unit', [1, 0, 0, 0])]);
    await table.add([row('zero', [0, 0, 0, 0])]);

    const results = await table.search([1, 0, 0, 0], { limit: 5, excludeIds: [] });

    expect(results.map((result) => result.id)).toEqual(['unit']);
    await database.close();
  });

  it('reopens the existing table and checks its vector width', async () => {
    const first = new MemoryStore(await LanceVectorDatabase.connect(directory), new HashedEmbedder());
    await first.addItem('persisted', 'Notes');
    await first.close();

    const database = await LanceVectorDatabase.connect(directory);
    await expect(database.tableNames()).resolves.toEqual([MEMORY_TABLE_NAME]);

    const reopened = new MemoryStore(database, new HashedEmbedder());
    await expect(reopened.count()).resolves.toBe(1);

    vi.spyOn(console, 'error').mockImplementation(() => {});
    const narrow = new MemoryStore(database, new HashedEmbedder(8));
    await expect(narrow.init()).rejects.toThrow('stores 256-dimensional vectors');

    await reopened.close();
  });
});
