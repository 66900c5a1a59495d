import type { FastifyInstance } from 'fastify';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ClipboardAgent } from '../agents/clipboardAgent.js';
import { CoreMemory } from '../agents/coreMemory.js';
import { buildApp } from '../app.js';
import { MockProvider } from '../llm/providers/mock.js';
import { LLMRouter } from '../llm/router.js';
import { HashedEmbedder, type Embedder } from '../memory/embeddings.js';
import { InMemoryVectorDatabase } from '../memory/inMemoryVectorDatabase.js';
import { MemoryStore } from '../memory/memoryStore.js';

async function buildTestApp(
  database: InMemoryVectorDatabase,
  embedder: Embedder,
): Promise<{ app: FastifyInstance; memoryStore: MemoryStore }> {
  const memoryStore = new MemoryStore(database, embedder);
  const chat = new LLMRouter({ mock: new MockProvider() });
  const agent = new ClipboardAgent({
    memory: memoryStore,
    chat,
    tools: { execute: vi.fn() },
    coreMemory: new CoreMemory(),
    models: { chat: 'chat-model', fast: 'fast-model', vision: 'vision-model' },
  });
  const app = await buildApp({ agent, memoryStore, mode: () => chat.mode }, { logLevel: false, maxImageBytes: 1024 });
  return { app, memoryStore };
}

describe('health and memory routes', () => {
  let app: FastifyInstance;
  let database: InMemoryVectorDatabase;
  let memoryStore: MemoryStore;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    database = new InMemoryVectorDatabase();
    ({ app, memoryStore } = await buildTestApp(database, new HashedEmbedder()));
  });

  afterEach(async () => {
    await app.close();
  });

  it('reports a healthy store and the model mode', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      status: 'ok',
      service: 'clipboard-sidecar',
      mode: 'mock',
      memory: {
        backend: 'memory',
        embeddingModel: 'hashed-bow-v2',
        initialized: true,
        error: null,
      },
    });
  });

  it('reports a failed store initialization with 503', async () => {
    vi.spyOn(database, 'tableNames').mockRejectedValue(new Error('disk gone'));

    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(503);
    expect(response.json()).toMatchObject({
      status: 'degraded',
      memory: { initialized: false, error: 'Memory store initialization failed: disk gone' },
    });
  });

  it('reports a closed store as degraded', async () => {
    await memoryStore.init();
    await memoryStore.close();

    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(503);
    expect(response.json()).toMatchObject({
      status: 'degraded',
      memory: { initialized: false, error: 'Memory store is closed' },
    });
  });

  it('rejects blank text with 400', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/v1/memory/add',
      payload: { text: '   ', source_app: 'Notes' },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ error: 'Invalid request' });
  });

  it('adds an item and finds it again', async () => {
    const added = await app.inject({
      method: 'POST',
      url: '/v1/memory/add',
      payload: { text: 'docker compose up --build', source_app: 'Terminal', tags: ['docker', 'docker'] },
    });
    expect(added.statusCode).toBe(200);
    const { id } = added.json<{ id: string }>();
    expect(typeof id).toBe('string');

    const found = await app.inject({
      method: 'GET',
      url: '/v1/memory/search',
      query: { query: 'docker compose up --build', limit: '1' },
    });

    expect(found.statusCode).toBe(200);
    expect(found.json()).toMatchObject({
      query: 'docker compose up --build',
      count: 1,
      items: [{ id, text: 'docker compose up --build', source_app: 'Terminal', tags: ['docker'] }],
    });
  });

  it('rejects an add without text', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/v1/memory/add',
      payload: { source_app: 'Terminal' },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ error: 'Invalid request' });
  });

  it('maps embedding failures to 500 with the message', async () => {
    await app.close();
    const failing: Embedder = {
      model: 'failing',
      dimensions: 4,
      embed: async () => {
        throw new Error('quota exceeded');
      },
    };
    ({ app } = await buildTestApp(new InMemoryVectorDatabase(), failing));

    const response = await app.inject({
      method: 'POST',
      url: '/v1/memory/add',
      payload: { text: 'x', source_app: 'Notes' },
    });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({ error: 'Embedding failed: quota exceeded', code: 'EMBEDDING_FAILED' });
  });
});
