import { join } from 'path';
import type { Config } from '../config.js';
import { InMemoryVectorDatabase } from './inMemoryVectorDatabase.js';
import { LanceVectorDatabase } from './lancedb.js';
import type { VectorDatabase } from './types.js';

export { MemoryStore, MEMORY_TABLE_NAME, SENTINEL_ID, normalizeTags } from './memoryStore.js';
export type { MemoryStoreStatus } from './memoryStore.js';
export { createEmbedder, HashedEmbedder, OpenAIEmbedder } from './embeddings.js';
export type { Embedder } from './embeddings.js';
export { InMemoryVectorDatabase } from './inMemoryVectorDatabase.js';
export type { MemoryItem, MemoryRetriever, MemorySearchHit, VectorDatabase } from './types.js';

export const LANCEDB_DIRNAME = 'clipboard-lancedb';

export async function openVectorDatabase(config: Config): Promise<VectorDatabase> {
  if (config.memoryBackend === 'memory') {
    return new InMemoryVectorDatabase();
  }
  return LanceVectorDatabase.connect(join(config.dataDir, LANCEDB_DIRNAME));
}
