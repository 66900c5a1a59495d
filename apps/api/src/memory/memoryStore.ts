import { nanoid } from 'nanoid';
import { z } from 'zod';
import { EmbeddingError, StoreError, errorMessage } from '../errors.js';
import type { Embedder } from './embeddings.js';
import type {
  MemoryItem,
  MemoryRetriever,
  MemorySearchHit,
  VectorBackend,
  VectorDatabase,
  VectorRow,
  VectorTable,
} from './types.js';

export const MEMORY_TABLE_NAME = 'clipboard_memory';
/** Reserved id of the row that fixes the table schema; never returned from search. */
export const SENTINEL_ID = '__init__';
export const MAX_SEARCH_LIMIT = 50;
const CLOSED_MESSAGE = 'Memory store is closed';

const TagListSchema = z.array(z.string());

export interface MemoryStoreStatus {
  backend: VectorBackend;
  embeddingModel: string;
  dimensions: number;
  initialized: boolean;
  error: string | null;
}

export function normalizeTags(tags: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of tags) {
    const tag = raw.trim();
    if (!tag || seen.has(tag)) continue;
    seen.add(tag);
    result.push(tag);
  }
  return result;
}

function isZeroVector(vector: number[]): boolean {
  return vector.every((value) => value === 0);
}

function parseStoredTags(raw: string): string[] {
  try {
    const parsed = TagListSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : [];
  } catch {
    console.warn('[memoryStore] dropping unreadable tags column');
    return [];
  }
}

function toRow(item: MemoryItem): VectorRow {
  return {
    id: item.id,
    text: item.text,
    timestamp: item.timestamp,
    source_app: item.sourceApp,
    tags: JSON.stringify(item.tags),
    vector: item.embedding,
  };
}

/**
 * Archival memory: clipboard snippets with embeddings, searchable by meaning.
 *
 * The table is created lazily from a sentinel row so the vector width is
 * pinned to the embedder. Initialization happens once per store; concurrent
 * first callers share the same attempt, and a failed attempt is kept so the
 * health check can report it.
 */
export class MemoryStore implements MemoryRetriever {
  private initPromise: Promise<VectorTable> | null = null;
  private initialized = false;
  private initError: StoreError | null = null;
  private closed = false;

  constructor(
    private readonly database: VectorDatabase,
    private readonly embedder: Embedder,
    private readonly tableName: string = MEMORY_TABLE_NAME,
  ) {}

  async init(): Promise<void> {
    await this.getTable();
  }

  status(): MemoryStoreStatus {
    return {
      backend: this.database.backend,
      embeddingModel: this.embedder.model,
      dimensions: this.embedder.dimensions,
      initialized: this.initialized && !this.closed,
      error: this.closed ? CLOSED_MESSAGE : this.initError?.message ?? null,
    };
  }

  async addItem(text: string, sourceApp: string, tags: readonly string[] = []): Promise<string> {
    const table = await this.getTable();
    const embedding = await this.embed(text);
    if (isZeroVector(embedding)) {
      throw new EmbeddingError('Text has nothing to embed');
    }

    const item: MemoryItem = {
      id: nanoid(),
      text,
      timestamp: Date.now(),
      sourceApp,
      tags: normalizeTags(tags),
      embedding,
    };

    try {
      await table.add([toRow(item)]);
    } catch (error) {
      throw new StoreError(`Failed to persist memory item: ${errorMessage(error)}`, { cause: error });
    }

    console.log(`[memoryStore] Stored item ${item.id} from ${sourceApp} (${text.length} chars)`);
    return item.id;
  }

  async search(query: string, limit: number = 5): Promise<MemorySearchHit[]> {
    const boundedLimit = Math.min(Math.max(Math.floor(limit), 0), MAX_SEARCH_LIMIT);
    if (boundedLimit === 0) return [];

    const table = await this.getTable();
    const vector = await this.embed(query);
    // A blank query is unrelated to everything.
    if (isZeroVector(vector)) return [];

    try {
      const rows = await table.search(vector, { limit: boundedLimit, excludeIds: [SENTINEL_ID] });
      return rows
        .filter((row) => row.id !== SENTINEL_ID)
        .map((row) => ({
          id: row.id,
          text: row.text,
          timestamp: row.timestamp,
          sourceApp: row.source_app,
          tags: parseStoredTags(row.tags),
          distance: row._distance,
        }));
    } catch (error) {
      throw new StoreError(`Memory search failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  /** Stored items, not counting the sentinel. */
  async count(): Promise<number> {
    const table = await this.getTable();
    try {
      return await table.countRows([SENTINEL_ID]);
    } catch (error) {
      throw new StoreError(`Failed to count memory items: ${errorMessage(error)}`, { cause: error });
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.database.close();
  }

  private getTable(): Promise<VectorTable> {
    if (this.closed) {
      return Promise.reject(new StoreError(CLOSED_MESSAGE));
    }
    if (!this.initPromise) {
      this.initPromise = this.openOrCreateTable().then(
        (table) => {
          this.initialized = true;
          return table;
        },
        (error: unknown) => {
          const storeError = error instanceof StoreError
            ? error
            : new StoreError(`Memory store initialization failed: ${errorMessage(error)}`, { cause: error });
          this.initError = storeError;
          console.error('[memoryStore] initialization failed:', storeError.message);
          throw storeError;
        },
      );
    }
    return this.initPromise;
  }

  private async openOrCreateTable(): Promise<VectorTable> {
    const existing = await this.database.tableNames();

    if (existing.includes(this.tableName)) {
      const table = await this.database.openTable(this.tableName);
      const width = await table.dimensions();
      if (width !== null && width !== this.embedder.dimensions) {
        throw new StoreError(
          `Table '${this.tableName}' stores ${width}-dimensional vectors but ${this.embedder.model} produces ${this.embedder.dimensions}`,
        );
      }
      console.log(`[memoryStore] Opened existing table '${this.tableName}'`);
      return table;
    }

    const sentinel: VectorRow = {
      id: SENTINEL_ID,
      text: '',
      timestamp: Date.now(),
      source_app: 'system',
      tags: '[]',
      vector: new Array<number>(this.embedder.dimensions).fill(0),
    };
    const table = await this.database.createTable(this.tableName, [sentinel]);
    console.log(`[memoryStore] Created table '${this.tableName}' (${this.embedder.dimensions} dims)`);
    return table;
  }

  private async embed(text: string): Promise<number[]> {
    let vector: number[];
    try {
      vector = await this.embedder.embed(text);
    } catch (error) {
      throw new EmbeddingError(`Embedding failed: ${errorMessage(error)}`, { cause: error });
    }

    if (vector.length !== this.embedder.dimensions) {
      throw new EmbeddingError(
        `Embedding has ${vector.length} dimensions, expected ${this.embedder.dimensions}`,
      );
    }
    if (!vector.every((value) => Number.isFinite(value))) {
      throw new EmbeddingError('Embedding contains non-finite values');
    }
    return vector;
  }
}
