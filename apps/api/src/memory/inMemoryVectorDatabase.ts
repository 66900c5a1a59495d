import type {
  VectorDatabase,
  VectorRow,
  VectorSearchOptions,
  VectorSearchRow,
  VectorTable,
} from './types.js';

function cosineDistance(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const magnitude = Math.sqrt(normA) * Math.sqrt(normB);
  // Zero vectors are treated as unrelated to everything.
  if (magnitude === 0) return 1;
  return 1 - dot / magnitude;
}

class InMemoryVectorTable implements VectorTable {
  private rows: VectorRow[] = [];

  constructor(initialRows: VectorRow[]) {
    this.rows = initialRows.map((row) => ({ ...row, vector: [...row.vector] }));
  }

  async add(rows: VectorRow[]): Promise<void> {
    const width = this.rows[0]?.vector.length;
    for (const row of rows) {
      if (width !== undefined && row.vector.length !== width) {
        throw new Error(`Vector dimension mismatch: expected ${width}, got ${row.vector.length}`);
      }
    }
    this.rows.push(...rows.map((row) => ({ ...row, vector: [...row.vector] })));
  }

  async search(vector: number[], options: VectorSearchOptions): Promise<VectorSearchRow[]> {
    const excluded = new Set(options.excludeIds);
    return this.rows
      .filter((row) => !excluded.has(row.id))
      .map((row) => ({
        id: row.id,
        text: row.text,
        timestamp: row.timestamp,
        source_app: row.source_app,
        tags: row.tags,
        _distance: cosineDistance(vector, row.vector),
      }))
      .sort((a, b) => a._distance - b._distance)
      .slice(0, options.limit);
  }

  async countRows(excludeIds: string[]): Promise<number> {
    const excluded = new Set(excludeIds);
    return this.rows.filter((row) => !excluded.has(row.id)).length;
  }

  async dimensions(): Promise<number | null> {
    return this.rows[0]?.vector.length ?? null;
  }
}

/** Process-local engine: nothing survives a restart. Used for MEMORY_BACKEND=memory and tests. */
export class InMemoryVectorDatabase implements VectorDatabase {
  readonly backend = 'memory' as const;
  private readonly tables = new Map<string, InMemoryVectorTable>();
  private closed = false;

  async tableNames(): Promise<string[]> {
    this.assertOpen();
    return Array.from(this.tables.keys());
  }

  async createTable(name: string, rows: VectorRow[]): Promise<VectorTable> {
    this.assertOpen();
    if (this.tables.has(name)) {
      throw new Error(`Table '${name}' already exists`);
    }
    const table = new InMemoryVectorTable(rows);
    this.tables.set(name, table);
    return table;
  }

  async openTable(name: string): Promise<VectorTable> {
    this.assertOpen();
    const table = this.tables.get(name);
    if (!table) {
      throw new Error(`Table '${name}' was not found`);
    }
    return table;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error('Database connection is closed');
    }
  }
}
