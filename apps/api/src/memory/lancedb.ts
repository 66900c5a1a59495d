import { mkdir } from 'fs/promises';
import * as lancedb from '@lancedb/lancedb';
import { z } from 'zod';
import type {
  VectorDatabase,
  VectorRow,
  VectorSearchOptions,
  VectorSearchRow,
  VectorTable,
} from './types.js';

// Rows come back from the engine untyped; validate the columns we read.
const SearchRowSchema = z.object({
  id: z.string(),
  text: z.string(),
  timestamp: z.number(),
  source_app: z.string(),
  tags: z.string(),
  // Cosine distance against a zero vector comes back as NaN.
  _distance: z.union([z.number(), z.nan()]),
});

function quote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

function excludeIdsPredicate(ids: string[]): string | null {
  if (ids.length === 0) return null;
  return `id NOT IN (${ids.map(quote).join(', ')})`;
}

function toRecord(row: VectorRow): Record<string, unknown> {
  return {
    id: row.id,
    text: row.text,
    timestamp: row.timestamp,
    source_app: row.source_app,
    tags: row.tags,
    vector: row.vector,
  };
}

class LanceVectorTable implements VectorTable {
  constructor(private readonly table: lancedb.Table) {}

  async add(rows: VectorRow[]): Promise<void> {
    await this.table.add(rows.map(toRecord));
  }

  async search(vector: number[], options: VectorSearchOptions): Promise<VectorSearchRow[]> {
    let query = this.table.vectorSearch(vector).distanceType('cosine').limit(options.limit);
    const predicate = excludeIdsPredicate(options.excludeIds);
    if (predicate) {
      query = query.where(predicate);
    }

    const rows: unknown[] = await query.toArray();
    const results: VectorSearchRow[] = [];
    for (const row of rows) {
      const parsed = SearchRowSchema.safeParse(row);
      if (!parsed.success) {
        console.warn('[memoryStore] skipping unreadable search row:', parsed.error.issues[0]?.message);
        continue;
      }
      if (!Number.isFinite(parsed.data._distance)) {
        console.warn(`[memoryStore] skipping row ${parsed.data.id} without a usable distance`);
        continue;
      }
      results.push(parsed.data);
    }
    return results;
  }

  async countRows(excludeIds: string[]): Promise<number> {
    const predicate = excludeIdsPredicate(excludeIds);
    return predicate ? this.table.countRows(predicate) : this.table.countRows();
  }

  async dimensions(): Promise<number | null> {
    const schema = await this.table.schema();
    const type: unknown = schema.fields.find((field) => field.name === 'vector')?.type;
    if (type && typeof type === 'object' && 'listSize' in type && typeof type.listSize === 'number') {
      return type.listSize;
    }
    return null;
  }
}

/** Embedded LanceDB database in a local directory. */
export class LanceVectorDatabase implements VectorDatabase {
  readonly backend = 'lancedb' as const;

  private constructor(private readonly connection: lancedb.Connection) {}

  static async connect(directory: string): Promise<LanceVectorDatabase> {
    await mkdir(directory, { recursive: true });
    const connection = await lancedb.connect(directory);
    return new LanceVectorDatabase(connection);
  }

  tableNames(): Promise<string[]> {
    return this.connection.tableNames();
  }

  async createTable(name: string, rows: VectorRow[]): Promise<VectorTable> {
    const table = await this.connection.createTable(name, rows.map(toRecord), { mode: 'create' });
    return new LanceVectorTable(table);
  }

  async openTable(name: string): Promise<VectorTable> {
    const table = await this.connection.openTable(name);
    return new LanceVectorTable(table);
  }

  async close(): Promise<void> {
    if (this.connection.isOpen()) {
      this.connection.close();
    }
  }
}
