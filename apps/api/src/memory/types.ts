export interface MemoryItem {
  id: string;
  text: string;
  /** Insertion time, epoch milliseconds. */
  timestamp: number;
  sourceApp: string;
  tags: string[];
  embedding: number[];
}

/** A search result. The stored embedding is not read back. */
export interface MemorySearchHit {
  id: string;
  text: string;
  timestamp: number;
  sourceApp: string;
  tags: string[];
  /** Engine-reported distance; lower is closer. */
  distance: number;
}

/** What the orchestrator needs from archival memory. */
export interface MemoryRetriever {
  search(query: string, limit: number): Promise<MemorySearchHit[]>;
}

export type VectorBackend = 'lancedb' | 'memory';

/** Row layout shared by every engine. Tags are stored as a JSON array string. */
export interface VectorRow {
  id: string;
  text: string;
  timestamp: number;
  source_app: string;
  tags: string;
  vector: number[];
}

export interface VectorSearchRow {
  id: string;
  text: string;
  timestamp: number;
  source_app: string;
  tags: string;
  _distance: number;
}

export interface VectorSearchOptions {
  limit: number;
  excludeIds: string[];
}

export interface VectorTable {
  add(rows: VectorRow[]): Promise<void>;
  /** Nearest neighbours by cosine distance, closest first. */
  search(vector: number[], options: VectorSearchOptions): Promise<VectorSearchRow[]>;
  countRows(excludeIds: string[]): Promise<number>;
  /** Dimensionality fixed by the table schema, or null when it cannot be read. */
  dimensions(): Promise<number | null>;
}

export interface VectorDatabase {
  readonly backend: VectorBackend;
  tableNames(): Promise<string[]>;
  /** Creates a table seeded with `rows`; fails if the name is taken. */
  createTable(name: string, rows: VectorRow[]): Promise<VectorTable>;
  openTable(name: string): Promise<VectorTable>;
  close(): Promise<void>;
}
