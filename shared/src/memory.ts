export interface AddMemoryRequest {
  text: string;
  source_app: string;
  tags?: string[];
}

export interface AddMemoryResponse {
  id: string;
}

export interface MemorySearchItem {
  id: string;
  text: string;
  timestamp: number;
  source_app: string;
  tags: string[];
  distance: number;
}

export interface MemorySearchResponse {
  query: string;
  count: number;
  items: MemorySearchItem[];
}

export type HealthStatus = 'ok' | 'degraded';
export type ModelMode = 'live' | 'mock';

export interface HealthResponse {
  status: HealthStatus;
  service: string;
  mode: ModelMode;
  memory: {
    backend: string;
    embeddingModel: string;
    initialized: boolean;
    error: string | null;
  };
}
