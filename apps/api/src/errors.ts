export type SidecarErrorCode =
  | 'EMBEDDING_FAILED'
  | 'STORE_FAILED'
  | 'MODEL_CALL_FAILED'
  | 'INVALID_TOOL_ARGUMENTS';

export abstract class SidecarError extends Error {
  abstract readonly code: SidecarErrorCode;
  public readonly statusCode: number;

  constructor(message: string, statusCode: number, options?: { cause?: unknown }) {
    super(message, options);
    this.statusCode = statusCode;
  }
}

/** The embedding capability is unreachable or returned an unusable vector. */
export class EmbeddingError extends SidecarError {
  readonly code = 'EMBEDDING_FAILED';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 500, options);
    this.name = 'EmbeddingError';
  }
}

/** Persistence failure: disk, schema or engine. */
export class StoreError extends SidecarError {
  readonly code = 'STORE_FAILED';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 500, options);
    this.name = 'StoreError';
  }
}

export type ModelFailureKind =
  | 'TIMEOUT'
  | 'RATE_LIMIT'
  | 'NETWORK'
  | 'AUTH'
  | 'BAD_REQUEST'
  | 'SERVER'
  | 'BAD_RESPONSE'
  | 'UNKNOWN';

const RETRYABLE_KINDS: ReadonlySet<ModelFailureKind> = new Set(['TIMEOUT', 'RATE_LIMIT', 'NETWORK', 'SERVER']);

/**
 * The chat or vision capability failed. The orchestrator turns these into a
 * user-facing reply; they never reach the host as an HTTP error.
 */
export class ModelCallError extends SidecarError {
  readonly code = 'MODEL_CALL_FAILED';
  public readonly kind: ModelFailureKind;

  constructor(message: string, kind: ModelFailureKind, options?: { cause?: unknown }) {
    super(message, 502, options);
    this.name = 'ModelCallError';
    this.kind = kind;
  }

  get retryable(): boolean {
    return RETRYABLE_KINDS.has(this.kind);
  }
}

/** A requested tool call could not be decoded (unknown tool, bad JSON, schema violation). */
export class ToolArgumentError extends SidecarError {
  readonly code = 'INVALID_TOOL_ARGUMENTS';
  public readonly toolName: string;

  constructor(toolName: string, message: string, options?: { cause?: unknown }) {
    super(message, 400, options);
    this.name = 'ToolArgumentError';
    this.toolName = toolName;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
