import { resolve } from "path";

export type EmbeddingProviderSetting = "auto" | "openai" | "hashed";
export type MemoryBackend = "lancedb" | "memory";

const EMBEDDING_PROVIDERS: readonly EmbeddingProviderSetting[] = ["auto", "openai", "hashed"] as const;
const MEMORY_BACKENDS: readonly MemoryBackend[] = ["lancedb", "memory"] as const;

export interface Config {
  nodeEnv: string;
  host: string;
  port: number;
  logLevel: string;

  // Chat model (xAI, OpenAI-compatible). No key means mock mode.
  grokApiKey?: string;
  grokBaseUrl: string;
  grokModel: string;
  grokFastModel: string;
  grokVisionModel: string;

  // Embeddings
  openaiApiKey?: string;
  embeddingProvider: EmbeddingProviderSetting;

  // Archival memory
  memoryBackend: MemoryBackend;
  dataDir: string;

  // Remote call budgets
  modelTimeoutMs: number;
  modelMaxRetries: number;
  toolTimeoutMs: number;
  maxImageBytes: number;

  // GitHub search tool (optional token raises the rate limit)
  githubToken?: string;
}

export interface EnvValidationIssue {
  key: string;
  reason: string;
}

export interface EnvValidationResult {
  ok: boolean;
  errors: EnvValidationIssue[];
  warnings: EnvValidationIssue[];
}

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): Config {
  const nodeEnv = env.NODE_ENV || "development";

  return {
    nodeEnv,
    host: env.HOST || "127.0.0.1",
    port: parseInteger(env.PORT, 8000),
    logLevel: env.LOG_LEVEL || (nodeEnv === "development" ? "info" : "warn"),

    grokApiKey: nonEmpty(env.GROK_API_KEY),
    grokBaseUrl: env.GROK_BASE_URL || "https://api.x.ai/v1",
    grokModel: env.GROK_MODEL || "grok-4-1-fast-reasoning",
    grokFastModel: env.GROK_FAST_MODEL || "grok-4-1-fast-non-reasoning",
    grokVisionModel: env.GROK_VISION_MODEL || "grok-2-vision-1212",

    openaiApiKey: nonEmpty(env.OPENAI_API_KEY),
    embeddingProvider: parseChoice(env.EMBEDDING_PROVIDER, EMBEDDING_PROVIDERS, "auto"),

    memoryBackend: parseChoice(env.MEMORY_BACKEND, MEMORY_BACKENDS, "lancedb"),
    dataDir: resolve(process.cwd(), env.DATA_DIR || "data"),

    modelTimeoutMs: parseInteger(env.MODEL_TIMEOUT_MS, 30_000, { min: 1 }),
    modelMaxRetries: parseInteger(env.MODEL_MAX_RETRIES, 1, { min: 0 }),
    toolTimeoutMs: parseInteger(env.TOOL_TIMEOUT_MS, 15_000, { min: 1 }),
    maxImageBytes: parseInteger(env.MAX_IMAGE_BYTES, 10 * 1024 * 1024, { min: 1 }),

    githubToken: nonEmpty(env.GITHUB_TOKEN),
  };
}

export function isMockMode(currentConfig: Config): boolean {
  return !currentConfig.grokApiKey;
}

export function validateConfig(currentConfig: Config): EnvValidationResult {
  const errors: EnvValidationIssue[] = [];
  const warnings: EnvValidationIssue[] = [];

  if (currentConfig.embeddingProvider === "openai" && !currentConfig.openaiApiKey) {
    errors.push({
      key: "OPENAI_API_KEY",
      reason: "EMBEDDING_PROVIDER=openai requires an OpenAI API key.",
    });
  }

  if (isMockMode(currentConfig)) {
    warnings.push({
      key: "GROK_API_KEY",
      reason: "No model credential configured; every model call is served by the mock model.",
    });
  }

  if (currentConfig.memoryBackend === "memory") {
    warnings.push({
      key: "MEMORY_BACKEND",
      reason: "Archival memory is in-process only and is lost on restart.",
    });
  }

  return {
    ok: errors.length === 0,
    errors,
    warnings,
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function parseInteger(
  value: string | undefined,
  fallback: number,
  options: { min?: number } = {},
): number {
  const parsed = parseInt(value || "", 10);
  if (!Number.isFinite(parsed)) return fallback;
  if (options.min !== undefined && parsed < options.min) return fallback;
  return parsed;
}

function parseChoice<T extends string>(
  value: string | undefined,
  choices: readonly T[],
  fallback: T,
): T {
  const normalized = value?.trim().toLowerCase();
  return choices.find((choice) => choice === normalized) ?? fallback;
}
