import OpenAI from 'openai';
import type { Config } from '../config.js';

const OPENAI_EMBEDDING_MODEL = 'text-embedding-3-small';
const OPENAI_EMBEDDING_DIMENSIONS = 512;
const MAX_INPUT_CHARS = 8000;

export const HASHED_EMBEDDING_DIMENSIONS = 256;

export interface Embedder {
  readonly model: string;
  readonly dimensions: number;
  embed(text: string): Promise<number[]>;
}

export class OpenAIEmbedder implements Embedder {
  readonly model = OPENAI_EMBEDDING_MODEL;
  readonly dimensions = OPENAI_EMBEDDING_DIMENSIONS;
  private client: OpenAI | null = null;

  constructor(private readonly apiKey: string, private readonly timeoutMs: number) {}

  private getClient(): OpenAI {
    if (!this.client) {
      this.client = new OpenAI({ apiKey: this.apiKey, timeout: this.timeoutMs, maxRetries: 1 });
    }
    return this.client;
  }

  async embed(text: string): Promise<number[]> {
    const response = await this.getClient().embeddings.create({
      model: this.model,
      input: text.slice(0, MAX_INPUT_CHARS),
      dimensions: this.dimensions,
    });
    const first = response.data[0];
    if (!first) {
      throw new Error('Embedding response contained no vectors');
    }
    return first.embedding;
  }
}

function hashToken(token: string): number {
  let hash = 2166136261;
  for (let i = 0; i < token.length; i += 1) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 16777619);
  }

  return hash >>> 0;
}

const WORD_PATTERN = /[\p{L}\p{N}_]+/gu;
// Scripts written without spaces between words.
const UNSPACED_SCRIPT = /[\p{Script=Han}\p{Script=Hiragana}\p{Script=Katakana}\p{Script=Hangul}\p{Script=Thai}]/u;

/**
 * Word tokens in any script, plus character bigrams for unspaced scripts.
 * Text without letters or digits falls back to its individual symbols, so
 * only blank text yields no features.
 */
export function extractFeatures(text: string): string[] {
  const lowered = text.toLowerCase();
  const words = lowered.match(WORD_PATTERN) ?? [];

  const features: string[] = [];
  for (const word of words) {
    features.push(word);
    if (UNSPACED_SCRIPT.test(word)) {
      const chars = Array.from(word);
      for (let i = 0; i + 1 < chars.length; i += 1) {
        features.push(`${chars[i]}${chars[i + 1]}`);
      }
    }
  }

  if (features.length === 0) {
    return Array.from(lowered).filter((char) => char.trim() !== '');
  }
  return features;
}

/**
 * Offline embedder: signed feature hashing, L2-normalised. Blank text maps
 * to the zero vector.
 */
export class HashedEmbedder implements Embedder {
  readonly model = 'hashed-bow-v2';

  constructor(readonly dimensions: number = HASHED_EMBEDDING_DIMENSIONS) {}

  async embed(text: string): Promise<number[]> {
    const vector = new Array<number>(this.dimensions).fill(0);
    const features = extractFeatures(text.slice(0, MAX_INPUT_CHARS));

    for (const token of features) {
      const hash = hashToken(token);
      const index = hash % this.dimensions;
      const sign = (hash & 1) === 0 ? 1 : -1;
      vector[index] += sign;
    }

    const magnitude = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    if (magnitude === 0) {
      return vector;
    }

    return vector.map((value) => value / magnitude);
  }
}

export function createEmbedder(config: Config): Embedder {
  const useOpenAI = config.embeddingProvider === 'openai'
    || (config.embeddingProvider === 'auto' && !!config.openaiApiKey);

  if (useOpenAI) {
    if (!config.openaiApiKey) {
      throw new Error('OPENAI_API_KEY required for embeddings');
    }
    return new OpenAIEmbedder(config.openaiApiKey, config.modelTimeoutMs);
  }

  return new HashedEmbedder();
}
