import { describe, expect, it } from 'vitest';
import { loadConfig } from '../config.js';
import {
  HASHED_EMBEDDING_DIMENSIONS,
  HashedEmbedder,
  OpenAIEmbedder,
  createEmbedder,
  extractFeatures,
} from './embeddings.js';

function norm(vector: number[]): number {
  return Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
}

describe('hashed embedder', () => {
  const embedder = new HashedEmbedder();

  it('produces unit vectors of the configured width', async () => {
    const vector = await embedder.embed('Copy the build command from the terminal');

    expect(vector).toHaveLength(HASHED_EMBEDDING_DIMENSIONS);
    expect(norm(vector)).toBeCloseTo(1, 10);
  });

  it('is deterministic and ignores case and punctuation', async () => {
    const a = await embedder.embed('Hello, World!');
    const b = await embedder.embed('hello world');

    expect(a).toEqual(b);
  });

  it('embeds text in any script, emoji and symbols to unit vectors', async () => {
    for (const text of ['会議は明日の午後三時です', 'Привет, как дела?', '🎉🚀', '---']) {
      expect(norm(await embedder.embed(text))).toBeCloseTo(1, 10);
    }
  });

  it('maps only blank text to the zero vector', async () => {
    const vector = await new HashedEmbedder(16).embed(' \n\t ');

    expect(vector).toEqual(new Array<number>(16).fill(0));
  });
});

describe('extractFeatures', () => {
  it('keeps unicode words and adds bigrams for unspaced scripts', () => {
    expect(extractFeatures('Привет мир')).toEqual(['привет', 'мир']);
    expect(extractFeatures('日本語')).toEqual(['日本語', '日本', '本語']);
  });

  it('falls back to individual symbols when there are no words', () => {
    expect(extractFeatures('- 🎉')).toEqual(['-', '🎉']);
  });
});

describe('createEmbedder', () => {
  it('uses the hashed embedder when no OpenAI key is configured', () => {
    const embedder = createEmbedder(loadConfig({}));
    expect(embedder).toBeInstanceOf(HashedEmbedder);
    expect(embedder.model).toBe('hashed-bow-v2');
  });

  it('uses OpenAI embeddings when a key is present', () => {
    const embedder = createEmbedder(loadConfig({ OPENAI_API_KEY: 'test-secret' }));
    expect(embedder).toBeInstanceOf(OpenAIEmbedder);
    expect(embedder.dimensions).toBe(512);
  });

  it('honours an explicit hashed setting even with a key', () => {
    const embedder = createEmbedder(loadConfig({ OPENAI_API_KEY: 'test-secret', EMBEDDING_PROVIDER: 'hashed' }));
    expect(embedder).toBeInstanceOf(HashedEmbedder);
  });
});
