import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ModelCallError } from '../errors.js';
import { LLMRouter } from './router.js';
import type { GenerateRequest, GenerateResponse, LLMProviderAdapter } from './types.js';

const request: GenerateRequest = { messages: [{ role: 'user', content: 'hi' }], model: 'grok-test' };

function fakeProvider(
  name: LLMProviderAdapter['name'],
  isConfigured: boolean,
  generate: (req: GenerateRequest) => Promise<GenerateResponse>,
): LLMProviderAdapter {
  return { name, isConfigured, generate: vi.fn(generate) };
}

describe('llm router', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('uses the mock provider when the live one has no credential', async () => {
    const live = fakeProvider('grok', false, async () => ({ content: 'live', finishReason: 'stop' }));
    const mock = fakeProvider('mock', true, async () => ({ content: 'mock', finishReason: 'stop' }));
    const router = new LLMRouter({ live, mock });

    expect(router.mode).toBe('mock');
    await expect(router.generate(request)).resolves.toMatchObject({ content: 'mock' });
    expect(live.generate).not.toHaveBeenCalled();
  });

  it('retries transient failures and logs usage of the successful call', async () => {
    let calls = 0;
    const live = fakeProvider('grok', true, async () => {
      calls += 1;
      if (calls === 1) throw new ModelCallError('Model request timed out', 'TIMEOUT');
      return { content: 'ok', finishReason: 'stop', usage: { inputTokens: 12, outputTokens: 3 } };
    });
    const logUsage = vi.fn();
    const router = new LLMRouter({
      live,
      mock: fakeProvider('mock', true, async () => ({ content: 'mock', finishReason: 'stop' })),
      maxRetries: 1,
      retryBaseMs: 0,
      logUsage,
    });

    expect(router.mode).toBe('live');
    await expect(router.generate(request)).resolves.toMatchObject({ content: 'ok' });
    expect(live.generate).toHaveBeenCalledTimes(2);
    expect(logUsage).toHaveBeenCalledWith('grok', 'grok-test', 12, 3);
  });

  it('does not retry client errors', async () => {
    const live = fakeProvider('grok', true, async () => {
      throw new ModelCallError('Model API error 400: bad', 'BAD_REQUEST');
    });
    const router = new LLMRouter({
      live,
      mock: fakeProvider('mock', true, async () => ({ content: 'mock', finishReason: 'stop' })),
      maxRetries: 3,
      retryBaseMs: 0,
    });

    await expect(router.generate(request)).rejects.toMatchObject({ kind: 'BAD_REQUEST' });
    expect(live.generate).toHaveBeenCalledTimes(1);
  });

  it('normalises unknown failures to ModelCallError after the last attempt', async () => {
    const live = fakeProvider('grok', true, async () => {
      throw new Error('socket hang up');
    });
    const router = new LLMRouter({
      live,
      mock: fakeProvider('mock', true, async () => ({ content: 'mock', finishReason: 'stop' })),
      retryBaseMs: 0,
    });

    const failure = router.generate(request);
    await expect(failure).rejects.toBeInstanceOf(ModelCallError);
    await expect(failure).rejects.toThrow('socket hang up');
  });
});
