import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ToolExecutor, type RepositorySearch } from './executor.js';
import type { SearchGithubCall } from './registry.js';

const call: SearchGithubCall = {
  kind: 'search_github',
  executionSite: 'server',
  id: 'call-1',
  args: { query: 'lancedb', limit: 1 },
};

describe('tool executor', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('formats search results as the tool output', async () => {
    const github: RepositorySearch = {
      searchRepositories: vi.fn().mockResolvedValue([
        { fullName: 'lancedb/lancedb', url: 'https://github.com/lancedb/lancedb', description: null, stars: 5, language: 'Rust' },
      ]),
    };

    const result = await new ToolExecutor(github).execute(call);

    expect(result.success).toBe(true);
    expect(result.output).toBe('GitHub repositories for "lancedb":\n1. lancedb/lancedb (5 stars, Rust)\n   https://github.com/lancedb/lancedb');
    expect(github.searchRepositories).toHaveBeenCalledWith('lancedb', 1);
  });

  it('turns a failure into an error result instead of throwing', async () => {
    const github: RepositorySearch = {
      searchRepositories: vi.fn().mockRejectedValue(new Error('GitHub search failed: 503 unavailable')),
    };

    const result = await new ToolExecutor(github).execute(call);

    expect(result).toMatchObject({ success: false, output: 'Error: GitHub search failed: 503 unavailable' });
  });
});
