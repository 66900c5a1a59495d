import { z } from 'zod';

const GITHUB_API_URL = 'https://api.github.com';

const RepositorySchema = z.object({
  full_name: z.string(),
  html_url: z.string(),
  description: z.string().nullable(),
  stargazers_count: z.number(),
  language: z.string().nullable().optional(),
});

const SearchResponseSchema = z.object({
  total_count: z.number(),
  items: z.array(RepositorySchema),
});

export interface RepositorySummary {
  fullName: string;
  url: string;
  description: string | null;
  stars: number;
  language: string | null;
}

export interface GitHubClientOptions {
  token?: string;
  timeoutMs: number;
  fetch?: typeof fetch;
}

export class GitHubClient {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: GitHubClientOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  private getHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'Accept': 'application/vnd.github+json',
      'X-GitHub-Api-Version': '2022-11-28',
      'User-Agent': 'clipsidecar',
    };
    if (this.options.token) {
      headers['Authorization'] = `Bearer ${this.options.token}`;
    }
    return headers;
  }

  async searchRepositories(query: string, limit: number): Promise<RepositorySummary[]> {
    const params = new URLSearchParams({ q: query, per_page: String(limit) });
    const url = `${GITHUB_API_URL}/search/repositories?${params.toString()}`;

    const response = await this.fetchImpl(url, {
      method: 'GET',
      headers: this.getHeaders(),
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`GitHub search failed: ${response.status} ${error}`);
    }

    const parsed = SearchResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('GitHub search returned an unexpected payload');
    }

    return parsed.data.items.slice(0, limit).map((item) => ({
      fullName: item.full_name,
      url: item.html_url,
      description: item.description,
      stars: item.stargazers_count,
      language: item.language ?? null,
    }));
  }
}

export function formatRepositories(query: string, repositories: RepositorySummary[]): string {
  if (repositories.length === 0) {
    return `No GitHub repositories found for "${query}".`;
  }

  const lines = repositories.map((repo, index) => {
    const language = repo.language ? `, ${repo.language}` : '';
    const description = repo.description ? ` - ${repo.description}` : '';
    return `${index + 1}. ${repo.fullName} (${repo.stars} stars${language})${description}\n   ${repo.url}`;
  });
  return `GitHub repositories for "${query}":\n${lines.join('\n')}`;
}
