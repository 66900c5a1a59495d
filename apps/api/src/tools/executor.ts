import { errorMessage } from '../errors.js';
import { formatRepositories, type RepositorySummary } from './github.js';
import type { ServerToolCall } from './registry.js';

export interface ToolExecutionResult {
  success: boolean;
  /** Text handed back to the model as the tool turn content. */
  output: string;
  durationMs: number;
}

export interface RepositorySearch {
  searchRepositories(query: string, limit: number): Promise<RepositorySummary[]>;
}

/** Runs the tools whose execution site is the sidecar itself. */
export interface ServerToolRunner {
  execute(call: ServerToolCall): Promise<ToolExecutionResult>;
}

export class ToolExecutor implements ServerToolRunner {
  constructor(private readonly github: RepositorySearch) {}

  async execute(call: ServerToolCall): Promise<ToolExecutionResult> {
    const start = Date.now();
    try {
      const output = await this.run(call);
      console.log(`[tools] ${call.kind} ok in ${Date.now() - start}ms`);
      return { success: true, output, durationMs: Date.now() - start };
    } catch (error) {
      const message = errorMessage(error);
      console.warn(`[tools] ${call.kind} failed:`, message);
      return { success: false, output: `Error: ${message}`, durationMs: Date.now() - start };
    }
  }

  private async run(call: ServerToolCall): Promise<string> {
    switch (call.kind) {
      case 'search_github': {
        const repositories = await this.github.searchRepositories(call.args.query, call.args.limit);
        return formatRepositories(call.args.query, repositories);
      }
      default: {
        const unhandled: never = call.kind;
        throw new Error(`No server-side handler for ${JSON.stringify(call)}`);
      }
    }
  }
}
