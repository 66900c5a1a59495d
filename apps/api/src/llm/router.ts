import { ModelCallError } from '../errors.js';
import { toModelCallError } from './providers/grok.js';
import type {
  ChatModel,
  GenerateRequest,
  GenerateResponse,
  LLMProviderAdapter,
  ModelMode,
} from './types.js';
import type { UsageLogger } from './usage-logger.js';

export interface LLMRouterOptions {
  /** The hosted model. Absent or unconfigured means every call goes to `mock`. */
  live?: LLMProviderAdapter;
  mock: LLMProviderAdapter;
  maxRetries?: number;
  /** Base delay for exponential backoff between retries. */
  retryBaseMs?: number;
  logUsage?: UsageLogger;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Single entry point for chat completions. Picks live vs mock once per call,
 * retries transient failures and normalises every failure to ModelCallError.
 */
export class LLMRouter implements ChatModel {
  private readonly live?: LLMProviderAdapter;
  private readonly mock: LLMProviderAdapter;
  private readonly maxRetries: number;
  private readonly retryBaseMs: number;
  private readonly logUsage?: UsageLogger;

  constructor(options: LLMRouterOptions) {
    this.live = options.live;
    this.mock = options.mock;
    this.maxRetries = options.maxRetries ?? 1;
    this.retryBaseMs = options.retryBaseMs ?? 1000;
    this.logUsage = options.logUsage;
  }

  get mode(): ModelMode {
    return this.live?.isConfigured ? 'live' : 'mock';
  }

  private getProvider(): LLMProviderAdapter {
    if (this.live?.isConfigured) {
      return this.live;
    }
    return this.mock;
  }

  async generate(request: GenerateRequest): Promise<GenerateResponse> {
    const provider = this.getProvider();
    const response = await this.generateWithRetry(provider, request);
    if (response.usage && this.logUsage) {
      this.logUsage(provider.name, request.model || 'default', response.usage.inputTokens, response.usage.outputTokens);
    }
    return response;
  }

  private async generateWithRetry(
    provider: LLMProviderAdapter,
    request: GenerateRequest,
  ): Promise<GenerateResponse> {
    let lastError: ModelCallError | undefined;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      try {
        return await provider.generate(request);
      } catch (error) {
        lastError = toModelCallError(error);

        // Client errors and malformed responses will not succeed on retry
        if (!lastError.retryable || attempt === this.maxRetries) {
          throw lastError;
        }

        // Exponential backoff: base, 2x base, 4x base...
        const backoffMs = Math.pow(2, attempt) * this.retryBaseMs;
        console.warn(`[llm] Retry ${attempt + 1}/${this.maxRetries} for ${provider.name} after ${backoffMs}ms:`, lastError.message);
        await sleep(backoffMs);
      }
    }

    throw lastError ?? new ModelCallError('Unknown error in generateWithRetry', 'UNKNOWN');
  }
}
