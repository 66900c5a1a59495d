import OpenAI from 'openai';
import { ModelCallError } from '../../errors.js';
import type {
  ConversationTurn,
  GenerateRequest,
  GenerateResponse,
  LLMProviderAdapter,
  ToolDefinition,
} from '../types.js';

export interface GrokProviderOptions {
  apiKey?: string;
  baseURL: string;
  defaultModel: string;
  timeoutMs: number;
}

/** xAI chat completions through the OpenAI SDK (the endpoint speaks the same protocol). */
export class GrokProvider implements LLMProviderAdapter {
  readonly name = 'grok' as const;
  private client: OpenAI | null = null;

  constructor(private readonly options: GrokProviderOptions) {}

  get isConfigured(): boolean {
    return !!this.options.apiKey;
  }

  private getClient(): OpenAI {
    if (!this.client) {
      if (!this.options.apiKey) {
        throw new ModelCallError('GROK_API_KEY is not configured', 'AUTH');
      }
      this.client = new OpenAI({
        apiKey: this.options.apiKey,
        baseURL: this.options.baseURL,
        timeout: this.options.timeoutMs,
        // Retries are owned by the router.
        maxRetries: 0,
      });
    }
    return this.client;
  }

  async generate(request: GenerateRequest): Promise<GenerateResponse> {
    const client = this.getClient();
    const tools = request.tools && request.tools.length > 0
      ? request.tools.map((tool) => this.convertTool(tool))
      : undefined;

    let response: OpenAI.ChatCompletion;
    try {
      response = await client.chat.completions.create({
        model: request.model || this.options.defaultModel,
        max_tokens: request.maxTokens || 1024,
        temperature: request.temperature ?? 0.7,
        messages: request.messages.map((turn) => this.convertTurn(turn)),
        tools,
        tool_choice: tools ? request.toolChoice ?? 'auto' : undefined,
      });
    } catch (error) {
      throw toModelCallError(error);
    }

    const choice = response.choices[0];
    if (!choice) {
      throw new ModelCallError('Model returned no choices', 'BAD_RESPONSE');
    }
    const message = choice.message;

    const toolCalls: NonNullable<GenerateResponse['toolCalls']> = [];
    for (const tc of message.tool_calls ?? []) {
      if (tc.type === 'function') {
        toolCalls.push({
          id: tc.id,
          name: tc.function.name,
          rawArguments: tc.function.arguments || '{}',
        });
      }
    }

    return {
      content: message.content || '',
      toolCalls: toolCalls.length > 0 ? toolCalls : undefined,
      finishReason: choice.finish_reason === 'tool_calls' ? 'tool_use' :
                    choice.finish_reason === 'length' ? 'max_tokens' : 'stop',
      usage: response.usage ? {
        inputTokens: response.usage.prompt_tokens,
        outputTokens: response.usage.completion_tokens,
      } : undefined,
    };
  }

  private convertTurn(turn: ConversationTurn): OpenAI.ChatCompletionMessageParam {
    switch (turn.role) {
      case 'system':
        return { role: 'system', content: turn.content };
      case 'user':
        return { role: 'user', content: turn.content };
      case 'assistant':
        if (turn.toolCalls && turn.toolCalls.length > 0) {
          return {
            role: 'assistant',
            content: turn.content || null,
            tool_calls: turn.toolCalls.map((call) => ({
              id: call.id,
              type: 'function' as const,
              function: { name: call.name, arguments: call.rawArguments },
            })),
          };
        }
        return { role: 'assistant', content: turn.content };
      case 'tool':
        return { role: 'tool', tool_call_id: turn.toolCallId, content: turn.content };
    }
  }

  private convertTool(tool: ToolDefinition): OpenAI.ChatCompletionTool {
    return {
      type: 'function',
      function: {
        name: tool.name,
        description: tool.description,
        parameters: {
          type: 'object',
          properties: tool.parameters.properties,
          required: tool.parameters.required,
        },
      },
    };
  }
}

export function toModelCallError(error: unknown): ModelCallError {
  if (error instanceof ModelCallError) return error;

  // Timeout is a subclass of the connection error, so it is checked first.
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new ModelCallError('Model request timed out', 'TIMEOUT', { cause: error });
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return new ModelCallError(`Could not reach the model API: ${error.message}`, 'NETWORK', { cause: error });
  }
  if (error instanceof OpenAI.APIError) {
    const status = error.status;
    const kind = status === 429 ? 'RATE_LIMIT'
      : status === 401 || status === 403 ? 'AUTH'
      : status !== undefined && status >= 500 ? 'SERVER'
      : status !== undefined && status >= 400 ? 'BAD_REQUEST'
      : 'UNKNOWN';
    return new ModelCallError(`Model API error${status ? ` ${status}` : ''}: ${error.message}`, kind, { cause: error });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new ModelCallError(message, 'UNKNOWN', { cause: error });
}
