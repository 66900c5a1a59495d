export type LLMProvider = 'grok' | 'mock';

export interface TextContentBlock {
  type: 'text';
  text: string;
}

export interface ImageContentBlock {
  type: 'image_url';
  image_url: { url: string };
}

export type ContentBlock = TextContentBlock | ImageContentBlock;

/** A tool invocation exactly as the model emitted it; arguments are still raw JSON. */
export interface ToolCallRequest {
  id: string;
  name: string;
  rawArguments: string;
}

export interface SystemTurn {
  role: 'system';
  content: string;
}

export interface UserTurn {
  role: 'user';
  content: string | ContentBlock[];
}

export interface AssistantTurn {
  role: 'assistant';
  content: string;
  toolCalls?: ToolCallRequest[];
}

export interface ToolTurn {
  role: 'tool';
  toolCallId: string;
  toolName: string;
  content: string;
}

export type ConversationTurn = SystemTurn | UserTurn | AssistantTurn | ToolTurn;

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, {
      type: string;
      description: string;
    }>;
    required?: string[];
  };
}

export type ToolChoice = 'auto' | 'none';

export interface GenerateRequest {
  messages: readonly ConversationTurn[];
  model?: string;
  tools?: ToolDefinition[];
  toolChoice?: ToolChoice;
  maxTokens?: number;
  temperature?: number;
}

export interface GenerateResponse {
  content: string;
  toolCalls?: ToolCallRequest[];
  finishReason: 'stop' | 'tool_use' | 'max_tokens' | 'error';
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

export interface LLMProviderAdapter {
  readonly name: LLMProvider;
  readonly isConfigured: boolean;
  generate(request: GenerateRequest): Promise<GenerateResponse>;
}

export type ModelMode = 'live' | 'mock';

/** What the orchestrator talks to: one chat capability, live or mocked. */
export interface ChatModel {
  readonly mode: ModelMode;
  generate(request: GenerateRequest): Promise<GenerateResponse>;
}

/** Extract plain text from content that may be string or ContentBlock[] */
export function getTextContent(content: string | ContentBlock[]): string {
  if (typeof content === 'string') return content;
  return content
    .filter((b): b is TextContentBlock => b.type === 'text')
    .map((b) => b.text)
    .join('\n');
}
