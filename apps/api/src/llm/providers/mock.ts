import type {
  ConversationTurn,
  GenerateRequest,
  GenerateResponse,
  LLMProviderAdapter,
  ToolTurn,
} from '../types.js';
import { getTextContent } from '../types.js';

const ACTIVE_APP_LINE = /^Active application: (.+)$/m;

/**
 * Scripted stand-in for the hosted model, used when no credential is
 * configured. It never touches the network.
 *
 * - a first pass mentioning "github" requests `search_github`
 * - a pass that already carries tool results summarises them
 * - anything else is echoed back
 */
export class MockProvider implements LLMProviderAdapter {
  readonly name = 'mock' as const;
  readonly isConfigured = true;
  private callCounter = 0;

  async generate(request: GenerateRequest): Promise<GenerateResponse> {
    const toolTurns = request.messages.filter((turn): turn is ToolTurn => turn.role === 'tool');
    if (toolTurns.length > 0) {
      return {
        content: summariseToolTurns(toolTurns),
        finishReason: 'stop',
      };
    }

    const message = lastUserText(request.messages);
    const canSearch = request.toolChoice !== 'none'
      && (request.tools ?? []).some((tool) => tool.name === 'search_github');

    if (canSearch && /github/i.test(message)) {
      this.callCounter += 1;
      return {
        content: '',
        toolCalls: [{
          id: `mock-call-${this.callCounter}`,
          name: 'search_github',
          rawArguments: JSON.stringify({ query: toSearchQuery(message) }),
        }],
        finishReason: 'tool_use',
      };
    }

    return {
      content: `Mock response: I received '${message}'. Context app: ${activeApp(request.messages)}.`,
      finishReason: 'stop',
    };
  }
}

function lastUserText(messages: readonly ConversationTurn[]): string {
  for (let i = messages.length - 1; i >= 0; i--) {
    const turn = messages[i];
    if (turn.role === 'user') return getTextContent(turn.content);
  }
  return '';
}

function activeApp(messages: readonly ConversationTurn[]): string {
  const system = messages.find((turn) => turn.role === 'system');
  const match = system ? ACTIVE_APP_LINE.exec(getTextContent(system.content)) : null;
  return match ? match[1].trim() : 'Unknown';
}

/** "Find a SwiftUI markdown parser on GitHub." -> "Find a SwiftUI markdown parser" */
export function toSearchQuery(message: string): string {
  const stripped = message
    .replace(/\b(?:on|in|from)?\s*github\b/gi, ' ')
    .replace(/\s+/g, ' ')
    .replace(/[\s.?!]+$/, '')
    .trim();
  return stripped || message.trim();
}

function summariseToolTurns(turns: ToolTurn[]): string {
  const sections = turns.map((turn) => `[${turn.toolName}]\n${turn.content}`);
  return `Mock summary of tool results:\n\n${sections.join('\n\n')}`;
}
