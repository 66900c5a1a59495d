import type { ClientToolCall } from '@clipsidecar/shared';

export interface ClipboardPreviewItem {
  content: string;
  timestamp: string | null;
}

/** Host-supplied situation, already validated and defaulted at the HTTP boundary. */
export interface MessageContext {
  appName: string;
  clipboardPreview: ClipboardPreviewItem[];
}

export const EMPTY_CONTEXT: MessageContext = {
  appName: 'Unknown',
  clipboardPreview: [],
};

export interface AgentReply {
  responseText: string;
  clientToolCalls: ClientToolCall[];
}

export interface AgentModels {
  /** Main conversational model (tool calling). */
  chat: string;
  /** Cheap model for tagging and reflection. */
  fast: string;
  vision: string;
}
