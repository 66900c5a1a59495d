import type { ClientToolCall } from './tools.js';

export interface ClipboardContextItem {
  content: string;
  timestamp?: string;
}

/** Situational context the host attaches to a chat message. Extra keys are ignored. */
export interface MessageContextPayload {
  app_name?: string;
  clipboard_items?: ClipboardContextItem[];
}

export interface AgentMessageRequest {
  message: string;
  context?: MessageContextPayload | null;
}

export interface AgentMessageResponse {
  response: string;
  tool_calls: ClientToolCall[];
}

export interface AgentTagsRequest {
  content: string;
  app_name?: string;
}

export interface AgentTagsResponse {
  tags: string[];
}

export interface AgentReflectResponse {
  persona: string;
}
