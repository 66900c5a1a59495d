export type {
  AgentMessageRequest,
  AgentMessageResponse,
  AgentReflectResponse,
  AgentTagsRequest,
  AgentTagsResponse,
  ClipboardContextItem,
  MessageContextPayload,
} from './messages.js';
export type {
  AddMemoryRequest,
  AddMemoryResponse,
  HealthResponse,
  HealthStatus,
  MemorySearchItem,
  MemorySearchResponse,
  ModelMode,
} from './memory.js';
export type {
  ClientToolCall,
  ClientToolName,
  ExecutionSite,
  PasteToAppArguments,
  ServerToolName,
  ToolName,
} from './tools.js';
