/** Tools the model may call. Server tools run inside the sidecar; client tools are handed to the host. */
export type ServerToolName = 'search_github';
export type ClientToolName = 'paste_to_app';
export type ToolName = ServerToolName | ClientToolName;

export type ExecutionSite = 'server' | 'client';

export interface PasteToAppArguments {
  content: string;
}

/**
 * A tool call the host must carry out itself (e.g. typing text into the
 * frontmost app). The sidecar never waits for the host to report back.
 */
export type ClientToolCall = {
  name: 'paste_to_app';
  arguments: PasteToAppArguments;
};
