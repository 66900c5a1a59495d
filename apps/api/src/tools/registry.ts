import { z } from 'zod';
import type { ExecutionSite, ToolName } from '@clipsidecar/shared';
import { ToolArgumentError } from '../errors.js';
import type { ToolCallRequest, ToolDefinition } from '../llm/types.js';

export const DEFAULT_SEARCH_LIMIT = 5;

const SearchGithubArgsSchema = z.object({
  query: z.string().trim().min(1, 'query must not be empty'),
  limit: z.coerce.number().int().min(1).max(10).optional().default(DEFAULT_SEARCH_LIMIT),
});

const PasteToAppArgsSchema = z.object({
  content: z.string().min(1, 'content must not be empty'),
});

export type SearchGithubArgs = z.infer<typeof SearchGithubArgsSchema>;
export type PasteToAppArgs = z.infer<typeof PasteToAppArgsSchema>;

export interface SearchGithubCall {
  kind: 'search_github';
  executionSite: 'server';
  id: string;
  args: SearchGithubArgs;
}

export interface PasteToAppCall {
  kind: 'paste_to_app';
  executionSite: 'client';
  id: string;
  args: PasteToAppArgs;
}

/** Every tool the model can call. Adding a tool means adding a variant here. */
export type AgentToolCall = SearchGithubCall | PasteToAppCall;
export type ServerToolCall = Extract<AgentToolCall, { executionSite: 'server' }>;
export type ClientSideToolCall = Extract<AgentToolCall, { executionSite: 'client' }>;

interface ToolSpec {
  definition: ToolDefinition;
  executionSite: ExecutionSite;
}

const TOOL_SPECS: Record<ToolName, ToolSpec> = {
  search_github: {
    executionSite: 'server',
    definition: {
      name: 'search_github',
      description: 'Search public GitHub repositories. Use when the user asks to find a library, project or code on GitHub.',
      parameters: {
        type: 'object',
        properties: {
          query: {
            type: 'string',
            description: 'GitHub search query, e.g. "swiftui markdown parser"',
          },
          limit: {
            type: 'number',
            description: `How many repositories to return (1-10, default ${DEFAULT_SEARCH_LIMIT})`,
          },
        },
        required: ['query'],
      },
    },
  },
  paste_to_app: {
    executionSite: 'client',
    definition: {
      name: 'paste_to_app',
      description: 'Paste text into the application the user is currently working in. Use when the user asks you to paste, type or insert something.',
      parameters: {
        type: 'object',
        properties: {
          content: {
            type: 'string',
            description: 'The exact text to paste',
          },
        },
        required: ['content'],
      },
    },
  },
};

export const TOOL_DEFINITIONS: ToolDefinition[] = Object.values(TOOL_SPECS).map((spec) => spec.definition);

export function isToolName(name: string): name is ToolName {
  return Object.prototype.hasOwnProperty.call(TOOL_SPECS, name);
}

export function getExecutionSite(name: ToolName): ExecutionSite {
  return TOOL_SPECS[name].executionSite;
}

function parseArguments<T extends z.ZodTypeAny>(toolName: string, schema: T, raw: string): z.infer<T> {
  let json: unknown;
  try {
    json = JSON.parse(raw || '{}');
  } catch (error) {
    throw new ToolArgumentError(toolName, `Arguments for ${toolName} are not valid JSON`, { cause: error });
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`)
      .join('; ');
    throw new ToolArgumentError(toolName, `Invalid arguments for ${toolName}: ${detail}`);
  }
  return parsed.data;
}

/**
 * Decode a raw model tool call into its typed variant.
 * @throws {ToolArgumentError} for unknown tools, malformed JSON or schema violations
 */
export function decodeToolCall(request: ToolCallRequest): AgentToolCall {
  if (!isToolName(request.name)) {
    throw new ToolArgumentError(request.name, `Unknown tool: ${request.name}`);
  }

  switch (request.name) {
    case 'search_github':
      return {
        kind: 'search_github',
        executionSite: 'server',
        id: request.id,
        args: parseArguments(request.name, SearchGithubArgsSchema, request.rawArguments),
      };
    case 'paste_to_app':
      return {
        kind: 'paste_to_app',
        executionSite: 'client',
        id: request.id,
        args: parseArguments(request.name, PasteToAppArgsSchema, request.rawArguments),
      };
  }
}
