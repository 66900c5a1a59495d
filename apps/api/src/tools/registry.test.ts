import { describe, expect, it } from 'vitest';
import { ToolArgumentError } from '../errors.js';
import { TOOL_DEFINITIONS, decodeToolCall, getExecutionSite, isToolName } from './registry.js';

describe('tool registry', () => {
  it('exposes a definition for every tool', () => {
    expect(TOOL_DEFINITIONS.map((tool) => tool.name)).toEqual(['search_github', 'paste_to_app']);
    expect(getExecutionSite('search_github')).toBe('server');
    expect(getExecutionSite('paste_to_app')).toBe('client');
    expect(isToolName('delete_everything')).toBe(false);
  });

  it('decodes search_github with a default limit', () => {
    const call = decodeToolCall({ id: 'call-1', name: 'search_github', rawArguments: '{"query":"  swift markdown  "}' });

    expect(call).toEqual({
      kind: 'search_github',
      executionSite: 'server',
      id: 'call-1',
      args: { query: 'swift markdown', limit: 5 },
    });
  });

  it('decodes paste_to_app as a client-side call', () => {
    const call = decodeToolCall({ id: 'call-2', name: 'paste_to_app', rawArguments: '{"content":"Hello World"}' });

    expect(call.executionSite).toBe('client');
    expect(call.args).toEqual({ content: 'Hello World' });
  });

  it('rejects unknown tools', () => {
    expect(() => decodeToolCall({ id: 'x', name: 'open_door', rawArguments: '{}' }))
      .toThrow(new ToolArgumentError('open_door', 'Unknown tool: open_door'));
  });

  it('rejects malformed JSON arguments', () => {
    expect(() => decodeToolCall({ id: 'x', name: 'paste_to_app', rawArguments: '{"content":' }))
      .toThrow('Arguments for paste_to_app are not valid JSON');
  });

  it('rejects arguments that violate the schema', () => {
    expect(() => decodeToolCall({ id: 'x', name: 'paste_to_app', rawArguments: '{"content":""}' }))
      .toThrow('Invalid arguments for paste_to_app: content: content must not be empty');
    expect(() => decodeToolCall({ id: 'x', name: 'search_github', rawArguments: '{"query":"a","limit":50}' }))
      .toThrow(ToolArgumentError);
  });
});
