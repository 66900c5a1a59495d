import type { ClientToolCall } from '@clipsidecar/shared';
import { ToolArgumentError, errorMessage } from '../errors.js';
import type {
  AssistantTurn,
  ConversationTurn,
  GenerateResponse,
  ToolCallRequest,
  ToolTurn,
} from '../llm/types.js';
import type { ServerToolRunner } from '../tools/executor.js';
import { decodeToolCall, type AgentToolCall, type ClientSideToolCall } from '../tools/registry.js';

type DecodedCall =
  | { request: ToolCallRequest; call: AgentToolCall }
  | { request: ToolCallRequest; error: ToolArgumentError };

/**
 * Outcome of one batch of model tool calls:
 * - `delegate`: hand client tools to the host and end the turn
 * - `second_pass`: server tools ran; call the model again with `turns`
 * - `fallback`: nothing in the batch could be executed
 */
export type ToolResolution =
  | { type: 'delegate'; clientToolCalls: ClientToolCall[]; skippedServerCalls: number }
  | { type: 'second_pass'; turns: readonly ConversationTurn[] }
  | { type: 'fallback'; text: string };

function decode(request: ToolCallRequest): DecodedCall {
  try {
    return { request, call: decodeToolCall(request) };
  } catch (error) {
    const argumentError = error instanceof ToolArgumentError
      ? error
      : new ToolArgumentError(request.name, errorMessage(error), { cause: error });
    return { request, error: argumentError };
  }
}

function toClientToolCall(call: ClientSideToolCall): ClientToolCall {
  switch (call.kind) {
    case 'paste_to_app':
      return { name: 'paste_to_app', arguments: { content: call.args.content } };
  }
}

export function describeArgumentErrors(errors: ToolArgumentError[]): string {
  const details = errors.map((error) => error.message).join('; ');
  return `Sorry, I couldn't carry out that action: ${details}`;
}

/**
 * Resolve a batch of tool calls against the conversation that produced it.
 *
 * Any valid client-side call ends the turn: all of them go to the host
 * together, and server-side calls in the same batch are not run because
 * their results would never reach the model. Otherwise every call gets a
 * tool turn (result, execution error or argument error) in request order,
 * appended after the assistant turn that asked for them. `turns` is never
 * mutated.
 */
export async function resolveToolCalls(
  turns: readonly ConversationTurn[],
  response: GenerateResponse,
  runner: ServerToolRunner,
): Promise<ToolResolution> {
  const requests = response.toolCalls ?? [];
  const decoded = requests.map(decode);

  const clientCalls: ClientSideToolCall[] = [];
  const argumentErrors: ToolArgumentError[] = [];
  let serverCallCount = 0;
  for (const entry of decoded) {
    if ('error' in entry) {
      argumentErrors.push(entry.error);
    } else if (entry.call.executionSite === 'client') {
      clientCalls.push(entry.call);
    } else {
      serverCallCount += 1;
    }
  }

  for (const error of argumentErrors) {
    console.warn(`[agent] skipping tool call ${error.toolName}: ${error.message}`);
  }

  if (clientCalls.length > 0) {
    if (serverCallCount > 0) {
      console.info(`[agent] delegating ${clientCalls.length} client tool call(s); skipped ${serverCallCount} server call(s) in the same batch`);
    }
    return {
      type: 'delegate',
      clientToolCalls: clientCalls.map(toClientToolCall),
      skippedServerCalls: serverCallCount,
    };
  }

  if (serverCallCount === 0) {
    return { type: 'fallback', text: describeArgumentErrors(argumentErrors) };
  }

  const assistantTurn: AssistantTurn = {
    role: 'assistant',
    content: response.content,
    toolCalls: requests,
  };

  const toolTurns: ToolTurn[] = [];
  for (const entry of decoded) {
    let content: string;
    if ('error' in entry) {
      content = `Error: ${entry.error.message}`;
    } else if (entry.call.executionSite === 'server') {
      const result = await runner.execute(entry.call);
      content = result.output;
    } else {
      continue;
    }
    toolTurns.push({
      role: 'tool',
      toolCallId: entry.request.id,
      toolName: entry.request.name,
      content,
    });
  }

  return { type: 'second_pass', turns: [...turns, assistantTurn, ...toolTurns] };
}
