import { z } from 'zod';
import { errorMessage } from '../errors.js';
import type { ChatModel, ConversationTurn } from '../llm/types.js';
import type { MemoryRetriever, MemorySearchHit } from '../memory/types.js';
import {
  CLIENT_TOOL_ACKNOWLEDGMENT,
  MOCK_VISION_RESPONSE,
  VISION_INSTRUCTION,
  buildReflectionPrompt,
  buildTagsPrompt,
} from '../prompts/assistant.js';
import type { ServerToolRunner } from '../tools/executor.js';
import { TOOL_DEFINITIONS } from '../tools/registry.js';
import type { CoreMemory } from './coreMemory.js';
import { buildSystemPrompt, formatMemoryBlock } from './promptBuilder.js';
import { resolveToolCalls } from './toolResolution.js';
import type { AgentModels, AgentReply, MessageContext } from './types.js';

export const MEMORY_RESULTS_PER_MESSAGE = 3;
const REFLECTION_MEMORY_LIMIT = 5;
const TAG_CONTENT_CHARS = 500;
const MAX_TAGS = 5;

const TagArraySchema = z.array(z.string());

export interface ClipboardAgentDeps {
  memory: MemoryRetriever;
  chat: ChatModel;
  tools: ServerToolRunner;
  coreMemory: CoreMemory;
  models: AgentModels;
}

export function apologize(error: unknown): string {
  return `Sorry, I couldn't get an answer from the model right now (${errorMessage(error)}). Please try again in a moment.`;
}

/** Strip Markdown code fences and parse a JSON array of tags; anything else yields []. */
export function parseTagList(raw: string): string[] {
  const cleaned = raw
    .replace(/```json/gi, '')
    .replace(/```/g, '')
    .trim();

  let parsed: unknown;
  try {
    parsed = JSON.parse(cleaned);
  } catch {
    return [];
  }

  const tags = TagArraySchema.safeParse(parsed);
  if (!tags.success) return [];

  const unique = new Set<string>();
  for (const tag of tags.data) {
    const normalized = tag.trim().toLowerCase();
    if (normalized) unique.add(normalized);
  }
  return Array.from(unique).slice(0, MAX_TAGS);
}

/**
 * The orchestration core: memory retrieval, prompt assembly, model calls and
 * tool-call routing. Holds no per-request state; concurrent calls are safe.
 */
export class ClipboardAgent {
  private readonly memory: MemoryRetriever;
  private readonly chat: ChatModel;
  private readonly tools: ServerToolRunner;
  private readonly coreMemory: CoreMemory;
  private readonly models: AgentModels;
  private reflection: Promise<string> | null = null;

  constructor(deps: ClipboardAgentDeps) {
    this.memory = deps.memory;
    this.chat = deps.chat;
    this.tools = deps.tools;
    this.coreMemory = deps.coreMemory;
    this.models = deps.models;
  }

  get persona(): string {
    return this.coreMemory.snapshot().persona;
  }

  async processMessage(message: string, context: MessageContext): Promise<AgentReply> {
    const memories = await this.retrieveMemories(message, MEMORY_RESULTS_PER_MESSAGE);
    const systemPrompt = buildSystemPrompt({
      core: this.coreMemory.snapshot(),
      context,
      memories,
    });

    const turns: readonly ConversationTurn[] = [
      { role: 'system', content: systemPrompt },
      { role: 'user', content: message },
    ];

    try {
      const first = await this.chat.generate({
        messages: turns,
        model: this.models.chat,
        tools: TOOL_DEFINITIONS,
        toolChoice: 'auto',
      });

      if (!first.toolCalls || first.toolCalls.length === 0) {
        return { responseText: first.content, clientToolCalls: [] };
      }

      const resolution = await resolveToolCalls(turns, first, this.tools);
      switch (resolution.type) {
        case 'delegate':
          return { responseText: CLIENT_TOOL_ACKNOWLEDGMENT, clientToolCalls: resolution.clientToolCalls };
        case 'fallback':
          return { responseText: resolution.text, clientToolCalls: [] };
        case 'second_pass': {
          const second = await this.chat.generate({
            messages: resolution.turns,
            model: this.models.chat,
            tools: TOOL_DEFINITIONS,
            toolChoice: 'none',
          });
          return { responseText: second.content, clientToolCalls: [] };
        }
      }
    } catch (error) {
      console.error('[agent] processMessage failed:', errorMessage(error));
      return { responseText: apologize(error), clientToolCalls: [] };
    }
  }

  async processVision(image: Buffer, mimeType: string = 'image/png'): Promise<string> {
    if (this.chat.mode === 'mock') {
      return MOCK_VISION_RESPONSE;
    }

    const dataUrl = `data:${mimeType};base64,${image.toString('base64')}`;
    try {
      const response = await this.chat.generate({
        model: this.models.vision,
        messages: [{
          role: 'user',
          content: [
            { type: 'text', text: VISION_INSTRUCTION },
            { type: 'image_url', image_url: { url: dataUrl } },
          ],
        }],
      });
      return response.content;
    } catch (error) {
      console.error('[agent] processVision failed:', errorMessage(error));
      return apologize(error);
    }
  }

  async generateTags(content: string, appName: string = 'Unknown'): Promise<string[]> {
    if (this.chat.mode === 'mock') {
      return [];
    }

    try {
      const response = await this.chat.generate({
        model: this.models.fast,
        messages: [{ role: 'user', content: buildTagsPrompt(content.slice(0, TAG_CONTENT_CHARS), appName) }],
        temperature: 0.2,
      });
      return parseTagList(response.content);
    } catch (error) {
      console.warn('[agent] tag generation failed:', errorMessage(error));
      return [];
    }
  }

  /**
   * Regenerate the persona block. Concurrent triggers share one run; message
   * handling keeps reading the previous persona until the new one is swapped in.
   */
  reflect(): Promise<string> {
    if (!this.reflection) {
      this.reflection = this.runReflection().finally(() => {
        this.reflection = null;
      });
    }
    return this.reflection;
  }

  private async runReflection(): Promise<string> {
    const core = this.coreMemory.snapshot();
    if (this.chat.mode === 'mock') {
      return core.persona;
    }

    const memories = await this.retrieveMemories(core.persona, REFLECTION_MEMORY_LIMIT);
    try {
      const response = await this.chat.generate({
        model: this.models.fast,
        messages: [{
          role: 'user',
          content: buildReflectionPrompt(core.persona, core.human, formatMemoryBlock(memories)),
        }],
      });

      const persona = response.content.trim();
      if (!persona) {
        return this.coreMemory.snapshot().persona;
      }
      console.log('[agent] persona updated by reflection');
      return this.coreMemory.replacePersona(persona).persona;
    } catch (error) {
      console.warn('[agent] reflection failed, keeping persona:', errorMessage(error));
      return this.coreMemory.snapshot().persona;
    }
  }

  private async retrieveMemories(query: string, limit: number): Promise<MemorySearchHit[]> {
    try {
      return await this.memory.search(query, limit);
    } catch (error) {
      console.warn('[agent] memory search failed, continuing without memories:', errorMessage(error));
      return [];
    }
  }
}
