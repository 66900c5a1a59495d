import type { MemorySearchHit } from '../memory/types.js';
import { INSTRUCTION_SUFFIX } from '../prompts/assistant.js';
import type { CoreMemorySnapshot } from './coreMemory.js';
import type { MessageContext } from './types.js';

export const CLIPBOARD_PREVIEW_CHARS = 200;
export const MAX_CLIPBOARD_ITEMS = 10;
export const MEMORY_PREVIEW_CHARS = 150;

export function truncatePreview(text: string, maxChars: number): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > maxChars ? `${flat.slice(0, maxChars)}...` : flat;
}

export function formatSituationalContext(context: MessageContext): string {
  const lines = [
    '## Current situation',
    `Active application: ${context.appName}`,
    'Recent clipboard items:',
  ];

  const items = context.clipboardPreview.slice(0, MAX_CLIPBOARD_ITEMS);
  if (items.length === 0) {
    lines.push('- none');
  }
  for (const item of items) {
    const when = item.timestamp ? `[${item.timestamp}] ` : '';
    lines.push(`- ${when}${truncatePreview(item.content, CLIPBOARD_PREVIEW_CHARS)}`);
  }
  return lines.join('\n');
}

export function formatMemoryBlock(memories: MemorySearchHit[]): string {
  if (memories.length === 0) {
    return '## Relevant memories\nNo relevant memories found.';
  }

  const lines = memories.map((memory, index) =>
    `${index + 1}. (${memory.sourceApp}) ${truncatePreview(memory.text, MEMORY_PREVIEW_CHARS)}`,
  );
  return `## Relevant memories\n${lines.join('\n')}`;
}

export interface SystemPromptInput {
  core: CoreMemorySnapshot;
  context: MessageContext;
  memories: MemorySearchHit[];
}

export function buildSystemPrompt(input: SystemPromptInput): string {
  return [
    input.core.persona,
    `## About the user\n${input.core.human}`,
    formatSituationalContext(input.context),
    formatMemoryBlock(input.memories),
    INSTRUCTION_SUFFIX,
  ].join('\n\n');
}
