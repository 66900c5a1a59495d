import { DEFAULT_HUMAN_BLOCK, DEFAULT_PERSONA_BLOCK } from '../prompts/assistant.js';

export interface CoreMemorySnapshot {
  readonly persona: string;
  readonly human: string;
}

/**
 * Always-included context blocks. Requests read an immutable snapshot, so a
 * reflection swapping the persona never changes a prompt mid-build.
 */
export class CoreMemory {
  private current: CoreMemorySnapshot;

  constructor(initial: Partial<CoreMemorySnapshot> = {}) {
    this.current = Object.freeze({
      persona: initial.persona ?? DEFAULT_PERSONA_BLOCK,
      human: initial.human ?? DEFAULT_HUMAN_BLOCK,
    });
  }

  snapshot(): CoreMemorySnapshot {
    return this.current;
  }

  replacePersona(persona: string): CoreMemorySnapshot {
    this.current = Object.freeze({ ...this.current, persona });
    return this.current;
  }
}
