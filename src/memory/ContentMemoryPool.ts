import type { ContentMemoryOptions } from './config.js';
import { ContentMemory } from './ContentMemory.js';

/**
 * One ContentMemory per automation session. Memories are created on first
 * access with the pool's options and never shared between sessions.
 */
export class ContentMemoryPool {
  private memories = new Map<string, ContentMemory>();

  constructor(private options: ContentMemoryOptions = {}) {}

  get(sessionId: string): ContentMemory {
    let memory = this.memories.get(sessionId);
    if (!memory) {
      memory = new ContentMemory(this.options);
      this.memories.set(sessionId, memory);
    }
    return memory;
  }

  has(sessionId: string): boolean {
    return this.memories.has(sessionId);
  }

  delete(sessionId: string): boolean {
    return this.memories.delete(sessionId);
  }

  clear(): void {
    this.memories.clear();
  }

  sessionIds(): string[] {
    return [...this.memories.keys()];
  }
}
