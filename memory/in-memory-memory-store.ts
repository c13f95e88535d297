import { randomUUID } from 'crypto';
import { aggregateScore, keywordOverlapScore, timeDecayScore } from './scoring';
import type { MemoryCapability, MemoryInput, MemoryRecord } from './types';

interface InMemoryMemoryStoreOptions {
  getTime?: () => number;
  /** Oldest memories are dropped past this count. Default: 10000. */
  maxEntries?: number;
}

/**
 * Process-local memory ranked by `0.6 * keyword overlap + 0.2 * importance +
 * 0.2 * time decay`. Records sharing no keyword with the query are not
 * returned.
 */
export class InMemoryMemoryStore implements MemoryCapability {
  private readonly memories = new Map<string, MemoryRecord>();
  private readonly getTime: () => number;
  private readonly maxEntries: number;

  constructor(options: InMemoryMemoryStoreOptions = {}) {
    this.getTime = options.getTime ?? (() => Date.now());
    this.maxEntries = options.maxEntries ?? 10_000;
  }

  get size(): number {
    return this.memories.size;
  }

  async remember(input: MemoryInput): Promise<string> {
    if (!input.content.trim()) {
      throw new Error('Memory content is required');
    }
    const importance = input.importance ?? 0.5;
    if (!Number.isFinite(importance) || importance < 0 || importance > 1) {
      throw new Error(`Memory importance must be between 0 and 1. Got: ${importance}`);
    }

    const id = randomUUID();
    this.memories.set(id, Object.freeze({
      id,
      content: input.content,
      kind: input.kind,
      tags: Object.freeze([...(input.tags ?? [])]),
      importance,
      createdAt: this.getTime()
    }));

    while (this.memories.size > this.maxEntries) {
      const oldest = this.memories.keys().next();
      if (oldest.done) {
        break;
      }
      this.memories.delete(oldest.value);
    }

    return id;
  }

  async search(query: string, limit: number): Promise<MemoryRecord[]> {
    if (limit <= 0) {
      return [];
    }

    const now = this.getTime();
    const ranked: MemoryRecord[] = [];
    for (const memory of this.memories.values()) {
      const overlap = keywordOverlapScore(query, `${memory.content} ${memory.tags.join(' ')}`);
      if (overlap === 0) {
        continue;
      }
      const score = aggregateScore(overlap, memory.importance, timeDecayScore(memory.createdAt, now));
      ranked.push({ ...memory, score });
    }

    return ranked
      .sort((left, right) => (right.score ?? 0) - (left.score ?? 0))
      .slice(0, limit);
  }
}
