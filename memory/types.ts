export interface MemoryInput {
  content: string;
  kind: string;
  tags?: string[];
  /** 0..1; defaults to 0.5. */
  importance?: number;
}

export interface MemoryRecord {
  readonly id: string;
  readonly content: string;
  readonly kind: string;
  readonly tags: readonly string[];
  readonly importance: number;
  readonly createdAt: number;
  /** Ranking score of the search that returned this record. */
  readonly score?: number;
}

/** Long-term memory consulted by agent runtimes before and after each task. */
export interface MemoryCapability {
  remember(input: MemoryInput): Promise<string>;
  search(query: string, limit: number): Promise<MemoryRecord[]>;
}
