const WEEK_MS = 7 * 24 * 60 * 60 * 1000;

/** 1 for a fresh memory, halving every `halfLifeMs`. */
export function timeDecayScore(timestamp: number, now: number = Date.now(), halfLifeMs: number = WEEK_MS): number {
  if (halfLifeMs <= 0) {
    throw new Error('Half-life must be positive');
  }

  const age = Math.max(0, now - timestamp);
  const decay = 0.5 ** (age / halfLifeMs);
  return Math.min(1, Math.max(0, decay));
}

/** Share of the query's distinct tokens that also appear in `text`. */
export function keywordOverlapScore(query: string, text: string): number {
  const queryTokens = new Set(tokenize(query));
  if (queryTokens.size === 0) {
    return 0;
  }

  const tokens = new Set(tokenize(text));
  let overlap = 0;
  for (const token of queryTokens) {
    if (tokens.has(token)) {
      overlap += 1;
    }
  }
  return overlap / queryTokens.size;
}

export function aggregateScore(overlap: number, importance: number, decay: number, weights = { overlap: 0.6, importance: 0.2, decay: 0.2 }): number {
  return overlap * weights.overlap + importance * weights.importance + decay * weights.decay;
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/u)
    .filter((token) => token.length > 1);
}
