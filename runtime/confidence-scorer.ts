const URL_PATTERN = /https?:\/\/[^\s)\]]+/giu;
const CITATION_PATTERN = /\[(\d+)\]/gu;
const HEDGE_PATTERN = /\b(?:might|may|possibly|perhaps|unclear|uncertain|it\s+seems|not\s+sure|could\s+be|likely)\b/giu;

const BASE_SCORE = 0.4;
const MAX_LENGTH_WORDS = 200;
const LENGTH_WEIGHT = 0.3;
const MAX_SOURCES = 5;
const SOURCE_WEIGHT = 0.05;
const MAX_HEDGES = 4;
const HEDGE_WEIGHT = 0.05;

/**
 * Deterministic confidence in [0, 1] for a completion, from its length, the
 * distinct sources it cites and how much it hedges. Rounded to two decimals.
 */
export function scoreConfidence(text: string): number {
  if (!text.trim()) {
    return 0;
  }

  const words = text.trim().split(/\s+/u).length;
  const lengthScore = Math.min(words / MAX_LENGTH_WORDS, 1) * LENGTH_WEIGHT;
  const sourceScore = Math.min(countSources(text), MAX_SOURCES) * SOURCE_WEIGHT;
  const hedgePenalty = Math.min(countHedges(text), MAX_HEDGES) * HEDGE_WEIGHT;

  const score = Math.min(1, Math.max(0, BASE_SCORE + lengthScore + sourceScore - hedgePenalty));
  return Math.round(score * 100) / 100;
}

export function countSources(text: string): number {
  const urls = new Set<string>();
  for (const match of text.matchAll(URL_PATTERN)) {
    const url = match[0].replace(/[.,]+$/u, '');
    if (url) {
      urls.add(url);
    }
  }

  const citations = new Set<string>();
  for (const match of text.matchAll(CITATION_PATTERN)) {
    citations.add(match[1]);
  }

  return urls.size + citations.size;
}

export function countHedges(text: string): number {
  return [...text.matchAll(HEDGE_PATTERN)].length;
}
