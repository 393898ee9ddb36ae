/**
 * Score normalization and re-ranking
 *
 * Local results arrive with a vector distance (lower = closer) and web results
 * with a result position only. Both are mapped onto one relevance scale in
 * [0, 1] so that merged evidence can be ordered together.
 *
 * @module analyzer/score-normalization
 */

import { assertValidRelevance, type EvidenceItem } from "./types";

const WEB_TOP_RELEVANCE = 0.8;
const WEB_STEP = 0.1;
const WEB_FLOOR = 0.5;

/** r = 1 / (1 + d), in (0, 1], strictly decreasing in d. */
export function localDistanceToRelevance(distance: number): number {
  const d = Number.isFinite(distance) ? Math.max(0, distance) : Number.MAX_VALUE;
  return assertValidRelevance(1 / (1 + d), "local distance");
}

/**
 * Synthetic relevance for the web result at 0-based `position`:
 * 0.8, 0.7, 0.6, then 0.5 for every later position.
 */
export function webRankToRelevance(position: number): number {
  const raw = Math.max(WEB_FLOOR, WEB_TOP_RELEVANCE - WEB_STEP * Math.max(0, position));
  // Rounded so 0.8 - 0.1 compares equal to 0.7
  return assertValidRelevance(Math.round(raw * 1000) / 1000, "web position");
}

/** Lowercased whitespace-separated words; punctuation stays attached. */
export function tokenize(text: string): Set<string> {
  return new Set(text.toLowerCase().split(/\s+/).filter((word) => word.length > 0));
}

/** Number of distinct claim tokens that also occur in `content`. */
export function keywordOverlap(claimTokens: Set<string>, content: string): number {
  const contentTokens = tokenize(content);
  let overlap = 0;
  for (const token of claimTokens) {
    if (contentTokens.has(token)) overlap++;
  }
  return overlap;
}

/**
 * Keep one item per (origin, sourceId), preferring the higher relevance.
 * First-seen order is preserved.
 */
export function dedupeEvidence(items: EvidenceItem[]): EvidenceItem[] {
  const byKey = new Map<string, EvidenceItem>();
  for (const item of items) {
    const key = `${item.origin}|${item.sourceId}`;
    const existing = byKey.get(key);
    if (!existing || item.relevanceScore > existing.relevanceScore) {
      byKey.set(key, item);
    }
  }
  return [...byKey.values()];
}

/**
 * Deduplicate, then order by (keyword overlap with the claim, relevance), both
 * descending, and renumber ranks 1..n. Ties keep their input order.
 */
export function rerankEvidence(claim: string, items: EvidenceItem[]): EvidenceItem[] {
  const claimTokens = tokenize(claim);
  const scored = dedupeEvidence(items).map((item) => ({
    item,
    overlap: keywordOverlap(claimTokens, item.content),
  }));

  scored.sort((a, b) => b.overlap - a.overlap || b.item.relevanceScore - a.item.relevanceScore);

  return scored.map(({ item }, i) => ({ ...item, rank: i + 1 }));
}
