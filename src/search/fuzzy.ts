/**
 * Ordered-subsequence fuzzy matching.
 *
 * "gco" matches "git checkout" because g, c and o appear in that order.
 * Each matched character scores SCORE_MATCH; a character directly after the
 * previous match earns BONUS_CONSECUTIVE; every skipped character between
 * two matches costs PENALTY_GAP; a first match at offset k earns
 * max(0, BONUS_START - k).
 */

export const SCORE_MATCH = 16;
export const BONUS_CONSECUTIVE = 8;
export const PENALTY_GAP = 1;
export const BONUS_START = 15;

export interface FuzzyMatch {
  score: number;
  /** Offsets of the matched characters in the target */
  positions: number[];
}

function scorePositions(positions: number[]): number {
  let score = positions.length * SCORE_MATCH;

  for (let i = 1; i < positions.length; i++) {
    const gap = (positions[i] ?? 0) - (positions[i - 1] ?? 0) - 1;
    score += gap === 0 ? BONUS_CONSECUTIVE : -gap * PENALTY_GAP;
  }

  score += Math.max(0, BONUS_START - (positions[0] ?? 0));
  return Math.max(1, score);
}

function matchFrom(query: string, target: string, start: number): number[] | null {
  const positions = [start];
  let ti = start + 1;

  for (let qi = 1; qi < query.length; qi++) {
    const index = target.indexOf(query.charAt(qi), ti);
    if (index < 0) {
      return null;
    }
    positions.push(index);
    ti = index + 1;
  }
  return positions;
}

/**
 * Case-insensitive fuzzy match of `query` against `target`.
 * Every occurrence of the query's first character is tried as an anchor and
 * the best-scoring alignment wins. Returns null when the query is empty or
 * not a subsequence of the target.
 */
export function fuzzyMatch(query: string, target: string): FuzzyMatch | null {
  const q = query.toLowerCase();
  const t = target.toLowerCase();
  if (q.length === 0 || q.length > t.length) {
    return null;
  }

  let best: FuzzyMatch | null = null;
  let anchor = t.indexOf(q.charAt(0));

  while (anchor >= 0) {
    const positions = matchFrom(q, t, anchor);
    if (!positions) {
      // Later anchors leave even less of the target to match
      break;
    }
    const score = scorePositions(positions);
    if (!best || score > best.score) {
      best = { score, positions };
    }
    anchor = t.indexOf(q.charAt(0), anchor + 1);
  }

  return best;
}

export function fuzzyScore(query: string, target: string): number | null {
  return fuzzyMatch(query, target)?.score ?? null;
}
