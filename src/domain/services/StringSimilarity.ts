import type { MatchConfidence } from '../entities/Interpretation.js';

export const SIMILARITY_THRESHOLDS = {
  exact: 1.0,
  high: 0.85,
  medium: 0.65,
  low: 0.4,
} as const;

export const levenshteinDistance = (a: string, b: string): number => {
  if (a === b) {
    return 0;
  }
  if (!a.length) {
    return b.length;
  }
  if (!b.length) {
    return a.length;
  }

  let previous = Array.from({ length: b.length + 1 }, (_, index) => index);

  for (let i = 1; i <= a.length; i += 1) {
    const current = [i];
    for (let j = 1; j <= b.length; j += 1) {
      const substitution = (previous[j - 1] ?? 0) + (a[i - 1] === b[j - 1] ? 0 : 1);
      const insertion = (current[j - 1] ?? 0) + 1;
      const deletion = (previous[j] ?? 0) + 1;
      current.push(Math.min(substitution, insertion, deletion));
    }
    previous = current;
  }

  return previous[b.length] ?? 0;
};

/** Normalized edit similarity in [0, 1]: 1 - distance / longer length. */
export const similarityRatio = (a: string, b: string): number => {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) {
    return 1;
  }
  return 1 - levenshteinDistance(a, b) / longest;
};

export const confidenceFromRatio = (ratio: number): MatchConfidence => {
  if (ratio >= SIMILARITY_THRESHOLDS.exact) {
    return 'EXACT';
  }
  if (ratio >= SIMILARITY_THRESHOLDS.high) {
    return 'HIGH';
  }
  if (ratio >= SIMILARITY_THRESHOLDS.medium) {
    return 'MEDIUM';
  }
  if (ratio >= SIMILARITY_THRESHOLDS.low) {
    return 'LOW';
  }
  return 'NO_MATCH';
};

export interface CloseMatch {
  candidate: string;
  ratio: number;
}

/**
 * Best candidates at or above `cutoff`, highest ratio first. Equal ratios keep
 * the candidates' original order.
 */
export const closeMatches = (
  query: string,
  candidates: Iterable<string>,
  options: { limit?: number; cutoff?: number } = {},
): CloseMatch[] => {
  const limit = options.limit ?? 3;
  const cutoff = options.cutoff ?? SIMILARITY_THRESHOLDS.low;

  return Array.from(candidates)
    .map((candidate) => ({ candidate, ratio: similarityRatio(query, candidate) }))
    .filter((match) => match.ratio >= cutoff)
    .sort((left, right) => right.ratio - left.ratio)
    .slice(0, limit);
};
