/**
 * Skill-rank tokens
 *
 * `NC` is unranked. Tiers run E < D < C < B < A; inside a tier a lower
 * sub-level is stronger (E0 beats E6). A ranks carry a national position,
 * A1 being the strongest.
 */

const RANK_PATTERN = /^(?:NC|[A-E]\d{0,2})$/;

const TIER_WEIGHT: Record<string, number> = {
  E: 1,
  D: 2,
  C: 3,
  B: 4,
  A: 5,
};

export function isRankToken(token: string): boolean {
  return RANK_PATTERN.test(token.trim().toUpperCase());
}

/**
 * Numeric strength of a rank, higher is stronger. `null` for unknown tokens.
 */
export function rankScore(token: string): number | null {
  const normalized = token.trim().toUpperCase();
  if (!RANK_PATTERN.test(normalized)) {
    return null;
  }
  if (normalized === "NC") {
    return 0;
  }

  const tier = TIER_WEIGHT[normalized.charAt(0)];
  if (tier === undefined) {
    return null;
  }
  const level = normalized.length > 1 ? Number(normalized.slice(1)) : 0;
  return tier * 100 + (99 - level);
}

/**
 * Sort comparator, strongest first. Unknown tokens go last.
 */
export function compareRanks(a: string, b: string): number {
  const scoreA = rankScore(a) ?? -1;
  const scoreB = rankScore(b) ?? -1;
  if (scoreA !== scoreB) {
    return scoreB - scoreA;
  }
  return a.localeCompare(b);
}
