/**
 * Ranking Constants
 *
 * These values control recipe ordering. Existing tuning depends on the exact
 * numbers, so change them together with the tests.
 */

export const SCORING = {
  /** Points per unique pantry ingredient the recipe uses */
  USED_WEIGHT: 100,

  /** Flat bonus when nothing is missing (cook right now) */
  COMPLETE_BONUS: 1000,

  /** Penalty per unique recipe ingredient (favors simpler recipes on ties) */
  SIZE_PENALTY: 1,

  /** Multiplier for cosine similarity in hybrid fusion; must stay below USED_WEIGHT */
  SEMANTIC_WEIGHT: 50,
} as const;

/** Candidates pulled from each stage before fusion */
export const DEFAULT_CANDIDATE_POOL = 500;

export const DEFAULT_TOP_K = 10;
