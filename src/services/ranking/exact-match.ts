/**
 * Exact-Match Candidate Ranker
 *
 * Scores recipes that share at least one normalized key with the pantry.
 * Pure function of the pantry and the read-only catalog.
 */

import { CandidateScore, RecipeRecord } from '../../types';
import { normalizeIngredients } from '../../utils/normalize';
import { RecipeCatalog } from '../catalog';
import { SCORING } from './constants';

export interface PantryOverlap {
  used: number;
  available: string[];
  missing: string[];
  uniqueCount: number;
}

/**
 * Compare a recipe's unique keys against the pantry.
 * `available` and `missing` keep the order in which keys first appear in the recipe.
 */
export function computeOverlap(recipe: RecipeRecord, pantry: ReadonlySet<string>): PantryOverlap {
  const unique = new Set(recipe.ingredients);
  const available: string[] = [];
  const missing: string[] = [];

  for (const key of unique) {
    if (pantry.has(key)) {
      available.push(key);
    } else {
      missing.push(key);
    }
  }

  return { used: available.length, available, missing, uniqueCount: unique.size };
}

/**
 * Waste-aware score.
 *
 * Formula: used × 100 + (1000 if nothing missing) − |unique recipe keys|
 *
 * Using more pantry items always wins over a higher overlap ratio, and
 * "cook now" recipes sit above anything needing a shop.
 */
export function computeExactScore(overlap: PantryOverlap): number {
  const completeBonus = overlap.missing.length === 0 ? SCORING.COMPLETE_BONUS : 0;
  return (
    overlap.used * SCORING.USED_WEIGHT +
    completeBonus -
    overlap.uniqueCount * SCORING.SIZE_PENALTY
  );
}

/** Normalize and de-duplicate raw pantry items (empty keys dropped). */
export function toPantrySet(pantryItems: Iterable<string>): Set<string> {
  return new Set(normalizeIngredients(pantryItems));
}

/**
 * Rank recipes for a pantry.
 *
 * Algorithm:
 * 1. Normalize pantry items into a set P (empty P -> [])
 * 2. Candidates = union of index lookups for each key in P
 * 3. Drop candidates missing more than `allowMissing` keys
 * 4. Score, stable sort descending, keep `topK`
 *
 * Candidate ids with no metadata record are skipped.
 *
 * @param catalog - Metadata store + inverted index
 * @param pantryItems - Raw pantry item names
 * @param allowMissing - Tolerated missing keys; negative is treated as 0
 * @param topK - Result cap
 */
export function rankPantryCandidates(
  catalog: RecipeCatalog,
  pantryItems: Iterable<string>,
  allowMissing: number,
  topK: number
): CandidateScore[] {
  const pantry = toPantrySet(pantryItems);
  if (pantry.size === 0 || topK <= 0) return [];

  const maxMissing = Math.max(0, allowMissing);

  const candidateIds = new Set<number>();
  for (const key of pantry) {
    for (const id of catalog.index.lookup(key)) {
      candidateIds.add(id);
    }
  }

  const scored: CandidateScore[] = [];
  for (const id of candidateIds) {
    const recipe = catalog.metadata.get(id);
    if (!recipe) continue;

    const overlap = computeOverlap(recipe, pantry);
    if (overlap.missing.length > maxMissing) continue;

    scored.push({
      recipeId: id,
      score: computeExactScore(overlap),
      used: overlap.used,
      missing: overlap.missing,
    });
  }

  scored.sort((a, b) => b.score - a.score);
  return scored.slice(0, topK);
}
