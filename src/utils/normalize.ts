/**
 * Deterministic ingredient key normalization.
 * No ML, no fuzzy matching - just explicit rules.
 *
 * This module is shared between:
 * - Index building (recipe ingredients -> inverted index keys)
 * - Query time (pantry items -> lookup keys)
 *
 * Both paths must go through normalizeIngredient or exact matches silently stop
 * lining up with pre-built index files.
 */

// Quantity + unit phrase, e.g. "2 cups", "1/2 tsp", "100 g".
// There is no word boundary after the unit, so "2 green" also loses its "g".
// Pre-built indices were produced with this exact pattern; quantities match
// any decimal digit, not only ASCII.
const QUANTITY_UNIT_PATTERN =
  /(^|\s)\p{Nd}+\/?\p{Nd}*\s*(cups?|cup|tbsp|tbs|tbsp\.|tsp|grams?|g|kg|oz|ounces?)/giu;

const NON_WORD_PATTERN = /[^\p{L}\p{N}_\s]/gu;

/**
 * Normalize a raw ingredient phrase into its lexical key.
 * - Lowercase and trim
 * - Drop quantity/unit phrases
 * - Drop punctuation
 * - Naive singularization ("es" when length > 4, else "s" when length > 3)
 *
 * The singularizer also trims words that only look plural ("hummus" -> "hummu").
 * Changing that means rebuilding every persisted index.
 *
 * @param raw - Raw ingredient text from a recipe or a pantry
 * @returns Normalized key, or "" when nothing is left
 */
export function normalizeIngredient(raw: string): string {
  let key = raw.toLowerCase().trim();
  key = key.replace(QUANTITY_UNIT_PATTERN, ' ');
  key = key.replace(NON_WORD_PATTERN, '');
  key = key.trim();

  if (key.endsWith('es') && key.length > 4) {
    return key.slice(0, -2);
  }
  if (key.endsWith('s') && key.length > 3) {
    return key.slice(0, -1);
  }
  return key;
}

/**
 * Normalize a list of raw ingredient phrases, dropping empty keys.
 * Order and duplicates are kept.
 */
export function normalizeIngredients(items: Iterable<string>): string[] {
  const keys: string[] = [];
  for (const item of items) {
    const key = normalizeIngredient(item);
    if (key) keys.push(key);
  }
  return keys;
}
