/**
 * Inverted Ingredient Index
 *
 * Normalized ingredient key -> ids of the recipes that contain it.
 * Built once (at ingestion, or from records in memory) and read-only afterwards.
 * Ids are de-duplicated per key at build time.
 */

import fs from 'fs';
import { IngredientIndexFile, IngredientIndexFileSchema, RecipeRecord } from '../../types';
import { IndexLoadError } from '../../utils/errors';

const EMPTY: ReadonlySet<number> = new Set<number>();

export class IngredientIndex {
  private readonly buckets: Map<string, Set<number>>;

  constructor(buckets: Map<string, Set<number>> = new Map()) {
    this.buckets = buckets;
  }

  /**
   * Build from records whose ingredients are already normalized keys.
   * An id lands under a key iff the recipe lists that key at least once.
   */
  static build(records: Iterable<RecipeRecord>): IngredientIndex {
    const buckets = new Map<string, Set<number>>();
    for (const record of records) {
      for (const key of record.ingredients) {
        if (!key) continue;
        let bucket = buckets.get(key);
        if (!bucket) {
          bucket = new Set<number>();
          buckets.set(key, bucket);
        }
        bucket.add(record.id);
      }
    }
    return new IngredientIndex(buckets);
  }

  static fromJSON(data: IngredientIndexFile): IngredientIndex {
    const buckets = new Map<string, Set<number>>();
    for (const [key, ids] of Object.entries(data)) {
      if (!key) continue;
      buckets.set(key, new Set(ids));
    }
    return new IngredientIndex(buckets);
  }

  get size(): number {
    return this.buckets.size;
  }

  lookup(key: string): ReadonlySet<number> {
    return this.buckets.get(key) ?? EMPTY;
  }

  /** Same shape as ingredient_index.json */
  toJSON(): Record<string, number[]> {
    const out: Record<string, number[]> = {};
    for (const [key, ids] of this.buckets) {
      out[key] = Array.from(ids);
    }
    return out;
  }
}

/**
 * Load ingredient_index.json (a single object of key -> id array).
 *
 * @throws IndexLoadError when the file is missing or malformed
 */
export async function loadIngredientIndex(filePath: string): Promise<IngredientIndex> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(filePath, 'utf8');
  } catch (err) {
    throw new IndexLoadError(`Ingredient index not found: ${filePath}`, {
      path: filePath,
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new IndexLoadError(`Malformed JSON in ingredient index: ${filePath}`, {
      path: filePath,
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  const parsed = IngredientIndexFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new IndexLoadError(`Invalid ingredient index: ${filePath}`, {
      path: filePath,
      issues: parsed.error.issues,
    });
  }

  return IngredientIndex.fromJSON(parsed.data);
}
