/**
 * Recipe catalog: the metadata store plus the inverted ingredient index.
 * Both are read-only once loaded, so one catalog serves concurrent requests.
 */

import { RecipeRecord } from '../../types';
import { IngredientIndex, loadIngredientIndex } from './ingredient-index';
import { MetadataStore, loadMetadataStore } from './metadata-store';

export { IngredientIndex, loadIngredientIndex } from './ingredient-index';
export { MetadataStore, loadMetadataStore, createRecipeRecord } from './metadata-store';
export type { RawRecipeInput } from './metadata-store';

export interface RecipeCatalog {
  metadata: MetadataStore;
  index: IngredientIndex;
}

export async function loadCatalog(paths: {
  metadataPath: string;
  ingredientIndexPath: string;
}): Promise<RecipeCatalog> {
  const [metadata, index] = await Promise.all([
    loadMetadataStore(paths.metadataPath),
    loadIngredientIndex(paths.ingredientIndexPath),
  ]);

  console.log(
    `[Catalog] Loaded ${metadata.size} recipes and ${index.size} ingredient keys`
  );

  return { metadata, index };
}

/** Build a catalog from records already in memory. */
export function createCatalog(records: RecipeRecord[]): RecipeCatalog {
  return {
    metadata: new MetadataStore(records),
    index: IngredientIndex.build(records),
  };
}
