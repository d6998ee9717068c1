/**
 * Recipe Retrieval Service
 *
 * Operations exposed to callers:
 * - exactMatchRank: pantry overlap ranking
 * - semanticRank: embedding similarity ranking
 * - hybridRank: fused ranking resolved to full records
 * - checkFeasibility: one recipe against the pantry
 *
 * Holds no mutable state beyond the injected, read-only catalog and vector
 * search service, so one instance serves concurrent requests.
 */

import {
  CandidateScore,
  FeasibilityReport,
  HybridRankOptions,
  HybridResult,
  RecipeRecord,
  SemanticHit,
} from '../../types';
import { RecipeCatalog } from '../catalog';
import { PantryInventoryProvider, resolvePantry } from '../pantry';
import { VectorSearchService } from '../vector';
import { DEFAULT_TOP_K } from './constants';
import { computeOverlap, rankPantryCandidates, toPantrySet } from './exact-match';
import { HybridRanker, HybridRankerOptions } from './hybrid';
import { SemanticRanker } from './semantic';

export { SCORING, DEFAULT_CANDIDATE_POOL, DEFAULT_TOP_K } from './constants';
export { computeOverlap, computeExactScore, rankPantryCandidates, toPantrySet } from './exact-match';
export { SemanticRanker } from './semantic';
export { HybridRanker } from './hybrid';

export interface RetrievalDependencies extends HybridRankerOptions {
  vectorSearch?: VectorSearchService | null;
  pantryProvider?: PantryInventoryProvider | null;
}

export class RecipeRetrievalService {
  private readonly semantic: SemanticRanker;
  private readonly hybrid: HybridRanker;
  private readonly pantryProvider: PantryInventoryProvider | null;

  constructor(
    private readonly catalog: RecipeCatalog,
    deps: RetrievalDependencies = {}
  ) {
    this.pantryProvider = deps.pantryProvider ?? null;
    this.semantic = new SemanticRanker(deps.vectorSearch ?? null);
    this.hybrid = new HybridRanker(catalog, this.semantic, this.pantryProvider, deps);
  }

  get semanticAvailable(): boolean {
    return this.semantic.available;
  }

  get recipeCount(): number {
    return this.catalog.metadata.size;
  }

  get ingredientCount(): number {
    return this.catalog.index.size;
  }

  exactMatchRank(pantryItems: string[], allowMissing = 0, topK = DEFAULT_TOP_K): CandidateScore[] {
    return rankPantryCandidates(this.catalog, pantryItems, allowMissing, topK);
  }

  semanticRank(
    queryText?: string | null,
    pantryItems?: string[] | null,
    k = DEFAULT_TOP_K
  ): Promise<SemanticHit[]> {
    return this.semantic.rank(queryText, pantryItems, k);
  }

  hybridRank(options: HybridRankOptions = {}): Promise<HybridResult[]> {
    return this.hybrid.rank(options);
  }

  getRecipe(id: number): RecipeRecord | undefined {
    return this.catalog.metadata.get(id);
  }

  /**
   * Check one recipe against the pantry (caller items, else the provider's
   * inventory). Feasible when at most `allowMissing` unique keys are missing;
   * with no pantry at all, every key is missing.
   *
   * @returns undefined for an unknown recipe id
   */
  async checkFeasibility(
    recipeId: number,
    allowMissing = 0,
    pantryItems?: string[]
  ): Promise<FeasibilityReport | undefined> {
    const recipe = this.catalog.metadata.get(recipeId);
    if (!recipe) return undefined;

    const pantry = await resolvePantry(this.pantryProvider, pantryItems, 0, new Date());
    const overlap = computeOverlap(recipe, toPantrySet(pantry.items));

    return {
      recipeId,
      feasible: overlap.missing.length <= Math.max(0, allowMissing),
      available: overlap.available,
      missing: overlap.missing,
      numAvailable: overlap.available.length,
      numMissing: overlap.missing.length,
    };
  }
}
