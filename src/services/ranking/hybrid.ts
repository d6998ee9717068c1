/**
 * Hybrid Merge Engine
 *
 * Pool-then-fuse ranking:
 * 1. Resolve the pantry (caller-supplied, or read from the inventory provider)
 * 2. Exact-match ranking over a generous candidate pool
 * 3. Semantic search over the same pool size, concurrently with step 2
 * 4. Add similarity × 50 to candidates already in the exact-match pool
 * 5. Stable sort, keep topK, resolve records
 *
 * The exact-match pool is the candidate universe unless includeSemanticOnly
 * is set. A failed or unavailable semantic stage falls back to exact-match
 * order.
 */

import { HybridRankOptions, HybridResult, SemanticOutcome } from '../../types';
import { RecipeCatalog } from '../catalog';
import { PantryInventoryProvider, resolvePantry } from '../pantry';
import { DEFAULT_CANDIDATE_POOL, DEFAULT_TOP_K, SCORING } from './constants';
import { computeOverlap, rankPantryCandidates, toPantrySet } from './exact-match';
import { SemanticRanker } from './semantic';

export interface HybridRankerOptions {
  candidatePoolSize?: number;
  includeSemanticOnly?: boolean;
  expiringWithinDays?: number;
  now?: () => Date;
}

interface FusedCandidate {
  recipeId: number;
  score: number;
  used: number;
  missing: string[];
}

export class HybridRanker {
  private readonly candidatePoolSize: number;
  private readonly includeSemanticOnly: boolean;
  private readonly expiringWithinDays: number;
  private readonly now: () => Date;

  constructor(
    private readonly catalog: RecipeCatalog,
    private readonly semantic: SemanticRanker,
    private readonly pantryProvider: PantryInventoryProvider | null,
    options: HybridRankerOptions = {}
  ) {
    this.candidatePoolSize = options.candidatePoolSize ?? DEFAULT_CANDIDATE_POOL;
    this.includeSemanticOnly = options.includeSemanticOnly ?? false;
    this.expiringWithinDays = options.expiringWithinDays ?? 3;
    this.now = options.now ?? (() => new Date());
  }

  async rank(options: HybridRankOptions = {}): Promise<HybridResult[]> {
    const topK = options.topK ?? DEFAULT_TOP_K;
    const allowMissing = options.allowMissing ?? 0;
    const useSemantic = options.useSemantic ?? true;

    // ─────────────────────────────────────────────────────────────
    // STEP 1: Resolve pantry
    // ─────────────────────────────────────────────────────────────
    const pantry = await resolvePantry(
      this.pantryProvider,
      options.pantryItems,
      this.expiringWithinDays,
      this.now()
    );
    const pantrySet = toPantrySet(pantry.items);
    if (pantrySet.size === 0 || topK <= 0) return [];

    // ─────────────────────────────────────────────────────────────
    // STEP 2 + 3: Exact-match pool and semantic pool, concurrently
    // ─────────────────────────────────────────────────────────────
    const semanticPending: Promise<SemanticOutcome> | null = useSemantic
      ? this.semantic.search(options.queryText, pantry.items, this.candidatePoolSize)
      : null;

    const exact = rankPantryCandidates(
      this.catalog,
      pantry.items,
      allowMissing,
      this.candidatePoolSize
    );

    const outcome = semanticPending ? await semanticPending : null;
    if (outcome && outcome.status === 'failed') {
      console.warn('[HybridRanker] Semantic stage failed, using exact-match ranking only');
    }

    // ─────────────────────────────────────────────────────────────
    // STEP 4: Fuse
    // ─────────────────────────────────────────────────────────────
    // Map insertion order is the exact-match order, so the stable sort
    // below breaks ties the same way on every run.
    const fused = new Map<number, FusedCandidate>();
    for (const candidate of exact) {
      fused.set(candidate.recipeId, { ...candidate });
    }

    if (outcome && outcome.status === 'ok') {
      const boosted = new Set<number>();

      for (const hit of outcome.hits) {
        if (boosted.has(hit.recipeId)) continue;
        boosted.add(hit.recipeId);

        const bonus = hit.similarity * SCORING.SEMANTIC_WEIGHT;
        const entry = fused.get(hit.recipeId);
        if (entry) {
          entry.score += bonus;
          continue;
        }

        if (!this.includeSemanticOnly) continue;
        const recipe = this.catalog.metadata.get(hit.recipeId);
        if (!recipe) continue;
        const overlap = computeOverlap(recipe, pantrySet);
        fused.set(hit.recipeId, {
          recipeId: hit.recipeId,
          score: bonus,
          used: overlap.used,
          missing: overlap.missing,
        });
      }
    }

    // ─────────────────────────────────────────────────────────────
    // STEP 5 + 6: Order, cut, resolve
    // ─────────────────────────────────────────────────────────────
    const ranked = Array.from(fused.values()).sort((a, b) => b.score - a.score);

    const results: HybridResult[] = [];
    for (const candidate of ranked) {
      if (results.length >= topK) break;
      const recipe = this.catalog.metadata.get(candidate.recipeId);
      if (!recipe) continue;

      results.push({
        recipe,
        score: candidate.score,
        used: candidate.used,
        missing: candidate.missing,
        expiringUsed: Array.from(new Set(recipe.ingredients)).filter((key) =>
          pantry.expiring.has(key)
        ),
      });
    }

    return results;
  }
}
