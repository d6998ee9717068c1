/**
 * Semantic Candidate Ranker
 *
 * Embeds "preference. Ingredients: pantry" and asks the vector index for the
 * nearest recipes. An optional layer: every failure mode degrades to no hits.
 */

import { SemanticHit, SemanticOutcome } from '../../types';
import { VectorSearchService, buildSemanticQueryText } from '../vector';

export class SemanticRanker {
  constructor(private readonly vectorSearch: VectorSearchService | null) {}

  get available(): boolean {
    return this.vectorSearch?.isReady ?? false;
  }

  /**
   * Run a semantic search and report why it produced what it did.
   * Never rejects.
   */
  async search(
    queryText: string | null | undefined,
    pantryItems: readonly string[] | null | undefined,
    k: number
  ): Promise<SemanticOutcome> {
    const text = buildSemanticQueryText(queryText, pantryItems);
    if (text === null) return { status: 'no_input' };

    if (!this.vectorSearch) {
      return { status: 'unavailable', reason: 'vector backend not configured' };
    }
    if (!this.vectorSearch.isReady) {
      return { status: 'unavailable', reason: 'vector backend not initialized' };
    }
    if (k <= 0) return { status: 'ok', hits: [] };

    try {
      const hits = await this.vectorSearch.search(text, k);
      return { status: 'ok', hits };
    } catch (error) {
      console.error('[SemanticRanker] Search failed:', error);
      return { status: 'failed', error };
    }
  }

  /** Hits ordered by descending similarity; [] when there is nothing to return. */
  async rank(
    queryText: string | null | undefined,
    pantryItems: readonly string[] | null | undefined,
    k: number
  ): Promise<SemanticHit[]> {
    const outcome = await this.search(queryText, pantryItems, k);
    return outcome.status === 'ok' ? outcome.hits : [];
  }
}
