/**
 * Vector Search Service
 *
 * Owns the embedding provider and the vector index with an explicit
 * init()/close() lifecycle. Constructed once at boot and injected into the
 * semantic ranker, so tests can swap in in-process doubles.
 */

import type { VectorBackendConfig } from '../../config';
import { RecipeRecord, SemanticHit, VectorPoint } from '../../types';
import { TimeoutError, withTimeout } from '../../utils/timeout';
import { EmbeddingProvider, OpenAIEmbeddingProvider, l2Normalize, recipeEmbeddingText } from './embeddings';
import { QdrantVectorIndex, VectorIndex } from './qdrant';

export { buildSemanticQueryText, recipeEmbeddingText, l2Normalize, OpenAIEmbeddingProvider } from './embeddings';
export type { EmbeddingProvider } from './embeddings';
export { QdrantVectorIndex } from './qdrant';
export type { VectorIndex } from './qdrant';

export interface VectorSearchOptions {
  /** Budget for one call, retries included */
  timeoutMs: number;
  /** Extra attempts after a failed (non-timeout) call */
  retries?: number;
}

export class VectorSearchService {
  private ready = false;
  private readonly retries: number;

  constructor(
    private readonly embeddings: EmbeddingProvider,
    private readonly index: VectorIndex,
    private readonly options: VectorSearchOptions
  ) {
    this.retries = options.retries ?? 1;
  }

  static fromConfig(config: VectorBackendConfig): VectorSearchService {
    return new VectorSearchService(
      new OpenAIEmbeddingProvider(
        config.openaiApiKey,
        config.embeddingModel,
        config.embeddingDimensions,
        config.timeoutMs
      ),
      new QdrantVectorIndex(config.qdrantUrl, config.collectionName, config.qdrantApiKey),
      { timeoutMs: config.timeoutMs }
    );
  }

  get isReady(): boolean {
    return this.ready;
  }

  /**
   * Check that the recipe collection exists. Never throws: on failure the
   * service stays unavailable and semantic ranking returns nothing.
   */
  async init(): Promise<boolean> {
    try {
      const exists = await withTimeout(
        this.index.collectionExists(),
        this.options.timeoutMs,
        'Collection check'
      );
      if (!exists) {
        console.warn('[VectorSearch] Recipe collection not found, semantic search disabled');
      }
      this.ready = exists;
    } catch (error) {
      console.error('[VectorSearch] Backend unavailable, semantic search disabled:', error);
      this.ready = false;
    }
    return this.ready;
  }

  async close(): Promise<void> {
    this.ready = false;
  }

  /**
   * Embed `text` and return the k nearest recipes, most similar first.
   * Throws on backend failure or timeout; callers decide how to degrade.
   */
  async search(text: string, k: number): Promise<SemanticHit[]> {
    if (!this.ready) {
      throw new Error('Vector search service is not initialized');
    }

    const matches = await this.withRetry('Semantic search', async () => {
      const vector = l2Normalize(await this.embeddings.embed(text));
      return this.index.search(vector, k);
    });

    return matches
      .map((match) => ({ recipeId: match.id, similarity: match.score }))
      .sort((a, b) => b.similarity - a.similarity);
  }

  /**
   * Ingestion-time builder: embed records and write them in batches.
   *
   * @returns Number of points written
   */
  async upsertRecipes(records: Iterable<RecipeRecord>, batchSize = 100): Promise<number> {
    let batch: RecipeRecord[] = [];
    let written = 0;

    const flush = async (): Promise<void> => {
      if (batch.length === 0) return;
      const points: VectorPoint[] = [];
      for (const record of batch) {
        const vector = l2Normalize(await this.embeddings.embed(recipeEmbeddingText(record)));
        points.push({
          id: record.id,
          vector,
          payload: {
            title: record.title,
            ingredients: record.ingredients,
            source: record.source,
            link: record.link,
          },
        });
      }
      await this.withRetry('Vector upsert', () => this.index.upsert(points));
      written += points.length;
      batch = [];
    };

    for (const record of records) {
      batch.push(record);
      if (batch.length >= batchSize) await flush();
    }
    await flush();

    return written;
  }

  /**
   * Attempts share one deadline of `timeoutMs`: a retry only gets the time
   * the failed attempt left over.
   */
  private async withRetry<T>(label: string, fn: () => Promise<T>): Promise<T> {
    const deadline = Date.now() + this.options.timeoutMs;
    let attempt = 0;
    for (;;) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new TimeoutError(label, this.options.timeoutMs);
      }
      try {
        return await withTimeout(fn(), remaining, label);
      } catch (error) {
        if (error instanceof TimeoutError || attempt >= this.retries) throw error;
        attempt++;
        console.warn(`[VectorSearch] ${label} failed, retrying (${attempt}/${this.retries}):`, error);
      }
    }
  }
}
