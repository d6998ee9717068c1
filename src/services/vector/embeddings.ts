/**
 * Embedding text construction and providers.
 *
 * Corpus vectors and query vectors must come from the same model and the
 * same text template, otherwise similarities are meaningless.
 */

import OpenAI from 'openai';
import { RecipeRecord } from '../../types';

export interface EmbeddingProvider {
  readonly model: string;
  embed(text: string): Promise<number[]>;
}

/** "{title}. Ingredients: {a, b, c}" */
export function recipeEmbeddingText(recipe: Pick<RecipeRecord, 'title' | 'ingredients'>): string {
  return `${recipe.title}. Ingredients: ${recipe.ingredients.join(', ')}`;
}

/**
 * Query text for semantic search: the free-text preference, then an
 * "Ingredients: ..." clause for the pantry, joined by ". ".
 *
 * @returns The search string, or null when neither input has content
 */
export function buildSemanticQueryText(
  queryText?: string | null,
  pantryItems?: readonly string[] | null
): string | null {
  const parts: string[] = [];

  const query = queryText?.trim();
  if (query) parts.push(query);

  const items = (pantryItems ?? []).map((item) => item.trim()).filter((item) => item.length > 0);
  if (items.length > 0) parts.push(`Ingredients: ${items.join(', ')}`);

  return parts.length > 0 ? parts.join('. ') : null;
}

/** Scale to unit length so inner product equals cosine similarity. */
export function l2Normalize(vector: readonly number[]): number[] {
  let sumSquares = 0;
  for (const value of vector) sumSquares += value * value;
  const norm = Math.sqrt(sumSquares);
  if (norm === 0) return [...vector];
  return vector.map((value) => value / norm);
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  private readonly client: OpenAI;

  constructor(
    apiKey: string,
    public readonly model: string,
    private readonly dimensions: number,
    timeoutMs: number
  ) {
    // Retries are handled by VectorSearchService
    this.client = new OpenAI({ apiKey, maxRetries: 0, timeout: timeoutMs });
  }

  async embed(text: string): Promise<number[]> {
    const response = await this.client.embeddings.create({
      model: this.model,
      input: text,
      dimensions: this.dimensions,
    });

    const embedding = response.data[0]?.embedding;
    if (!embedding) {
      throw new Error(`Embedding model ${this.model} returned no vector`);
    }
    return embedding;
  }
}
