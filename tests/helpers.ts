import { RecipeRecord, VectorMatch, VectorPoint } from '../src/types';
import { EmbeddingProvider, VectorIndex } from '../src/services/vector';

export function recipe(id: number, title: string, ingredients: string[]): RecipeRecord {
  return { id, title, ingredients, directions: [], source: '', link: '' };
}

export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly model = 'fake-embedding';
  readonly texts: string[] = [];

  constructor(private readonly vector: number[] = [3, 4]) {}

  async embed(text: string): Promise<number[]> {
    this.texts.push(text);
    return this.vector;
  }
}

/** In-process stand-in for the vector backend. */
export class FakeVectorIndex implements VectorIndex {
  readonly searchCalls: Array<{ vector: number[]; limit: number }> = [];
  readonly upserts: VectorPoint[][] = [];
  failuresBeforeSuccess = 0;
  /** Delay before an injected failure rejects */
  failureDelayMs = 0;
  hang = false;

  constructor(
    public matches: VectorMatch[] = [],
    public exists = true
  ) {}

  async collectionExists(): Promise<boolean> {
    return this.exists;
  }

  search(vector: number[], limit: number): Promise<VectorMatch[]> {
    this.searchCalls.push({ vector, limit });
    if (this.failuresBeforeSuccess > 0) {
      this.failuresBeforeSuccess--;
      const failure = new Error('connection reset');
      if (this.failureDelayMs <= 0) return Promise.reject(failure);
      return new Promise<VectorMatch[]>((_, reject) => {
        setTimeout(() => reject(failure), this.failureDelayMs);
      });
    }
    if (this.hang) return new Promise<VectorMatch[]>(() => undefined);
    return Promise.resolve(this.matches.slice(0, limit));
  }

  async upsert(points: VectorPoint[]): Promise<void> {
    this.upserts.push(points);
  }
}
