import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  VectorSearchService,
  buildSemanticQueryText,
  l2Normalize,
  recipeEmbeddingText,
} from '../src/services/vector';
import { SemanticRanker } from '../src/services/ranking';
import { TimeoutError } from '../src/utils/timeout';
import { FakeEmbeddingProvider, FakeVectorIndex, recipe } from './helpers';

async function readyService(index: FakeVectorIndex, embeddings = new FakeEmbeddingProvider()) {
  const service = new VectorSearchService(embeddings, index, { timeoutMs: 50 });
  await service.init();
  return service;
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('text construction', () => {
  it('builds the corpus embedding text from title and ingredients', () => {
    expect(recipeEmbeddingText(recipe(1, 'Pancakes', ['flour', 'egg', 'milk']))).toBe(
      'Pancakes. Ingredients: flour, egg, milk'
    );
  });

  it('joins preference and pantry clause with ". "', () => {
    expect(buildSemanticQueryText('quick breakfast', ['eggs', 'milk'])).toBe(
      'quick breakfast. Ingredients: eggs, milk'
    );
  });

  it('uses whichever input is present', () => {
    expect(buildSemanticQueryText('spicy soup', null)).toBe('spicy soup');
    expect(buildSemanticQueryText(undefined, ['rice'])).toBe('Ingredients: rice');
  });

  it('returns null when both inputs are empty', () => {
    expect(buildSemanticQueryText(null, null)).toBeNull();
    expect(buildSemanticQueryText('  ', ['', ' '])).toBeNull();
  });
});

describe('l2Normalize', () => {
  it('scales to unit length', () => {
    expect(l2Normalize([3, 4])).toEqual([0.6, 0.8]);
  });

  it('leaves the zero vector alone', () => {
    expect(l2Normalize([0, 0])).toEqual([0, 0]);
  });
});

describe('VectorSearchService', () => {
  it('is not ready when the collection is missing', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const service = await readyService(new FakeVectorIndex([], false));

    expect(service.isReady).toBe(false);
  });

  it('is not ready when the backend is unreachable', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const index = new FakeVectorIndex();
    vi.spyOn(index, 'collectionExists').mockRejectedValue(new Error('ECONNREFUSED'));

    const service = await readyService(index);
    expect(service.isReady).toBe(false);
  });

  it('searches with the normalized query vector', async () => {
    const index = new FakeVectorIndex([
      { id: 4, score: 0.4 },
      { id: 9, score: 0.9 },
    ]);
    const embeddings = new FakeEmbeddingProvider([3, 4]);
    const service = await readyService(index, embeddings);

    const hits = await service.search('quick breakfast', 5);

    expect(embeddings.texts).toEqual(['quick breakfast']);
    expect(index.searchCalls).toEqual([{ vector: [0.6, 0.8], limit: 5 }]);
    expect(hits).toEqual([
      { recipeId: 9, similarity: 0.9 },
      { recipeId: 4, similarity: 0.4 },
    ]);
  });

  it('retries once after a transient failure', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const index = new FakeVectorIndex([{ id: 1, score: 0.5 }]);
    index.failuresBeforeSuccess = 1;
    const service = await readyService(index);

    const hits = await service.search('soup', 3);

    expect(index.searchCalls).toHaveLength(2);
    expect(hits).toEqual([{ recipeId: 1, similarity: 0.5 }]);
  });

  it('gives up after the retry', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const index = new FakeVectorIndex([{ id: 1, score: 0.5 }]);
    index.failuresBeforeSuccess = 2;
    const service = await readyService(index);

    await expect(service.search('soup', 3)).rejects.toThrow('connection reset');
    expect(index.searchCalls).toHaveLength(2);
  });

  it('does not retry a timeout', async () => {
    const index = new FakeVectorIndex();
    const service = await readyService(index);
    index.hang = true;

    await expect(service.search('soup', 3)).rejects.toBeInstanceOf(TimeoutError);
    expect(index.searchCalls).toHaveLength(1);
  });

  it('gives a retry only the time left on the deadline', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const index = new FakeVectorIndex();
    index.failuresBeforeSuccess = 1;
    index.failureDelayMs = 30;
    index.hang = true;
    const service = await readyService(index);

    const error = await service.search('soup', 3).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(index.searchCalls).toHaveLength(2);
    if (error instanceof TimeoutError) {
      expect(error.timeoutMs).toBeLessThan(50);
    }
  });

  it('refuses to search once closed', async () => {
    const service = await readyService(new FakeVectorIndex());
    await service.close();

    expect(service.isReady).toBe(false);
    await expect(service.search('soup', 3)).rejects.toThrow('not initialized');
  });

  it('upserts recipes in batches with the shared text template', async () => {
    const index = new FakeVectorIndex();
    const embeddings = new FakeEmbeddingProvider([0, 2]);
    const service = await readyService(index, embeddings);

    const written = await service.upsertRecipes(
      [
        recipe(1, 'Pancakes', ['flour', 'egg']),
        recipe(2, 'Toast', ['bread']),
        recipe(3, 'Rice', ['rice']),
      ],
      2
    );

    expect(written).toBe(3);
    expect(index.upserts.map((batch) => batch.map((point) => point.id))).toEqual([[1, 2], [3]]);
    expect(index.upserts[0][0]).toEqual({
      id: 1,
      vector: [0, 1],
      payload: { title: 'Pancakes', ingredients: ['flour', 'egg'], source: '', link: '' },
    });
    expect(embeddings.texts).toEqual([
      'Pancakes. Ingredients: flour, egg',
      'Toast. Ingredients: bread',
      'Rice. Ingredients: rice',
    ]);
  });
});

describe('SemanticRanker', () => {
  it('returns no_input when both inputs are absent', async () => {
    const ranker = new SemanticRanker(await readyService(new FakeVectorIndex()));

    expect(await ranker.search(null, null, 10)).toEqual({ status: 'no_input' });
    expect(await ranker.rank(null, null, 10)).toEqual([]);
  });

  it('reports unavailable without a backend', async () => {
    const ranker = new SemanticRanker(null);

    expect(await ranker.search('soup', null, 10)).toEqual({
      status: 'unavailable',
      reason: 'vector backend not configured',
    });
    expect(await ranker.rank('soup', null, 10)).toEqual([]);
  });

  it('reports unavailable when the backend never initialized', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const ranker = new SemanticRanker(await readyService(new FakeVectorIndex([], false)));

    expect(await ranker.search('soup', null, 10)).toEqual({
      status: 'unavailable',
      reason: 'vector backend not initialized',
    });
  });

  it('converts backend failures into an empty result', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const index = new FakeVectorIndex([{ id: 1, score: 0.5 }]);
    const ranker = new SemanticRanker(await readyService(index));
    index.failuresBeforeSuccess = 5;

    const outcome = await ranker.search('soup', ['leek'], 10);
    expect(outcome.status).toBe('failed');
    expect(await ranker.rank('soup', ['leek'], 10)).toEqual([]);
  });

  it('embeds preference and pantry together', async () => {
    const index = new FakeVectorIndex([{ id: 7, score: 0.7 }]);
    const embeddings = new FakeEmbeddingProvider();
    const ranker = new SemanticRanker(await readyService(index, embeddings));

    const hits = await ranker.rank('creamy soup', ['leek', 'potato'], 10);

    expect(embeddings.texts).toEqual(['creamy soup. Ingredients: leek, potato']);
    expect(hits).toEqual([{ recipeId: 7, similarity: 0.7 }]);
  });
});
