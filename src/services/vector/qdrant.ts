/**
 * Qdrant-backed vector index over recipe embeddings (cosine distance).
 */

import { QdrantClient } from '@qdrant/js-client-rest';
import { VectorMatch, VectorPoint } from '../../types';

export interface VectorIndex {
  collectionExists(): Promise<boolean>;
  search(vector: number[], limit: number): Promise<VectorMatch[]>;
  upsert(points: VectorPoint[]): Promise<void>;
}

export class QdrantVectorIndex implements VectorIndex {
  private readonly client: QdrantClient;

  constructor(
    url: string,
    private readonly collectionName: string,
    apiKey?: string
  ) {
    this.client = new QdrantClient({ url, apiKey });
  }

  async collectionExists(): Promise<boolean> {
    const { collections } = await this.client.getCollections();
    return collections.some((collection) => collection.name === this.collectionName);
  }

  async search(vector: number[], limit: number): Promise<VectorMatch[]> {
    const hits = await this.client.search(this.collectionName, {
      vector,
      limit,
      with_payload: false,
    });

    const matches: VectorMatch[] = [];
    for (const hit of hits) {
      const id = typeof hit.id === 'number' ? hit.id : Number(hit.id);
      // UUID point ids are not recipe ids
      if (!Number.isInteger(id)) continue;
      matches.push({ id, score: hit.score });
    }
    return matches;
  }

  async upsert(points: VectorPoint[]): Promise<void> {
    await this.client.upsert(this.collectionName, {
      wait: true,
      points: points.map((point) => ({
        id: point.id,
        vector: point.vector,
        payload: point.payload,
      })),
    });
  }
}
