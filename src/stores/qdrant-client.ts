import { QdrantClient as QdrantSdk } from '@qdrant/js-client-rest';
import type { QdrantConfig, QdrantDistance } from '../types/config.js';
import { withRetry, type RetryPolicy } from '../providers/base.js';

export interface CollectionPoint {
  id: number;
  vector: number[];
  payload: Record<string, unknown>;
}

export interface ScoredCollectionPoint {
  id: number | string;
  score: number;
  payload?: Record<string, unknown> | null;
}

export interface CollectionPage {
  points: Array<{ id: number | string; payload?: Record<string, unknown> | null }>;
  nextOffset: number | string | null;
}

export interface CollectionInfo {
  pointsCount: number;
  vectorSize: number | null;
}

/**
 * Operations the remote store needs from a vector database collection.
 */
export interface VectorCollectionClient {
  collectionExists(name: string): Promise<boolean>;
  createCollection(name: string, vectorSize: number, distance: QdrantDistance): Promise<void>;
  deleteCollection(name: string): Promise<void>;
  getCollectionInfo(name: string): Promise<CollectionInfo>;
  upsert(name: string, points: CollectionPoint[]): Promise<void>;
  search(name: string, vector: number[], limit: number): Promise<ScoredCollectionPoint[]>;
  scroll(name: string, limit: number, offset?: number | string | null): Promise<CollectionPage>;
}

/**
 * Qdrant over its REST SDK. Every call retries with a fixed delay.
 */
export class QdrantCollectionClient implements VectorCollectionClient {
  private readonly sdk: QdrantSdk;
  private readonly policy: RetryPolicy;

  constructor(config: QdrantConfig) {
    this.sdk = new QdrantSdk({ url: config.url, apiKey: config.apiKey });
    this.policy = { maxAttempts: config.maxRetries, delayMs: config.retryDelayMs };
  }

  async collectionExists(name: string): Promise<boolean> {
    const { exists } = await this.retry(() => this.sdk.collectionExists(name));
    return exists;
  }

  async createCollection(name: string, vectorSize: number, distance: QdrantDistance): Promise<void> {
    await this.retry(() => this.sdk.createCollection(name, { vectors: { size: vectorSize, distance } }));
  }

  async deleteCollection(name: string): Promise<void> {
    await this.retry(() => this.sdk.deleteCollection(name));
  }

  async getCollectionInfo(name: string): Promise<CollectionInfo> {
    const info = await this.retry(() => this.sdk.getCollection(name));
    let vectorSize: number | null = null;
    const vectors = info.config.params.vectors;
    if (vectors && 'size' in vectors) {
      const size = vectors.size;
      if (typeof size === 'number') vectorSize = size;
    }
    return { pointsCount: info.points_count ?? 0, vectorSize };
  }

  async upsert(name: string, points: CollectionPoint[]): Promise<void> {
    if (points.length === 0) return;
    await this.retry(() => this.sdk.upsert(name, { wait: true, points }));
  }

  async search(name: string, vector: number[], limit: number): Promise<ScoredCollectionPoint[]> {
    const response = await this.retry(() =>
      this.sdk.query(name, { query: vector, limit, with_payload: true })
    );
    return response.points.map((point) => ({ id: point.id, score: point.score, payload: point.payload }));
  }

  async scroll(name: string, limit: number, offset?: number | string | null): Promise<CollectionPage> {
    const response = await this.retry(() =>
      this.sdk.scroll(name, { limit, offset: offset ?? undefined, with_payload: true, with_vector: false })
    );
    const next = response.next_page_offset;
    return {
      points: response.points.map((point) => ({ id: point.id, payload: point.payload })),
      nextOffset: typeof next === 'number' || typeof next === 'string' ? next : null,
    };
  }

  private retry<T>(operation: () => Promise<T>): Promise<T> {
    return withRetry(operation, this.policy, 'qdrant');
  }
}
