import type { Chunk } from '../types/document.js';
import type { AddResult, SearchResult, StoreStats } from '../types/search.js';
import type { QdrantDistance } from '../types/config.js';
import type { EmbeddingService } from '../services/embedding.js';
import type { VectorCollectionClient } from './qdrant-client.js';
import { ChunkLedger, type IndexedChunkRecord, IndexedChunkRecordSchema } from './chunk-ledger.js';
import { type VectorStore, distanceToScore } from './types.js';
import { SchemaMismatchError, StoreError, ValidationError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('qdrant-store');

const UPSERT_BATCH = 256;
const SCROLL_PAGE = 256;

export interface QdrantStoreOptions {
  collectionName: string;
  distance: QdrantDistance;
}

/**
 * Remote index in a Qdrant collection. Points are keyed by chunk id and carry the chunk
 * content and metadata as payload, so the collection alone is enough to rebuild state.
 */
export class QdrantStore implements VectorStore {
  readonly backend = 'qdrant';
  private ledger = new ChunkLedger();
  private embedding: EmbeddingService;
  private client: VectorCollectionClient;
  private options: QdrantStoreOptions;
  private synced: Promise<void> | null = null;

  constructor(embedding: EmbeddingService, client: VectorCollectionClient, options: QdrantStoreOptions) {
    this.embedding = embedding;
    this.client = client;
    this.options = options;
  }

  get size(): number {
    return this.ledger.size;
  }

  async add(chunks: Chunk[]): Promise<AddResult> {
    await this.sync();
    const { fresh, duplicates } = this.ledger.partition(chunks);
    if (duplicates > 0) {
      log.info({ duplicates }, 'Skipped duplicate chunks');
    }
    if (fresh.length === 0) {
      return { added: 0, duplicates };
    }

    const vectors = await this.embedding.embedChunks(fresh);
    const dimension = this.ledger.checkDimension(vectors);
    const ids = this.ledger.peekIds(fresh.length);
    const name = this.options.collectionName;

    await this.guard('insert vectors', async () => {
      if (!(await this.client.collectionExists(name))) {
        await this.client.createCollection(name, dimension, this.options.distance);
        log.info({ collection: name, dimension, distance: this.options.distance }, 'Created collection');
      }

      const points = fresh.map((chunk, i) => ({
        id: ids[i],
        vector: vectors[i],
        payload: { chunk_id: ids[i], content: chunk.content, metadata: chunk.metadata },
      }));
      for (let i = 0; i < points.length; i += UPSERT_BATCH) {
        await this.client.upsert(name, points.slice(i, i + UPSERT_BATCH));
      }
    });

    this.ledger.commit(fresh, dimension);
    log.info({ added: fresh.length, total: this.ledger.size }, 'Added chunks');
    return { added: fresh.length, duplicates };
  }

  async search(query: string, topK: number): Promise<SearchResult[]> {
    if (!Number.isInteger(topK) || topK < 1) {
      throw new ValidationError('top_k must be a positive integer');
    }
    await this.sync();
    if (this.ledger.size === 0) {
      return [];
    }

    const vector = await this.embedding.embedQuery(query);
    if (vector.length !== this.ledger.dimension) {
      throw new SchemaMismatchError(
        `Query embedding dimension ${vector.length} does not match index dimension ${this.ledger.dimension}`
      );
    }

    const hits = await this.guard('search', () =>
      this.client.search(this.options.collectionName, vector, Math.min(topK, this.ledger.size))
    );

    const results: SearchResult[] = [];
    for (const hit of hits) {
      const chunk = typeof hit.id === 'number' ? this.ledger.get(hit.id) : undefined;
      if (!chunk) continue;
      results.push({ chunk, score: this.normalize(hit.score) });
    }
    return results;
  }

  /**
   * Qdrant persists on write; this only confirms the collection is there.
   */
  async save(): Promise<void> {
    await this.sync();
    if (this.ledger.size === 0) {
      return;
    }
    const exists = await this.guard('confirm persistence', () =>
      this.client.collectionExists(this.options.collectionName)
    );
    if (!exists) {
      throw new StoreError(`Collection ${this.options.collectionName} is missing`, this.backend);
    }
    log.info({ collection: this.options.collectionName, chunks: this.ledger.size }, 'Collection persisted');
  }

  async load(): Promise<boolean> {
    const name = this.options.collectionName;
    const exists = await this.guard('check collection', () => this.client.collectionExists(name));
    if (!exists) {
      this.ledger.reset();
      this.synced = Promise.resolve();
      return false;
    }

    const info = await this.guard('read collection info', () => this.client.getCollectionInfo(name));
    const records: IndexedChunkRecord[] = [];
    let offset: number | string | null = null;
    do {
      const page = await this.guard('scroll collection', () => this.client.scroll(name, SCROLL_PAGE, offset));
      for (const point of page.points) {
        const parsed = IndexedChunkRecordSchema.safeParse(point.payload);
        if (!parsed.success) {
          throw new SchemaMismatchError(`Point ${String(point.id)} has a malformed payload: ${parsed.error.message}`);
        }
        records.push(parsed.data);
      }
      offset = page.nextOffset;
    } while (offset !== null);

    records.sort((a, b) => a.chunk_id - b.chunk_id);
    this.ledger.restore({
      dimension: records.length > 0 ? info.vectorSize : null,
      num_chunks: records.length,
      chunks: records,
    });
    this.synced = Promise.resolve();
    log.info({ collection: name, chunks: this.ledger.size }, 'Loaded collection');
    return true;
  }

  async clear(): Promise<void> {
    const name = this.options.collectionName;
    await this.guard('clear collection', async () => {
      if (await this.client.collectionExists(name)) {
        await this.client.deleteCollection(name);
      }
    });
    this.ledger.reset();
    this.synced = Promise.resolve();
    log.info({ collection: name }, 'Cleared collection');
  }

  async getStats(): Promise<StoreStats> {
    await this.sync();
    const name = this.options.collectionName;
    const indexSize = await this.guard('read stats', async () =>
      (await this.client.collectionExists(name)) ? (await this.client.getCollectionInfo(name)).pointsCount : 0
    );
    return {
      numChunks: this.ledger.size,
      dimension: this.ledger.dimension,
      indexSize,
      sources: this.ledger.sources(),
    };
  }

  async close(): Promise<void> {
    // REST client holds no connection
  }

  /**
   * Read the collection once before the first read or write, so a store that was never
   * loaded still numbers and deduplicates against points already in it.
   */
  private sync(): Promise<void> {
    if (!this.synced) {
      this.synced = this.load().then(
        () => undefined,
        (error: unknown) => {
          this.synced = null;
          throw error;
        }
      );
    }
    return this.synced;
  }

  /** Euclid scores are distances; Cosine and Dot are already similarities. */
  private normalize(score: number): number {
    return this.options.distance === 'Euclid' ? distanceToScore(score) : score;
  }

  private async guard<T>(action: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof SchemaMismatchError || error instanceof StoreError) {
        throw error;
      }
      throw new StoreError(`Failed to ${action}: ${errorMessage(error)}`, this.backend);
    }
  }
}
