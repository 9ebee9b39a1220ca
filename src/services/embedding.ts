import pLimit from 'p-limit';
import type { EmbeddingInput, EmbeddingProvider } from '../types/provider.js';
import type { Chunk } from '../types/document.js';
import { SchemaMismatchError, ValidationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('embedding');

export interface EmbeddingOptions {
  batchSize: number;
  /** Simultaneous in-flight requests to the embedding collaborator */
  maxConcurrentRequests: number;
}

export function embeddingInputForChunk(chunk: Chunk): EmbeddingInput {
  const image = chunk.metadata.extra.page_image;
  return typeof image === 'string' ? { text: chunk.content, image } : { text: chunk.content };
}

export class EmbeddingService {
  private provider: EmbeddingProvider;
  private options: EmbeddingOptions;

  constructor(provider: EmbeddingProvider, options?: Partial<EmbeddingOptions>) {
    this.provider = provider;
    this.options = {
      batchSize: 32,
      maxConcurrentRequests: 4,
      ...options,
    };
    if (this.options.batchSize < 1 || this.options.maxConcurrentRequests < 1) {
      throw new ValidationError('Embedding batch size and concurrency must be at least 1');
    }
  }

  get model(): string {
    return this.provider.model;
  }

  /**
   * Embed inputs in batches. Batches run concurrently up to the configured limit; the
   * returned vectors line up with `inputs`.
   */
  async embed(inputs: EmbeddingInput[]): Promise<number[][]> {
    if (inputs.length === 0) {
      return [];
    }

    const { batchSize, maxConcurrentRequests } = this.options;
    const batches: EmbeddingInput[][] = [];
    for (let i = 0; i < inputs.length; i += batchSize) {
      batches.push(inputs.slice(i, i + batchSize));
    }

    const limit = pLimit(maxConcurrentRequests);
    log.debug({ inputs: inputs.length, batches: batches.length, maxConcurrentRequests }, 'Embedding batches');

    const results = await Promise.all(
      batches.map((batch, batchIndex) =>
        limit(async () => {
          const vectors = await this.provider.embed(batch);
          if (vectors.length !== batch.length) {
            throw new SchemaMismatchError(
              `Batch ${batchIndex}: expected ${batch.length} embeddings, received ${vectors.length}`
            );
          }
          return vectors;
        })
      )
    );

    return results.flat();
  }

  async embedChunks(chunks: Chunk[]): Promise<number[][]> {
    return this.embed(chunks.map(embeddingInputForChunk));
  }

  async embedQuery(query: string): Promise<number[]> {
    if (query.trim().length === 0) {
      throw new ValidationError('Query cannot be empty');
    }
    const [vector] = await this.embed([{ text: query }]);
    if (!vector) {
      throw new SchemaMismatchError('No embedding returned for query');
    }
    return vector;
  }
}
