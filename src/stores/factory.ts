import type { AppConfig } from '../types/config.js';
import type { EmbeddingService } from '../services/embedding.js';
import type { VectorStore } from './types.js';
import { SqliteVecStore } from './sqlite-vec.js';
import { QdrantStore } from './qdrant.js';
import { QdrantCollectionClient, type VectorCollectionClient } from './qdrant-client.js';
import { ConfigurationError } from '../utils/errors.js';

export interface StoreDependencies {
  /** Replaces the Qdrant REST client */
  collectionClient?: VectorCollectionClient;
}

export class VectorStoreFactory {
  /**
   * Create the backend named in configuration
   */
  static create(config: AppConfig, embedding: EmbeddingService, deps: StoreDependencies = {}): VectorStore {
    const { vectorStore } = config;

    switch (vectorStore.type) {
      case 'sqlite':
        return new SqliteVecStore(embedding, vectorStore.path);
      case 'qdrant':
        return new QdrantStore(embedding, deps.collectionClient ?? new QdrantCollectionClient(vectorStore.qdrant), {
          collectionName: vectorStore.qdrant.collectionName,
          distance: vectorStore.qdrant.distance,
        });
      default:
        throw new ConfigurationError(`Unsupported vector store: ${String(vectorStore.type)}`);
    }
  }
}
