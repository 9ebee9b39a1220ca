import type { AppConfig } from '../types/config.js';
import type { Document, DocumentMetadata, IngestionOutcome } from '../types/document.js';
import type { EmbeddingProvider, RerankProvider } from '../types/provider.js';
import type { RetrievalResponse, StoreStats } from '../types/search.js';
import type { VectorStore } from '../stores/types.js';
import type { VectorCollectionClient } from '../stores/qdrant-client.js';
import { ProviderFactory } from '../providers/factory.js';
import { VectorStoreFactory } from '../stores/factory.js';
import { DocumentService, createDocument } from './document.js';
import { EmbeddingService } from './embedding.js';
import { ExtractorRegistry } from './extraction.js';
import { type ExecutionMode, IngestionScheduler, type LoadDirectoryOptions } from './ingestion.js';
import { SearchService } from './search.js';
import { QueryResultSaver } from './query-log.js';
import { buildContext } from './context.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('pipeline');

export interface PipelineDependencies {
  embeddingProvider?: EmbeddingProvider;
  /** `null` turns reranking off regardless of configuration */
  rerankProvider?: RerankProvider | null;
  collectionClient?: VectorCollectionClient;
  registry?: ExtractorRegistry;
  workerScript?: URL;
}

export interface IngestSummary {
  documents: number;
  chunks: number;
  added: number;
  duplicates: number;
  failures: IngestionOutcome[];
  cancelled: number;
  mode: ExecutionMode | null;
}

export interface QueryOutcome extends RetrievalResponse {
  context: string;
  /** Folder the results were written to, when saving */
  savedTo: string | null;
}

/**
 * Wires extraction, chunking, embedding, the vector store and retrieval together.
 */
export class RagPipeline {
  readonly config: AppConfig;
  readonly documents: DocumentService;
  readonly scheduler: IngestionScheduler;
  readonly store: VectorStore;
  readonly search: SearchService;
  readonly saver: QueryResultSaver | null;

  constructor(
    config: AppConfig,
    documents: DocumentService,
    scheduler: IngestionScheduler,
    store: VectorStore,
    search: SearchService,
    saver: QueryResultSaver | null = null
  ) {
    this.config = config;
    this.documents = documents;
    this.scheduler = scheduler;
    this.store = store;
    this.search = search;
    this.saver = saver;
  }

  static async create(config: AppConfig, deps: PipelineDependencies = {}): Promise<RagPipeline> {
    const provider = deps.embeddingProvider ?? ProviderFactory.createEmbeddingProvider(config);
    const reranker = deps.rerankProvider === undefined ? ProviderFactory.createRerankProvider(config) : deps.rerankProvider;

    const embedding = new EmbeddingService(provider, {
      batchSize: config.embedding.batchSize,
      maxConcurrentRequests: config.embedding.maxConcurrentRequests,
    });
    const store = VectorStoreFactory.create(config, embedding, { collectionClient: deps.collectionClient });
    const documents = await DocumentService.fromConfig(config);
    const scheduler = new IngestionScheduler(
      deps.registry ?? ExtractorRegistry.fromConfig(config.extraction),
      config.extraction,
      config.ingestion,
      deps.workerScript
    );
    const search = new SearchService(store, reranker, {
      topK: config.retrieval.topK,
      candidateCount: config.reranker.candidateCount,
    });
    const saver = config.queryLog.enabled ? new QueryResultSaver(config.queryLog.outputDir) : null;

    const pipeline = new RagPipeline(config, documents, scheduler, store, search, saver);
    await pipeline.open();
    return pipeline;
  }

  /**
   * Restore the persisted index, if any. `create` already does this once.
   */
  async open(): Promise<boolean> {
    const loaded = await this.store.load();
    log.debug({ backend: this.store.backend, loaded, chunks: this.store.size }, 'Opened vector store');
    return loaded;
  }

  async ingestDocuments(documents: Document[]): Promise<Omit<IngestSummary, 'failures' | 'cancelled' | 'mode'>> {
    const chunks = this.documents.chunkAll(documents);
    if (chunks.length === 0) {
      return { documents: documents.length, chunks: 0, added: 0, duplicates: 0 };
    }

    const { added, duplicates } = await this.store.add(chunks);
    await this.store.save();
    log.info({ documents: documents.length, chunks: chunks.length, added, duplicates }, 'Indexed documents');
    return { documents: documents.length, chunks: chunks.length, added, duplicates };
  }

  async ingestFile(filePath: string): Promise<IngestSummary> {
    const documents = await this.scheduler.loadFile(filePath);
    const result = await this.ingestDocuments(documents);
    return { ...result, failures: [], cancelled: 0, mode: null };
  }

  async ingestText(text: string, metadata: Partial<DocumentMetadata> = {}): Promise<IngestSummary> {
    const document = createDocument(text, { source: 'text_input', ...metadata });
    const result = await this.ingestDocuments([document]);
    return { ...result, failures: [], cancelled: 0, mode: null };
  }

  async ingestDirectory(root: string, options: LoadDirectoryOptions = {}): Promise<IngestSummary> {
    const report = await this.scheduler.loadDirectory(root, options);
    const result = await this.ingestDocuments(report.documents);
    return {
      ...result,
      failures: report.failures,
      cancelled: report.outcomes.filter((outcome) => outcome.status === 'cancelled').length,
      mode: report.mode,
    };
  }

  async query(query: string, options: { topK?: number; save?: boolean } = {}): Promise<QueryOutcome> {
    const response = await this.search.retrieve(query, options.topK);

    let savedTo: string | null = null;
    const saver = options.save ? (this.saver ?? new QueryResultSaver(this.config.queryLog.outputDir)) : this.saver;
    if (saver) {
      savedTo = await saver.save(response.query, response.candidates, response.reranked ? response.results : null, {
        top_k: options.topK ?? this.config.retrieval.topK,
        backend: this.store.backend,
      });
    }

    return { ...response, context: buildContext(response.results), savedTo };
  }

  async stats(): Promise<StoreStats> {
    return this.store.getStats();
  }

  async clear(): Promise<void> {
    await this.store.clear();
    log.info({ backend: this.store.backend }, 'Cleared vector store');
  }

  async close(): Promise<void> {
    await this.store.close();
  }
}
