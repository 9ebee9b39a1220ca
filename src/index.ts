export * from './types/config.js';
export * from './types/document.js';
export type * from './types/provider.js';
export type * from './types/search.js';

export * from './utils/errors.js';
export { logger, createLogger } from './utils/logger.js';
export { ConfigManager } from './utils/config.js';
export { TextSplitter, findBoundary } from './utils/chunking.js';
export { TextProcessor } from './utils/text-processing.js';
export { loadTokenizer, type Tokenizer } from './utils/tokenizer.js';

export { OpenAIEmbeddingProvider, type EmbeddingTransport } from './providers/openai.js';
export { HttpRerankProvider } from './providers/reranker.js';
export { ProviderFactory } from './providers/factory.js';

export type { VectorStore } from './stores/types.js';
export { distanceToScore } from './stores/types.js';
export { SqliteVecStore } from './stores/sqlite-vec.js';
export { QdrantStore } from './stores/qdrant.js';
export { QdrantCollectionClient, type VectorCollectionClient } from './stores/qdrant-client.js';
export { VectorStoreFactory } from './stores/factory.js';

export { ContentClassifier, buildProfiles } from './services/classifier.js';
export { DocumentService, createDocument } from './services/document.js';
export { EmbeddingService } from './services/embedding.js';
export {
  ExtractorRegistry,
  ImageExtractor,
  MarkitdownExtractor,
  TextFileExtractor,
  extractDocuments,
} from './services/extraction.js';
export { PdfExtractor, openWithPdfjs, type PdfOpener, type PdfSource } from './services/pdf.js';
export { IngestionScheduler, selectExecutionMode, type ExecutionMode, type IngestionReport } from './services/ingestion.js';
export { SearchService } from './services/search.js';
export { buildContext } from './services/context.js';
export { QueryResultSaver } from './services/query-log.js';
export { RagPipeline, type IngestSummary, type PipelineDependencies, type QueryOutcome } from './services/pipeline.js';
