import type { AppConfig, ChunkingMode } from '../types/config.js';
import type { Chunk, ChunkMetadata, ContentType, Document, DocumentMetadata } from '../types/document.js';
import { ContentClassifier, buildProfiles } from './classifier.js';
import { TextSplitter } from '../utils/chunking.js';
import { TextProcessor } from '../utils/text-processing.js';
import { loadTokenizer } from '../utils/tokenizer.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('document');

export interface DocumentServiceOptions {
  mode: ChunkingMode;
  chunkSize: number;
  chunkOverlap: number;
  minChunkSize: number;
  /** Stamped on every chunk as embedding_model_version */
  embeddingModel?: string;
}

interface ResolvedParameters {
  chunkSize: number;
  chunkOverlap: number;
  minChunkSize: number;
}

export function createDocument(
  content: string,
  metadata: Partial<DocumentMetadata> = {},
  now: Date = new Date()
): Document {
  return {
    content,
    metadata: { ...metadata, extra: { ...(metadata.extra ?? {}) } },
    contentHash: TextProcessor.generateContentHash(content),
    ingestionTimestamp: now.toISOString(),
  };
}

/**
 * Turns documents into chunks with lineage metadata.
 */
export class DocumentService {
  private classifier: ContentClassifier;
  private splitter: TextSplitter;
  private options: DocumentServiceOptions;

  constructor(classifier: ContentClassifier, splitter: TextSplitter, options: DocumentServiceOptions) {
    this.classifier = classifier;
    this.splitter = splitter;
    this.options = options;
  }

  /**
   * Build from configuration, loading a tokenizer when token mode is configured.
   */
  static async fromConfig(config: AppConfig): Promise<DocumentService> {
    const { chunking } = config;
    const tokenizer = chunking.mode === 'token' ? await loadTokenizer(chunking.encoding) : null;
    if (chunking.mode === 'token' && !tokenizer) {
      log.warn({ encoding: chunking.encoding }, 'Token chunking unavailable, using character mode');
    }

    return new DocumentService(new ContentClassifier(buildProfiles(chunking.profiles)), new TextSplitter(tokenizer), {
      mode: tokenizer ? chunking.mode : 'character',
      chunkSize: chunking.chunkSize,
      chunkOverlap: chunking.chunkOverlap,
      minChunkSize: chunking.minChunkSize,
      embeddingModel: config.embedding.model,
    });
  }

  chunk(document: Document): Chunk[] {
    const contentType = this.classifier.classify(document);
    const params = this.resolveParameters(contentType);
    const { chunks, mode } = this.splitter.split(document.content, {
      ...params,
      mode: this.options.mode,
    });

    log.debug(
      { source: document.metadata.source, contentType, chunks: chunks.length, chunkSize: params.chunkSize },
      'Chunked document'
    );

    return chunks.map((content, index) => {
      const metadata: ChunkMetadata = {
        ...document.metadata,
        extra: { ...document.metadata.extra },
        content_hash: document.contentHash,
        chunk_index: index,
        total_chunks: chunks.length,
        chunk_size_used: params.chunkSize,
        chunk_overlap_used: params.chunkOverlap,
        chunking_mode: mode,
        chunk_content_hash: TextProcessor.generateContentHash(content),
        content_type: contentType,
      };
      if (this.options.embeddingModel) {
        metadata.embedding_model_version = this.options.embeddingModel;
      }
      return { content, metadata };
    });
  }

  chunkAll(documents: Document[]): Chunk[] {
    return documents.flatMap((document) => this.chunk(document));
  }

  private resolveParameters(contentType: ContentType): ResolvedParameters {
    const profile = this.classifier.getProfile(contentType);
    if (!profile) {
      return {
        chunkSize: this.options.chunkSize,
        chunkOverlap: this.options.chunkOverlap,
        minChunkSize: this.options.minChunkSize,
      };
    }
    return {
      chunkSize: Math.min(profile.chunkSize, profile.maxChunkSize),
      chunkOverlap: profile.chunkOverlap,
      minChunkSize: profile.minChunkSize,
    };
  }
}
