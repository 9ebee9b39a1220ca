import { z } from 'zod';
import { ChunkingModeSchema } from './config.js';

export const CONTENT_TYPES = ['code', 'table', 'documentation', 'default'] as const;
export type ContentType = (typeof CONTENT_TYPES)[number];

/** Metadata attached to a document at ingestion time. */
export const DocumentMetadataSchema = z.object({
  source: z.string().optional(),
  filename: z.string().optional(),
  file_type: z.string().optional(),
  extractor: z.string().optional(),
  /** sha256 of the owning document's content; fallback dedup key */
  content_hash: z.string().optional(),
  extra: z.record(z.unknown()).default({}),
});
export type DocumentMetadata = z.infer<typeof DocumentMetadataSchema>;

export const ChunkMetadataSchema = DocumentMetadataSchema.extend({
  chunk_index: z.number().int().min(0),
  total_chunks: z.number().int().min(1),
  chunk_size_used: z.number().int().positive(),
  chunk_overlap_used: z.number().int().min(0),
  chunking_mode: ChunkingModeSchema,
  chunk_content_hash: z.string().optional(),
  content_type: z.enum(CONTENT_TYPES),
  embedding_model_version: z.string().optional(),
});
export type ChunkMetadata = z.infer<typeof ChunkMetadataSchema>;

export interface Document {
  readonly content: string;
  readonly metadata: DocumentMetadata;
  readonly contentHash: string;
  /** ISO-8601 */
  readonly ingestionTimestamp: string;
}

export interface Chunk {
  readonly content: string;
  readonly metadata: ChunkMetadata;
  /** Assigned once the chunk is accepted into an index. */
  readonly chunkId?: number;
}

export interface IndexedChunk extends Chunk {
  readonly chunkId: number;
}

export interface ContentTypeProfile {
  contentType: Exclude<ContentType, 'default'>;
  chunkSize: number;
  chunkOverlap: number;
  minChunkSize: number;
  maxChunkSize: number;
  extensions: ReadonlySet<string>;
  patterns: readonly string[];
  patternThreshold: number;
}

export interface ExtractedPage {
  /** 1-based */
  pageNumber: number;
  text: string;
  /** data: URL of the rendered page */
  image?: string;
  width?: number;
  height?: number;
}

/** Output of a document-extraction collaborator. */
export interface ExtractedContent {
  text: string;
  extractor: string;
  /** data: URL of a rendered page, when the format has one */
  pageImage?: string;
  /** Paged formats, in reading order. Each page becomes its own document. */
  pages?: ExtractedPage[];
}

export interface IngestionOutcome {
  /** Empty unless the file succeeded; paged formats give one per page */
  documents: Document[];
  relativePath: string;
  error: string | null;
  status: 'success' | 'failed' | 'cancelled';
}
