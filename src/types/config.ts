import os from 'os';
import { z } from 'zod';

export const ChunkingModeSchema = z.enum(['character', 'token']);
export type ChunkingMode = z.infer<typeof ChunkingModeSchema>;

export const TokenizerEncodingSchema = z.enum([
  'gpt2',
  'r50k_base',
  'p50k_base',
  'p50k_edit',
  'cl100k_base',
  'o200k_base',
]);
export type TokenizerEncoding = z.infer<typeof TokenizerEncodingSchema>;

export const ContentProfileSchema = z.object({
  chunkSize: z.number().int().positive(),
  chunkOverlap: z.number().int().min(0),
  minChunkSize: z.number().int().min(1).default(1),
  maxChunkSize: z.number().int().positive(),
  extensions: z.array(z.string()).default([]),
  patterns: z.array(z.string()).default([]),
  patternThreshold: z.number().int().min(0).default(10),
});
export type ContentProfileConfig = z.infer<typeof ContentProfileSchema>;

export const ExecutionModeSchema = z.enum(['auto', 'worker', 'async', 'sequential']);
export type ExecutionModeSetting = z.infer<typeof ExecutionModeSchema>;

export const VectorStoreTypeSchema = z.enum(['sqlite', 'qdrant']);
export type VectorStoreType = z.infer<typeof VectorStoreTypeSchema>;

export const QdrantDistanceSchema = z.enum(['Euclid', 'Cosine', 'Dot']);
export type QdrantDistance = z.infer<typeof QdrantDistanceSchema>;

const EmbeddingConfigSchema = z.object({
  baseUrl: z.string().url().default('http://localhost:8888/v1'),
  apiKey: z.string().optional(),
  model: z.string().default('text-embedding-3-small'),
  batchSize: z.number().int().positive().default(32),
  maxConcurrentRequests: z.number().int().positive().default(4),
  timeoutMs: z.number().int().positive().default(60_000),
  maxRetries: z.number().int().positive().default(3),
  retryDelayMs: z.number().int().min(0).default(1000),
});

const RerankerConfigSchema = z.object({
  enabled: z.boolean().default(false),
  url: z.string().url().default('http://localhost:8888/v1/rerank'),
  apiKey: z.string().optional(),
  model: z.string().default('bge-reranker-v2-m3'),
  candidateCount: z.number().int().positive().default(20),
  timeoutMs: z.number().int().positive().default(30_000),
  maxRetries: z.number().int().positive().default(3),
  retryDelayMs: z.number().int().min(0).default(1000),
});

const ChunkingConfigSchema = z.object({
  mode: ChunkingModeSchema.default('character'),
  encoding: TokenizerEncodingSchema.default('cl100k_base'),
  chunkSize: z.number().int().positive().default(500),
  chunkOverlap: z.number().int().min(0).default(50),
  minChunkSize: z.number().int().min(1).default(1),
  profiles: z
    .object({
      code: ContentProfileSchema,
      table: ContentProfileSchema,
      documentation: ContentProfileSchema,
    })
    .default({
      code: {
        chunkSize: 800,
        chunkOverlap: 100,
        minChunkSize: 20,
        maxChunkSize: 1500,
        extensions: [
          '.py', '.js', '.ts', '.tsx', '.jsx', '.java', '.go', '.rs', '.c', '.cpp', '.h',
          '.cs', '.rb', '.php', '.sh', '.sql',
        ],
        patterns: [],
        patternThreshold: 10,
      },
      table: {
        chunkSize: 1000,
        chunkOverlap: 0,
        minChunkSize: 20,
        maxChunkSize: 2000,
        extensions: ['.csv', '.tsv', '.xlsx'],
        patterns: ['|', '\t'],
        patternThreshold: 10,
      },
      documentation: {
        chunkSize: 600,
        chunkOverlap: 60,
        minChunkSize: 20,
        maxChunkSize: 1200,
        extensions: ['.md', '.rst', '.adoc', '.html'],
        patterns: [],
        patternThreshold: 10,
      },
    }),
});

const IngestionConfigSchema = z.object({
  mode: ExecutionModeSchema.default('auto'),
  minFilesForParallel: z.number().int().min(1).default(2),
  maxWorkers: z.number().int().positive().default(Math.max(1, os.cpus().length)),
  submissionStaggerMs: z.number().int().min(0).default(100),
  recursive: z.boolean().default(true),
  extensions: z
    .array(z.string())
    .default(['.txt', '.md', '.py', '.js', '.ts', '.html', '.css', '.json', '.pdf']),
});

export const PdfModeSchema = z.enum(['multimodal', 'text-only', 'image-only']);
export type PdfMode = z.infer<typeof PdfModeSchema>;

const ExtractionConfigSchema = z.object({
  markitdownCommand: z.string().default('markitdown'),
  timeoutMs: z.number().int().positive().default(300_000),
  maxOutputBytes: z.number().int().positive().default(50 * 1024 * 1024),
  pdf: z
    .object({
      /** What each page contributes: its text, its rendered image, or both */
      mode: PdfModeSchema.default('multimodal'),
      /** 1 = 72 DPI */
      imageScale: z.number().positive().max(8).default(2),
    })
    .default({}),
});

const VectorStoreConfigSchema = z.object({
  type: VectorStoreTypeSchema.default('sqlite'),
  path: z.string().default('vector_store'),
  qdrant: z
    .object({
      url: z.string().url().default('http://localhost:6333'),
      apiKey: z.string().optional(),
      collectionName: z.string().default('rag_documents'),
      distance: QdrantDistanceSchema.default('Euclid'),
      maxRetries: z.number().int().positive().default(3),
      retryDelayMs: z.number().int().min(0).default(1000),
    })
    .default({}),
});

export const AppConfigSchema = z.object({
  version: z.string().default('0.1.0'),
  embedding: EmbeddingConfigSchema.default({}),
  reranker: RerankerConfigSchema.default({}),
  chunking: ChunkingConfigSchema.default({}),
  ingestion: IngestionConfigSchema.default({}),
  extraction: ExtractionConfigSchema.default({}),
  retrieval: z.object({ topK: z.number().int().positive().default(5) }).default({}),
  vectorStore: VectorStoreConfigSchema.default({}),
  queryLog: z
    .object({
      enabled: z.boolean().default(false),
      outputDir: z.string().default('query_results'),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type EmbeddingConfig = AppConfig['embedding'];
export type RerankerConfig = AppConfig['reranker'];
export type ChunkingConfig = AppConfig['chunking'];
export type IngestionConfig = AppConfig['ingestion'];
export type ExtractionConfig = AppConfig['extraction'];
export type PdfConfig = ExtractionConfig['pdf'];
export type VectorStoreConfig = AppConfig['vectorStore'];
export type QdrantConfig = VectorStoreConfig['qdrant'];

/** Every field at its default. */
export function defaultConfig(): AppConfig {
  return AppConfigSchema.parse({});
}
