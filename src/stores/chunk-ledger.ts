import { z } from 'zod';
import type { Chunk, IndexedChunk } from '../types/document.js';
import { ChunkMetadataSchema } from '../types/document.js';
import { SchemaMismatchError } from '../utils/errors.js';

export const IndexedChunkRecordSchema = z.object({
  chunk_id: z.number().int().min(0),
  content: z.string(),
  metadata: ChunkMetadataSchema,
});

export type IndexedChunkRecord = z.infer<typeof IndexedChunkRecordSchema>;

export const PersistedIndexSchema = z.object({
  dimension: z.number().int().positive().nullable(),
  num_chunks: z.number().int().min(0),
  chunks: z.array(IndexedChunkRecordSchema),
});
export type PersistedIndex = z.infer<typeof PersistedIndexSchema>;

export interface PartitionResult {
  fresh: Chunk[];
  duplicates: number;
}

/**
 * Dedup key: chunk hash when present, otherwise the owning document's hash.
 */
export function dedupKey(chunk: Chunk): string | null {
  return chunk.metadata.chunk_content_hash ?? chunk.metadata.content_hash ?? null;
}

/**
 * Chunk records, dedup keys, id allocation and the fixed dimension for one index.
 * Backends own the vectors; this owns everything else.
 */
export class ChunkLedger {
  private records = new Map<number, IndexedChunk>();
  private keys = new Set<string>();
  private nextId = 0;
  private fixedDimension: number | null = null;

  get size(): number {
    return this.records.size;
  }

  get dimension(): number | null {
    return this.fixedDimension;
  }

  /**
   * Split incoming chunks into new ones and duplicates of indexed (or earlier incoming) chunks.
   */
  partition(chunks: Chunk[]): PartitionResult {
    const fresh: Chunk[] = [];
    const seen = new Set<string>();
    let duplicates = 0;

    for (const chunk of chunks) {
      const key = dedupKey(chunk);
      if (key !== null && (this.keys.has(key) || seen.has(key))) {
        duplicates++;
        continue;
      }
      if (key !== null) seen.add(key);
      fresh.push(chunk);
    }

    return { fresh, duplicates };
  }

  /**
   * Width shared by all vectors; must equal the fixed dimension once one exists.
   */
  checkDimension(vectors: number[][]): number {
    const width = vectors[0]?.length ?? 0;
    if (width === 0) {
      throw new SchemaMismatchError('Received an empty embedding');
    }
    if (vectors.some((vector) => vector.length !== width)) {
      throw new SchemaMismatchError('Embeddings in one batch have different widths');
    }
    if (this.fixedDimension !== null && this.fixedDimension !== width) {
      throw new SchemaMismatchError(
        `Embedding dimension ${width} does not match index dimension ${this.fixedDimension}`
      );
    }
    return width;
  }

  /** Ids the next `count` chunks will receive. */
  peekIds(count: number): number[] {
    return Array.from({ length: count }, (_, i) => this.nextId + i);
  }

  commit(chunks: Chunk[], dimension: number): IndexedChunk[] {
    const indexed = chunks.map((chunk, i): IndexedChunk => ({
      content: chunk.content,
      metadata: chunk.metadata,
      chunkId: this.nextId + i,
    }));

    for (const record of indexed) {
      this.records.set(record.chunkId, record);
      const key = dedupKey(record);
      if (key !== null) this.keys.add(key);
    }
    this.nextId += chunks.length;
    this.fixedDimension = dimension;
    return indexed;
  }

  get(chunkId: number): IndexedChunk | undefined {
    return this.records.get(chunkId);
  }

  all(): IndexedChunk[] {
    return [...this.records.values()].sort((a, b) => a.chunkId - b.chunkId);
  }

  sources(): string[] {
    const sources = new Set<string>();
    for (const record of this.records.values()) {
      sources.add(record.metadata.source ?? 'Unknown');
    }
    return [...sources].sort();
  }

  reset(): void {
    this.records.clear();
    this.keys.clear();
    this.nextId = 0;
    this.fixedDimension = null;
  }

  toSnapshot(): PersistedIndex {
    const chunks = this.all().map((record) => ({
      chunk_id: record.chunkId,
      content: record.content,
      metadata: record.metadata,
    }));
    return { dimension: this.fixedDimension, num_chunks: chunks.length, chunks };
  }

  restore(snapshot: PersistedIndex): void {
    if (snapshot.num_chunks !== snapshot.chunks.length) {
      throw new SchemaMismatchError(
        `Snapshot lists ${snapshot.chunks.length} chunks but declares ${snapshot.num_chunks}`
      );
    }

    const ids = new Set(snapshot.chunks.map((record) => record.chunk_id));
    if (ids.size !== snapshot.chunks.length) {
      throw new SchemaMismatchError('Snapshot repeats a chunk id');
    }

    this.reset();
    for (const record of snapshot.chunks) {
      const chunk: IndexedChunk = { content: record.content, metadata: record.metadata, chunkId: record.chunk_id };
      this.records.set(chunk.chunkId, chunk);
      const key = dedupKey(chunk);
      if (key !== null) this.keys.add(key);
      this.nextId = Math.max(this.nextId, chunk.chunkId + 1);
    }
    this.fixedDimension = snapshot.dimension;
  }
}
