import type { Chunk } from '../types/document.js';
import type { AddResult, SearchResult, StoreStats } from '../types/search.js';

/**
 * Contract shared by every vector index backend. Callers must not run `add` concurrently
 * with `add` or `search` on the same instance; concurrent `search` calls are fine.
 */
export interface VectorStore {
  readonly backend: string;
  /** Number of indexed chunks */
  readonly size: number;
  add(chunks: Chunk[]): Promise<AddResult>;
  search(query: string, topK: number): Promise<SearchResult[]>;
  save(): Promise<void>;
  /**
   * Restore persisted state; resolves false when there is nothing to restore.
   * The other async operations run this once themselves when it was never called.
   */
  load(): Promise<boolean>;
  clear(): Promise<void>;
  getStats(): Promise<StoreStats>;
  close(): Promise<void>;
}

/** Convert a distance (lower is closer) into a similarity (higher is closer). */
export function distanceToScore(distance: number): number {
  return 1 / (1 + distance);
}
