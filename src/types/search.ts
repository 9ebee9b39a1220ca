import type { IndexedChunk } from './document.js';

export interface SearchResult {
  chunk: IndexedChunk;
  /** Higher is closer, whatever the backend's native metric. */
  score: number;
}

export interface RankedResult extends SearchResult {
  /** 1-based position in the vector search */
  originalRank: number;
  /** 1-based position after reranking; equals originalRank when no rerank happened */
  newRank: number;
  rerankScore?: number;
}

export interface RetrievalResponse {
  query: string;
  results: RankedResult[];
  /** Candidates from the first-stage vector search, in search order. */
  candidates: SearchResult[];
  reranked: boolean;
  executionTime: number;
}

export interface StoreStats {
  numChunks: number;
  dimension: number | null;
  indexSize: number;
  sources: string[];
}

export interface AddResult {
  added: number;
  duplicates: number;
}
