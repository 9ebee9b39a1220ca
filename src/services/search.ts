import type { RerankProvider } from '../types/provider.js';
import type { RankedResult, RetrievalResponse, SearchResult } from '../types/search.js';
import type { VectorStore } from '../stores/types.js';
import { PreconditionError, ValidationError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('search');

export interface SearchOptions {
  /** Results returned when the caller does not ask for a count */
  topK: number;
  /** Candidates fetched for the reranker */
  candidateCount: number;
}

function unranked(results: SearchResult[]): RankedResult[] {
  return results.map((result, index) => ({ ...result, originalRank: index + 1, newRank: index + 1 }));
}

/**
 * Two-stage retrieval: vector search, then optional reranking with fallback to
 * vector order when the reranker is unavailable.
 */
export class SearchService {
  private store: VectorStore;
  private reranker: RerankProvider | null;
  private options: SearchOptions;

  constructor(store: VectorStore, reranker: RerankProvider | null, options?: Partial<SearchOptions>) {
    this.store = store;
    this.reranker = reranker;
    this.options = {
      topK: 5,
      candidateCount: 20,
      ...options,
    };
  }

  get rerankingEnabled(): boolean {
    return this.reranker !== null;
  }

  async retrieve(query: string, topK: number = this.options.topK): Promise<RetrievalResponse> {
    const startTime = Date.now();
    const trimmed = query.trim();

    if (trimmed.length === 0) {
      throw new ValidationError('Search query cannot be empty');
    }
    if (!Number.isInteger(topK) || topK < 1) {
      throw new ValidationError('top_k must be a positive integer');
    }
    if (this.store.size === 0) {
      throw new PreconditionError('No documents in the index. Ingest documents first.');
    }

    if (!this.reranker) {
      const candidates = await this.store.search(trimmed, topK);
      return {
        query: trimmed,
        results: unranked(candidates),
        candidates,
        reranked: false,
        executionTime: Date.now() - startTime,
      };
    }

    const candidates = await this.store.search(trimmed, Math.max(this.options.candidateCount, topK));
    let results: RankedResult[];
    let reranked = false;

    try {
      results = await this.rerank(this.reranker, trimmed, candidates, topK);
      reranked = true;
    } catch (error) {
      log.warn({ err: errorMessage(error), candidates: candidates.length }, 'Reranking failed, using vector search order');
      results = unranked(candidates.slice(0, topK));
    }

    return { query: trimmed, results, candidates, reranked, executionTime: Date.now() - startTime };
  }

  private async rerank(
    reranker: RerankProvider,
    query: string,
    candidates: SearchResult[],
    topK: number
  ): Promise<RankedResult[]> {
    if (candidates.length === 0) {
      return [];
    }

    const hits = await reranker.rerank(
      query,
      candidates.map((candidate) => candidate.chunk.content),
      topK
    );
    if (hits.length === 0) {
      throw new ValidationError('Reranker returned no results');
    }

    const seen = new Set<number>();
    const merged: Array<SearchResult & { originalRank: number; rerankScore: number }> = [];
    for (const hit of hits) {
      const candidate = candidates[hit.index];
      if (!candidate || seen.has(hit.index)) continue;
      seen.add(hit.index);
      merged.push({ ...candidate, originalRank: hit.index + 1, rerankScore: hit.relevanceScore });
    }

    // Array.prototype.sort is stable; equal scores keep vector order
    merged.sort((a, b) => b.rerankScore - a.rerankScore || a.originalRank - b.originalRank);

    return merged.slice(0, topK).map((result, index) => ({ ...result, newRank: index + 1 }));
  }
}
