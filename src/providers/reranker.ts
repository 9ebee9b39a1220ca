import { z } from 'zod';
import { BaseProvider } from './base.js';
import type { RerankHit, RerankProvider } from '../types/provider.js';
import type { RerankerConfig } from '../types/config.js';
import { ApiError, SchemaMismatchError } from '../utils/errors.js';

const RerankHitSchema = z.object({
  index: z.number().int().min(0),
  relevance_score: z.number(),
});

const RerankResponseSchema = z
  .object({
    results: z.array(RerankHitSchema).optional(),
    data: z.array(RerankHitSchema).optional(),
  })
  .refine((value) => value.results !== undefined || value.data !== undefined, {
    message: 'response has neither "results" nor "data"',
  });

/**
 * Client for `/rerank` style endpoints (Jina, Cohere, llama.cpp and TEI compatible bodies).
 */
export class HttpRerankProvider extends BaseProvider implements RerankProvider {
  readonly name = 'reranker';
  private url: string;
  private model: string;
  private apiKey: string | undefined;
  private timeoutMs: number;
  private fetchImpl: typeof fetch;

  constructor(config: RerankerConfig, fetchImpl: typeof fetch = fetch) {
    super({ maxAttempts: config.maxRetries, delayMs: config.retryDelayMs });
    this.url = config.url;
    this.model = config.model;
    this.apiKey = config.apiKey;
    this.timeoutMs = config.timeoutMs;
    this.fetchImpl = fetchImpl;
  }

  async rerank(query: string, documents: string[], topN: number): Promise<RerankHit[]> {
    if (documents.length === 0) {
      return [];
    }

    const payload = await this.withRetry(() => this.post({
      model: this.model,
      query,
      documents,
      top_n: topN,
    }));

    const parsed = RerankResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new SchemaMismatchError(`Malformed rerank response: ${parsed.error.message}`);
    }

    const hits = parsed.data.results ?? parsed.data.data ?? [];
    return hits.slice(0, topN).map((hit) => {
      if (hit.index >= documents.length) {
        throw new SchemaMismatchError(`Rerank index ${hit.index} out of range (${documents.length} documents)`);
      }
      return { index: hit.index, relevanceScore: hit.relevance_score };
    });
  }

  private async post(body: Record<string, unknown>): Promise<unknown> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }

    const response = await this.fetchImpl(this.url, {
      method: 'POST',
      headers,
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      const text = await response.text();
      throw new ApiError(`HTTP ${response.status} ${response.statusText}: ${text.slice(0, 200)}`, this.name);
    }
    return response.json();
  }
}
