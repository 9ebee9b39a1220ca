import type { ExtractedContent } from './document.js';

/** One item for the embedding collaborator; `image` is a data: URL. */
export interface EmbeddingInput {
  text: string;
  image?: string;
}

export interface EmbeddingProvider {
  readonly name: string;
  readonly model: string;
  /** Returns one vector per input, in input order. */
  embed(inputs: EmbeddingInput[]): Promise<number[][]>;
}

export interface RerankHit {
  /** Index into the submitted documents */
  index: number;
  relevanceScore: number;
}

export interface RerankProvider {
  readonly name: string;
  rerank(query: string, documents: string[], topN: number): Promise<RerankHit[]>;
}

export interface DocumentExtractor {
  readonly name: string;
  /** True when the work happens outside this process (child process or remote service). */
  readonly offloaded: boolean;
  extract(filePath: string): Promise<ExtractedContent>;
}
