import type { AppConfig } from '../types/config.js';
import type { EmbeddingProvider, RerankProvider } from '../types/provider.js';
import { OpenAIEmbeddingProvider } from './openai.js';
import { HttpRerankProvider } from './reranker.js';

export class ProviderFactory {
  static createEmbeddingProvider(config: AppConfig): EmbeddingProvider {
    return new OpenAIEmbeddingProvider(config.embedding);
  }

  /**
   * Reranking is optional; null when disabled.
   */
  static createRerankProvider(config: AppConfig): RerankProvider | null {
    if (!config.reranker.enabled) {
      return null;
    }
    return new HttpRerankProvider(config.reranker);
  }
}
