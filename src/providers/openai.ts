import OpenAI from 'openai';
import { z } from 'zod';
import { BaseProvider } from './base.js';
import type { EmbeddingInput, EmbeddingProvider } from '../types/provider.js';
import type { EmbeddingConfig } from '../types/config.js';
import { SchemaMismatchError, ValidationError } from '../utils/errors.js';

/** The slice of the OpenAI client this provider calls. */
export interface EmbeddingTransport {
  post(path: string, opts: { body: unknown; timeout?: number }): PromiseLike<unknown>;
}

const EmbeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int().min(0),
      embedding: z.array(z.number()),
    })
  ),
});

type EmbeddingItem = string | { text: string; image: string };

/**
 * Embedding client for OpenAI-compatible `/embeddings` endpoints. Items carrying an image are
 * sent as `{ text, image }` objects for multimodal servers.
 */
export class OpenAIEmbeddingProvider extends BaseProvider implements EmbeddingProvider {
  readonly name = 'embedding';
  readonly model: string;
  private transport: EmbeddingTransport;
  private timeoutMs: number;

  constructor(config: EmbeddingConfig, transport?: EmbeddingTransport) {
    super({ maxAttempts: config.maxRetries, delayMs: config.retryDelayMs });
    this.model = config.model;
    this.timeoutMs = config.timeoutMs;
    this.transport =
      transport ??
      new OpenAI({
        apiKey: config.apiKey || 'unused',
        baseURL: config.baseUrl,
        timeout: config.timeoutMs,
        maxRetries: 0,
      });
  }

  async embed(inputs: EmbeddingInput[]): Promise<number[][]> {
    if (inputs.length === 0) {
      return [];
    }
    inputs.forEach((input, index) => {
      if (input.text.trim().length === 0 && !input.image) {
        throw new ValidationError(`Embedding input ${index} is empty`);
      }
    });

    const body = {
      model: this.model,
      input: inputs.map((input): EmbeddingItem => (input.image ? { text: input.text, image: input.image } : input.text)),
    };

    const raw = await this.withRetry(async () =>
      this.transport.post('/embeddings', { body, timeout: this.timeoutMs })
    );
    return this.parseResponse(raw, inputs.length);
  }

  /**
   * Validate the payload and put vectors back in request order.
   */
  private parseResponse(raw: unknown, expected: number): number[][] {
    const parsed = EmbeddingResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new SchemaMismatchError(`Malformed embedding response: ${parsed.error.message}`);
    }

    const items = [...parsed.data.data].sort((a, b) => a.index - b.index);
    if (items.length !== expected) {
      throw new SchemaMismatchError(`Expected ${expected} embeddings, received ${items.length}`);
    }

    const width = items[0]?.embedding.length ?? 0;
    return items.map((item, position) => {
      if (item.index !== position) {
        throw new SchemaMismatchError(`Embedding response is missing index ${position}`);
      }
      if (item.embedding.length === 0 || item.embedding.length !== width) {
        throw new SchemaMismatchError('Embedding response mixes vector widths');
      }
      return item.embedding;
    });
  }
}
