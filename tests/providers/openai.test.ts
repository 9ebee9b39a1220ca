import { describe, it, expect } from 'vitest';
import { OpenAIEmbeddingProvider, type EmbeddingTransport } from '../../src/providers/openai.js';
import { defaultConfig, type EmbeddingConfig } from '../../src/types/config.js';
import { ApiError, SchemaMismatchError, ValidationError } from '../../src/utils/errors.js';

class FakeTransport implements EmbeddingTransport {
  readonly requests: Array<{ path: string; body: unknown; timeout?: number }> = [];

  constructor(private replies: Array<() => unknown>) {}

  async post(path: string, opts: { body: unknown; timeout?: number }): Promise<unknown> {
    this.requests.push({ path, body: opts.body, timeout: opts.timeout });
    const reply = this.replies.shift();
    if (!reply) throw new Error('no reply queued');
    return reply();
  }
}

function embeddingConfig(overrides: Partial<EmbeddingConfig> = {}): EmbeddingConfig {
  return { ...defaultConfig().embedding, model: 'embed-test', retryDelayMs: 0, ...overrides };
}

describe('OpenAIEmbeddingProvider', () => {
  it('should post text and image items to /embeddings', async () => {
    const transport = new FakeTransport([
      () => ({ data: [{ index: 0, embedding: [1, 0] }, { index: 1, embedding: [0, 1] }] }),
    ]);
    const provider = new OpenAIEmbeddingProvider(embeddingConfig({ timeoutMs: 5000 }), transport);

    await provider.embed([{ text: 'plain' }, { text: 'page', image: 'data:image/png;base64,AAAA' }]);

    expect(transport.requests).toEqual([
      {
        path: '/embeddings',
        body: { model: 'embed-test', input: ['plain', { text: 'page', image: 'data:image/png;base64,AAAA' }] },
        timeout: 5000,
      },
    ]);
  });

  it('should restore input order from the response indices', async () => {
    const transport = new FakeTransport([
      () => ({
        data: [
          { index: 2, embedding: [3, 3] },
          { index: 0, embedding: [1, 1] },
          { index: 1, embedding: [2, 2] },
        ],
      }),
    ]);
    const provider = new OpenAIEmbeddingProvider(embeddingConfig(), transport);

    const vectors = await provider.embed([{ text: 'a' }, { text: 'b' }, { text: 'c' }]);

    expect(vectors).toEqual([[1, 1], [2, 2], [3, 3]]);
  });

  it('should fail on a count mismatch without retrying', async () => {
    const transport = new FakeTransport([() => ({ data: [{ index: 0, embedding: [1] }] })]);
    const provider = new OpenAIEmbeddingProvider(embeddingConfig(), transport);

    await expect(provider.embed([{ text: 'a' }, { text: 'b' }])).rejects.toThrow(SchemaMismatchError);
    expect(transport.requests).toHaveLength(1);
  });

  it('should fail on vectors of different widths', async () => {
    const transport = new FakeTransport([
      () => ({ data: [{ index: 0, embedding: [1, 2] }, { index: 1, embedding: [1] }] }),
    ]);
    const provider = new OpenAIEmbeddingProvider(embeddingConfig(), transport);

    await expect(provider.embed([{ text: 'a' }, { text: 'b' }])).rejects.toThrow('mixes vector widths');
  });

  it('should fail on a malformed payload', async () => {
    const transport = new FakeTransport([() => ({ embeddings: [[1, 2]] })]);
    const provider = new OpenAIEmbeddingProvider(embeddingConfig(), transport);

    await expect(provider.embed([{ text: 'a' }])).rejects.toThrow(SchemaMismatchError);
  });

  it('should retry transient failures', async () => {
    const transport = new FakeTransport([
      () => {
        throw new Error('socket hang up');
      },
      () => {
        throw new Error('timeout');
      },
      () => ({ data: [{ index: 0, embedding: [0.5] }] }),
    ]);
    const provider = new OpenAIEmbeddingProvider(embeddingConfig({ maxRetries: 3 }), transport);

    await expect(provider.embed([{ text: 'a' }])).resolves.toEqual([[0.5]]);
    expect(transport.requests).toHaveLength(3);
  });

  it('should give up after the retry budget', async () => {
    const transport = new FakeTransport([
      () => {
        throw new Error('connection refused');
      },
      () => {
        throw new Error('connection refused');
      },
    ]);
    const provider = new OpenAIEmbeddingProvider(embeddingConfig({ maxRetries: 2 }), transport);

    await expect(provider.embed([{ text: 'a' }])).rejects.toThrow(
      'Operation failed after 2 attempts: connection refused'
    );
  });

  it('should not retry authentication failures', async () => {
    const transport = new FakeTransport([
      () => {
        throw new Error('401 Unauthorized');
      },
    ]);
    const provider = new OpenAIEmbeddingProvider(embeddingConfig(), transport);

    await expect(provider.embed([{ text: 'a' }])).rejects.toThrow(ApiError);
    expect(transport.requests).toHaveLength(1);
  });

  it('should reject empty text without an image', async () => {
    const provider = new OpenAIEmbeddingProvider(embeddingConfig(), new FakeTransport([]));
    await expect(provider.embed([{ text: '  ' }])).rejects.toThrow(ValidationError);
  });

  it('should return nothing for no inputs', async () => {
    const transport = new FakeTransport([]);
    const provider = new OpenAIEmbeddingProvider(embeddingConfig(), transport);

    await expect(provider.embed([])).resolves.toEqual([]);
    expect(transport.requests).toHaveLength(0);
  });
});
