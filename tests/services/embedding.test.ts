import { describe, it, expect } from 'vitest';
import { EmbeddingService, embeddingInputForChunk } from '../../src/services/embedding.js';
import type { EmbeddingInput, EmbeddingProvider } from '../../src/types/provider.js';
import { SchemaMismatchError, ValidationError } from '../../src/utils/errors.js';
import { LetterCountEmbeddingProvider, makeChunk } from '../helpers/fakes.js';

/** Answers each batch after a delay that shrinks with the batch position, so later batches finish first. */
class SlowProvider implements EmbeddingProvider {
  readonly name = 'slow';
  readonly model = 'slow-v1';
  inFlight = 0;
  maxInFlight = 0;
  private batchNumber = 0;

  async embed(inputs: EmbeddingInput[]): Promise<number[][]> {
    const delay = 40 - this.batchNumber++ * 10;
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    await new Promise((resolve) => setTimeout(resolve, Math.max(delay, 0)));
    this.inFlight--;
    return inputs.map((input) => [Number(input.text)]);
  }
}

describe('EmbeddingService', () => {
  it('should split inputs into batches', async () => {
    const provider = new LetterCountEmbeddingProvider();
    const service = new EmbeddingService(provider, { batchSize: 2, maxConcurrentRequests: 1 });

    const vectors = await service.embed([{ text: 'a' }, { text: 'bb' }, { text: 'ccc' }]);

    expect(provider.calls.map((batch) => batch.length)).toEqual([2, 1]);
    expect(vectors).toEqual([
      [1, 0, 0, 0],
      [0, 2, 0, 0],
      [0, 0, 3, 0],
    ]);
  });

  it('should keep input order when batches finish out of order', async () => {
    const provider = new SlowProvider();
    const service = new EmbeddingService(provider, { batchSize: 1, maxConcurrentRequests: 2 });
    const inputs = ['1', '2', '3', '4'].map((text) => ({ text }));

    const vectors = await service.embed(inputs);

    expect(vectors).toEqual([[1], [2], [3], [4]]);
    expect(provider.maxInFlight).toBe(2);
  });

  it('should fail when a batch comes back short', async () => {
    const provider: EmbeddingProvider = {
      name: 'short',
      model: 'short-v1',
      embed: async () => [[1]],
    };
    const service = new EmbeddingService(provider, { batchSize: 2 });

    await expect(service.embed([{ text: 'a' }, { text: 'b' }])).rejects.toThrow(SchemaMismatchError);
  });

  it('should reject an empty query', async () => {
    const service = new EmbeddingService(new LetterCountEmbeddingProvider());
    await expect(service.embedQuery('   ')).rejects.toThrow(ValidationError);
  });

  it('should embed a query as a single text input', async () => {
    const provider = new LetterCountEmbeddingProvider();
    const service = new EmbeddingService(provider);

    await expect(service.embedQuery('abc')).resolves.toEqual([1, 1, 1, 0]);
    expect(provider.calls).toEqual([[{ text: 'abc' }]]);
  });

  it('should send page images along with chunk text', () => {
    const chunk = makeChunk('Figure 1', { extra: { page_image: 'data:image/png;base64,AAAA' } });
    expect(embeddingInputForChunk(chunk)).toEqual({ text: 'Figure 1', image: 'data:image/png;base64,AAAA' });
    expect(embeddingInputForChunk(makeChunk('plain'))).toEqual({ text: 'plain' });
  });

  it('should reject a zero batch size', () => {
    expect(() => new EmbeddingService(new LetterCountEmbeddingProvider(), { batchSize: 0 })).toThrow(ValidationError);
  });
});
