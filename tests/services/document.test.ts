import { describe, it, expect } from 'vitest';
import { DocumentService, createDocument } from '../../src/services/document.js';
import { ContentClassifier, buildProfiles } from '../../src/services/classifier.js';
import { TextSplitter } from '../../src/utils/chunking.js';
import { defaultConfig } from '../../src/types/config.js';
import { sha256 } from '../helpers/fakes.js';

function createService(): DocumentService {
  return new DocumentService(
    new ContentClassifier(buildProfiles(defaultConfig().chunking.profiles)),
    new TextSplitter(),
    { mode: 'character', chunkSize: 50, chunkOverlap: 10, minChunkSize: 1, embeddingModel: 'embed-v1' }
  );
}

describe('createDocument', () => {
  it('should hash the content and stamp the ingestion time', () => {
    const document = createDocument('body text', { source: 'a.txt' }, new Date('2026-01-02T03:04:05.000Z'));

    expect(document.contentHash).toBe(sha256('body text'));
    expect(document.ingestionTimestamp).toBe('2026-01-02T03:04:05.000Z');
    expect(document.metadata).toEqual({ source: 'a.txt', extra: {} });
  });
});

describe('DocumentService', () => {
  it('should stamp lineage metadata on every chunk', () => {
    const service = createService();
    const document = createDocument('a'.repeat(120), { source: 'notes.txt' });

    const chunks = service.chunk(document);

    expect(chunks).toHaveLength(3);
    chunks.forEach((chunk, index) => {
      expect(chunk.metadata).toMatchObject({
        source: 'notes.txt',
        content_hash: document.contentHash,
        chunk_index: index,
        total_chunks: 3,
        chunk_size_used: 50,
        chunk_overlap_used: 10,
        chunking_mode: 'character',
        content_type: 'default',
        embedding_model_version: 'embed-v1',
      });
      expect(chunk.metadata.chunk_content_hash).toBe(sha256(chunk.content));
      expect(chunk.chunkId).toBeUndefined();
    });
  });

  it('should use the content-type profile sizes', () => {
    const service = createService();
    const document = createDocument('export const answer = 42;', { source: 'main.ts', file_type: '.ts' });

    const [chunk] = service.chunk(document);

    expect(chunk.metadata.content_type).toBe('code');
    expect(chunk.metadata.chunk_size_used).toBe(800);
    expect(chunk.metadata.chunk_overlap_used).toBe(100);
  });

  it('should not share the extra record between document and chunks', () => {
    const service = createService();
    const document = createDocument('Some text here.', { source: 'x.txt', extra: { page: 1 } });

    const [chunk] = service.chunk(document);
    chunk.metadata.extra.page = 2;

    expect(document.metadata.extra.page).toBe(1);
  });

  it('should chunk several documents in order', () => {
    const service = createService();
    const chunks = service.chunkAll([
      createDocument('First document.', { source: 'one.txt' }),
      createDocument('Second document.', { source: 'two.txt' }),
    ]);

    expect(chunks.map((chunk) => chunk.metadata.source)).toEqual(['one.txt', 'two.txt']);
  });

  it('should build from configuration in character mode', async () => {
    const service = await DocumentService.fromConfig(defaultConfig());
    const chunks = service.chunk(createDocument('Plain configuration test.', { source: 'c.txt' }));

    expect(chunks).toHaveLength(1);
    expect(chunks[0].metadata.chunk_size_used).toBe(500);
    expect(chunks[0].metadata.embedding_model_version).toBe('text-embedding-3-small');
  });
});
