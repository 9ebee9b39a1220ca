import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'fs';
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { RagPipeline, type PipelineDependencies } from '../../src/services/pipeline.js';
import { AppConfigSchema, type AppConfig } from '../../src/types/config.js';
import { PreconditionError } from '../../src/utils/errors.js';
import { InMemoryCollectionClient, LetterCountEmbeddingProvider, StaticRerankProvider } from '../helpers/fakes.js';

const MISSING_WORKER = new URL('file:///nonexistent/ragline/extract-worker.js');

describe('RagPipeline', () => {
  let dir: string;
  let config: AppConfig;
  const opened: RagPipeline[] = [];

  async function createPipeline(deps: PipelineDependencies = {}): Promise<RagPipeline> {
    const pipeline = await RagPipeline.create(config, {
      embeddingProvider: new LetterCountEmbeddingProvider(),
      rerankProvider: null,
      workerScript: MISSING_WORKER,
      ...deps,
    });
    opened.push(pipeline);
    return pipeline;
  }

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'ragline-pipeline-'));
    config = AppConfigSchema.parse({
      vectorStore: { path: path.join(dir, 'store') },
      queryLog: { outputDir: path.join(dir, 'queries') },
      ingestion: { submissionStaggerMs: 0 },
    });
  });

  afterEach(async () => {
    for (const pipeline of opened.splice(0)) {
      await pipeline.close();
    }
    await rm(dir, { recursive: true, force: true });
  });

  it('should skip a second document with the same content', async () => {
    const pipeline = await createPipeline();

    const first = await pipeline.ingestText('aaa bbb', { source: 'one' });
    const second = await pipeline.ingestText('aaa bbb', { source: 'two' });

    expect(first).toMatchObject({ documents: 1, chunks: 1, added: 1, duplicates: 0 });
    expect(second).toMatchObject({ documents: 1, chunks: 1, added: 0, duplicates: 1 });
    expect(pipeline.store.size).toBe(1);
  });

  it('should ingest a directory and answer from it', async () => {
    const docs = path.join(dir, 'docs');
    await mkdir(docs);
    await writeFile(path.join(docs, 'alpha.txt'), 'aaaa', 'utf-8');
    await writeFile(path.join(docs, 'beta.txt'), 'bbbb', 'utf-8');
    await writeFile(path.join(docs, 'gamma.txt'), 'cccc', 'utf-8');
    const pipeline = await createPipeline();

    const summary = await pipeline.ingestDirectory(docs, { mode: 'sequential' });
    const outcome = await pipeline.query('bb', { topK: 2 });

    expect(summary).toEqual({
      documents: 3,
      chunks: 3,
      added: 3,
      duplicates: 0,
      failures: [],
      cancelled: 0,
      mode: 'sequential',
    });
    expect(outcome.results).toHaveLength(2);
    expect(outcome.results[0].chunk.content).toBe('bbbb');
    expect(outcome.context.startsWith(`[Source 1: ${path.join(docs, 'beta.txt')}]\nbbbb\n`)).toBe(true);
    expect(outcome.savedTo).toBeNull();
  });

  it('should persist the index between pipelines', async () => {
    const writer = await createPipeline();
    await writer.ingestText('aaa', { source: 'a' });
    await writer.ingestText('ccc', { source: 'c' });

    const reader = await createPipeline();

    expect(reader.store.size).toBe(2);
    await expect(reader.stats()).resolves.toEqual({
      numChunks: 2,
      dimension: 4,
      indexSize: 2,
      sources: ['a', 'c'],
    });
  });

  it('should continue numbering and deduplicating against the persisted index', async () => {
    const writer = await createPipeline();
    await writer.ingestText('aaa', { source: 'a' });
    await writer.ingestText('ccc', { source: 'c' });

    const next = await createPipeline();
    await expect(next.ingestText('aaa', { source: 'again' })).resolves.toMatchObject({ added: 0, duplicates: 1 });
    await expect(next.ingestText('ddd', { source: 'd' })).resolves.toMatchObject({ added: 1, duplicates: 0 });

    const [hit] = await next.store.search('ddd', 1);
    expect(hit.chunk.chunkId).toBe(2);
    await expect(next.open()).resolves.toBe(true);
    expect(next.store.size).toBe(3);
  });

  it('should fail a query against an empty index', async () => {
    const pipeline = await createPipeline();
    await expect(pipeline.query('anything')).rejects.toThrow(PreconditionError);
  });

  it('should rerank and save results when asked', async () => {
    const reranker = new StaticRerankProvider((documents) =>
      documents.map((_, index) => ({ index, relevanceScore: index })).reverse()
    );
    const pipeline = await createPipeline({ rerankProvider: reranker });
    await pipeline.ingestText('aaa', { source: 'a' });
    await pipeline.ingestText('bbb', { source: 'b' });

    const outcome = await pipeline.query('aaa', { topK: 2, save: true });

    expect(outcome.reranked).toBe(true);
    expect(outcome.results.map((result) => [result.chunk.content, result.originalRank, result.newRank])).toEqual([
      ['bbb', 2, 1],
      ['aaa', 1, 2],
    ]);
    expect(outcome.savedTo).not.toBeNull();
    expect(existsSync(path.join(outcome.savedTo ?? '', 'reranked_results.json'))).toBe(true);
  });

  it('should index into a qdrant collection when configured', async () => {
    config = AppConfigSchema.parse({ ...config, vectorStore: { ...config.vectorStore, type: 'qdrant' } });
    const client = new InMemoryCollectionClient();
    const pipeline = await createPipeline({ collectionClient: client });

    await pipeline.ingestText('abcd', { source: 'q' });

    expect(pipeline.store.backend).toBe('qdrant');
    expect(client.collections.get('rag_documents')?.points.size).toBe(1);
  });

  it('should clear the index', async () => {
    const pipeline = await createPipeline();
    await pipeline.ingestText('aaa', { source: 'a' });

    await pipeline.clear();

    expect(pipeline.store.size).toBe(0);
    await expect(pipeline.stats()).resolves.toMatchObject({ numChunks: 0 });
  });
});
