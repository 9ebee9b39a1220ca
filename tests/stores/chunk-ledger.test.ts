import { describe, it, expect } from 'vitest';
import { ChunkLedger, type PersistedIndex } from '../../src/stores/chunk-ledger.js';
import { SchemaMismatchError } from '../../src/utils/errors.js';
import { makeChunk } from '../helpers/fakes.js';

function record(chunkId: number, content: string): PersistedIndex['chunks'][number] {
  const chunk = makeChunk(content);
  return { chunk_id: chunkId, content: chunk.content, metadata: chunk.metadata };
}

describe('ChunkLedger', () => {
  it('should continue ids after the highest restored id', () => {
    const ledger = new ChunkLedger();
    ledger.restore({ dimension: 4, num_chunks: 2, chunks: [record(0, 'aaa'), record(4, 'bbb')] });

    expect(ledger.size).toBe(2);
    expect(ledger.peekIds(2)).toEqual([5, 6]);
    expect(ledger.partition([makeChunk('bbb'), makeChunk('ccc')]).duplicates).toBe(1);
  });

  it('should reject a snapshot that repeats a chunk id', () => {
    const ledger = new ChunkLedger();

    expect(() =>
      ledger.restore({ dimension: 4, num_chunks: 2, chunks: [record(0, 'aaa'), record(0, 'bbb')] })
    ).toThrow(SchemaMismatchError);
    expect(ledger.size).toBe(0);
  });

  it('should reject a snapshot whose count disagrees with its chunks', () => {
    const ledger = new ChunkLedger();

    expect(() => ledger.restore({ dimension: 4, num_chunks: 3, chunks: [record(0, 'aaa')] })).toThrow(
      SchemaMismatchError
    );
  });

  it('should keep earlier state when a restore is rejected', () => {
    const ledger = new ChunkLedger();
    ledger.commit([makeChunk('aaa')], 4);

    expect(() =>
      ledger.restore({ dimension: 4, num_chunks: 2, chunks: [record(1, 'bbb'), record(1, 'ccc')] })
    ).toThrow(SchemaMismatchError);
    expect(ledger.all().map((chunk) => chunk.content)).toEqual(['aaa']);
  });
});
