import { describe, it, expect } from 'vitest';
import { buildContext } from '../../src/services/context.js';
import { makeChunk } from '../helpers/fakes.js';

describe('buildContext', () => {
  it('should number sources and separate chunks', () => {
    const context = buildContext([
      { chunk: { ...makeChunk('alpha', { source: 'a.txt' }), chunkId: 4 }, score: 0.9 },
      { chunk: { ...makeChunk('beta', { source: undefined }), chunkId: 7 }, score: 0.5 },
    ]);

    expect(context).toBe('[Source 1: a.txt]\nalpha\n\n---\n[Source 2: Unknown]\nbeta\n');
  });

  it('should be empty for no results', () => {
    expect(buildContext([])).toBe('');
  });
});
