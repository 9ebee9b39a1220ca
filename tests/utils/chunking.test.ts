import { describe, it, expect } from 'vitest';
import { TextSplitter, findBoundary } from '../../src/utils/chunking.js';
import type { Tokenizer } from '../../src/utils/tokenizer.js';
import { ValidationError } from '../../src/utils/errors.js';

/** One token per character, so token mode results can be traced like character mode. */
const charTokenizer: Tokenizer = {
  encoding: 'chars',
  encode: (text) => Array.from(text, (char) => char.charCodeAt(0)),
  decode: (tokens) => String.fromCharCode(...tokens),
};

describe('findBoundary', () => {
  it('should cut after a sentence end in the last quarter of the window', () => {
    const window = 'a'.repeat(35) + '. Ne';
    expect(findBoundary(window + 'x')).toBe(36);
  });

  it('should ignore sentence ends before the last quarter and fall back to whitespace', () => {
    const window = 'The cat sat on the mat. The dog ran far ';
    expect(window.length).toBe(40);
    expect(findBoundary(window)).toBe(39);
  });

  it('should return null when there is no boundary past the midpoint', () => {
    expect(findBoundary('word ' + 'x'.repeat(30))).toBeNull();
  });
});

describe('TextSplitter', () => {
  describe('Character mode', () => {
    it('should hard-cut unbroken text into overlapping chunks', () => {
      const splitter = new TextSplitter();
      const text = 'a'.repeat(120);

      const { chunks, mode } = splitter.split(text, { chunkSize: 50, chunkOverlap: 10 });

      expect(mode).toBe('character');
      expect(chunks.map((chunk) => chunk.length)).toEqual([50, 50, 40]);
      chunks.forEach((chunk) => expect(chunk.length).toBeLessThanOrEqual(50));
    });

    it('should not cut between the halves of a surrogate pair', () => {
      const splitter = new TextSplitter();

      const { chunks } = splitter.split('ab😀cd', { chunkSize: 3, chunkOverlap: 0 });

      expect(chunks).toEqual(['ab', '😀c', 'd']);
    });

    it('should not start an overlapping chunk inside a surrogate pair', () => {
      const splitter = new TextSplitter();

      const { chunks } = splitter.split('😀'.repeat(4), { chunkSize: 5, chunkOverlap: 1 });

      expect(chunks).toEqual(['😀😀', '😀😀', '😀😀']);
    });

    it('should prefer sentence boundaries', () => {
      const splitter = new TextSplitter();
      const text = 'a'.repeat(35) + '. Next sentence continues here.';

      const { chunks } = splitter.split(text, { chunkSize: 40, chunkOverlap: 0 });

      expect(chunks).toEqual(['a'.repeat(35) + '.', 'Next sentence continues here.']);
    });

    it('should fall back to word boundaries', () => {
      const splitter = new TextSplitter();
      const text = 'The cat sat on the mat. The dog ran far away from home today.';

      const { chunks } = splitter.split(text, { chunkSize: 40, chunkOverlap: 0 });

      expect(chunks).toEqual(['The cat sat on the mat. The dog ran far', 'away from home today.']);
    });

    it('should return a single chunk for short text', () => {
      const splitter = new TextSplitter();
      const { chunks } = splitter.split('  Short text.  ', { chunkSize: 100, chunkOverlap: 10 });
      expect(chunks).toEqual(['Short text.']);
    });

    it('should return no chunks for empty or blank text', () => {
      const splitter = new TextSplitter();
      expect(splitter.split('', { chunkSize: 10, chunkOverlap: 2 }).chunks).toEqual([]);
      expect(splitter.split('   \n\t', { chunkSize: 10, chunkOverlap: 2 }).chunks).toEqual([]);
    });

    it('should drop chunks shorter than the minimum size', () => {
      const splitter = new TextSplitter();
      const { chunks } = splitter.split('Hi.', { chunkSize: 10, chunkOverlap: 0, minChunkSize: 5 });
      expect(chunks).toEqual([]);
    });

    it('should terminate when the overlap is not smaller than the chunk size', () => {
      const splitter = new TextSplitter();
      const { chunks } = splitter.split('b'.repeat(35), { chunkSize: 10, chunkOverlap: 15 });
      expect(chunks).toEqual(['b'.repeat(10), 'b'.repeat(10), 'b'.repeat(10), 'b'.repeat(5)]);
    });

    it('should cover every character of the input in order', () => {
      const splitter = new TextSplitter();
      const text = Array.from({ length: 60 }, (_, i) => `word${i}`).join(' ');

      const { chunks } = splitter.split(text, { chunkSize: 45, chunkOverlap: 8 });

      let searchFrom = 0;
      let coveredUntil = 0;
      for (const chunk of chunks) {
        const at = text.indexOf(chunk, searchFrom);
        expect(at).toBeGreaterThanOrEqual(0);
        // gaps between chunks may only be whitespace lost to trimming
        expect(text.slice(coveredUntil, Math.max(coveredUntil, at)).trim()).toBe('');
        coveredUntil = Math.max(coveredUntil, at + chunk.length);
        searchFrom = at + 1;
      }
      expect(coveredUntil).toBe(text.length);
    });
  });

  describe('Token mode', () => {
    it('should count chunk size in tokens', () => {
      const splitter = new TextSplitter(charTokenizer);

      const { chunks, mode } = splitter.split('a'.repeat(120), { chunkSize: 50, chunkOverlap: 10, mode: 'token' });

      expect(mode).toBe('token');
      expect(chunks.map((chunk) => chunk.length)).toEqual([50, 50, 40]);
    });

    it('should downgrade to character mode without a tokenizer', () => {
      const splitter = new TextSplitter(null);

      const { chunks, mode } = splitter.split('a'.repeat(120), { chunkSize: 50, chunkOverlap: 10, mode: 'token' });

      expect(splitter.hasTokenizer).toBe(false);
      expect(mode).toBe('character');
      expect(chunks).toHaveLength(3);
    });
  });

  describe('Validation', () => {
    it('should reject a non-positive chunk size', () => {
      const splitter = new TextSplitter();
      expect(() => splitter.split('text', { chunkSize: 0, chunkOverlap: 0 })).toThrow(ValidationError);
    });

    it('should reject a negative overlap', () => {
      const splitter = new TextSplitter();
      expect(() => splitter.split('text', { chunkSize: 10, chunkOverlap: -1 })).toThrow(ValidationError);
    });
  });
});
