import type { ChunkingMode } from '../types/config.js';
import type { Tokenizer } from './tokenizer.js';
import { ValidationError } from './errors.js';
import { createLogger } from './logger.js';

const log = createLogger('splitter');

const SENTENCE_DELIMITERS = ['. ', '? ', '! ', '.\n', '?\n', '!\n'];

const isHighSurrogate = (code: number): boolean => code >= 0xd800 && code <= 0xdbff;
const isLowSurrogate = (code: number): boolean => code >= 0xdc00 && code <= 0xdfff;

export interface SplitOptions {
  chunkSize: number;
  chunkOverlap: number;
  minChunkSize?: number;
  mode?: ChunkingMode;
}

export interface SplitResult {
  chunks: string[];
  /** Mode actually used; token mode without a tokenizer runs as character mode. */
  mode: ChunkingMode;
}

/**
 * Find where to cut a window that does not reach the end of the input.
 * Returns the length to keep, or null for a hard cut.
 */
export function findBoundary(window: string): number | null {
  const length = window.length;
  const midpoint = length / 2;
  const quarterStart = Math.floor((length * 3) / 4);

  let sentenceEnd = -1;
  for (const delimiter of SENTENCE_DELIMITERS) {
    sentenceEnd = Math.max(sentenceEnd, window.lastIndexOf(delimiter));
  }
  if (sentenceEnd >= quarterStart && sentenceEnd > midpoint) {
    return sentenceEnd + 1;
  }

  for (let i = length - 1; i > midpoint; i--) {
    if (/\s/.test(window.charAt(i))) {
      return i;
    }
  }

  return null;
}

/**
 * Splits text into size-bounded chunks, preferring sentence ends, then word gaps.
 */
export class TextSplitter {
  private tokenizer: Tokenizer | null;
  private warnedDowngrade = false;

  constructor(tokenizer: Tokenizer | null = null) {
    this.tokenizer = tokenizer;
  }

  get hasTokenizer(): boolean {
    return this.tokenizer !== null;
  }

  split(text: string, options: SplitOptions): SplitResult {
    TextSplitter.validateOptions(options);
    const minChunkSize = options.minChunkSize ?? 1;
    let mode: ChunkingMode = options.mode ?? 'character';

    if (mode === 'token' && !this.tokenizer) {
      if (!this.warnedDowngrade) {
        log.warn('No tokenizer available, falling back to character-count chunking');
        this.warnedDowngrade = true;
      }
      mode = 'character';
    }

    if (text.trim().length === 0) {
      return { chunks: [], mode };
    }

    const raw =
      mode === 'token' && this.tokenizer
        ? this.splitByTokens(text, options.chunkSize, options.chunkOverlap, this.tokenizer)
        : this.splitByCharacters(text, options.chunkSize, options.chunkOverlap);

    const chunks = raw.map((chunk) => chunk.trim()).filter((chunk) => chunk.length >= minChunkSize);
    return { chunks, mode };
  }

  private splitByCharacters(text: string, chunkSize: number, overlap: number): string[] {
    const chunks: string[] = [];
    let start = 0;

    while (start < text.length) {
      let end = Math.min(start + chunkSize, text.length);
      if (end < text.length && end - 1 > start && isHighSurrogate(text.charCodeAt(end - 1))) {
        end--;
      }
      let chunk = text.slice(start, end);

      if (end < text.length) {
        const cut = findBoundary(chunk);
        if (cut !== null) {
          chunk = chunk.slice(0, cut);
          end = start + cut;
        }
      }

      chunks.push(chunk);
      if (end >= text.length) {
        break;
      }
      const previous = start;
      start = this.nextStart(start, end, chunkSize, overlap);
      if (start < end && isLowSurrogate(text.charCodeAt(start))) {
        start = start - 1 > previous ? start - 1 : end;
      }
    }

    return chunks;
  }

  private splitByTokens(text: string, chunkSize: number, overlap: number, tokenizer: Tokenizer): string[] {
    const tokens = tokenizer.encode(text);
    const chunks: string[] = [];
    let start = 0;

    while (start < tokens.length) {
      let end = Math.min(start + chunkSize, tokens.length);
      let chunk = tokenizer.decode(tokens.slice(start, end));

      if (end < tokens.length) {
        const cut = findBoundary(chunk);
        if (cut !== null) {
          const truncated = chunk.slice(0, cut);
          const truncatedTokens = tokenizer.encode(truncated).length;
          // too short after re-encoding: keep the hard cut
          if (truncatedTokens >= chunkSize / 2 && truncatedTokens < end - start) {
            chunk = truncated;
            end = start + truncatedTokens;
          }
        }
      }

      chunks.push(chunk);
      if (end >= tokens.length) {
        break;
      }
      start = this.nextStart(start, end, chunkSize, overlap);
    }

    return chunks;
  }

  /**
   * Step back by the overlap, but always move forward.
   */
  private nextStart(start: number, end: number, chunkSize: number, overlap: number): number {
    const next = end - overlap;
    if (next <= end - chunkSize || next <= start) {
      return end;
    }
    return next;
  }

  static validateOptions(options: SplitOptions): void {
    if (!Number.isInteger(options.chunkSize) || options.chunkSize <= 0) {
      throw new ValidationError('Chunk size must be a positive integer');
    }
    if (!Number.isInteger(options.chunkOverlap) || options.chunkOverlap < 0) {
      throw new ValidationError('Chunk overlap must be a non-negative integer');
    }
    if (options.minChunkSize !== undefined && options.minChunkSize < 1) {
      throw new ValidationError('Minimum chunk size must be at least 1');
    }
  }
}
