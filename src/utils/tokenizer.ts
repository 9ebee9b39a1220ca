import type { TokenizerEncoding } from '../types/config.js';
import { createLogger } from './logger.js';

const log = createLogger('tokenizer');

/** Maps text to token ids and back. */
export interface Tokenizer {
  readonly encoding: string;
  encode(text: string): number[];
  decode(tokens: number[]): string;
}

/**
 * Load a BPE tokenizer from js-tiktoken. Resolves to null when the library or the
 * encoding cannot be loaded, so callers can drop to character counting.
 */
export async function loadTokenizer(encoding: TokenizerEncoding): Promise<Tokenizer | null> {
  try {
    const { getEncoding } = await import('js-tiktoken');
    const bpe = getEncoding(encoding);
    return {
      encoding,
      encode: (text) => bpe.encode(text),
      decode: (tokens) => bpe.decode(tokens),
    };
  } catch (error) {
    log.warn({ encoding, err: error }, 'Tokenizer unavailable');
    return null;
  }
}
