import type { SearchResult } from '../types/search.js';

/**
 * Join retrieved chunks into one prompt-ready block, numbered by rank.
 */
export function buildContext(results: SearchResult[]): string {
  return results
    .map((result, index) => {
      const source = result.chunk.metadata.source ?? 'Unknown';
      return `[Source ${index + 1}: ${source}]\n${result.chunk.content}\n`;
    })
    .join('\n---\n');
}
