import { describe, it, expect } from 'vitest';
import { ContentClassifier, buildProfiles } from '../../src/services/classifier.js';
import { defaultConfig } from '../../src/types/config.js';
import type { DocumentMetadata } from '../../src/types/document.js';

function doc(content: string, metadata: Partial<DocumentMetadata> = {}) {
  return { content, metadata: { extra: {}, ...metadata } };
}

describe('ContentClassifier', () => {
  const classifier = new ContentClassifier(buildProfiles(defaultConfig().chunking.profiles));

  describe('Extension matching', () => {
    it('should classify by file_type first', () => {
      expect(classifier.classify(doc('plain words', { file_type: '.ts', source: 'notes.md' }))).toBe('code');
    });

    it('should accept file_type without a leading dot', () => {
      expect(classifier.classify(doc('plain words', { file_type: 'MD' }))).toBe('documentation');
    });

    it('should fall back to the source extension', () => {
      expect(classifier.classify(doc('a,b,c', { source: 'data/report.CSV' }))).toBe('table');
    });
  });

  describe('Pattern matching', () => {
    it('should classify as table when the pipe count exceeds the threshold', () => {
      expect(classifier.classify(doc('a|'.repeat(11)))).toBe('table');
    });

    it('should not classify at exactly the threshold', () => {
      expect(classifier.classify(doc('a|'.repeat(10)))).toBe('default');
    });

    it('should use patterns when the extension matches no profile', () => {
      expect(classifier.classify(doc('x\t'.repeat(12), { source: 'dump.log' }))).toBe('table');
    });
  });

  it('should return default when nothing matches', () => {
    expect(classifier.classify(doc('Just prose.', { source: 'notes.txt' }))).toBe('default');
  });

  it('should expose profiles by content type', () => {
    expect(classifier.getProfile('code')?.chunkSize).toBe(800);
    expect(classifier.getProfile('default')).toBeUndefined();
  });
});
