import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import {
  ExtractorRegistry,
  ImageExtractor,
  MarkitdownExtractor,
  TextFileExtractor,
  extractDocuments,
  runExtractionTask,
} from '../../src/services/extraction.js';
import { defaultConfig } from '../../src/types/config.js';
import { FileError } from '../../src/utils/errors.js';
import { sha256 } from '../helpers/fakes.js';

describe('extraction', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'ragline-extract-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('ExtractorRegistry', () => {
    it('should route each format to its extractor', () => {
      const registry = ExtractorRegistry.fromConfig(defaultConfig().extraction);

      expect(registry.forFile('/docs/report.PDF').name).toBe('pdf');
      expect(registry.isOffloaded('/docs/report.pdf')).toBe(false);
      expect(registry.forFile('/docs/slides.pptx').name).toBe('markitdown');
      expect(registry.isOffloaded('/docs/slides.pptx')).toBe(true);
      expect(registry.forFile('/docs/photo.jpeg').name).toBe('image');
      expect(registry.forFile('/docs/notes.txt').name).toBe('text');
      expect(registry.isOffloaded('/docs/notes.txt')).toBe(false);
      expect(registry.transferable).toBe(true);
    });

    it('should stop being transferable once a custom extractor is registered', () => {
      const registry = ExtractorRegistry.fromConfig(defaultConfig().extraction).register('.log', new TextFileExtractor());

      expect(registry.transferable).toBe(false);
      expect(registry.forFile('server.LOG').name).toBe('text');
    });
  });

  describe('extractDocuments', () => {
    it('should build a document with file metadata', async () => {
      const filePath = path.join(dir, 'Notes.TXT');
      await writeFile(filePath, 'Meeting notes.', 'utf-8');

      const [document, ...rest] = await extractDocuments(
        ExtractorRegistry.fromConfig(defaultConfig().extraction),
        filePath
      );

      expect(rest).toEqual([]);
      expect(document.content).toBe('Meeting notes.');
      expect(document.contentHash).toBe(sha256('Meeting notes.'));
      expect(document.metadata).toEqual({
        source: filePath,
        filename: 'Notes.TXT',
        file_type: '.txt',
        extractor: 'text',
        extra: {},
      });
    });

    it('should attach page images for image files', async () => {
      const filePath = path.join(dir, 'pic.png');
      await writeFile(filePath, Buffer.from([1, 2, 3]));

      const [document] = await extractDocuments(ExtractorRegistry.fromConfig(defaultConfig().extraction), filePath);

      expect(document.content).toBe('Image: pic.png');
      expect(document.metadata.extractor).toBe('image');
      expect(document.metadata.extra).toEqual({ page_image: 'data:image/png;base64,AQID' });
    });

    it('should reject files without text', async () => {
      const filePath = path.join(dir, 'blank.txt');
      await writeFile(filePath, '  \n', 'utf-8');

      await expect(
        extractDocuments(ExtractorRegistry.fromConfig(defaultConfig().extraction), filePath)
      ).rejects.toThrow(FileError);
    });
  });

  describe('extractors', () => {
    it('should report unreadable text files as FileError', async () => {
      await expect(new TextFileExtractor().extract(path.join(dir, 'missing.txt'))).rejects.toThrow(FileError);
    });

    it('should report unreadable images as FileError', async () => {
      await expect(new ImageExtractor().extract(path.join(dir, 'missing.png'))).rejects.toThrow(FileError);
    });

    it('should report a converter that cannot be started', async () => {
      const extractor = new MarkitdownExtractor({
        ...defaultConfig().extraction,
        markitdownCommand: path.join(dir, 'no-such-converter'),
      });

      await expect(extractor.extract(path.join(dir, 'report.docx'))).rejects.toThrow('Failed to run');
    });
  });

  describe('runExtractionTask', () => {
    it('should turn errors into failed outcomes', async () => {
      const outcome = await runExtractionTask(ExtractorRegistry.fromConfig(defaultConfig().extraction), {
        filePath: path.join(dir, 'gone.txt'),
        relativePath: 'gone.txt',
      });

      expect(outcome.status).toBe('failed');
      expect(outcome.documents).toEqual([]);
      expect(outcome.relativePath).toBe('gone.txt');
      expect(outcome.error).toContain('Failed to read');
    });
  });
});
