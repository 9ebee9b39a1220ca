import { spawn } from 'child_process';
import { promises as fs } from 'fs';
import path from 'path';
import type { ExtractionConfig } from '../types/config.js';
import type { Document, ExtractedContent, ExtractedPage, IngestionOutcome } from '../types/document.js';
import type { DocumentExtractor } from '../types/provider.js';
import { createDocument } from './document.js';
import { PdfExtractor } from './pdf.js';
import { FileError, errorMessage } from '../utils/errors.js';

const OFFICE_EXTENSIONS = ['.docx', '.pptx', '.xlsx'];
const IMAGE_TYPES: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
};

export class TextFileExtractor implements DocumentExtractor {
  readonly name = 'text';
  readonly offloaded = false;

  async extract(filePath: string): Promise<ExtractedContent> {
    try {
      return { text: await fs.readFile(filePath, 'utf-8'), extractor: this.name };
    } catch (error) {
      throw new FileError(`Failed to read ${filePath}: ${String(error)}`);
    }
  }
}

/**
 * Page-image formats: the image itself goes to the embedding collaborator, with the
 * file name as its text.
 */
export class ImageExtractor implements DocumentExtractor {
  readonly name = 'image';
  readonly offloaded = false;

  async extract(filePath: string): Promise<ExtractedContent> {
    const mime = IMAGE_TYPES[path.extname(filePath).toLowerCase()] ?? 'application/octet-stream';
    let data: Buffer;
    try {
      data = await fs.readFile(filePath);
    } catch (error) {
      throw new FileError(`Failed to read ${filePath}: ${String(error)}`);
    }
    return {
      text: `Image: ${path.basename(filePath)}`,
      extractor: this.name,
      pageImage: `data:${mime};base64,${data.toString('base64')}`,
    };
  }
}

/**
 * Converts Office files to Markdown with the external `markitdown` command.
 */
export class MarkitdownExtractor implements DocumentExtractor {
  readonly name = 'markitdown';
  readonly offloaded = true;
  private command: string;
  private timeoutMs: number;
  private maxBytes: number;

  constructor(config: ExtractionConfig) {
    this.command = config.markitdownCommand;
    this.timeoutMs = config.timeoutMs;
    this.maxBytes = config.maxOutputBytes;
  }

  extract(filePath: string): Promise<ExtractedContent> {
    return new Promise((resolve, reject) => {
      const proc = spawn(this.command, [filePath], { stdio: ['ignore', 'pipe', 'pipe'] });
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let bytes = 0;
      let settled = false;

      const fail = (message: string): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        proc.kill('SIGKILL');
        reject(new FileError(message));
      };

      const timer = setTimeout(() => fail(`markitdown timed out after ${this.timeoutMs}ms`), this.timeoutMs);

      proc.stdout.on('data', (chunk: Buffer) => {
        bytes += chunk.length;
        if (bytes > this.maxBytes) {
          fail(`markitdown output exceeded ${this.maxBytes} bytes`);
          return;
        }
        stdout.push(chunk);
      });
      proc.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

      proc.on('error', (error) => fail(`Failed to run ${this.command}: ${error.message}`));

      proc.on('close', (code) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (code !== 0) {
          const detail = Buffer.concat(stderr).toString('utf8').slice(0, 500);
          reject(new FileError(`markitdown exited with code ${code}: ${detail}`));
          return;
        }
        resolve({ text: Buffer.concat(stdout).toString('utf8'), extractor: this.name });
      });
    });
  }
}

/**
 * Chooses an extractor per file extension.
 */
export class ExtractorRegistry {
  private byExtension = new Map<string, DocumentExtractor>();
  private fallback: DocumentExtractor;
  private portable: boolean;

  constructor(fallback: DocumentExtractor, portable: boolean = false) {
    this.fallback = fallback;
    this.portable = portable;
  }

  /** True while the registry is built purely from configuration, so a worker thread can rebuild it. */
  get transferable(): boolean {
    return this.portable;
  }

  static fromConfig(config: ExtractionConfig): ExtractorRegistry {
    const registry = new ExtractorRegistry(new TextFileExtractor(), true);
    const markitdown = new MarkitdownExtractor(config);
    const image = new ImageExtractor();
    registry.byExtension.set('.pdf', new PdfExtractor(config.pdf));
    OFFICE_EXTENSIONS.forEach((ext) => registry.byExtension.set(ext, markitdown));
    Object.keys(IMAGE_TYPES).forEach((ext) => registry.byExtension.set(ext, image));
    return registry;
  }

  register(extension: string, extractor: DocumentExtractor): this {
    this.byExtension.set(extension.toLowerCase(), extractor);
    this.portable = false;
    return this;
  }

  forFile(filePath: string): DocumentExtractor {
    return this.byExtension.get(path.extname(filePath).toLowerCase()) ?? this.fallback;
  }

  isOffloaded(filePath: string): boolean {
    return this.forFile(filePath).offloaded;
  }
}

function pageExtra(page: ExtractedPage, totalPages: number): Record<string, unknown> {
  const extra: Record<string, unknown> = { page_number: page.pageNumber, total_pages: totalPages };
  if (page.image) {
    extra.page_image = page.image;
    extra.width = page.width;
    extra.height = page.height;
  }
  return extra;
}

/**
 * Extract one file into Documents: one per page for paged formats, otherwise one.
 */
export async function extractDocuments(registry: ExtractorRegistry, filePath: string): Promise<Document[]> {
  const extractor = registry.forFile(filePath);
  const extracted = await extractor.extract(filePath);
  const metadata = {
    source: filePath,
    filename: path.basename(filePath),
    file_type: path.extname(filePath).toLowerCase(),
    extractor: extracted.extractor,
  };

  if (extracted.pages) {
    const pages = extracted.pages;
    if (pages.length === 0) {
      throw new FileError(`No pages extracted from ${filePath}`);
    }
    return pages.map((page) => createDocument(page.text, { ...metadata, extra: pageExtra(page, pages.length) }));
  }

  if (extracted.text.trim().length === 0 && !extracted.pageImage) {
    throw new FileError(`No text extracted from ${filePath}`);
  }
  return [
    createDocument(extracted.text, {
      ...metadata,
      extra: extracted.pageImage ? { page_image: extracted.pageImage } : {},
    }),
  ];
}

export interface ExtractionTask {
  filePath: string;
  relativePath: string;
}

/**
 * Run one task to an outcome. Never rejects: failures become `failed` outcomes.
 */
export async function runExtractionTask(registry: ExtractorRegistry, task: ExtractionTask): Promise<IngestionOutcome> {
  try {
    const documents = await extractDocuments(registry, task.filePath);
    return { documents, relativePath: task.relativePath, error: null, status: 'success' };
  } catch (error) {
    return { documents: [], relativePath: task.relativePath, error: errorMessage(error), status: 'failed' };
  }
}
