import { createRequire } from 'module';
import { promises as fs } from 'fs';
import path from 'path';
import { pathToFileURL } from 'url';
import type { PdfConfig } from '../types/config.js';
import type { ExtractedContent, ExtractedPage } from '../types/document.js';
import type { DocumentExtractor } from '../types/provider.js';
import { FileError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('pdf');

export interface RenderedPage {
  /** data: URL of a PNG */
  dataUrl: string;
  width: number;
  height: number;
}

/** An open PDF. Pages are numbered from 1. */
export interface PdfSource {
  readonly numPages: number;
  pageText(pageNumber: number): Promise<string>;
  renderPage(pageNumber: number, scale: number): Promise<RenderedPage>;
  close(): Promise<void>;
}

export type PdfOpener = (data: Uint8Array) => Promise<PdfSource>;

type PdfJs = typeof import('pdfjs-dist/legacy/build/pdf.mjs');

let pdfjs: Promise<PdfJs> | null = null;

function loadPdfJs(): Promise<PdfJs> {
  if (!pdfjs) {
    pdfjs = import('pdfjs-dist/legacy/build/pdf.mjs').then(
      (lib) => {
        const require = createRequire(import.meta.url);
        lib.GlobalWorkerOptions.workerSrc = pathToFileURL(require.resolve('pdfjs-dist/legacy/build/pdf.worker.mjs')).href;
        return lib;
      },
      (error: unknown) => {
        pdfjs = null;
        throw error;
      }
    );
  }
  return pdfjs;
}

/**
 * Open a PDF with pdfjs-dist. Pages render onto an @napi-rs/canvas surface.
 */
export const openWithPdfjs: PdfOpener = async (data) => {
  const lib = await loadPdfJs();
  const document = await lib.getDocument({ data, isEvalSupported: false, verbosity: 0 }).promise;

  return {
    numPages: document.numPages,

    async pageText(pageNumber) {
      const page = await document.getPage(pageNumber);
      const content = await page.getTextContent();
      let text = '';
      for (const item of content.items) {
        if ('str' in item) {
          text += item.str + (item.hasEOL ? '\n' : ' ');
        }
      }
      return text.replace(/[ \t]+/g, ' ').replace(/ *\n */g, '\n').trim();
    },

    async renderPage(pageNumber, scale) {
      const { createCanvas } = await import('@napi-rs/canvas');
      const page = await document.getPage(pageNumber);
      const viewport = page.getViewport({ scale });
      const width = Math.ceil(viewport.width);
      const height = Math.ceil(viewport.height);
      const canvas = createCanvas(width, height);
      await page.render({ canvasContext: canvas.getContext('2d'), viewport }).promise;
      const png = await canvas.encode('png');
      return { dataUrl: `data:image/png;base64,${png.toString('base64')}`, width, height };
    },

    close: () => document.destroy(),
  };
};

/**
 * One page per extracted section, headed `Page <n> from <file>`. Depending on the mode a page
 * carries its text, its rendered image, or both; a page that fails to render keeps its text.
 */
export class PdfExtractor implements DocumentExtractor {
  readonly name = 'pdf';
  readonly offloaded = false;
  private options: PdfConfig;
  private open: PdfOpener;

  constructor(options: PdfConfig, open: PdfOpener = openWithPdfjs) {
    this.options = options;
    this.open = open;
  }

  async extract(filePath: string): Promise<ExtractedContent> {
    let data: Buffer;
    try {
      data = await fs.readFile(filePath);
    } catch (error) {
      throw new FileError(`Failed to read ${filePath}: ${String(error)}`);
    }

    let source: PdfSource;
    try {
      source = await this.open(new Uint8Array(data));
    } catch (error) {
      throw new FileError(`Failed to parse ${filePath}: ${errorMessage(error)}`);
    }

    const filename = path.basename(filePath);
    try {
      const pages: ExtractedPage[] = [];
      for (let pageNumber = 1; pageNumber <= source.numPages; pageNumber++) {
        pages.push(await this.extractPage(source, pageNumber, filename));
      }
      log.debug({ file: filename, pages: pages.length, mode: this.options.mode }, 'Extracted PDF');
      return { text: pages.map((page) => page.text).join('\n\n'), extractor: this.name, pages };
    } catch (error) {
      throw new FileError(`Failed to extract ${filePath}: ${errorMessage(error)}`);
    } finally {
      await source.close();
    }
  }

  private async extractPage(source: PdfSource, pageNumber: number, filename: string): Promise<ExtractedPage> {
    const header = `Page ${pageNumber} from ${filename}`;
    const body = this.options.mode === 'image-only' ? '' : (await source.pageText(pageNumber)).trim();
    const page: ExtractedPage = { pageNumber, text: body ? `${header}\n\n${body}` : header };
    if (this.options.mode === 'text-only') {
      return page;
    }

    try {
      const rendered = await source.renderPage(pageNumber, this.options.imageScale);
      return { ...page, image: rendered.dataUrl, width: rendered.width, height: rendered.height };
    } catch (error) {
      log.warn({ file: filename, page: pageNumber, err: errorMessage(error) }, 'Could not render page image');
      return page;
    }
  }
}
