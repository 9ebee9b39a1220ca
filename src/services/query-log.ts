import { existsSync, promises as fs } from 'fs';
import path from 'path';
import type { RankedResult, SearchResult } from '../types/search.js';
import { TextProcessor } from '../utils/text-processing.js';
import { FileError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('query-log');

export const QUERY_METADATA_FILE = 'query_metadata.json';
export const RAW_RESULTS_FILE = 'raw_retrieval.json';
export const RERANKED_RESULTS_FILE = 'reranked_results.json';

export interface SavedResult {
  content: string;
  score: number;
  chunk_id: number;
  metadata: Record<string, unknown>;
  rerank_score?: number | null;
  original_rank?: number;
  new_rank?: number;
}

export interface SavedQuery {
  directory: string;
  metadata?: unknown;
  raw?: unknown;
  reranked?: unknown;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local time as YYYYMMDD_HHMMSS */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

function isRanked(result: SearchResult | RankedResult): result is RankedResult {
  return 'originalRank' in result;
}

export function toSavedResult(result: SearchResult | RankedResult): SavedResult {
  const saved: SavedResult = {
    content: result.chunk.content,
    score: result.score,
    chunk_id: result.chunk.chunkId,
    metadata: { ...result.chunk.metadata },
  };
  if (isRanked(result)) {
    saved.rerank_score = result.rerankScore ?? null;
    saved.original_rank = result.originalRank;
    saved.new_rank = result.newRank;
  }
  return saved;
}

/**
 * Writes each query's raw and reranked results into its own timestamped folder.
 */
export class QueryResultSaver {
  private outputDir: string;
  private now: () => Date;

  constructor(outputDir: string, now: () => Date = () => new Date()) {
    this.outputDir = path.resolve(outputDir);
    this.now = now;
  }

  async save(
    query: string,
    rawResults: SearchResult[],
    rerankedResults: RankedResult[] | null,
    extra: Record<string, unknown> = {}
  ): Promise<string> {
    const timestamp = this.now();
    const directory = path.join(this.outputDir, `${formatTimestamp(timestamp)}_${TextProcessor.slugify(query)}`);
    const iso = timestamp.toISOString();

    const metadata = {
      query,
      timestamp: iso,
      raw_result_count: rawResults.length,
      reranked_result_count: rerankedResults ? rerankedResults.length : 0,
      reranker_used: rerankedResults !== null,
      ...extra,
    };

    try {
      await fs.mkdir(directory, { recursive: true });
      await this.writeJson(path.join(directory, QUERY_METADATA_FILE), metadata);
      await this.writeJson(path.join(directory, RAW_RESULTS_FILE), {
        query,
        timestamp: iso,
        result_count: rawResults.length,
        results: rawResults.map(toSavedResult),
      });
      if (rerankedResults) {
        await this.writeJson(path.join(directory, RERANKED_RESULTS_FILE), {
          query,
          timestamp: iso,
          result_count: rerankedResults.length,
          results: rerankedResults.map(toSavedResult),
        });
      }
    } catch (error) {
      throw new FileError(`Failed to save query results: ${String(error)}`);
    }

    log.info({ directory }, 'Saved query results');
    return directory;
  }

  async load(directory: string): Promise<SavedQuery> {
    const saved: SavedQuery = { directory };
    saved.metadata = await this.readJson(path.join(directory, QUERY_METADATA_FILE));
    saved.raw = await this.readJson(path.join(directory, RAW_RESULTS_FILE));
    saved.reranked = await this.readJson(path.join(directory, RERANKED_RESULTS_FILE));
    return saved;
  }

  /**
   * Saved query folders, newest first.
   */
  async list(): Promise<string[]> {
    if (!existsSync(this.outputDir)) {
      return [];
    }
    const entries = await fs.readdir(this.outputDir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort()
      .reverse()
      .map((name) => path.join(this.outputDir, name));
  }

  private async writeJson(filePath: string, data: unknown): Promise<void> {
    await fs.writeFile(filePath, JSON.stringify(data, null, 2), 'utf-8');
  }

  private async readJson(filePath: string): Promise<unknown> {
    if (!existsSync(filePath)) {
      return undefined;
    }
    try {
      const content: unknown = JSON.parse(await fs.readFile(filePath, 'utf-8'));
      return content;
    } catch (error) {
      throw new FileError(`Failed to read ${filePath}: ${String(error)}`);
    }
  }
}
