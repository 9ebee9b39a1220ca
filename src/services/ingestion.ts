import { promises as fs } from 'fs';
import path from 'path';
import pLimit from 'p-limit';
import type { ExecutionModeSetting, ExtractionConfig, IngestionConfig } from '../types/config.js';
import type { Document, IngestionOutcome } from '../types/document.js';
import {
  type ExtractionTask,
  ExtractorRegistry,
  extractDocuments,
  runExtractionTask,
} from './extraction.js';
import { ExtractionWorkerPool, WorkerStartError } from './worker-pool.js';
import { sleep } from '../providers/base.js';
import { FileError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('ingestion');

export const DEFAULT_WORKER_SCRIPT = new URL('./extract-worker.js', import.meta.url);

export type ExecutionMode = 'worker' | 'async' | 'sequential';

export type ProgressCallback = (
  completed: number,
  total: number,
  status: IngestionOutcome['status'],
  relativePath: string
) => void;

export interface LoadDirectoryOptions {
  extensions?: string[];
  recursive?: boolean;
  mode?: ExecutionModeSetting;
  maxWorkers?: number;
  /** Aborting stops new files from starting; running ones finish and report. */
  signal?: AbortSignal;
  onProgress?: ProgressCallback;
}

export interface IngestionReport {
  documents: Document[];
  /** One per eligible file: completion order in parallel modes, submission order otherwise */
  outcomes: IngestionOutcome[];
  failures: IngestionOutcome[];
  mode: ExecutionMode;
}

/**
 * Decide how to run a batch. Small batches run inline; batches with offloaded extraction
 * (waiting on another process or service) overlap on the event loop; the rest get threads.
 */
export function selectExecutionMode(
  fileCount: number,
  requested: ExecutionModeSetting,
  anyOffloaded: boolean,
  minFilesForParallel: number
): ExecutionMode {
  if (requested === 'sequential' || fileCount < minFilesForParallel) {
    return 'sequential';
  }
  if (requested !== 'auto') {
    return requested;
  }
  return anyOffloaded ? 'async' : 'worker';
}

class OutcomeCollector {
  readonly outcomes: IngestionOutcome[] = [];

  constructor(private total: number, private onProgress?: ProgressCallback) {}

  record(outcome: IngestionOutcome): void {
    this.outcomes.push(outcome);
    this.onProgress?.(this.outcomes.length, this.total, outcome.status, outcome.relativePath);
  }

  cancel(task: ExtractionTask): void {
    this.record({ documents: [], relativePath: task.relativePath, error: 'cancelled', status: 'cancelled' });
  }
}

/**
 * Enumerates files and extracts them into Documents with per-file error isolation.
 */
export class IngestionScheduler {
  private registry: ExtractorRegistry;
  private extraction: ExtractionConfig;
  private options: IngestionConfig;
  private workerScript: URL;

  constructor(
    registry: ExtractorRegistry,
    extraction: ExtractionConfig,
    options: IngestionConfig,
    workerScript: URL = DEFAULT_WORKER_SCRIPT
  ) {
    this.registry = registry;
    this.extraction = extraction;
    this.options = options;
    this.workerScript = workerScript;
  }

  /**
   * Files under `root` whose extension is in `extensions`, sorted by path.
   */
  async enumerateFiles(root: string, extensions: string[], recursive: boolean): Promise<string[]> {
    const wanted = new Set(extensions.map((ext) => ext.toLowerCase()));
    const files: string[] = [];

    const walk = async (dir: string): Promise<void> => {
      const entries = await fs.readdir(dir, { withFileTypes: true });
      for (const entry of entries) {
        const fullPath = path.join(dir, entry.name);
        if (entry.isDirectory()) {
          if (recursive) await walk(fullPath);
        } else if (entry.isFile() && wanted.has(path.extname(entry.name).toLowerCase())) {
          files.push(fullPath);
        }
      }
    };

    await walk(root);
    return files.sort();
  }

  /** Extract one file; paged formats give one Document per page. */
  async loadFile(filePath: string): Promise<Document[]> {
    const absolutePath = path.resolve(filePath);
    try {
      const stat = await fs.stat(absolutePath);
      if (!stat.isFile()) {
        throw new FileError(`Not a file: ${filePath}`);
      }
    } catch (error) {
      if (error instanceof FileError) throw error;
      throw new FileError(`File not found: ${filePath}`);
    }
    return extractDocuments(this.registry, absolutePath);
  }

  async loadDirectory(root: string, options: LoadDirectoryOptions = {}): Promise<IngestionReport> {
    const rootPath = path.resolve(root);
    try {
      const stat = await fs.stat(rootPath);
      if (!stat.isDirectory()) throw new FileError(`Not a directory: ${root}`);
    } catch (error) {
      if (error instanceof FileError) throw error;
      throw new FileError(`Directory not found: ${root}`);
    }

    const files = await this.enumerateFiles(
      rootPath,
      options.extensions ?? this.options.extensions,
      options.recursive ?? this.options.recursive
    );
    const tasks: ExtractionTask[] = files.map((filePath) => ({
      filePath,
      relativePath: path.relative(rootPath, filePath),
    }));

    const mode = selectExecutionMode(
      tasks.length,
      options.mode ?? this.options.mode,
      tasks.some((task) => this.registry.isOffloaded(task.filePath)),
      this.options.minFilesForParallel
    );
    const maxWorkers = options.maxWorkers ?? this.options.maxWorkers;
    log.info({ root: rootPath, files: tasks.length, mode, maxWorkers }, 'Starting ingestion');

    const collector = new OutcomeCollector(tasks.length, options.onProgress);
    let usedMode = mode;
    switch (mode) {
      case 'sequential':
        await this.runSequential(tasks, collector, options.signal);
        break;
      case 'async':
        await this.runAsync(tasks, collector, maxWorkers, options.signal);
        break;
      case 'worker':
        usedMode = await this.runWorkers(tasks, collector, maxWorkers, options.signal);
        break;
    }

    const outcomes = collector.outcomes;
    const documents = outcomes.flatMap((outcome) => outcome.documents);
    const failures = outcomes.filter((outcome) => outcome.status === 'failed');
    log.info({ documents: documents.length, failed: failures.length, mode: usedMode }, 'Ingestion finished');

    return { documents, outcomes, failures, mode: usedMode };
  }

  private async runSequential(tasks: ExtractionTask[], collector: OutcomeCollector, signal?: AbortSignal): Promise<void> {
    for (const task of tasks) {
      if (signal?.aborted) {
        collector.cancel(task);
        continue;
      }
      collector.record(await runExtractionTask(this.registry, task));
    }
  }

  private async runAsync(
    tasks: ExtractionTask[],
    collector: OutcomeCollector,
    concurrency: number,
    signal?: AbortSignal
  ): Promise<void> {
    const limit = pLimit(Math.max(1, concurrency));
    const stagger = this.options.submissionStaggerMs;
    const pending: Promise<void>[] = [];

    for (const [index, task] of tasks.entries()) {
      if (index > 0 && stagger > 0 && !signal?.aborted) {
        await sleep(stagger);
      }
      pending.push(
        limit(async () => {
          if (signal?.aborted) {
            collector.cancel(task);
            return;
          }
          collector.record(await runExtractionTask(this.registry, task));
        })
      );
    }

    await Promise.all(pending);
  }

  /**
   * Thread pool run. Anything the pool could not take (it failed to start, or every
   * thread died) runs sequentially instead.
   */
  private async runWorkers(
    tasks: ExtractionTask[],
    collector: OutcomeCollector,
    size: number,
    signal?: AbortSignal
  ): Promise<ExecutionMode> {
    if (!this.registry.transferable) {
      log.warn('Custom extractors cannot be rebuilt in a worker thread, running sequentially');
      await this.runSequential(tasks, collector, signal);
      return 'sequential';
    }

    const pool = new ExtractionWorkerPool(this.workerScript, size, { extraction: this.extraction });
    let leftover: ExtractionTask[];
    try {
      leftover = await pool.run(tasks, (outcome) => collector.record(outcome), signal);
    } catch (error) {
      if (!(error instanceof WorkerStartError)) throw error;
      log.warn({ err: errorMessage(error) }, 'Worker pool unavailable, running sequentially');
      await this.runSequential(tasks, collector, signal);
      return 'sequential';
    }

    if (leftover.length > 0) {
      if (!signal?.aborted) {
        log.warn({ remaining: leftover.length }, 'Worker pool stopped early, finishing sequentially');
      }
      await this.runSequential(leftover, collector, signal);
    }
    return 'worker';
  }
}
