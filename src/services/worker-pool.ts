import { Worker } from 'worker_threads';
import { existsSync } from 'fs';
import { fileURLToPath } from 'url';
import type { ExtractionConfig } from '../types/config.js';
import type { IngestionOutcome } from '../types/document.js';
import type { ExtractionTask } from './extraction.js';
import { RagError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('worker-pool');

export class WorkerStartError extends RagError {
  constructor(message: string) {
    super(message, 'WORKER_START_FAILED');
    this.name = 'WorkerStartError';
  }
}

export interface ExtractWorkerData {
  extraction: ExtractionConfig;
}

export type WorkerRequest = { type: 'task'; task: ExtractionTask } | { type: 'shutdown' };

export type WorkerReply = { type: 'ready' } | { type: 'outcome'; outcome: IngestionOutcome };

function isWorkerReply(value: unknown): value is WorkerReply {
  if (typeof value !== 'object' || value === null || !('type' in value)) return false;
  if (value.type === 'ready') return true;
  return value.type === 'outcome' && 'outcome' in value && typeof value.outcome === 'object' && value.outcome !== null;
}

/**
 * Fixed-size pool of extraction threads. Each thread takes one task at a time; results are
 * reported in completion order.
 */
export class ExtractionWorkerPool {
  private script: URL;
  private size: number;
  private workerData: ExtractWorkerData;

  constructor(script: URL, size: number, workerData: ExtractWorkerData) {
    this.script = script;
    this.size = Math.max(1, size);
    this.workerData = workerData;
  }

  /**
   * Resolves with the tasks that were never dispatched: left over after cancellation,
   * or after every thread died.
   */
  run(
    tasks: ExtractionTask[],
    onOutcome: (outcome: IngestionOutcome) => void,
    signal?: AbortSignal
  ): Promise<ExtractionTask[]> {
    if (tasks.length === 0) {
      return Promise.resolve([]);
    }
    if (!existsSync(fileURLToPath(this.script))) {
      return Promise.reject(new WorkerStartError(`Worker script not found: ${this.script.href}`));
    }

    return new Promise((resolve, reject) => {
      const queue = [...tasks];
      const inFlight = new Map<Worker, ExtractionTask>();
      let alive = 0;
      let ready = 0;

      const dispatch = (worker: Worker): void => {
        const task = signal?.aborted ? undefined : queue.shift();
        if (!task) {
          const shutdown: WorkerRequest = { type: 'shutdown' };
          worker.postMessage(shutdown);
          return;
        }
        inFlight.set(worker, task);
        const request: WorkerRequest = { type: 'task', task };
        worker.postMessage(request);
      };

      const count = Math.min(this.size, tasks.length);
      for (let i = 0; i < count; i++) {
        let worker: Worker;
        try {
          worker = new Worker(this.script, { workerData: this.workerData });
        } catch (error) {
          if (alive === 0) {
            reject(new WorkerStartError(`Failed to start worker: ${errorMessage(error)}`));
            return;
          }
          log.warn({ err: errorMessage(error) }, 'Failed to start an extra worker');
          break;
        }
        alive++;

        worker.on('message', (message: unknown) => {
          if (!isWorkerReply(message)) {
            log.warn('Ignoring malformed worker message');
            return;
          }
          if (message.type === 'ready') {
            ready++;
          } else {
            inFlight.delete(worker);
            onOutcome(message.outcome);
          }
          dispatch(worker);
        });

        worker.on('error', (error) => {
          const task = inFlight.get(worker);
          inFlight.delete(worker);
          log.warn({ err: error.message, file: task?.relativePath }, 'Worker failed');
          if (task) {
            onOutcome({ documents: [], relativePath: task.relativePath, error: error.message, status: 'failed' });
          }
        });

        worker.on('exit', (code) => {
          const task = inFlight.get(worker);
          if (task) {
            inFlight.delete(worker);
            onOutcome({
              documents: [],
              relativePath: task.relativePath,
              error: `Worker exited with code ${code}`,
              status: 'failed',
            });
          }
          alive--;
          if (alive === 0) {
            if (ready === 0) {
              log.warn('No extraction worker started');
            }
            resolve(queue);
          }
        });
      }
    });
  }
}
