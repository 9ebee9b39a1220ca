import { parentPort, workerData } from 'worker_threads';
import { AppConfigSchema } from '../types/config.js';
import { ExtractorRegistry, runExtractionTask } from './extraction.js';
import type { WorkerReply } from './worker-pool.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('extract-worker');

if (!parentPort) {
  throw new Error('extract-worker must run inside a worker thread');
}
const port = parentPort;

const data: unknown = workerData;
const extraction = AppConfigSchema.shape.extraction.parse(
  typeof data === 'object' && data !== null && 'extraction' in data ? data.extraction : undefined
);
const registry = ExtractorRegistry.fromConfig(extraction);

function isTaskRequest(value: unknown): value is { type: 'task'; task: { filePath: string; relativePath: string } } {
  if (typeof value !== 'object' || value === null || !('type' in value) || value.type !== 'task') return false;
  if (!('task' in value) || typeof value.task !== 'object' || value.task === null) return false;
  const task = value.task;
  return (
    'filePath' in task && typeof task.filePath === 'string' &&
    'relativePath' in task && typeof task.relativePath === 'string'
  );
}

port.on('message', (message: unknown) => {
  if (isTaskRequest(message)) {
    void runExtractionTask(registry, message.task)
      .then((outcome) => {
        const reply: WorkerReply = { type: 'outcome', outcome };
        port.postMessage(reply);
      })
      .catch((error: unknown) => {
        log.error({ err: error }, 'Failed to report outcome');
        process.exit(1);
      });
    return;
  }
  port.close();
});

const ready: WorkerReply = { type: 'ready' };
port.postMessage(ready);
