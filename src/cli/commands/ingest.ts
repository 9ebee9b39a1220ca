import { Command } from 'commander';
import type { ExecutionModeSetting } from '../../types/config.js';
import type { IngestSummary, RagPipeline } from '../../services/pipeline.js';
import { ValidationError } from '../../utils/errors.js';
import { ProgressBar, ProgressIndicator, formatDuration } from '../utils/progress.js';
import { formatValidationError, parseExecutionMode, parseExtensions, parsePositiveInt } from '../utils/validation.js';
import { openPipeline } from '../utils/runtime.js';

interface IngestOptions {
  file?: string;
  directory?: string;
  text?: string;
  extensions?: string[];
  recursive: boolean;
  mode?: ExecutionModeSetting;
  workers?: number;
}

const STATUS_ICON = { success: '✅', failed: '❌', cancelled: '⏹ ' } as const;

export function createIngestCommand(): Command {
  return new Command('ingest')
    .description('Extract, chunk, embed and index documents')
    .option('-f, --file <path>', 'Ingest a single file')
    .option('-d, --directory <path>', 'Ingest every matching file in a directory')
    .option('-t, --text <text>', 'Ingest a literal text snippet')
    .option('-e, --extensions <list>', 'Comma-separated file extensions for --directory', parseExtensions)
    .option('--no-recursive', 'Do not descend into subdirectories')
    .option('-m, --mode <mode>', 'Execution mode: auto, worker, async or sequential', parseExecutionMode)
    .option('-w, --workers <number>', 'Maximum parallel extractions', parsePositiveInt)
    .action(async (options: IngestOptions, command: Command) => {
      let pipeline: RagPipeline | undefined;
      try {
        const sources = [options.file, options.directory, options.text].filter((value) => value !== undefined);
        if (sources.length !== 1) {
          throw new ValidationError('Specify exactly one of --file, --directory or --text');
        }

        pipeline = await openPipeline(command);
        const startTime = Date.now();
        const summary = await runIngest(pipeline, options);
        printSummary(summary, Date.now() - startTime, pipeline.store.size);
      } catch (error) {
        console.error(formatValidationError(error));
        process.exitCode = 1;
      } finally {
        await pipeline?.close();
      }
    });
}

async function runIngest(pipeline: RagPipeline, options: IngestOptions): Promise<IngestSummary> {
  if (options.directory !== undefined) {
    return ingestDirectory(pipeline, options.directory, options);
  }

  const progress = new ProgressIndicator(options.file !== undefined ? `Ingesting ${options.file}...` : 'Ingesting text...');
  progress.start();
  try {
    const summary =
      options.file !== undefined ? await pipeline.ingestFile(options.file) : await pipeline.ingestText(options.text ?? '');
    progress.stop('Indexed');
    return summary;
  } catch (error) {
    progress.fail('Ingestion failed');
    throw error;
  }
}

async function ingestDirectory(pipeline: RagPipeline, directory: string, options: IngestOptions): Promise<IngestSummary> {
  console.log(`📂 Ingesting ${directory}`);

  // First Ctrl+C stops new files from starting; running ones finish and are reported.
  const controller = new AbortController();
  const onInterrupt = (): void => {
    console.log('\n⚠️  Interrupted, waiting for in-flight files...');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  let bar: ProgressBar | undefined;
  try {
    return await pipeline.ingestDirectory(directory, {
      extensions: options.extensions,
      recursive: options.recursive ? undefined : false,
      mode: options.mode,
      maxWorkers: options.workers,
      signal: controller.signal,
      onProgress: (completed, total, status, relativePath) => {
        bar ??= new ProgressBar(total);
        bar.update(completed, `${STATUS_ICON[status]} ${relativePath}`);
      },
    });
  } finally {
    bar?.finish();
    process.removeListener('SIGINT', onInterrupt);
  }
}

function printSummary(summary: IngestSummary, elapsedMs: number, indexSize: number): void {
  const attempted = summary.documents + summary.failures.length + summary.cancelled;
  console.log('');
  if (summary.mode !== null) {
    console.log(`✅ Processed ${summary.documents}/${attempted} files (${summary.mode} mode) in ${formatDuration(elapsedMs)}`);
  } else {
    console.log(`✅ Processed ${summary.documents} document in ${formatDuration(elapsedMs)}`);
  }

  if (summary.failures.length > 0) {
    console.log(`❌ Failed: ${summary.failures.length}`);
    for (const failure of summary.failures) {
      console.log(`   • ${failure.relativePath}: ${failure.error ?? 'unknown error'}`);
    }
  }
  if (summary.cancelled > 0) {
    console.log(`⏹  Cancelled: ${summary.cancelled}`);
  }

  console.log(`📦 Chunks: ${summary.chunks} (added ${summary.added}, duplicates skipped ${summary.duplicates})`);
  console.log(`📊 Index now holds ${indexSize} chunks`);
}
