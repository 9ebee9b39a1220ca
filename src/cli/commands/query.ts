import { Command } from 'commander';
import type { RankedResult } from '../../types/search.js';
import type { QueryOutcome, RagPipeline } from '../../services/pipeline.js';
import { TextProcessor } from '../../utils/text-processing.js';
import { ProgressIndicator, formatDuration } from '../utils/progress.js';
import { formatValidationError, parsePositiveInt, validateQueryString } from '../utils/validation.js';
import { openPipeline } from '../utils/runtime.js';

interface QueryOptions {
  topK?: number;
  contextOnly?: boolean;
  verbose?: boolean;
  save?: boolean;
}

const PREVIEW_LENGTH = 300;

export function createQueryCommand(): Command {
  return new Command('query')
    .description('Retrieve the chunks most relevant to a question')
    .argument('<question>', 'Question or search text')
    .option('-k, --top-k <number>', 'Number of results to return', parsePositiveInt)
    .option('--context-only', 'Print only the assembled context block')
    .option('-v, --verbose', 'Show full chunk content and metadata')
    .option('-s, --save', 'Write the results to the query log directory')
    .action(async (question: string, options: QueryOptions, command: Command) => {
      let pipeline: RagPipeline | undefined;
      try {
        validateQueryString(question);
        pipeline = await openPipeline(command);
        const outcome = await runQuery(pipeline, question, options);
        if (options.contextOnly) {
          console.log(outcome.context);
        } else {
          displayOutcome(outcome, options.verbose === true);
        }
      } catch (error) {
        console.error(formatValidationError(error));
        process.exitCode = 1;
      } finally {
        await pipeline?.close();
      }
    });
}

export async function runQuery(pipeline: RagPipeline, question: string, options: QueryOptions): Promise<QueryOutcome> {
  if (options.contextOnly) {
    return pipeline.query(question, { topK: options.topK, save: options.save });
  }

  const progress = new ProgressIndicator('Searching...');
  progress.start();
  try {
    const outcome = await pipeline.query(question, { topK: options.topK, save: options.save });
    progress.stop();
    return outcome;
  } catch (error) {
    progress.fail('Search failed');
    throw error;
  }
}

function rankChange(result: RankedResult): string {
  const delta = result.originalRank - result.newRank;
  if (delta > 0) return `↑${delta}`;
  if (delta < 0) return `↓${-delta}`;
  return '=';
}

export function displayOutcome(outcome: QueryOutcome, verbose: boolean): void {
  console.log(`\n🔍 Query: "${outcome.query}"`);

  if (outcome.results.length === 0) {
    console.log('❌ No results found.');
    return;
  }

  const label = outcome.reranked ? 'reranked' : 'vector search';
  console.log(`✅ ${outcome.results.length} results in ${formatDuration(outcome.executionTime)} (${label})\n`);

  for (const result of outcome.results) {
    const { chunk } = result;
    let header = `[${result.newRank}] score ${result.score.toFixed(4)}`;
    if (result.rerankScore !== undefined) {
      header += ` | rerank ${result.rerankScore.toFixed(4)} | was #${result.originalRank} (${rankChange(result)})`;
    }
    console.log(header);
    console.log(`    📄 ${chunk.metadata.source ?? 'Unknown'} (chunk ${chunk.metadata.chunk_index + 1}/${chunk.metadata.total_chunks})`);

    const content = verbose ? chunk.content : TextProcessor.truncate(chunk.content.replace(/\s+/g, ' '), PREVIEW_LENGTH);
    console.log(`    ${content}`);

    if (verbose) {
      const { extra, ...metadata } = chunk.metadata;
      console.log(`    🏷️  ${JSON.stringify({ ...metadata, extra: Object.keys(extra) })}`);
    }
    console.log('');
  }

  if (outcome.savedTo) {
    console.log(`💾 Results saved to ${outcome.savedTo}`);
  }
}
