import { Command } from 'commander';
import { createInterface } from 'readline';
import type { RagPipeline } from '../../services/pipeline.js';
import { formatValidationError, parsePositiveInt } from '../utils/validation.js';
import { openPipeline } from '../utils/runtime.js';
import { displayOutcome, runQuery } from './query.js';
import { displayStats } from './stats.js';

export function createInteractiveCommand(): Command {
  return new Command('interactive')
    .description('Ask questions in a loop against the current index')
    .option('-k, --top-k <number>', 'Number of results per question', parsePositiveInt)
    .action(async (options: { topK?: number }, command: Command) => {
      let pipeline: RagPipeline | undefined;
      try {
        pipeline = await openPipeline(command);
        await runLoop(pipeline, options.topK);
      } catch (error) {
        console.error(formatValidationError(error));
        process.exitCode = 1;
      } finally {
        await pipeline?.close();
      }
    });
}

async function runLoop(pipeline: RagPipeline, topK?: number): Promise<void> {
  console.log('💬 ragline interactive mode');
  console.log(`   ${pipeline.store.size} chunks indexed. Type "stats" for details, "exit" to quit.\n`);

  const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: 'ragline> ' });
  rl.prompt();

  for await (const line of rl) {
    const input = line.trim();
    if (input === 'exit' || input === 'quit') {
      break;
    }

    if (input === 'stats') {
      displayStats(await pipeline.stats());
    } else if (input.length > 0) {
      try {
        displayOutcome(await runQuery(pipeline, input, { topK }), false);
      } catch (error) {
        // one bad question should not end the session
        console.error(formatValidationError(error));
      }
    }
    rl.prompt();
  }

  rl.close();
  console.log('👋 Bye');
}
