import { Command } from 'commander';
import type { StoreStats } from '../../types/search.js';
import type { RagPipeline } from '../../services/pipeline.js';
import { formatValidationError } from '../utils/validation.js';
import { openPipeline } from '../utils/runtime.js';

export function createStatsCommand(): Command {
  return new Command('stats')
    .description('Show vector index statistics')
    .action(async (_options: object, command: Command) => {
      let pipeline: RagPipeline | undefined;
      try {
        pipeline = await openPipeline(command);
        console.log(`🗄️  Backend: ${pipeline.store.backend}`);
        displayStats(await pipeline.stats());
      } catch (error) {
        console.error(formatValidationError(error));
        process.exitCode = 1;
      } finally {
        await pipeline?.close();
      }
    });
}

export function displayStats(stats: StoreStats): void {
  console.log(`📊 Chunks: ${stats.numChunks}`);
  console.log(`📐 Dimension: ${stats.dimension ?? 'not set'}`);
  console.log(`🔢 Index entries: ${stats.indexSize}`);
  console.log(`📄 Sources (${stats.sources.length}):`);
  for (const source of stats.sources) {
    console.log(`   • ${source}`);
  }
}
