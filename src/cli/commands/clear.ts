import { Command } from 'commander';
import type { RagPipeline } from '../../services/pipeline.js';
import { promptConfirm } from '../utils/input.js';
import { formatValidationError } from '../utils/validation.js';
import { openPipeline } from '../utils/runtime.js';

export function createClearCommand(): Command {
  return new Command('clear')
    .description('Delete every indexed chunk and the persisted snapshot')
    .option('-y, --yes', 'Skip the confirmation prompt')
    .action(async (options: { yes?: boolean }, command: Command) => {
      let pipeline: RagPipeline | undefined;
      try {
        pipeline = await openPipeline(command);
        const count = pipeline.store.size;

        if (!options.yes) {
          const confirmed = await promptConfirm(`Delete all ${count} chunks from the ${pipeline.store.backend} index?`, false);
          if (!confirmed) {
            console.log('Nothing deleted.');
            return;
          }
        }

        await pipeline.clear();
        console.log(`🗑️  Cleared ${count} chunks`);
      } catch (error) {
        console.error(formatValidationError(error));
        process.exitCode = 1;
      } finally {
        await pipeline?.close();
      }
    });
}
