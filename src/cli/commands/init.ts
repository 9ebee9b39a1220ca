import { Command } from 'commander';
import { promptConfirm } from '../utils/input.js';
import { ProgressIndicator } from '../utils/progress.js';
import { formatValidationError } from '../utils/validation.js';
import { configManagerFor } from '../utils/runtime.js';

export function createInitCommand(): Command {
  return new Command('init')
    .description('Write a configuration file with default settings')
    .option('--force', 'Overwrite existing configuration')
    .action(async (options: { force?: boolean }, command: Command) => {
      try {
        await initializeConfiguration(command, options.force === true);
      } catch (error) {
        console.error(formatValidationError(error));
        process.exitCode = 1;
      }
    });
}

async function initializeConfiguration(command: Command, force: boolean): Promise<void> {
  console.log('🚀 ragline configuration setup');
  console.log('');

  const configManager = configManagerFor(command);

  if (configManager.exists() && !force) {
    const overwrite = await promptConfirm(
      `Configuration already exists at ${configManager.getConfigPath()}. Overwrite it?`,
      false
    );

    if (!overwrite) {
      console.log('Configuration setup cancelled.');
      return;
    }
  }

  const progress = new ProgressIndicator('Saving configuration...');
  progress.start();

  try {
    await configManager.save();
    progress.stop(`Configuration saved to ${configManager.getConfigPath()}`);
  } catch (error) {
    progress.fail('Failed to save configuration');
    throw error;
  }

  console.log('');
  console.log('Next steps:');
  console.log('  1. Point embedding.baseUrl at your embedding service (or set EMBEDDING_API_URL)');
  console.log('  2. Add documents: ragline ingest --directory <path>');
  console.log('  3. Ask a question: ragline query "<question>"');
  console.log('');
}
