#!/usr/bin/env node
import { Command, CommanderError } from 'commander';
import { createInitCommand } from './commands/init.js';
import { createIngestCommand } from './commands/ingest.js';
import { createQueryCommand } from './commands/query.js';
import { createInteractiveCommand } from './commands/interactive.js';
import { createStatsCommand } from './commands/stats.js';
import { createClearCommand } from './commands/clear.js';

const program = new Command();

program
  .name('ragline')
  .description('Document ingestion and retrieval for retrieval-augmented generation')
  .version('0.1.0')
  .option('-c, --config <path>', 'Path to configuration file');

program.addCommand(createInitCommand());
program.addCommand(createIngestCommand());
program.addCommand(createQueryCommand());
program.addCommand(createInteractiveCommand());
program.addCommand(createStatsCommand());
program.addCommand(createClearCommand());

// Error handling
program.exitOverride();

try {
  await program.parseAsync();
} catch (error) {
  if (error instanceof CommanderError) {
    process.exit(error.exitCode);
  }
  console.error('❌ Command failed:', String(error));
  process.exit(1);
}
