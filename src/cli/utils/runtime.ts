import type { Command } from 'commander';
import type { AppConfig } from '../../types/config.js';
import { ConfigManager } from '../../utils/config.js';
import { RagPipeline } from '../../services/pipeline.js';

export type GlobalOptions = {
  config?: string;
};

export function configManagerFor(command: Command): ConfigManager {
  const { config } = command.optsWithGlobals<GlobalOptions>();
  return new ConfigManager(config);
}

export async function loadConfig(command: Command): Promise<AppConfig> {
  return configManagerFor(command).load();
}

/**
 * Build the pipeline from configuration and restore any persisted index.
 */
export async function openPipeline(command: Command): Promise<RagPipeline> {
  return RagPipeline.create(await loadConfig(command));
}
