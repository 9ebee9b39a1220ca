import { existsSync, promises as fs } from 'fs';
import path from 'path';
import os from 'os';
import dotenv from 'dotenv';
import { type AppConfig, AppConfigSchema, defaultConfig } from '../types/config.js';
import { ValidationError, FileError } from './errors.js';
import { createLogger } from './logger.js';

const log = createLogger('config');

type RawConfig = Record<string, unknown>;

export interface ConfigManagerOptions {
  env?: NodeJS.ProcessEnv;
  /** Read `.env` from the working directory before applying overrides. */
  loadDotenv?: boolean;
}

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseBoolean(value: string): boolean {
  return ['true', '1', 'yes'].includes(value.trim().toLowerCase());
}

export class ConfigManager {
  private configPath: string;
  private configDir: string;
  private env: NodeJS.ProcessEnv;
  private loadDotenv: boolean;

  constructor(customPath?: string, options: ConfigManagerOptions = {}) {
    if (customPath) {
      this.configPath = path.resolve(customPath);
      this.configDir = path.dirname(this.configPath);
    } else {
      this.configDir = path.join(os.homedir(), '.ragline');
      this.configPath = path.join(this.configDir, 'config.json');
    }
    this.env = options.env ?? process.env;
    this.loadDotenv = options.loadDotenv ?? options.env === undefined;
  }

  exists(): boolean {
    return existsSync(this.configPath);
  }

  /**
   * Load configuration: file (or defaults), then environment overrides, then schema validation.
   */
  async load(): Promise<AppConfig> {
    if (this.loadDotenv) {
      dotenv.config();
    }

    let raw: RawConfig = {};
    if (this.exists()) {
      raw = await this.readFile();
    } else {
      log.warn({ path: this.configPath }, 'Configuration file not found, using defaults');
    }

    const merged = this.mergeDeep(raw, this.envOverrides());
    const result = AppConfigSchema.safeParse(merged);
    if (!result.success) {
      throw new ValidationError(`Invalid configuration: ${result.error.message}`);
    }
    return result.data;
  }

  /**
   * Write a configuration file; fields left out take their defaults.
   */
  async save(config: Partial<AppConfig> = {}): Promise<void> {
    const result = AppConfigSchema.safeParse(this.mergeDeep(defaultConfig(), config));
    if (!result.success) {
      throw new ValidationError(`Invalid configuration: ${result.error.message}`);
    }

    try {
      await fs.mkdir(this.configDir, { recursive: true });
      await fs.writeFile(this.configPath, JSON.stringify(result.data, null, 2), 'utf-8');
    } catch (error) {
      throw new FileError(`Failed to save configuration: ${String(error)}`);
    }
  }

  getConfigPath(): string {
    return this.configPath;
  }

  private async readFile(): Promise<RawConfig> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      throw new FileError(`Failed to load configuration: ${String(error)}`);
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch {
      throw new ValidationError(`Configuration file contains invalid JSON: ${this.configPath}`);
    }
    if (!isRecord(data)) {
      throw new ValidationError('Configuration root must be an object');
    }
    return data;
  }

  /**
   * Environment variables that override file values
   */
  private envOverrides(): RawConfig {
    const env = this.env;
    const embedding: RawConfig = {};
    const reranker: RawConfig = {};
    const vectorStore: RawConfig = {};
    const qdrant: RawConfig = {};
    const chunking: RawConfig = {};

    if (env.EMBEDDING_API_URL) embedding.baseUrl = env.EMBEDDING_API_URL;
    if (env.EMBEDDING_API_KEY) embedding.apiKey = env.EMBEDDING_API_KEY;
    if (env.EMBEDDING_MODEL) embedding.model = env.EMBEDDING_MODEL;
    if (env.RERANKER_API_URL) reranker.url = env.RERANKER_API_URL;
    if (env.RERANKER_API_KEY) reranker.apiKey = env.RERANKER_API_KEY;
    if (env.RERANKER_ENABLED) reranker.enabled = parseBoolean(env.RERANKER_ENABLED);
    if (env.VECTOR_STORE_TYPE) vectorStore.type = env.VECTOR_STORE_TYPE;
    if (env.VECTOR_STORE_PATH) vectorStore.path = env.VECTOR_STORE_PATH;
    if (env.QDRANT_URL) qdrant.url = env.QDRANT_URL;
    if (env.QDRANT_API_KEY) qdrant.apiKey = env.QDRANT_API_KEY;
    if (env.QDRANT_COLLECTION_NAME) qdrant.collectionName = env.QDRANT_COLLECTION_NAME;
    if (env.CHUNKING_MODE) chunking.mode = env.CHUNKING_MODE;

    if (Object.keys(qdrant).length > 0) vectorStore.qdrant = qdrant;

    const overrides: RawConfig = {};
    if (Object.keys(embedding).length > 0) overrides.embedding = embedding;
    if (Object.keys(reranker).length > 0) overrides.reranker = reranker;
    if (Object.keys(vectorStore).length > 0) overrides.vectorStore = vectorStore;
    if (Object.keys(chunking).length > 0) overrides.chunking = chunking;
    return overrides;
  }

  private mergeDeep(target: RawConfig, source: RawConfig): RawConfig {
    const result: RawConfig = { ...target };

    for (const [key, value] of Object.entries(source)) {
      const current = result[key];
      if (isRecord(value) && isRecord(current)) {
        result[key] = this.mergeDeep(current, value);
      } else if (value !== undefined) {
        result[key] = value;
      }
    }

    return result;
  }
}
