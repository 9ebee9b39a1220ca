import Database from 'better-sqlite3';
import * as sqliteVec from 'sqlite-vec';
import { existsSync, promises as fs } from 'fs';
import path from 'path';
import type { Chunk } from '../types/document.js';
import type { AddResult, SearchResult, StoreStats } from '../types/search.js';
import type { EmbeddingService } from '../services/embedding.js';
import { ChunkLedger, PersistedIndexSchema } from './chunk-ledger.js';
import { type VectorStore, distanceToScore } from './types.js';
import { SchemaMismatchError, StoreError, ValidationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('sqlite-vec-store');

export const INDEX_FILE = 'index.sqlite';
export const METADATA_FILE = 'metadata.json';

interface NeighbourRow {
  rowid: number;
  distance: number;
}

function toBlob(vector: number[]): Buffer {
  const floats = new Float32Array(vector);
  return Buffer.from(floats.buffer, floats.byteOffset, floats.byteLength);
}

/**
 * In-process index: an in-memory SQLite database with a sqlite-vec `vec0` table (L2 distance).
 * A snapshot is the serialized database plus a JSON document of chunk records.
 */
export class SqliteVecStore implements VectorStore {
  readonly backend = 'sqlite';
  private db: Database.Database;
  private ledger = new ChunkLedger();
  private embedding: EmbeddingService;
  private directory: string;
  private synced: Promise<void> | null = null;

  constructor(embedding: EmbeddingService, directory: string) {
    this.embedding = embedding;
    this.directory = path.resolve(directory);
    this.db = this.openDatabase();
  }

  get size(): number {
    return this.ledger.size;
  }

  async add(chunks: Chunk[]): Promise<AddResult> {
    await this.sync();
    const { fresh, duplicates } = this.ledger.partition(chunks);
    if (duplicates > 0) {
      log.info({ duplicates }, 'Skipped duplicate chunks');
    }
    if (fresh.length === 0) {
      return { added: 0, duplicates };
    }

    const vectors = await this.embedding.embedChunks(fresh);
    const dimension = this.ledger.checkDimension(vectors);
    const ids = this.ledger.peekIds(fresh.length);

    try {
      this.ensureTable(dimension);
      const insert = this.db.prepare<[bigint, Buffer]>('INSERT INTO chunk_vectors(rowid, embedding) VALUES (?, ?)');
      const insertAll = this.db.transaction((rows: Array<[number, number[]]>) => {
        for (const [id, vector] of rows) {
          insert.run(BigInt(id), toBlob(vector));
        }
      });
      insertAll(ids.map((id, i): [number, number[]] => [id, vectors[i]]));
    } catch (error) {
      throw new StoreError(`Failed to insert vectors: ${String(error)}`, this.backend);
    }

    this.ledger.commit(fresh, dimension);
    log.info({ added: fresh.length, total: this.ledger.size }, 'Added chunks');
    return { added: fresh.length, duplicates };
  }

  async search(query: string, topK: number): Promise<SearchResult[]> {
    if (!Number.isInteger(topK) || topK < 1) {
      throw new ValidationError('top_k must be a positive integer');
    }
    await this.sync();
    if (this.ledger.size === 0) {
      return [];
    }

    const vector = await this.embedding.embedQuery(query);
    if (vector.length !== this.ledger.dimension) {
      throw new SchemaMismatchError(
        `Query embedding dimension ${vector.length} does not match index dimension ${this.ledger.dimension}`
      );
    }

    let rows: NeighbourRow[];
    try {
      rows = this.db
        .prepare<[Buffer, bigint], NeighbourRow>(
          'SELECT rowid, distance FROM chunk_vectors WHERE embedding MATCH ? AND k = ? ORDER BY distance'
        )
        .all(toBlob(vector), BigInt(Math.min(topK, this.ledger.size)));
    } catch (error) {
      throw new StoreError(`Vector search failed: ${String(error)}`, this.backend);
    }

    const results: SearchResult[] = [];
    for (const row of rows) {
      const chunk = this.ledger.get(Number(row.rowid));
      if (chunk) {
        results.push({ chunk, score: distanceToScore(row.distance) });
      }
    }
    return results;
  }

  async save(): Promise<void> {
    await this.sync();
    try {
      await fs.mkdir(this.directory, { recursive: true });
      await fs.writeFile(path.join(this.directory, INDEX_FILE), this.db.serialize());
      await fs.writeFile(
        path.join(this.directory, METADATA_FILE),
        JSON.stringify(this.ledger.toSnapshot(), null, 2),
        'utf-8'
      );
    } catch (error) {
      throw new StoreError(`Failed to save index: ${String(error)}`, this.backend);
    }
    log.info({ directory: this.directory, chunks: this.ledger.size }, 'Saved index');
  }

  async load(): Promise<boolean> {
    const metadataPath = path.join(this.directory, METADATA_FILE);
    const indexPath = path.join(this.directory, INDEX_FILE);
    if (!existsSync(metadataPath)) {
      this.synced = Promise.resolve();
      return false;
    }
    if (!existsSync(indexPath)) {
      throw new StoreError(`Index file missing next to ${metadataPath}`, this.backend);
    }

    let raw: unknown;
    let blob: Buffer;
    try {
      raw = JSON.parse(await fs.readFile(metadataPath, 'utf-8'));
      blob = await fs.readFile(indexPath);
    } catch (error) {
      throw new StoreError(`Failed to read index snapshot: ${String(error)}`, this.backend);
    }

    const parsed = PersistedIndexSchema.safeParse(raw);
    if (!parsed.success) {
      throw new SchemaMismatchError(`Corrupt index metadata: ${parsed.error.message}`);
    }

    const db = this.openDatabase(blob);
    const vectorCount = this.countVectors(db);
    if (vectorCount !== parsed.data.num_chunks) {
      db.close();
      throw new SchemaMismatchError(
        `Index holds ${vectorCount} vectors but metadata lists ${parsed.data.num_chunks} chunks`
      );
    }

    this.ledger.restore(parsed.data);
    this.db.close();
    this.db = db;
    this.synced = Promise.resolve();
    log.info({ directory: this.directory, chunks: this.ledger.size }, 'Loaded index');
    return true;
  }

  async clear(): Promise<void> {
    try {
      this.db.exec('DROP TABLE IF EXISTS chunk_vectors');
      await fs.rm(path.join(this.directory, INDEX_FILE), { force: true });
      await fs.rm(path.join(this.directory, METADATA_FILE), { force: true });
    } catch (error) {
      throw new StoreError(`Failed to clear index: ${String(error)}`, this.backend);
    }
    this.ledger.reset();
    this.synced = Promise.resolve();
    log.info('Cleared index');
  }

  async getStats(): Promise<StoreStats> {
    await this.sync();
    return {
      numChunks: this.ledger.size,
      dimension: this.ledger.dimension,
      indexSize: this.countVectors(this.db),
      sources: this.ledger.sources(),
    };
  }

  async close(): Promise<void> {
    this.db.close();
  }

  /**
   * Pick up a snapshot already on disk before the first read or write, so ids and dedup
   * keys continue from it instead of starting over.
   */
  private sync(): Promise<void> {
    if (!this.synced) {
      this.synced = this.load().then(
        () => undefined,
        (error: unknown) => {
          this.synced = null;
          throw error;
        }
      );
    }
    return this.synced;
  }

  private openDatabase(snapshot?: Buffer): Database.Database {
    try {
      const db = snapshot ? new Database(snapshot) : new Database(':memory:');
      sqliteVec.load(db);
      return db;
    } catch (error) {
      throw new StoreError(`Failed to open vector database: ${String(error)}`, this.backend);
    }
  }

  private ensureTable(dimension: number): void {
    this.db.exec(`CREATE VIRTUAL TABLE IF NOT EXISTS chunk_vectors USING vec0(embedding float[${dimension}])`);
  }

  private countVectors(db: Database.Database): number {
    const table = db
      .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'chunk_vectors'")
      .get();
    if (!table) {
      return 0;
    }
    const row = db.prepare<[], { count: number }>('SELECT count(*) AS count FROM chunk_vectors').get();
    return row?.count ?? 0;
  }
}
