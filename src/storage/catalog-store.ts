/**
 * Catalog collection with an exact in-memory vector index and SQLite
 * persistence.
 *
 * ## Architecture
 *
 * ```
 * ┌──────────────────────────────────────────────────────────────┐
 * │                       CatalogStore                           │
 * │  ┌──────────────────────┐   ┌──────────────────────────────┐ │
 * │  │  In-Memory Entries   │   │     SQLite Persistence       │ │
 * │  │  ordinal-ordered     │ ◄─┤  collections                 │ │
 * │  │  { record, vector }  │   │  catalog_entries (id, ord,   │ │
 * │  └──────────────────────┘   │   record, full_text, BLOB)   │ │
 * │                             └──────────────────────────────┘ │
 * └──────────────────────────────────────────────────────────────┘
 * ```
 *
 * Entries are loaded from SQLite on first access. Search is a brute-force
 * cosine scan (O(n) per query), ranked by ascending distance with ties broken
 * by ingestion ordinal.
 *
 * Single writer: a query issued while `build()` is running fails with
 * `INDEX_BUILDING`. Concurrent queries against a built collection are safe.
 *
 * @module storage/catalog-store
 */

import type Database from 'better-sqlite3-multiple-ciphers';
import type { AssessmentRecord } from '../catalog/types.js';
import { isAssessmentRecord } from '../catalog/full-text.js';
import type { EmbeddingProvider } from '../models/embedding-provider.js';
import { cosineDistance } from '../utils/cosine-distance.js';
import { assertDimensions, deserializeEmbedding, serializeEmbedding } from '../utils/embedding-utils.js';
import { ConfigurationError, NotFoundError, RetrievalError, StorageError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { ensureSchema } from './db.js';
import type {
  BuildOptions,
  BuildStats,
  CollectionStats,
  DbCatalogEntryRow,
  DbCollectionRow,
  IndexNeighbor,
  VectorIndex,
} from './types.js';

const log = createLogger('catalog-store');

interface IndexEntry {
  ordinal: number;
  record: AssessmentRecord;
  vector: number[];
}

/**
 * Validate k. Non-integer or non-finite values are rejected; k ≤ 0 is legal
 * and yields no results.
 */
export function assertValidK(k: number): void {
  if (!Number.isFinite(k) || !Number.isInteger(k)) {
    throw new RetrievalError(`k must be a finite integer, got ${k}`, 'INVALID_K');
  }
}

function decodeRecord(row: DbCatalogEntryRow): AssessmentRecord {
  const parsed: unknown = JSON.parse(row.record);
  if (!isAssessmentRecord(parsed)) {
    throw new StorageError(`Catalog entry ${row.id} is corrupt`, 'ENTRY_CORRUPT');
  }
  return Object.freeze(parsed);
}

export class CatalogStore implements VectorIndex {
  private entries: IndexEntry[] | null = null;
  private byId: Map<string, IndexEntry> = new Map();
  private building = false;

  constructor(
    private readonly db: Database.Database,
    private readonly embedder: EmbeddingProvider,
    readonly name: string,
  ) {
    ensureSchema(db);
  }

  /**
   * Open an existing collection.
   *
   * @throws NotFoundError `COLLECTION_NOT_FOUND` if it was never built
   */
  static open(db: Database.Database, embedder: EmbeddingProvider, name: string): CatalogStore {
    const store = new CatalogStore(db, embedder, name);
    const row = store.collectionRow();
    if (!row) {
      throw new NotFoundError(`Collection "${name}" has not been built`, 'COLLECTION_NOT_FOUND');
    }
    if (row.model_id !== embedder.modelId) {
      log.warn(`Collection "${name}" was built with ${row.model_id}, querying with ${embedder.modelId}`);
    }
    return store;
  }

  /**
   * Names of all built collections.
   */
  static listCollections(db: Database.Database): string[] {
    ensureSchema(db);
    const rows = db.prepare('SELECT name FROM collections ORDER BY name').all() as { name: string }[];
    return rows.map((r) => r.name);
  }

  private collectionRow(): DbCollectionRow | undefined {
    return this.db
      .prepare('SELECT name, model_id, dimensions, built_at FROM collections WHERE name = ?')
      .get(this.name) as DbCollectionRow | undefined;
  }

  /**
   * Load entries from SQLite into memory, in ingestion order.
   */
  private load(): IndexEntry[] {
    if (this.entries) return this.entries;

    const rows = this.db
      .prepare(
        'SELECT id, ordinal, record, full_text, embedding FROM catalog_entries WHERE collection = ? ORDER BY ordinal',
      )
      .all(this.name) as DbCatalogEntryRow[];

    const entries = rows.map((row) => ({
      ordinal: row.ordinal,
      record: decodeRecord(row),
      vector: deserializeEmbedding(row.embedding),
    }));

    this.entries = entries;
    this.byId = new Map(entries.map((e) => [e.record.id, e]));
    log.debug(`Loaded ${entries.length} entries`, { collection: this.name });
    return entries;
  }

  private invalidate(): void {
    this.entries = null;
    this.byId = new Map();
  }

  /**
   * Embed every record's fullText in one batch and store vectors with
   * metadata in one transaction.
   *
   * `reset` (default true) clears the collection first. Otherwise records
   * append with continuing ordinals, and a record whose id already exists is
   * replaced in place, keeping its ordinal.
   *
   * @throws ConfigurationError `DIMENSION_MISMATCH`
   */
  async build(records: AssessmentRecord[], options: BuildOptions = {}): Promise<BuildStats> {
    const reset = options.reset ?? true;
    const start = performance.now();

    this.building = true;
    try {
      const vectors = await this.embedder.encodeBatch(records.map((r) => r.fullText));
      const dimensions = this.embedder.dimensions;
      assertDimensions(vectors, dimensions, `Building "${this.name}"`);

      const existing = this.collectionRow();
      if (!reset && existing && existing.dimensions !== dimensions) {
        throw new ConfigurationError(
          `Collection "${this.name}" holds ${existing.dimensions}-dimensional vectors, new vectors have ${dimensions}`,
          'DIMENSION_MISMATCH',
        );
      }

      const upsertCollection = this.db.prepare(
        `INSERT INTO collections (name, model_id, dimensions, built_at) VALUES (?, ?, ?, ?)
         ON CONFLICT(name) DO UPDATE SET model_id = excluded.model_id,
           dimensions = excluded.dimensions, built_at = excluded.built_at`,
      );
      const clearEntries = this.db.prepare('DELETE FROM catalog_entries WHERE collection = ?');
      const selectIds = this.db.prepare('SELECT id FROM catalog_entries WHERE collection = ?');
      const selectMaxOrdinal = this.db.prepare(
        'SELECT MAX(ordinal) AS max_ordinal FROM catalog_entries WHERE collection = ?',
      );
      const upsertEntry = this.db.prepare(
        `INSERT INTO catalog_entries (collection, id, ordinal, record, full_text, embedding)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT(collection, id) DO UPDATE SET record = excluded.record,
           full_text = excluded.full_text, embedding = excluded.embedding`,
      );

      const write = this.db.transaction(() => {
        upsertCollection.run(this.name, this.embedder.modelId, dimensions, new Date().toISOString());
        if (reset) {
          clearEntries.run(this.name);
        }

        const known = new Set((selectIds.all(this.name) as { id: string }[]).map((r) => r.id));
        const maxRow = selectMaxOrdinal.get(this.name) as { max_ordinal: number | null } | undefined;
        let nextOrdinal = (maxRow?.max_ordinal ?? -1) + 1;

        records.forEach((record, i) => {
          const ordinal = known.has(record.id) ? 0 : nextOrdinal++;
          known.add(record.id);
          // ordinal is ignored on conflict
          upsertEntry.run(
            this.name,
            record.id,
            ordinal,
            JSON.stringify(record),
            record.fullText,
            serializeEmbedding(vectors[i]),
          );
        });
      });

      write();
      this.invalidate();

      const total = this.load().length;
      const stats: BuildStats = {
        collection: this.name,
        upserted: records.length,
        total,
        dimensions,
        durationMs: performance.now() - start,
      };
      log.info(`Built "${this.name}": ${records.length} upserted, ${total} total`, {
        reset,
        ms: Math.round(stats.durationMs),
      });
      return stats;
    } finally {
      this.building = false;
    }
  }

  /**
   * Exact top-k search by cosine distance, ascending; ties by ordinal.
   *
   * @throws RetrievalError `INVALID_K`
   * @throws ConfigurationError `INDEX_BUILDING` | `INDEX_NOT_BUILT` | `DIMENSION_MISMATCH`
   */
  async query(vector: number[], k: number): Promise<IndexNeighbor[]> {
    assertValidK(k);
    if (this.building) {
      throw new ConfigurationError(`Collection "${this.name}" is being built`, 'INDEX_BUILDING');
    }

    const collection = this.collectionRow();
    if (!collection) {
      throw new ConfigurationError(`Collection "${this.name}" has not been built`, 'INDEX_NOT_BUILT');
    }
    if (vector.length !== collection.dimensions) {
      throw new ConfigurationError(
        `Query vector has ${vector.length} dimensions, collection "${this.name}" has ${collection.dimensions}`,
        'DIMENSION_MISMATCH',
      );
    }
    if (k <= 0) {
      return [];
    }

    const scored = this.load().map((entry) => ({
      id: entry.record.id,
      distance: cosineDistance(vector, entry.vector),
      ordinal: entry.ordinal,
      record: entry.record,
    }));

    scored.sort((a, b) => a.distance - b.distance || a.ordinal - b.ordinal);
    return scored.slice(0, k);
  }

  async count(): Promise<number> {
    if (!this.collectionRow()) return 0;
    return this.load().length;
  }

  async isBuilt(): Promise<boolean> {
    return this.collectionRow() !== undefined;
  }

  getRecord(id: string): AssessmentRecord | undefined {
    this.load();
    return this.byId.get(id)?.record;
  }

  /**
   * All records in ingestion order.
   */
  listRecords(): AssessmentRecord[] {
    return this.load().map((e) => e.record);
  }

  /**
   * @throws NotFoundError `COLLECTION_NOT_FOUND`
   */
  stats(): CollectionStats {
    const row = this.collectionRow();
    if (!row) {
      throw new NotFoundError(`Collection "${this.name}" has not been built`, 'COLLECTION_NOT_FOUND');
    }
    return {
      name: row.name,
      modelId: row.model_id,
      dimensions: row.dimensions,
      count: this.load().length,
      builtAt: row.built_at,
    };
  }
}
