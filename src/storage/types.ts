/**
 * Type definitions for the storage layer.
 */

import type { AssessmentRecord } from '../catalog/types.js';

/**
 * One nearest-neighbor hit. Distance is cosine distance (1 - cos).
 */
export interface IndexNeighbor {
  id: string;
  distance: number;
  /** Ingestion position within the collection. */
  ordinal: number;
  record: AssessmentRecord;
}

export interface BuildOptions {
  /** Clear the collection before inserting. Default true. */
  reset?: boolean;
}

export interface BuildStats {
  collection: string;
  /** Records inserted or replaced by this build. */
  upserted: number;
  /** Entries in the collection after the build. */
  total: number;
  dimensions: number;
  durationMs: number;
}

export interface CollectionStats {
  name: string;
  modelId: string;
  dimensions: number;
  count: number;
  /** ISO timestamp of the last build. */
  builtAt: string;
}

/**
 * Exact nearest-neighbor index over catalog records.
 */
export interface VectorIndex {
  build(records: AssessmentRecord[], options?: BuildOptions): Promise<BuildStats>;
  query(vector: number[], k: number): Promise<IndexNeighbor[]>;
  count(): Promise<number>;
  isBuilt(): Promise<boolean>;
}

/** Row shape of the `collections` table. */
export interface DbCollectionRow {
  name: string;
  model_id: string;
  dimensions: number;
  built_at: string;
}

/** Row shape of the `catalog_entries` table. */
export interface DbCatalogEntryRow {
  id: string;
  ordinal: number;
  record: string;
  full_text: string;
  embedding: Buffer;
}
