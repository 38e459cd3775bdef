/**
 * Storage layer exports.
 */

export { openDatabase, ensureSchema, DB_KEY_ENV } from './db.js';
export { CatalogStore, assertValidK } from './catalog-store.js';
export type { IndexNeighbor, BuildOptions, BuildStats, CollectionStats, VectorIndex } from './types.js';
