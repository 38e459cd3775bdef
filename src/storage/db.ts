/**
 * SQLite database connection and schema.
 *
 * Supports optional encryption using better-sqlite3-multiple-ciphers. The key
 * is read from RECOMMENDER_DB_KEY; it is never stored in config.
 */

import Database from 'better-sqlite3-multiple-ciphers';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { resolvePath, type StorageSettings } from '../config/recommender-config.js';
import { StorageError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('db');

export const DB_KEY_ENV = 'RECOMMENDER_DB_KEY';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS collections (
    name TEXT PRIMARY KEY,
    model_id TEXT NOT NULL,
    dimensions INTEGER NOT NULL,
    built_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS catalog_entries (
    collection TEXT NOT NULL REFERENCES collections(name) ON DELETE CASCADE,
    id TEXT NOT NULL,
    ordinal INTEGER NOT NULL,
    record TEXT NOT NULL,
    full_text TEXT NOT NULL,
    embedding BLOB NOT NULL,
    PRIMARY KEY (collection, id)
  );

  CREATE INDEX IF NOT EXISTS idx_catalog_entries_ordinal
    ON catalog_entries(collection, ordinal);
`;

/**
 * Create tables if missing. Safe to call repeatedly.
 */
export function ensureSchema(database: Database.Database): void {
  database.exec(SCHEMA);
}

/**
 * Apply encryption to a database connection. Cipher must be set before key.
 */
function applyEncryption(database: Database.Database, cipher: string, key: string): void {
  database.pragma(`cipher = '${cipher}'`);
  database.pragma(`key = '${key.replace(/'/g, "''")}'`);
}

/**
 * Open (or create) the catalog database.
 *
 * @throws StorageError `ENCRYPTION_KEY_MISSING` when encryption is enabled
 *   without RECOMMENDER_DB_KEY
 * @throws StorageError `DB_OPEN_FAILED`
 */
export function openDatabase(settings: Pick<StorageSettings, 'dbPath' | 'encryption'>): Database.Database {
  const inMemory = settings.dbPath === ':memory:';
  const path = inMemory ? settings.dbPath : resolvePath(settings.dbPath);

  let key: string | undefined;
  if (settings.encryption.enabled) {
    key = process.env[DB_KEY_ENV];
    if (!key) {
      throw new StorageError(
        `Database encryption is enabled but ${DB_KEY_ENV} is not set`,
        'ENCRYPTION_KEY_MISSING',
      );
    }
  }

  let database: Database.Database;
  try {
    if (!inMemory) {
      const dir = dirname(path);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    database = new Database(path);

    if (key) {
      applyEncryption(database, settings.encryption.cipher, key);
    }

    database.pragma('foreign_keys = ON');
    if (!inMemory) {
      database.pragma('journal_mode = WAL');
    }
    ensureSchema(database);
  } catch (error) {
    throw new StorageError(`Cannot open catalog database at ${path}`, 'DB_OPEN_FAILED', error);
  }

  log.debug(`Opened ${path}`, { encrypted: key !== undefined });
  return database;
}
