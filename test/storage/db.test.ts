/**
 * Tests for database connection and schema.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DB_KEY_ENV, ensureSchema, openDatabase } from '../../src/storage/db.js';
import { StorageError } from '../../src/utils/errors.js';
import { setLogLevel } from '../../src/utils/logger.js';

setLogLevel('silent');

const PLAIN = { enabled: false, cipher: 'chacha20' as const };

function tableNames(db: ReturnType<typeof openDatabase>): string[] {
  const rows = db.prepare("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name").all() as {
    name: string;
  }[];
  return rows.map((r) => r.name);
}

describe('openDatabase', () => {
  let dir: string;
  const savedKey = process.env[DB_KEY_ENV];

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'db-'));
    delete process.env[DB_KEY_ENV];
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    if (savedKey === undefined) {
      delete process.env[DB_KEY_ENV];
    } else {
      process.env[DB_KEY_ENV] = savedKey;
    }
  });

  it('creates the schema in memory', () => {
    const db = openDatabase({ dbPath: ':memory:', encryption: PLAIN });

    expect(tableNames(db)).toEqual(['catalog_entries', 'collections']);
    expect(db.pragma('foreign_keys', { simple: true })).toBe(1);
    db.close();
  });

  it('creates parent directories and enables WAL for files', () => {
    const db = openDatabase({ dbPath: join(dir, 'nested', 'catalog.db'), encryption: PLAIN });

    expect(db.pragma('journal_mode', { simple: true })).toBe('wal');
    db.close();
  });

  it('throws ENCRYPTION_KEY_MISSING when encryption has no key', () => {
    const open = () => openDatabase({ dbPath: ':memory:', encryption: { enabled: true, cipher: 'chacha20' } });

    expect(open).toThrow(StorageError);
    expect(open).toThrow(`Database encryption is enabled but ${DB_KEY_ENV} is not set`);
  });

  it('opens an encrypted file with the key from the environment', () => {
    process.env[DB_KEY_ENV] = "test-secret'with-quote";
    const path = join(dir, 'secure.db');

    const db = openDatabase({ dbPath: path, encryption: { enabled: true, cipher: 'chacha20' } });
    db.prepare("INSERT INTO collections VALUES ('c', 'm', 3, 'now')").run();
    db.close();

    const reopened = openDatabase({ dbPath: path, encryption: { enabled: true, cipher: 'chacha20' } });
    expect(reopened.prepare('SELECT COUNT(*) AS n FROM collections').get()).toEqual({ n: 1 });
    reopened.close();
  });

  it('ensureSchema is idempotent', () => {
    const db = openDatabase({ dbPath: ':memory:', encryption: PLAIN });
    expect(() => ensureSchema(db)).not.toThrow();
    db.close();
  });
});
