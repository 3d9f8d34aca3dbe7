/**
 * Connection management for the optional state database.
 */
import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname, resolve } from 'path';
import { ErrorCodes, SystemError } from '../../utils/errors.js';
import { initializeSchema, migrateSchema } from './schema.js';

/** SQLite cache size in KB (negative means KB, positive means pages) */
const CACHE_SIZE_KB = -16000; // 16MB

export const MEMORY_DB = ':memory:';

/** Open connections by resolved path; in-memory databases are never shared */
const connections = new Map<string, Database.Database>();

/**
 * Open (or reuse) the state database at `path`, creating its directory and
 * schema on first use. Pass ':memory:' for a private in-memory database.
 */
export function openStateDb(path: string): Database.Database {
  const key = path === MEMORY_DB ? undefined : resolve(path);
  if (key !== undefined) {
    const existing = connections.get(key);
    if (existing) return existing;
  }

  try {
    if (key !== undefined) mkdirSync(dirname(key), { recursive: true });
    const db = new Database(key ?? MEMORY_DB);

    if (key !== undefined) {
      db.pragma('journal_mode = WAL');
      db.pragma('synchronous = NORMAL');
    }
    db.pragma(`cache_size = ${CACHE_SIZE_KB}`);
    db.pragma('temp_store = MEMORY');

    initializeSchema(db);
    migrateSchema(db);

    if (key !== undefined) connections.set(key, db);
    return db;
  } catch (error) {
    throw new SystemError(
      ErrorCodes.STATE_DB_ERROR,
      `Failed to open state database at ${path}: ${error instanceof Error ? error.message : String(error)}`,
      { path }
    );
  }
}

/**
 * Close a database opened with openStateDb.
 */
export function closeStateDb(db: Database.Database): void {
  for (const [key, open] of connections) {
    if (open === db) connections.delete(key);
  }
  if (db.open) db.close();
}

export function closeAllStateDbs(): void {
  for (const db of connections.values()) {
    if (db.open) db.close();
  }
  connections.clear();
}

/**
 * Run a function within a database transaction.
 * Automatically commits on success, rolls back on error.
 */
export function transaction<T>(db: Database.Database, fn: () => T): T {
  return db.transaction(fn)();
}
