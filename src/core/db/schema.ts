/**
 * State database schema: dependency triples and marker baselines.
 */
import type Database from 'better-sqlite3';

/** Current schema version */
export const SCHEMA_VERSION = 1;

export const SCHEMA_SQL = `
-- model key -> (file, marker) dependency edges
CREATE TABLE IF NOT EXISTS marker_dependencies (
  model_key TEXT NOT NULL,
  file_path TEXT NOT NULL,
  marker_id TEXT NOT NULL,
  PRIMARY KEY (file_path, marker_id, model_key)
);

CREATE INDEX IF NOT EXISTS idx_marker_dependencies_key ON marker_dependencies(model_key);

-- Last content the engine wrote for each marker
CREATE TABLE IF NOT EXISTS marker_baselines (
  file_path TEXT NOT NULL,
  marker_id TEXT NOT NULL,
  content TEXT NOT NULL,
  checksum TEXT NOT NULL,
  updated_at TEXT DEFAULT CURRENT_TIMESTAMP,
  PRIMARY KEY (file_path, marker_id)
);

CREATE TABLE IF NOT EXISTS meta (
  key TEXT PRIMARY KEY,
  value TEXT
);
`;

/**
 * Create tables if they don't exist and record the schema version.
 * Note: db.exec() is SQLite's exec method for running SQL, not child_process.exec()
 */
export function initializeSchema(db: Database.Database): void {
  db.exec(SCHEMA_SQL);
  db.prepare('INSERT OR IGNORE INTO meta (key, value) VALUES (?, ?)').run(
    'schema_version',
    String(SCHEMA_VERSION)
  );
}

export function getSchemaVersion(db: Database.Database): number {
  const row = db
    .prepare<[string], { value: string }>('SELECT value FROM meta WHERE key = ?')
    .get('schema_version');
  return row ? parseInt(row.value, 10) : 0;
}

export function needsMigration(db: Database.Database): boolean {
  return getSchemaVersion(db) < SCHEMA_VERSION;
}

/**
 * Bring an older database up to the current version. Version 1 is the
 * first schema, so this only stamps the version.
 */
export function migrateSchema(db: Database.Database): void {
  if (!needsMigration(db)) return;
  initializeSchema(db);
  db.prepare('UPDATE meta SET value = ? WHERE key = ?').run(String(SCHEMA_VERSION), 'schema_version');
}
