/**
 * Dependency repository - persisted (model key, file, marker) triples.
 */
import type Database from 'better-sqlite3';
import type { DependencyStore, DependencyTriple } from '../../dependencies/types.js';

interface DependencyRow {
  model_key: string;
  file_path: string;
  marker_id: string;
}

function toTriple(row: DependencyRow): DependencyTriple {
  return { modelKey: row.model_key, file: row.file_path, markerId: row.marker_id };
}

export class DependencyRepository implements DependencyStore {
  constructor(private readonly db: Database.Database) {}

  all(): DependencyTriple[] {
    return this.db
      .prepare<[], DependencyRow>(
        'SELECT model_key, file_path, marker_id FROM marker_dependencies ORDER BY file_path, marker_id, model_key'
      )
      .all()
      .map(toTriple);
  }

  forFile(file: string): DependencyTriple[] {
    return this.db
      .prepare<[string], DependencyRow>(
        'SELECT model_key, file_path, marker_id FROM marker_dependencies WHERE file_path = ? ORDER BY marker_id, model_key'
      )
      .all(file)
      .map(toTriple);
  }

  /**
   * Replace all triples of a file in one transaction.
   */
  replaceForFile(file: string, triples: DependencyTriple[]): void {
    const deleteStmt = this.db.prepare('DELETE FROM marker_dependencies WHERE file_path = ?');
    const insertStmt = this.db.prepare(
      'INSERT OR IGNORE INTO marker_dependencies (model_key, file_path, marker_id) VALUES (?, ?, ?)'
    );

    const replace = this.db.transaction(() => {
      deleteStmt.run(file);
      for (const triple of triples) {
        insertStmt.run(triple.modelKey, file, triple.markerId);
      }
    });

    replace();
  }

  deleteFile(file: string): void {
    this.db.prepare('DELETE FROM marker_dependencies WHERE file_path = ?').run(file);
  }

  count(): number {
    const row = this.db
      .prepare<[], { count: number }>('SELECT COUNT(*) as count FROM marker_dependencies')
      .get();
    return row?.count ?? 0;
  }
}
