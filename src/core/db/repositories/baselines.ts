/**
 * Baseline repository - last engine-written body per marker.
 */
import type Database from 'better-sqlite3';
import { computeChecksum } from '../../../utils/checksum.js';

export interface BaselineRecord {
  file: string;
  markerId: string;
  content: string;
  checksum: string;
}

interface BaselineRow {
  file_path: string;
  marker_id: string;
  content: string;
  checksum: string;
}

function toRecord(row: BaselineRow): BaselineRecord {
  return { file: row.file_path, markerId: row.marker_id, content: row.content, checksum: row.checksum };
}

export class BaselineRepository {
  constructor(private readonly db: Database.Database) {}

  get(file: string, markerId: string): BaselineRecord | null {
    const row = this.db
      .prepare<[string, string], BaselineRow>(
        'SELECT file_path, marker_id, content, checksum FROM marker_baselines WHERE file_path = ? AND marker_id = ?'
      )
      .get(file, markerId);
    return row ? toRecord(row) : null;
  }

  forFile(file: string): BaselineRecord[] {
    return this.db
      .prepare<[string], BaselineRow>(
        'SELECT file_path, marker_id, content, checksum FROM marker_baselines WHERE file_path = ? ORDER BY marker_id'
      )
      .all(file)
      .map(toRecord);
  }

  upsert(file: string, markerId: string, content: string): void {
    this.db.prepare(`
      INSERT INTO marker_baselines (file_path, marker_id, content, checksum, updated_at)
      VALUES (?, ?, ?, ?, CURRENT_TIMESTAMP)
      ON CONFLICT(file_path, marker_id) DO UPDATE SET
        content = excluded.content,
        checksum = excluded.checksum,
        updated_at = CURRENT_TIMESTAMP
    `).run(file, markerId, content, computeChecksum(content));
  }

  delete(file: string, markerId: string): void {
    this.db.prepare('DELETE FROM marker_baselines WHERE file_path = ? AND marker_id = ?').run(file, markerId);
  }

  /**
   * Delete baselines of a file whose marker ids are not in `keep`.
   */
  retain(file: string, keep: Iterable<string>): number {
    const kept = new Set(keep);
    const stale = this.forFile(file).filter((record) => !kept.has(record.markerId));
    const deleteStmt = this.db.prepare('DELETE FROM marker_baselines WHERE file_path = ? AND marker_id = ?');

    const prune = this.db.transaction(() => {
      for (const record of stale) deleteStmt.run(file, record.markerId);
    });
    prune();
    return stale.length;
  }

  deleteFile(file: string): void {
    this.db.prepare('DELETE FROM marker_baselines WHERE file_path = ?').run(file);
  }
}
