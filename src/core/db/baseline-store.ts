/**
 * BaselineStore backed by the state database.
 */
import type Database from 'better-sqlite3';
import type { BaselineStore } from '../baselines/types.js';
import type { MarkerId } from '../markers/types.js';
import { BaselineRepository } from './repositories/baselines.js';

export class SqliteBaselineStore implements BaselineStore {
  private readonly repository: BaselineRepository;

  constructor(db: Database.Database) {
    this.repository = new BaselineRepository(db);
  }

  get(file: string, markerId: MarkerId): string | undefined {
    return this.repository.get(file, markerId)?.content;
  }

  set(file: string, markerId: MarkerId, content: string): void {
    this.repository.upsert(file, markerId, content);
  }

  delete(file: string, markerId: MarkerId): void {
    this.repository.delete(file, markerId);
  }

  retain(file: string, markerIds: Iterable<MarkerId>): void {
    this.repository.retain(file, markerIds);
  }

  entries(file: string): Map<MarkerId, string> {
    return new Map(this.repository.forFile(file).map((record) => [record.markerId, record.content]));
  }
}
