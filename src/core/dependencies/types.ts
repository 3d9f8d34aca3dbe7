import type { MarkerId } from '../markers/types.js';

export interface MarkerRef {
  file: string;
  markerId: MarkerId;
}

/**
 * One row of the persisted dependency table.
 */
export interface DependencyTriple {
  modelKey: string;
  file: string;
  markerId: MarkerId;
}

/**
 * Read side of the dependency index. Rewrites consult a snapshot so that
 * the live index only changes in an explicit record step.
 */
export interface DependencyIndexView {
  affected(changedKeys: Iterable<string>): MarkerRef[];
  affectedInFile(file: string, changedKeys: Iterable<string>): Set<MarkerId>;
  affectedFiles(changedKeys: Iterable<string>): string[];
  dependenciesOf(file: string, markerId: MarkerId): string[];
  dependentsOf(modelKey: string): MarkerRef[];
  files(): string[];
}

/**
 * Persistence for dependency triples (restart continuity).
 */
export interface DependencyStore {
  all(): DependencyTriple[];
  replaceForFile(file: string, triples: DependencyTriple[]): void;
  deleteFile(file: string): void;
}
