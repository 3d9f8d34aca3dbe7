/**
 * ConflictReporter: accumulates conflicts across files for the caller.
 * Conflicts are only ever removed by an explicit decision.
 */
import type { MarkerId } from '../markers/types.js';
import type { Conflict, ConflictReason, ConflictSummary } from './types.js';

function conflictKey(file: string | undefined, markerId: MarkerId): string {
  return `${file ?? ''}\u0000${markerId}`;
}

export class ConflictReporter {
  private readonly conflicts = new Map<string, Conflict>();

  /**
   * Add a conflict; a later conflict for the same marker replaces the earlier one.
   */
  add(conflict: Conflict): void {
    const key = conflictKey(conflict.file, conflict.markerId);
    this.conflicts.delete(key);
    this.conflicts.set(key, conflict);
  }

  addAll(conflicts: Iterable<Conflict>): void {
    for (const conflict of conflicts) this.add(conflict);
  }

  report(): Conflict[] {
    return [...this.conflicts.values()];
  }

  forFile(file: string): Conflict[] {
    return this.report().filter((conflict) => conflict.file === file);
  }

  /**
   * Drop a conflict once the caller has resolved it.
   */
  remove(file: string | undefined, markerId: MarkerId): boolean {
    return this.conflicts.delete(conflictKey(file, markerId));
  }

  /**
   * Drop every conflict of a file, e.g. before re-reporting it from a fresh pass.
   */
  clearFile(file: string): void {
    for (const [key, conflict] of this.conflicts) {
      if (conflict.file === file) this.conflicts.delete(key);
    }
  }

  clear(): void {
    this.conflicts.clear();
  }

  hasConflicts(): boolean {
    return this.conflicts.size > 0;
  }

  summary(): ConflictSummary {
    const byFile: Record<string, number> = {};
    const byReason: Record<ConflictReason, number> = { diverged: 0, 'interactive-import': 0 };
    for (const conflict of this.conflicts.values()) {
      const file = conflict.file ?? '<memory>';
      byFile[file] = (byFile[file] ?? 0) + 1;
      byReason[conflict.reason]++;
    }
    return { total: this.conflicts.size, byFile, byReason };
  }
}
