import type { MarkerId, MarkerKind } from '../markers/types.js';

/**
 * Why a marker was left as-is instead of being regenerated.
 * - diverged: its body no longer matches what the engine last wrote
 * - interactive-import: an interactive import list would change
 */
export type ConflictReason = 'diverged' | 'interactive-import';

/**
 * A divergence between a marker's current and proposed content.
 * Never resolved automatically.
 */
export interface Conflict {
  file?: string;
  markerId: MarkerId;
  kind: MarkerKind;
  /** Body currently in the file, exactly as written */
  existing: string;
  /** Body the engine would have written */
  proposed: string;
  reason: ConflictReason;
}

/**
 * Explicit caller decision for a conflict.
 */
export type ConflictResolution =
  | 'accept-proposed'
  | 'keep-existing'
  | { manual: string };

export interface ConflictSummary {
  total: number;
  byFile: Record<string, number>;
  byReason: Record<ConflictReason, number>;
}
