export { formatConflict, formatConflicts, type ConflictFormatOptions } from './formatters.js';
export { ConflictReporter } from './reporter.js';
export { resolveConflict, type ResolvedConflict } from './resolution.js';
export type {
  Conflict,
  ConflictReason,
  ConflictResolution,
  ConflictSummary,
} from './types.js';
