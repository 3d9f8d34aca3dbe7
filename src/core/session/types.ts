import type { Conflict } from '../conflicts/types.js';
import type { GenerationError } from '../generator/types.js';
import type { MarkerId, ParseError } from '../markers/types.js';

export type FileStatus = 'updated' | 'unchanged' | 'error';

export type FileFailureCode = 'PARSE_ERROR' | 'UNKNOWN_LANGUAGE' | 'MISSING_FILE';

/**
 * Why a file was left untouched as a whole.
 */
export interface FileFailure {
  code: FileFailureCode;
  message: string;
  parseError?: ParseError;
}

export interface FileOutcome {
  file: string;
  status: FileStatus;
  /** New text when updated, otherwise the text as read */
  text: string;
  conflicts: Conflict[];
  errors: GenerationError[];
  regenerated: MarkerId[];
  seeded: MarkerId[];
  failure?: FileFailure;
}

export interface RegenerationReport {
  files: FileOutcome[];
  updated: string[];
  unchanged: string[];
  failed: string[];
  conflicts: Conflict[];
  errors: GenerationError[];
  /** Set when the abort signal fired before every file was processed */
  cancelled: boolean;
}

export interface IndexResult {
  file: string;
  /** Markers whose dependencies were recorded */
  markers: MarkerId[];
  /** Definitions that can never generate, e.g. an unparsable condition */
  errors: GenerationError[];
  failure?: FileFailure;
}
