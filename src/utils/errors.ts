/**
 * Error types and codes for Markwright.
 *
 * Only configuration and programmer mistakes are thrown. Marker parse
 * failures, generation failures and conflicts travel as values in the
 * results of the parser, generator and rewriter.
 */

/**
 * Base error class for all thrown Markwright errors.
 */
export class MarkwrightError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'MarkwrightError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration errors (loading, parsing, validation of config.yaml).
 */
export class ConfigError extends MarkwrightError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Marker catalog errors (invalid or contradictory marker definitions).
 */
export class CatalogError extends MarkwrightError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'CatalogError';
  }
}

/**
 * Raised when a caller asks to operate on a file whose markers do not parse,
 * e.g. resolving a conflict in a file that has since been corrupted.
 */
export class ParseFailure extends MarkwrightError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ParseFailure';
  }
}

/**
 * System errors (file not found, unreadable state database, etc.).
 */
export class SystemError extends MarkwrightError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Configuration and catalog errors (C001-C002)
  CONFIG_LOAD_ERROR: 'C001',
  CATALOG_LOAD_ERROR: 'C002',

  // Conflict resolution errors (R001-R002)
  MARKER_NOT_FOUND: 'R001',
  UNRESOLVABLE_FILE: 'R002',

  // System errors (S001-S003)
  PARSE_ERROR: 'S001',
  INVALID_SCHEMA: 'S002',
  STATE_DB_ERROR: 'S003',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
