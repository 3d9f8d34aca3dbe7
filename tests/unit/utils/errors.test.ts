/**
 * Tests for error types.
 */
import { describe, it, expect } from 'vitest';
import {
  CatalogError,
  ConfigError,
  ErrorCodes,
  MarkwrightError,
  ParseFailure,
  SystemError,
} from '../../../src/utils/errors.js';

describe('errors', () => {
  it('should carry code, message and details', () => {
    const error = new MarkwrightError('X001', 'Something broke', { file: 'a.ts' });

    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe('X001');
    expect(error.message).toBe('Something broke');
    expect(error.details).toEqual({ file: 'a.ts' });
  });

  it('should name each subclass', () => {
    expect(new ConfigError(ErrorCodes.CONFIG_LOAD_ERROR, 'm').name).toBe('ConfigError');
    expect(new CatalogError(ErrorCodes.CATALOG_LOAD_ERROR, 'm').name).toBe('CatalogError');
    expect(new ParseFailure(ErrorCodes.MARKER_NOT_FOUND, 'm').name).toBe('ParseFailure');
    expect(new SystemError(ErrorCodes.STATE_DB_ERROR, 'm').name).toBe('SystemError');
  });

  it('should keep subclasses catchable as MarkwrightError', () => {
    expect(new CatalogError(ErrorCodes.CATALOG_LOAD_ERROR, 'm')).toBeInstanceOf(MarkwrightError);
  });

  it('should serialize to JSON', () => {
    const error = new SystemError(ErrorCodes.PARSE_ERROR, 'Bad YAML', { line: 3 });

    expect(error.toJSON()).toEqual({
      name: 'SystemError',
      code: 'S001',
      message: 'Bad YAML',
      details: { line: 3 },
    });
  });
});
