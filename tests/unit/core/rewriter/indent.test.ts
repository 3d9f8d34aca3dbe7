import { describe, it, expect } from 'vitest';
import { dedentBody, formatBody, reindentToColumn } from '../../../../src/core/rewriter/indent.js';

describe('dedentBody', () => {
  it('should strip the marker indent and the final line ending', () => {
    expect(dedentBody('    a, b\n      nested\n', '    ')).toBe('a, b\n  nested');
  });

  it('should leave lines shallower than the indent alone', () => {
    expect(dedentBody('  x\r\n', '    ')).toBe('  x');
  });

  it('should return empty text for an empty body', () => {
    expect(dedentBody('', '  ')).toBe('');
  });
});

describe('formatBody', () => {
  it('should indent and terminate every line', () => {
    expect(formatBody('a\n\nb', '  ', '\n')).toBe('  a\n\n  b\n');
    expect(formatBody('a', '', '\r\n')).toBe('a\r\n');
  });

  it('should produce an empty body for empty content', () => {
    expect(formatBody('', '  ', '\n')).toBe('');
  });

  it('should round-trip with dedentBody', () => {
    const body = '    one\n      two\n';
    expect(formatBody(dedentBody(body, '    '), '    ', '\n')).toBe(body);
  });
});

describe('reindentToColumn', () => {
  it('should shift shallow text to the marker column keeping relative indent', () => {
    expect(reindentToColumn('doWork();\n  nested();\n\n', '    ')).toBe('    doWork();\n      nested();\n\n');
  });

  it('should keep text already at or beyond the column', () => {
    const body = '      deep();\n';
    expect(reindentToColumn(body, '    ')).toBe(body);
  });

  it('should keep each line ending', () => {
    expect(reindentToColumn('a\r\nb\n', '  ')).toBe('  a\r\n  b\n');
  });

  it('should keep blank bodies as they are', () => {
    expect(reindentToColumn('\n', '  ')).toBe('\n');
  });
});
