import { describe, it, expect } from 'vitest';
import {
  formatEndToken,
  formatStartToken,
  matchMarkerToken,
  scaffoldMarker,
} from '../../../../src/core/markers/grammar.js';
import { parseDocument, serializeDocument } from '../../../../src/core/markers/parser.js';
import { CSS, PYTHON, TS } from '../../../helpers/profiles.js';

describe('matchMarkerToken', () => {
  it('should match a line comment token with flexible whitespace', () => {
    expect(matchMarkerToken('  //   <guard:a-b.c:start>  ', TS)).toEqual({
      kind: 'guard',
      id: 'a-b.c',
      edge: 'start',
    });
  });

  it('should match a block comment token', () => {
    expect(matchMarkerToken('/* <import:deps:end> */', CSS)).toEqual({
      kind: 'import',
      id: 'deps',
      edge: 'end',
    });
  });

  it('should return the raw kind even when it is not a known kind', () => {
    expect(matchMarkerToken('# <widget:x:end>', PYTHON)?.kind).toBe('widget');
  });

  it('should not match tokens with trailing text', () => {
    expect(matchMarkerToken('// <guard:x:start> keep out', TS)).toBeNull();
  });

  it('should not match plain comments', () => {
    expect(matchMarkerToken('// guard:x:start', TS)).toBeNull();
    expect(matchMarkerToken('const a = 1;', TS)).toBeNull();
  });
});

describe('formatStartToken / formatEndToken', () => {
  it('should prefer the line comment form', () => {
    expect(formatStartToken(TS, 'generated', 'props')).toBe('// <generated:props:start>');
    expect(formatEndToken(PYTHON, 'generated', 'props')).toBe('# <generated:props:end>');
  });

  it('should fall back to the block comment form', () => {
    expect(formatStartToken(CSS, 'template', 'vars')).toBe('/* <template:vars:start> */');
  });
});

describe('scaffoldMarker', () => {
  it('should indent body lines and leave blank lines bare', () => {
    expect(scaffoldMarker(TS, 'guard', 'logic', { indent: '  ', body: 'x\n\ny' })).toBe(
      '  // <guard:logic:start>\n  x\n\n  y\n  // <guard:logic:end>\n'
    );
  });

  it('should produce text the parser reads back', () => {
    const text = scaffoldMarker(CSS, 'generated', 'vars', { lineEnding: '\r\n' });
    const result = parseDocument(text, CSS);

    expect(text).toBe('/* <generated:vars:start> */\r\n/* <generated:vars:end> */\r\n');
    expect(result.success).toBe(true);
    if (result.success) expect(serializeDocument(result.document)).toBe(text);
  });
});
