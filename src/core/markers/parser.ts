/**
 * MarkerParser: scans source text into verbatim segments and marker regions.
 *
 * Pure function of its inputs. Any structural problem (unbalanced tokens,
 * duplicate ids, unknown kinds, nesting) fails the whole parse so that no
 * output is ever produced from a partially understood file.
 */
import type { LanguageProfile } from '../languages/types.js';
import { matchMarkerToken, type MarkerToken } from './grammar.js';
import {
  isMarkerKind,
  type MarkerKind,
  type ParsedDocument,
  type ParseError,
  type ParseResult,
  type Region,
  type Segment,
} from './types.js';

interface SourceLine {
  text: string;
  eol: '' | '\n' | '\r\n';
  offset: number;
}

interface OpenMarker {
  kind: MarkerKind;
  id: string;
  indent: string;
  line: number;
  offset: number;
  startToken: string;
  body: string[];
}

/**
 * Split text into lines, keeping each line's own terminator so the document
 * can be reassembled byte for byte.
 */
export function splitLines(text: string): SourceLine[] {
  const lines: SourceLine[] = [];
  let pos = 0;
  while (pos < text.length) {
    const nl = text.indexOf('\n', pos);
    if (nl === -1) {
      lines.push({ text: text.slice(pos), eol: '', offset: pos });
      break;
    }
    const crlf = nl > pos && text[nl - 1] === '\r';
    lines.push({
      text: text.slice(pos, crlf ? nl - 1 : nl),
      eol: crlf ? '\r\n' : '\n',
      offset: pos,
    });
    pos = nl + 1;
  }
  return lines;
}

function detectLineEnding(lines: SourceLine[]): '\n' | '\r\n' {
  const first = lines.find((l) => l.eol !== '');
  return first?.eol === '\r\n' ? '\r\n' : '\n';
}

function fail(code: ParseError['code'], message: string, line: number, markerId?: string): ParseResult {
  return { success: false, error: { code, message, line, markerId } };
}

function label(token: { kind: string; id: string }): string {
  return `${token.kind}:${token.id}`;
}

/**
 * Parse a document into ordered segments.
 */
export function parseDocument(text: string, profile: LanguageProfile, file?: string): ParseResult {
  const lines = splitLines(text);
  const segments: Segment[] = [];
  const seenIds = new Map<string, number>();
  // LIFO of open markers; nesting is rejected so it never holds more than one
  const stack: OpenMarker[] = [];
  let verbatim = '';

  const flushVerbatim = (): void => {
    if (verbatim) {
      segments.push({ type: 'verbatim', text: verbatim });
      verbatim = '';
    }
  };

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const lineNum = i + 1;
    const raw = line.text + line.eol;
    const token: MarkerToken | null = matchMarkerToken(line.text, profile);

    if (!token) {
      const open = stack[stack.length - 1];
      if (open) {
        open.body.push(raw);
      } else {
        verbatim += raw;
      }
      continue;
    }

    if (!isMarkerKind(token.kind)) {
      return fail('UNKNOWN_KIND', `Unknown marker kind '${token.kind}' at line ${lineNum}`, lineNum, token.id);
    }

    if (token.edge === 'start') {
      const open = stack[stack.length - 1];
      if (open) {
        return fail(
          'NESTED_MARKER',
          `Marker ${label(token)} at line ${lineNum} opens inside ${label(open)} (line ${open.line}); nested markers are not supported`,
          lineNum,
          token.id
        );
      }
      const firstSeen = seenIds.get(token.id);
      if (firstSeen !== undefined) {
        return fail(
          'DUPLICATE_ID',
          `Marker id '${token.id}' at line ${lineNum} is already used at line ${firstSeen}`,
          lineNum,
          token.id
        );
      }
      seenIds.set(token.id, lineNum);
      flushVerbatim();
      stack.push({
        kind: token.kind,
        id: token.id,
        indent: line.text.match(/^\s*/)?.[0] ?? '',
        line: lineNum,
        offset: line.offset,
        startToken: raw,
        body: [],
      });
      continue;
    }

    // End token: must close the most recently opened marker
    const open = stack.pop();
    if (!open) {
      return fail(
        'UNBALANCED_MARKER',
        `End token ${label(token)} at line ${lineNum} has no matching start`,
        lineNum,
        token.id
      );
    }
    if (open.kind !== token.kind || open.id !== token.id) {
      return fail(
        'UNBALANCED_MARKER',
        `End token ${label(token)} at line ${lineNum} does not match open marker ${label(open)} (line ${open.line})`,
        lineNum,
        token.id
      );
    }

    const region: Region = {
      kind: open.kind,
      id: open.id,
      indent: open.indent,
      span: {
        startLine: open.line,
        endLine: lineNum,
        startOffset: open.offset,
        endOffset: line.offset + raw.length,
      },
      startToken: open.startToken,
      endToken: raw,
      rawContent: open.body.join(''),
    };
    segments.push({ type: 'region', region });
  }

  const unclosed = stack[stack.length - 1];
  if (unclosed) {
    return fail(
      'UNBALANCED_MARKER',
      `Marker ${label(unclosed)} opened at line ${unclosed.line} is never closed`,
      unclosed.line,
      unclosed.id
    );
  }

  flushVerbatim();

  const document: ParsedDocument = {
    file,
    profile,
    segments,
    lineEnding: detectLineEnding(lines),
  };
  return { success: true, document };
}

/**
 * Reassemble a document's text from its segments.
 */
export function serializeDocument(document: { segments: ReadonlyArray<Segment> }): string {
  let out = '';
  for (const segment of document.segments) {
    if (segment.type === 'verbatim') {
      out += segment.text;
    } else {
      out += segment.region.startToken + segment.region.rawContent + segment.region.endToken;
    }
  }
  return out;
}

/**
 * All regions of a document, in order.
 */
export function regionsOf<R extends Region>(document: { segments: ReadonlyArray<{ type: 'verbatim'; text: string } | { type: 'region'; region: R }> }): R[] {
  const regions: R[] = [];
  for (const segment of document.segments) {
    if (segment.type === 'region') regions.push(segment.region);
  }
  return regions;
}
