/**
 * Marker token grammar.
 *
 *   // <kind:id:start>        line comment form
 *   /* <kind:id:end> *\/      block comment form
 *
 * A token must be the only thing on its line apart from indentation and the
 * comment delimiters of the file's language.
 */
import type { LanguageProfile } from '../languages/types.js';
import type { MarkerId, MarkerKind } from './types.js';

const TOKEN_PATTERN = /^<([A-Za-z][\w-]*):([A-Za-z0-9_.-]+):(start|end)>$/;

export const MARKER_ID_PATTERN = /^[A-Za-z0-9_.-]+$/;

export interface MarkerToken {
  /** Raw kind text; may not be a known kind */
  kind: string;
  id: MarkerId;
  edge: 'start' | 'end';
}

/**
 * Strip the profile's comment delimiters from a trimmed line.
 * Returns null when the line is not a comment of this language.
 */
function commentBody(trimmed: string, profile: LanguageProfile): string | null {
  if (profile.lineComment && trimmed.startsWith(profile.lineComment)) {
    return trimmed.slice(profile.lineComment.length).trim();
  }
  const block = profile.blockComment;
  if (
    block &&
    trimmed.length >= block.open.length + block.close.length &&
    trimmed.startsWith(block.open) &&
    trimmed.endsWith(block.close)
  ) {
    return trimmed.slice(block.open.length, trimmed.length - block.close.length).trim();
  }
  return null;
}

/**
 * Recognize a marker token on a single line (without its line ending).
 */
export function matchMarkerToken(line: string, profile: LanguageProfile): MarkerToken | null {
  const body = commentBody(line.trim(), profile);
  if (body === null) return null;

  const match = body.match(TOKEN_PATTERN);
  if (!match) return null;

  return {
    kind: match[1],
    id: match[2],
    edge: match[3] === 'start' ? 'start' : 'end',
  };
}

function wrapComment(inner: string, profile: LanguageProfile): string {
  if (profile.lineComment) {
    return `${profile.lineComment} ${inner}`;
  }
  if (profile.blockComment) {
    return `${profile.blockComment.open} ${inner} ${profile.blockComment.close}`;
  }
  throw new Error(`Language profile '${profile.id}' has no comment syntax`);
}

export function formatStartToken(profile: LanguageProfile, kind: MarkerKind, id: MarkerId): string {
  return wrapComment(`<${kind}:${id}:start>`, profile);
}

export function formatEndToken(profile: LanguageProfile, kind: MarkerKind, id: MarkerId): string {
  return wrapComment(`<${kind}:${id}:end>`, profile);
}

/**
 * Build the text of a new marker block, for scaffolding files that do not
 * contain the marker yet. Body lines are indented to the marker column.
 */
export function scaffoldMarker(
  profile: LanguageProfile,
  kind: MarkerKind,
  id: MarkerId,
  options: { indent?: string; body?: string; lineEnding?: '\n' | '\r\n' } = {}
): string {
  const indent = options.indent ?? '';
  const eol = options.lineEnding ?? '\n';
  const lines = [`${indent}${formatStartToken(profile, kind, id)}`];
  if (options.body) {
    for (const line of options.body.split(/\r?\n/)) {
      lines.push(line.trim() === '' ? '' : `${indent}${line}`);
    }
  }
  lines.push(`${indent}${formatEndToken(profile, kind, id)}`);
  return lines.join(eol) + eol;
}
