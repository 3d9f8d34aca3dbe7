/**
 * Body indentation relative to a marker's column.
 *
 * Generators work on bodies dedented to the marker column and without a
 * trailing newline; the rewriter indents them back when writing.
 */
import { splitLines } from '../markers/parser.js';

/**
 * Strip the marker indent from each line and drop the final line ending.
 */
export function dedentBody(raw: string, indent: string): string {
  if (raw === '') return '';
  const trimmed = raw.replace(/\r?\n$/, '');
  return trimmed
    .split(/\r?\n/)
    .map((line) => (indent && line.startsWith(indent) ? line.slice(indent.length) : line))
    .join('\n');
}

/**
 * Indent content to the marker column and terminate every line.
 * Blank lines carry no indentation.
 */
export function formatBody(content: string, indent: string, eol: '\n' | '\r\n'): string {
  if (content === '') return '';
  return content
    .split(/\r?\n/)
    .map((line) => (line.trim() === '' ? '' : indent + line))
    .join(eol) + eol;
}

function leadingWhitespace(text: string): number {
  return text.length - text.trimStart().length;
}

/**
 * Shift guard text pasted shallower than the marker column so that its
 * least indented line sits at the column. Relative indentation and line
 * endings are kept; text already at or beyond the column is returned as is.
 */
export function reindentToColumn(raw: string, indent: string): string {
  const lines = splitLines(raw);
  const nonBlank = lines.filter((line) => line.text.trim() !== '');
  if (nonBlank.length === 0) return raw;

  const minIndent = Math.min(...nonBlank.map((line) => leadingWhitespace(line.text)));
  if (minIndent >= indent.length) return raw;

  return lines
    .map((line) => {
      if (line.text.trim() === '') return line.text + line.eol;
      return indent + line.text.slice(minIndent) + line.eol;
    })
    .join('');
}
