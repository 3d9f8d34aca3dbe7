/**
 * Text-level strategies for combining a marker's existing body with freshly
 * generated content.
 */
import type {
  GenerationStrategy,
  GeneratingMarker,
  ImportMergeStrategy,
} from '../markers/types.js';

export type ImportSortOrder = 'codepoint' | 'locale';

/**
 * Split content into lines; empty content has no lines.
 */
export function toLines(text: string): string[] {
  return text === '' ? [] : text.split(/\r?\n/);
}

function uniqueLines(lines: Iterable<string>): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const line of lines) {
    if (seen.has(line)) continue;
    seen.add(line);
    result.push(line);
  }
  return result;
}

function concatBodies(first: string, second: string): string {
  if (first === '') return second;
  if (second === '') return first;
  return `${first}\n${second}`;
}

function endsWithLines(lines: string[], block: string[]): boolean {
  if (block.length > lines.length) return false;
  const offset = lines.length - block.length;
  return block.every((line, i) => lines[offset + i] === line);
}

function startsWithLines(lines: string[], block: string[]): boolean {
  if (block.length > lines.length) return false;
  return block.every((line, i) => lines[i] === line);
}

/**
 * Combine existing and generated bodies for a generated marker.
 */
export function applyGenerationStrategy(
  strategy: GenerationStrategy,
  existing: string,
  fresh: string
): string {
  switch (strategy) {
    case 'replace':
      return fresh;
    case 'merge':
      return uniqueLines([...toLines(existing), ...toLines(fresh)]).join('\n');
    case 'if-empty':
      return existing.trim() === '' ? fresh : existing;
    // A body already ending (or starting) with the fresh block is left as is,
    // so regenerating an unchanged model adds nothing
    case 'append':
      return endsWithLines(toLines(existing), toLines(fresh)) ? existing : concatBodies(existing, fresh);
    case 'prepend':
      return startsWithLines(toLines(existing), toLines(fresh)) ? existing : concatBodies(fresh, existing);
  }
}

function importEntries(text: string): string[] {
  return uniqueLines(toLines(text).map((line) => line.trim()).filter((line) => line !== ''));
}

function sortEntries(entries: string[], order: ImportSortOrder): string[] {
  const sorted = [...entries];
  if (order === 'locale') {
    sorted.sort((a, b) => a.localeCompare(b));
  } else {
    sorted.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  }
  return sorted;
}

export interface ImportMergeResult {
  content: string;
  /** Proposed list awaiting a caller decision (interactive strategy only) */
  pending?: string;
}

/**
 * Produce a deterministic, de-duplicated import list.
 */
export function mergeImports(
  strategy: ImportMergeStrategy,
  existing: string,
  required: string,
  order: ImportSortOrder = 'codepoint'
): ImportMergeResult {
  const current = importEntries(existing);
  const wanted = importEntries(required);

  switch (strategy) {
    case 'keep-existing':
      return { content: uniqueLines([...current, ...wanted]).join('\n') };
    case 'replace':
      return { content: wanted.join('\n') };
    case 'merge':
      return { content: sortEntries(uniqueLines([...current, ...wanted]), order).join('\n') };
    case 'interactive': {
      const merged = sortEntries(uniqueLines([...current, ...wanted]), order).join('\n');
      const kept = current.join('\n');
      return merged === kept ? { content: kept } : { content: kept, pending: merged };
    }
  }
}

/**
 * Whether an out-of-band edit of the marker's body stops regeneration with a
 * `diverged` conflict. Every generated strategy is checked. Keep-existing
 * imports only ever add lines, and interactive imports raise their own
 * conflict.
 */
export function isConflictChecked(marker: GeneratingMarker): boolean {
  switch (marker.kind) {
    case 'generated':
      return true;
    case 'import':
      return marker.mergeStrategy === 'replace' || marker.mergeStrategy === 'merge';
    case 'conditional':
    case 'template':
      return true;
  }
}
