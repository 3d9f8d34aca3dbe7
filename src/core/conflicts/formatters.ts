/**
 * Human-readable conflict listings.
 */
import chalk from 'chalk';
import type { Conflict } from './types.js';

export interface ConflictFormatOptions {
  /** Colour headings and bodies with chalk (default false) */
  color?: boolean;
}

const REASON_LABELS: Record<Conflict['reason'], string> = {
  diverged: 'edited since last generation',
  'interactive-import': 'import list needs review',
};

function bodyLines(body: string, prefix: string): string[] {
  if (body === '') return [`${prefix}(empty)`];
  return body.replace(/\r?\n$/, '').split(/\r?\n/).map((line) => `${prefix}${line}`);
}

export function formatConflict(conflict: Conflict, options: ConflictFormatOptions = {}): string {
  const paint = options.color
    ? { heading: chalk.bold.yellow, existing: chalk.red, proposed: chalk.green }
    : { heading: (s: string) => s, existing: (s: string) => s, proposed: (s: string) => s };

  const location = conflict.file ? `${conflict.file} ` : '';
  const lines = [
    paint.heading(`${location}<${conflict.kind}:${conflict.markerId}> ${REASON_LABELS[conflict.reason]}`),
    '  existing:',
    ...bodyLines(conflict.existing, '  - ').map((line) => paint.existing(line)),
    '  proposed:',
    ...bodyLines(conflict.proposed, '  + ').map((line) => paint.proposed(line)),
  ];
  return lines.join('\n');
}

export function formatConflicts(conflicts: ReadonlyArray<Conflict>, options: ConflictFormatOptions = {}): string {
  if (conflicts.length === 0) return 'No conflicts.';
  const header = `${conflicts.length} conflict${conflicts.length === 1 ? '' : 's'}:`;
  return [header, ...conflicts.map((conflict) => formatConflict(conflict, options))].join('\n\n');
}
