/**
 * Apply an explicit caller decision to a conflicted marker.
 */
import { ErrorCodes, ParseFailure } from '../../utils/errors.js';
import type { LanguageProfile } from '../languages/types.js';
import { parseDocument, serializeDocument } from '../markers/parser.js';
import type { Segment } from '../markers/types.js';
import { formatBody } from '../rewriter/indent.js';
import type { Conflict, ConflictResolution } from './types.js';

export interface ResolvedConflict {
  text: string;
  /** Body now in the file; record it as the marker's baseline */
  baseline: string;
}

/**
 * Rewrite one marker's body according to the resolution. `manual` text is
 * given relative to the marker column and is indented like generated content.
 */
export function resolveConflict(
  text: string,
  profile: LanguageProfile,
  conflict: Conflict,
  resolution: ConflictResolution
): ResolvedConflict {
  const parsed = parseDocument(text, profile, conflict.file);
  if (!parsed.success) {
    throw new ParseFailure(
      ErrorCodes.UNRESOLVABLE_FILE,
      `Cannot resolve conflict on '${conflict.markerId}': ${parsed.error.message}`,
      { file: conflict.file, markerId: conflict.markerId, line: parsed.error.line }
    );
  }

  const { document } = parsed;
  const segments: Segment[] = [...document.segments];
  const index = segments.findIndex(
    (segment) => segment.type === 'region' && segment.region.id === conflict.markerId
  );
  const target = segments[index];
  if (target === undefined || target.type !== 'region') {
    throw new ParseFailure(
      ErrorCodes.MARKER_NOT_FOUND,
      `Marker '${conflict.markerId}' not found${conflict.file ? ` in ${conflict.file}` : ''}`,
      { file: conflict.file, markerId: conflict.markerId }
    );
  }

  const region = target.region;
  let baseline: string;
  if (resolution === 'accept-proposed') {
    baseline = conflict.proposed;
  } else if (resolution === 'keep-existing') {
    baseline = region.rawContent;
  } else {
    baseline = formatBody(resolution.manual, region.indent, document.lineEnding);
  }
  segments[index] = { type: 'region', region: { ...region, rawContent: baseline } };

  return { text: serializeDocument({ segments }), baseline };
}
