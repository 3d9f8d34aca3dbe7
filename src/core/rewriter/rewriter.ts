/**
 * Rewriter: merges fresh marker content into a bound document.
 *
 * Guards are copied (or seeded once), unaffected markers pass through
 * untouched, and affected markers are regenerated unless the body was
 * edited out of band and the strategy would throw that edit away. The
 * result is a value; nothing here touches the file system or the
 * dependency index.
 */
import type { Conflict } from '../conflicts/types.js';
import type { ContentGenerator } from '../generator/content-generator.js';
import type { ModelSnapshot } from '../generator/model.js';
import { isConflictChecked } from '../generator/strategies.js';
import type { GenerationError } from '../generator/types.js';
import { serializeDocument } from '../markers/parser.js';
import type { BoundDocument, BoundRegion, GuardMarker, MarkerId, Segment } from '../markers/types.js';
import { dedentBody, formatBody, reindentToColumn } from './indent.js';

export interface RewriteContext {
  model: ModelSnapshot;
  /** Marker ids to regenerate, or every generating marker */
  affected: ReadonlySet<MarkerId> | 'all';
  generator: Pick<ContentGenerator, 'generate'>;
  /** Re-indent guard text pasted shallower than its marker (default true) */
  reindentGuards?: boolean;
}

export interface RewriteResult {
  text: string;
  changed: boolean;
  conflicts: Conflict[];
  errors: GenerationError[];
  /** Body each marker holds after the rewrite, to record as its baseline */
  baselines: Map<MarkerId, string>;
  /** Markers whose body was written from fresh content */
  regenerated: MarkerId[];
  /** Guards filled with their default content */
  seeded: MarkerId[];
}

interface RegionOutcome {
  content: string;
  baseline: string;
}

export function rewriteDocument(document: BoundDocument, context: RewriteContext): RewriteResult {
  const { file, lineEnding } = document;
  const reindentGuards = context.reindentGuards ?? true;
  const result: RewriteResult = {
    text: '',
    changed: false,
    conflicts: [],
    errors: [],
    baselines: new Map(),
    regenerated: [],
    seeded: [],
  };

  const isAffected = (id: MarkerId): boolean =>
    context.affected === 'all' || context.affected.has(id);

  const rewriteGuard = (region: BoundRegion, marker: GuardMarker): RegionOutcome => {
    const raw = region.rawContent;
    if (!region.hasBaseline && raw.trim() === '' && marker.defaultContent !== undefined) {
      const seeded = formatBody(marker.defaultContent, region.indent, lineEnding);
      result.seeded.push(region.id);
      return { content: seeded, baseline: seeded };
    }
    const content = marker.preserveIndent && reindentGuards ? reindentToColumn(raw, region.indent) : raw;
    return { content, baseline: content };
  };

  const rewriteRegion = (region: BoundRegion): RegionOutcome => {
    const raw = region.rawContent;
    const keep: RegionOutcome = { content: raw, baseline: region.baselineContent };
    const { marker } = region;

    if (region.kind === 'guard') {
      return rewriteGuard(region, marker?.kind === 'guard' ? marker : { kind: 'guard', id: region.id, preserveIndent: true });
    }
    if (!isAffected(region.id)) return keep;

    if (!marker) {
      result.errors.push({
        file,
        markerId: region.id,
        kind: region.kind,
        code: 'MISSING_DEFINITION',
        message: `No ${region.kind} definition found for marker '${region.id}'`,
      });
      return keep;
    }
    if (marker.kind === 'guard') return keep;

    const outcome = context.generator.generate(marker, {
      model: context.model,
      existing: dedentBody(raw, region.indent),
      file,
    });
    if (!outcome.ok) {
      result.errors.push(outcome.error);
      return keep;
    }

    const proposed = formatBody(outcome.content, region.indent, lineEnding);

    if (outcome.pending !== undefined) {
      const pending = formatBody(outcome.pending, region.indent, lineEnding);
      result.conflicts.push({
        file,
        markerId: region.id,
        kind: region.kind,
        existing: raw,
        proposed: pending,
        reason: 'interactive-import',
      });
      return keep;
    }

    if (isConflictChecked(marker) && region.isModified && proposed !== raw) {
      result.conflicts.push({
        file,
        markerId: region.id,
        kind: region.kind,
        existing: raw,
        proposed,
        reason: 'diverged',
      });
      return keep;
    }

    if (proposed !== raw) result.regenerated.push(region.id);
    return { content: proposed, baseline: proposed };
  };

  const segments: Segment[] = document.segments.map((segment) => {
    if (segment.type === 'verbatim') return segment;
    const region = segment.region;
    const outcome = rewriteRegion(region);
    result.baselines.set(region.id, outcome.baseline);
    return { type: 'region', region: { ...region, rawContent: outcome.content } };
  });

  result.text = serializeDocument({ segments });
  result.changed = result.text !== serializeDocument(document);
  return result;
}
