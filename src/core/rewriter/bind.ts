/**
 * Attach catalog definitions and recorded baselines to parsed regions.
 */
import type { BaselineStore } from '../baselines/types.js';
import type { MarkerCatalog } from '../catalog/catalog.js';
import { anyKeyIntersects } from '../dependencies/keys.js';
import { markerDependencies } from '../generator/dependencies.js';
import type {
  BoundDocument,
  BoundSegment,
  MarkerId,
  ParsedDocument,
} from '../markers/types.js';

export interface BindSources {
  catalog: Pick<MarkerCatalog, 'definitionFor'>;
  /** Baselines are only looked up for documents that carry a file path */
  baselines?: Pick<BaselineStore, 'get'>;
}

export function bindDocument(document: ParsedDocument, sources: BindSources): BoundDocument {
  const { file } = document;
  const segments: BoundSegment[] = document.segments.map((segment) => {
    if (segment.type === 'verbatim') return segment;

    const region = segment.region;
    const stored = file !== undefined ? sources.baselines?.get(file, region.id) : undefined;
    const baselineContent = stored ?? region.rawContent;
    return {
      type: 'region',
      region: {
        ...region,
        marker: sources.catalog.definitionFor(file, region.kind, region.id),
        baselineContent,
        hasBaseline: stored !== undefined,
        isModified: region.rawContent !== baselineContent,
      },
    };
  });

  return { ...document, segments };
}

/**
 * Ids of the document's generating markers whose dependencies intersect
 * the changed keys.
 */
export function selectAffected(document: BoundDocument, changedKeys: Iterable<string>): Set<MarkerId> {
  const changed = [...changedKeys];
  const affected = new Set<MarkerId>();
  for (const segment of document.segments) {
    if (segment.type !== 'region') continue;
    const { marker } = segment.region;
    if (!marker || marker.kind === 'guard') continue;
    if (anyKeyIntersects(changed, markerDependencies(marker))) {
      affected.add(marker.id);
    }
  }
  return affected;
}
