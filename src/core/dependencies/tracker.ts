/**
 * DependencyTracker: bidirectional index between model keys and the
 * (file, marker) pairs that depend on them.
 *
 * Owned by one session and passed explicitly. Mutation happens only in
 * record/forget/load; everything else is a read.
 */
import type { MarkerId } from '../markers/types.js';
import { keysIntersect } from './keys.js';
import type { DependencyIndexView, DependencyTriple, MarkerRef } from './types.js';

function compareRefs(a: MarkerRef, b: MarkerRef): number {
  if (a.file !== b.file) return a.file < b.file ? -1 : 1;
  if (a.markerId !== b.markerId) return a.markerId < b.markerId ? -1 : 1;
  return 0;
}

export class DependencyTracker implements DependencyIndexView {
  /** model key → file → marker ids */
  private readonly byKey = new Map<string, Map<string, Set<MarkerId>>>();
  /** file → marker id → model keys */
  private readonly byMarker = new Map<string, Map<MarkerId, Set<string>>>();

  /**
   * Set the dependency keys of one marker, replacing what was recorded.
   */
  record(file: string, markerId: MarkerId, keys: Iterable<string>): void {
    this.forgetMarker(file, markerId);

    const markerKeys = new Set(keys);
    let markers = this.byMarker.get(file);
    if (!markers) {
      markers = new Map();
      this.byMarker.set(file, markers);
    }
    markers.set(markerId, markerKeys);

    for (const key of markerKeys) {
      let files = this.byKey.get(key);
      if (!files) {
        files = new Map();
        this.byKey.set(key, files);
      }
      let ids = files.get(file);
      if (!ids) {
        ids = new Set();
        files.set(file, ids);
      }
      ids.add(markerId);
    }
  }

  forgetMarker(file: string, markerId: MarkerId): void {
    const markers = this.byMarker.get(file);
    const keys = markers?.get(markerId);
    if (!markers || !keys) return;

    for (const key of keys) {
      const files = this.byKey.get(key);
      const ids = files?.get(file);
      if (!files || !ids) continue;
      ids.delete(markerId);
      if (ids.size === 0) files.delete(file);
      if (files.size === 0) this.byKey.delete(key);
    }

    markers.delete(markerId);
    if (markers.size === 0) this.byMarker.delete(file);
  }

  /**
   * Drop every marker of a file, before re-recording it from a fresh parse.
   */
  forgetFile(file: string): void {
    const markers = this.byMarker.get(file);
    if (!markers) return;
    for (const markerId of [...markers.keys()]) {
      this.forgetMarker(file, markerId);
    }
  }

  /**
   * Replace the index contents with persisted triples.
   */
  load(triples: Iterable<DependencyTriple>): void {
    this.byKey.clear();
    this.byMarker.clear();

    const grouped = new Map<string, Map<MarkerId, string[]>>();
    for (const triple of triples) {
      let markers = grouped.get(triple.file);
      if (!markers) {
        markers = new Map();
        grouped.set(triple.file, markers);
      }
      const keys = markers.get(triple.markerId) ?? [];
      keys.push(triple.modelKey);
      markers.set(triple.markerId, keys);
    }

    for (const [file, markers] of grouped) {
      for (const [markerId, keys] of markers) {
        this.record(file, markerId, keys);
      }
    }
  }

  /**
   * Markers whose dependencies intersect the changed keys, sorted by file
   * then marker id.
   */
  affected(changedKeys: Iterable<string>): MarkerRef[] {
    const changed = [...changedKeys];
    const seen = new Set<string>();
    const refs: MarkerRef[] = [];

    for (const [key, files] of this.byKey) {
      if (!changed.some((c) => keysIntersect(c, key))) continue;
      for (const [file, ids] of files) {
        for (const markerId of ids) {
          const id = `${file}\u0000${markerId}`;
          if (seen.has(id)) continue;
          seen.add(id);
          refs.push({ file, markerId });
        }
      }
    }

    return refs.sort(compareRefs);
  }

  affectedInFile(file: string, changedKeys: Iterable<string>): Set<MarkerId> {
    const changed = [...changedKeys];
    const result = new Set<MarkerId>();
    const markers = this.byMarker.get(file);
    if (!markers) return result;

    for (const [markerId, keys] of markers) {
      for (const key of keys) {
        if (changed.some((c) => keysIntersect(c, key))) {
          result.add(markerId);
          break;
        }
      }
    }
    return result;
  }

  affectedFiles(changedKeys: Iterable<string>): string[] {
    return [...new Set(this.affected(changedKeys).map((ref) => ref.file))];
  }

  dependenciesOf(file: string, markerId: MarkerId): string[] {
    return [...(this.byMarker.get(file)?.get(markerId) ?? [])].sort();
  }

  dependentsOf(modelKey: string): MarkerRef[] {
    const refs: MarkerRef[] = [];
    for (const [file, ids] of this.byKey.get(modelKey) ?? []) {
      for (const markerId of ids) refs.push({ file, markerId });
    }
    return refs.sort(compareRefs);
  }

  files(): string[] {
    return [...this.byMarker.keys()].sort();
  }

  /**
   * Every (model key, file, marker) row, for persistence.
   */
  triples(file?: string): DependencyTriple[] {
    const rows: DependencyTriple[] = [];
    const entries: Array<[string, Map<MarkerId, Set<string>>]> = file !== undefined
      ? [[file, this.byMarker.get(file) ?? new Map<MarkerId, Set<string>>()]]
      : [...this.byMarker.entries()];

    for (const [f, markers] of entries) {
      for (const [markerId, keys] of markers) {
        for (const modelKey of keys) rows.push({ modelKey, file: f, markerId });
      }
    }
    return rows.sort((a, b) =>
      compareRefs(a, b) || (a.modelKey < b.modelKey ? -1 : a.modelKey > b.modelKey ? 1 : 0)
    );
  }

  /**
   * Detached read-only copy for readers that must not observe a record step
   * in progress.
   */
  snapshot(): DependencyIndexView {
    const copy = new DependencyTracker();
    copy.load(this.triples());
    return copy;
  }
}
