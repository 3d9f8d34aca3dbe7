/**
 * MarkerCatalog: out-of-band marker attributes.
 *
 * Delimiters only carry kind and id; strategy, condition, parameters and
 * content source come from here, keyed by file and marker id, with
 * file-independent defaults as the fallback.
 */
import type { GuardMarker, MarkerId, MarkerKind, MarkerType } from '../markers/types.js';

/**
 * Normalize a file key: forward slashes, no leading "./".
 */
export function normalizeFileKey(file: string): string {
  return file.replace(/\\/g, '/').replace(/^(\.\/)+/, '');
}

function defaultGuard(id: MarkerId): GuardMarker {
  return { kind: 'guard', id, preserveIndent: true };
}

export class MarkerCatalog {
  private readonly byFile = new Map<string, Map<MarkerId, MarkerType>>();
  private readonly defaults = new Map<MarkerId, MarkerType>();

  /**
   * Define a marker for one file, or for every file when `file` is omitted.
   */
  define(marker: MarkerType, file?: string): this {
    if (file === undefined) {
      this.defaults.set(marker.id, marker);
      return this;
    }
    const key = normalizeFileKey(file);
    let markers = this.byFile.get(key);
    if (!markers) {
      markers = new Map();
      this.byFile.set(key, markers);
    }
    markers.set(marker.id, marker);
    return this;
  }

  defineAll(markers: Iterable<MarkerType>, file?: string): this {
    for (const marker of markers) this.define(marker, file);
    return this;
  }

  /**
   * Definition for a marker found in a file. Guards without a definition
   * get a plain guard that preserves indentation; other kinds get nothing.
   */
  definitionFor(file: string | undefined, kind: MarkerKind, id: MarkerId): MarkerType | undefined {
    const specific = file !== undefined ? this.byFile.get(normalizeFileKey(file))?.get(id) : undefined;
    const definition = specific ?? this.defaults.get(id);
    if (definition && definition.kind === kind) return definition;
    if (kind === 'guard') return defaultGuard(id);
    return undefined;
  }

  /**
   * Files with file-specific definitions.
   */
  files(): string[] {
    return [...this.byFile.keys()].sort();
  }

  size(): number {
    let count = this.defaults.size;
    for (const markers of this.byFile.values()) count += markers.size;
    return count;
  }
}
