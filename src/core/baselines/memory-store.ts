/**
 * In-process baseline store; state lives as long as the session.
 */
import type { MarkerId } from '../markers/types.js';
import type { BaselineStore } from './types.js';

export class MemoryBaselineStore implements BaselineStore {
  private readonly files = new Map<string, Map<MarkerId, string>>();

  get(file: string, markerId: MarkerId): string | undefined {
    return this.files.get(file)?.get(markerId);
  }

  set(file: string, markerId: MarkerId, content: string): void {
    let markers = this.files.get(file);
    if (!markers) {
      markers = new Map();
      this.files.set(file, markers);
    }
    markers.set(markerId, content);
  }

  delete(file: string, markerId: MarkerId): void {
    const markers = this.files.get(file);
    if (!markers) return;
    markers.delete(markerId);
    if (markers.size === 0) this.files.delete(file);
  }

  retain(file: string, markerIds: Iterable<MarkerId>): void {
    const markers = this.files.get(file);
    if (!markers) return;
    const keep = new Set(markerIds);
    for (const markerId of [...markers.keys()]) {
      if (!keep.has(markerId)) markers.delete(markerId);
    }
    if (markers.size === 0) this.files.delete(file);
  }

  entries(file: string): Map<MarkerId, string> {
    return new Map(this.files.get(file) ?? []);
  }
}
