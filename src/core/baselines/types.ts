import type { MarkerId } from '../markers/types.js';

/**
 * Last content the engine itself wrote for each marker of each file.
 * Comparing it with the current body is how out-of-band edits are found.
 */
export interface BaselineStore {
  get(file: string, markerId: MarkerId): string | undefined;
  set(file: string, markerId: MarkerId, content: string): void;
  delete(file: string, markerId: MarkerId): void;
  /** Drop baselines of markers no longer present in the file */
  retain(file: string, markerIds: Iterable<MarkerId>): void;
  entries(file: string): Map<MarkerId, string>;
}
