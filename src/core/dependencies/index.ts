export { DependencyTracker } from './tracker.js';
export { keysIntersect, anyKeyIntersects } from './keys.js';
export { changedKeysBetween } from './changes.js';
export type { DependencyIndexView, DependencyStore, DependencyTriple, MarkerRef } from './types.js';
