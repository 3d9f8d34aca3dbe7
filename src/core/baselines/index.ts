export { MemoryBaselineStore } from './memory-store.js';
export type { BaselineStore } from './types.js';
