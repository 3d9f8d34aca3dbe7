/**
 * State database barrel export.
 */
export * from './manager.js';
export * from './schema.js';
export * from './baseline-store.js';
export * from './repositories/baselines.js';
export * from './repositories/dependencies.js';
