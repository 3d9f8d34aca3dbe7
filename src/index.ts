/**
 * Markwright - guarded-region code generation with round-trip rewriting.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Languages and marker parsing
export * from './core/languages/index.js';
export * from './core/markers/index.js';

// Marker definitions
export * from './core/catalog/index.js';

// Content generation
export * from './core/generator/index.js';

// Dependency index and baselines
export * from './core/dependencies/index.js';
export * from './core/baselines/index.js';

// Rewriting and conflicts
export * from './core/rewriter/index.js';
export * from './core/conflicts/index.js';

// Sessions and persistence
export * from './core/session/index.js';
export * from './core/db/index.js';

// Utilities
export * from './utils/index.js';
