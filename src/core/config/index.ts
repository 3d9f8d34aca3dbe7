export * from './loader.js';
export * from './schema.js';
