export {
  RegenerationSession,
  type ChangedKeys,
  type RegenerateOptions,
  type RegenerationSessionOptions,
} from './engine.js';
export { createSessionFromConfig, type ProjectSession, type SessionFactoryOptions } from './factory.js';
export {
  MemorySourceProvider,
  NodeSourceProvider,
  type NodeSourceProviderOptions,
  type SourceProvider,
} from './provider.js';
export type {
  FileFailure,
  FileFailureCode,
  FileOutcome,
  FileStatus,
  IndexResult,
  RegenerationReport,
} from './types.js';
