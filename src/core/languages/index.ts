export {
  BUILTIN_PROFILES,
  LanguageRegistry,
  normalizeExtension,
  profileFor,
  profileForPath,
} from './registry.js';
export type { LanguageProfile } from './types.js';
