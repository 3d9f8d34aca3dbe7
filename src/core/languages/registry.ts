/**
 * Language profile table and lookup.
 * Adding a language is a table entry; nothing else in the engine branches
 * on the language.
 */
import * as path from 'node:path';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import type { LanguageProfile } from './types.js';

const C_BLOCK = { open: '/*', close: '*/' } as const;
const XML_BLOCK = { open: '<!--', close: '-->' } as const;

export const BUILTIN_PROFILES: readonly LanguageProfile[] = [
  { id: 'typescript', extensions: ['ts', 'tsx', 'mts', 'cts'], lineComment: '//', blockComment: C_BLOCK },
  { id: 'javascript', extensions: ['js', 'jsx', 'mjs', 'cjs'], lineComment: '//', blockComment: C_BLOCK },
  { id: 'rust', extensions: ['rs'], lineComment: '//', blockComment: C_BLOCK },
  { id: 'java', extensions: ['java'], lineComment: '//', blockComment: C_BLOCK },
  { id: 'kotlin', extensions: ['kt', 'kts'], lineComment: '//', blockComment: C_BLOCK },
  { id: 'csharp', extensions: ['cs'], lineComment: '//', blockComment: C_BLOCK },
  { id: 'cpp', extensions: ['c', 'h', 'cpp', 'cc', 'cxx', 'hpp'], lineComment: '//', blockComment: C_BLOCK },
  { id: 'go', extensions: ['go'], lineComment: '//', blockComment: C_BLOCK },
  { id: 'swift', extensions: ['swift'], lineComment: '//', blockComment: C_BLOCK },
  { id: 'scss', extensions: ['scss', 'less'], lineComment: '//', blockComment: C_BLOCK },
  { id: 'css', extensions: ['css'], blockComment: C_BLOCK },
  { id: 'python', extensions: ['py', 'pyi'], lineComment: '#' },
  { id: 'ruby', extensions: ['rb'], lineComment: '#' },
  { id: 'shell', extensions: ['sh', 'bash', 'zsh'], lineComment: '#' },
  { id: 'yaml', extensions: ['yaml', 'yml'], lineComment: '#' },
  { id: 'toml', extensions: ['toml'], lineComment: '#' },
  { id: 'sql', extensions: ['sql'], lineComment: '--', blockComment: C_BLOCK },
  { id: 'lua', extensions: ['lua'], lineComment: '--' },
  { id: 'html', extensions: ['html', 'htm', 'vue', 'svelte'], blockComment: XML_BLOCK },
  { id: 'xml', extensions: ['xml', 'svg'], blockComment: XML_BLOCK },
];

/**
 * Normalize an extension: lower case, no leading dot.
 */
export function normalizeExtension(extension: string): string {
  return extension.trim().replace(/^\./, '').toLowerCase();
}

/**
 * Extension → profile lookup over the built-in table plus any extra
 * profiles from configuration. Later registrations win.
 */
export class LanguageRegistry {
  private readonly byExtension = new Map<string, LanguageProfile>();
  private readonly byId = new Map<string, LanguageProfile>();

  constructor(extraProfiles: readonly LanguageProfile[] = []) {
    for (const profile of [...BUILTIN_PROFILES, ...extraProfiles]) {
      this.register(profile);
    }
  }

  register(profile: LanguageProfile): void {
    if (!profile.lineComment && !profile.blockComment) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Language profile '${profile.id}' declares no comment syntax`,
        { profile: profile.id }
      );
    }
    const frozen: LanguageProfile = Object.freeze({
      ...profile,
      extensions: Object.freeze(profile.extensions.map(normalizeExtension)),
    });
    this.byId.set(frozen.id, frozen);
    for (const ext of frozen.extensions) {
      this.byExtension.set(ext, frozen);
    }
  }

  profileFor(extension: string): LanguageProfile | undefined {
    return this.byExtension.get(normalizeExtension(extension));
  }

  profileForPath(filePath: string): LanguageProfile | undefined {
    const ext = path.extname(filePath);
    return ext ? this.profileFor(ext) : undefined;
  }

  profileById(id: string): LanguageProfile | undefined {
    return this.byId.get(id);
  }

  list(): LanguageProfile[] {
    return [...this.byId.values()];
  }
}

const defaultRegistry = new LanguageRegistry();

/**
 * Look up a built-in profile by extension (with or without the dot).
 */
export function profileFor(extension: string): LanguageProfile | undefined {
  return defaultRegistry.profileFor(extension);
}

/**
 * Look up a built-in profile from a file path's extension.
 */
export function profileForPath(filePath: string): LanguageProfile | undefined {
  return defaultRegistry.profileForPath(filePath);
}
