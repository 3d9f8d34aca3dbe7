/**
 * Zod schema for `.markwright/config.yaml`.
 */
import { z } from 'zod';

/**
 * Helper to make an object schema default to {} when missing.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Extra comment syntax, registered on top of the built-in table. */
export const LanguageProfileConfigSchema = z
  .object({
    id: z.string().min(1),
    extensions: z.array(z.string().min(1)).min(1),
    line_comment: z.string().min(1).optional(),
    block_comment: z
      .object({
        open: z.string().min(1),
        close: z.string().min(1),
      })
      .optional(),
  })
  .refine((profile) => profile.line_comment !== undefined || profile.block_comment !== undefined, {
    message: 'A language profile needs line_comment or block_comment',
  });

export const ScanConfigSchema = z.object({
  include: z.array(z.string()).default(['**/*']),
  exclude: z.array(z.string()).default(['**/node_modules/**', '**/dist/**', '**/.git/**', '.markwright/**']),
});

export const CatalogConfigSchema = z.object({
  path: z.string().default('.markwright/markers.yaml'),
});

export const GenerationConfigSchema = z.object({
  /** Joins template instances when the marker sets no separator */
  template_separator: z.string().default('\n'),
  /** Shift guard text pasted shallower than its marker back to the marker column */
  reindent_guards: z.boolean().default(true),
  import_sort: z.enum(['codepoint', 'locale']).default('codepoint'),
});

export const StateConfigSchema = z.object({
  /** Keep dependencies and baselines in SQLite across sessions */
  persist: z.boolean().default(false),
  path: z.string().default('.markwright/state.db'),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export const ConfigSchema = withDefaults(z.object({
  version: z.string().default('1.0'),
  languages: z.array(LanguageProfileConfigSchema).default([]),
  scan: withDefaults(ScanConfigSchema),
  catalog: withDefaults(CatalogConfigSchema),
  generation: withDefaults(GenerationConfigSchema),
  state: withDefaults(StateConfigSchema),
  logging: withDefaults(LoggingConfigSchema),
}));

export type LanguageProfileConfig = z.infer<typeof LanguageProfileConfigSchema>;
export type GenerationConfig = z.infer<typeof GenerationConfigSchema>;
export type StateConfig = z.infer<typeof StateConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;
