/**
 * Zod schema for marker catalog YAML files.
 *
 * ```yaml
 * defaults:
 *   logic: { kind: guard, default_content: "// placeholder" }
 * files:
 *   src/Button.tsx:
 *     props:
 *       kind: generated
 *       depends_on: [schema.fields]
 *       source: { key: schema.fields, join: ", " }
 * ```
 */
import { z } from 'zod';

/** Plain string shorthand is static text. */
export const ContentSourceSchema = z.union([
  z.string(),
  z.object({ static: z.string() }),
  z.object({ template: z.string() }),
  z.object({ key: z.string(), join: z.string().optional() }),
  z.object({ function: z.string(), args: z.record(z.string(), z.unknown()).optional() }),
  z.object({ component: z.string(), properties: z.record(z.string(), z.unknown()).default({}) }),
]);

const DependsOnSchema = z.array(z.string()).default([]);

export const GuardDefinitionSchema = z.object({
  kind: z.literal('guard'),
  preserve_indent: z.boolean().default(true),
  default_content: z.string().optional(),
});

export const GeneratedDefinitionSchema = z.object({
  kind: z.literal('generated'),
  strategy: z.enum(['replace', 'merge', 'if-empty', 'append', 'prepend']).default('replace'),
  depends_on: DependsOnSchema,
  source: ContentSourceSchema,
});

export const ConditionalDefinitionSchema = z.object({
  kind: z.literal('conditional'),
  condition: z.string().min(1),
  strategy: z.enum(['include', 'exclude', 'switch']).default('include'),
  source: ContentSourceSchema.optional(),
  alternatives: z.record(z.string(), z.string()).optional(),
  depends_on: DependsOnSchema,
});

export const ImportDefinitionSchema = z.object({
  kind: z.literal('import'),
  import_type: z.enum(['module', 'dependency', 'local', 'namespace']).default('module'),
  merge_strategy: z.enum(['keep-existing', 'replace', 'merge', 'interactive']).default('merge'),
  source: ContentSourceSchema,
  depends_on: DependsOnSchema,
});

export const TemplateParameterSchema = z.object({
  type: z.enum(['string', 'integer', 'float', 'boolean', 'array', 'object', 'custom']).default('string'),
  from: z.string().optional(),
  default: z.unknown().optional(),
  required: z.boolean().default(false),
  description: z.string().optional(),
});

export const IterationSchema = z.object({
  data_source: z.string(),
  item_var: z.string().default('item'),
  index_var: z.string().optional(),
  separator: z.string().optional(),
});

export const TemplateDefinitionSchema = z.object({
  kind: z.literal('template'),
  body: z.string(),
  parameters: z.record(z.string(), TemplateParameterSchema).default({}),
  iteration: IterationSchema.optional(),
  depends_on: DependsOnSchema,
});

export const MarkerDefinitionSchema = z.discriminatedUnion('kind', [
  GuardDefinitionSchema,
  GeneratedDefinitionSchema,
  ConditionalDefinitionSchema,
  ImportDefinitionSchema,
  TemplateDefinitionSchema,
]);

const DefinitionMapSchema = z.record(z.string(), MarkerDefinitionSchema);

/** An empty catalog file is an empty catalog. */
export const CatalogSchema = z.preprocess(
  (val) => val ?? {},
  z.object({
    defaults: DefinitionMapSchema.default({}),
    files: z.record(z.string(), DefinitionMapSchema).default({}),
  })
);

export type ContentSourceDefinition = z.infer<typeof ContentSourceSchema>;
export type MarkerDefinition = z.infer<typeof MarkerDefinitionSchema>;
export type CatalogDefinition = z.infer<typeof CatalogSchema>;
