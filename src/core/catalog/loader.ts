/**
 * Load marker catalogs from YAML and convert definitions to marker types.
 */
import { CatalogError, ErrorCodes, MarkwrightError } from '../../utils/errors.js';
import { loadYamlWithSchema, parseYamlWithSchema } from '../../utils/yaml.js';
import { MARKER_ID_PATTERN } from '../markers/grammar.js';
import type { ContentSource, MarkerType, TemplateParameter } from '../markers/types.js';
import { MarkerCatalog } from './catalog.js';
import {
  CatalogSchema,
  type CatalogDefinition,
  type ContentSourceDefinition,
  type MarkerDefinition,
} from './schema.js';

function toContentSource(source: ContentSourceDefinition): ContentSource {
  if (typeof source === 'string') return { type: 'static', text: source };
  if ('static' in source) return { type: 'static', text: source.static };
  if ('template' in source) return { type: 'template', template: source.template };
  if ('key' in source) return { type: 'key', key: source.key, join: source.join };
  if ('function' in source) return { type: 'function', name: source.function, args: source.args };
  return { type: 'component', componentType: source.component, properties: source.properties };
}

/**
 * Convert one validated YAML definition into a marker type.
 */
export function toMarkerType(id: string, definition: MarkerDefinition): MarkerType {
  if (!MARKER_ID_PATTERN.test(id)) {
    throw new CatalogError(
      ErrorCodes.CATALOG_LOAD_ERROR,
      `Invalid marker id '${id}': ids may only contain letters, digits, '_', '.' and '-'`,
      { markerId: id }
    );
  }

  switch (definition.kind) {
    case 'guard':
      return {
        kind: 'guard',
        id,
        preserveIndent: definition.preserve_indent,
        defaultContent: definition.default_content,
      };
    case 'generated':
      return {
        kind: 'generated',
        id,
        strategy: definition.strategy,
        dependencies: definition.depends_on,
        source: toContentSource(definition.source),
      };
    case 'conditional':
      if (definition.strategy === 'switch' && !definition.alternatives) {
        throw new CatalogError(
          ErrorCodes.CATALOG_LOAD_ERROR,
          `Conditional marker '${id}' uses strategy 'switch' but declares no alternatives`,
          { markerId: id }
        );
      }
      if (definition.strategy !== 'switch' && definition.source === undefined) {
        throw new CatalogError(
          ErrorCodes.CATALOG_LOAD_ERROR,
          `Conditional marker '${id}' uses strategy '${definition.strategy}' but declares no source`,
          { markerId: id }
        );
      }
      return {
        kind: 'conditional',
        id,
        condition: definition.condition,
        strategy: definition.strategy,
        source: definition.source === undefined ? undefined : toContentSource(definition.source),
        alternatives: definition.alternatives,
        dependencies: definition.depends_on,
      };
    case 'import':
      return {
        kind: 'import',
        id,
        importType: definition.import_type,
        mergeStrategy: definition.merge_strategy,
        source: toContentSource(definition.source),
        dependencies: definition.depends_on,
      };
    case 'template': {
      const parameters: Record<string, TemplateParameter> = {};
      for (const [name, parameter] of Object.entries(definition.parameters)) {
        parameters[name] = {
          type: parameter.type,
          from: parameter.from,
          default: parameter.default,
          required: parameter.required,
          description: parameter.description,
        };
      }
      return {
        kind: 'template',
        id,
        body: definition.body,
        parameters,
        iteration: definition.iteration && {
          dataSource: definition.iteration.data_source,
          itemVar: definition.iteration.item_var,
          indexVar: definition.iteration.index_var,
          separator: definition.iteration.separator,
        },
        dependencies: definition.depends_on,
      };
    }
  }
}

/**
 * Build a catalog from a validated definition object.
 */
export function buildCatalog(definition: CatalogDefinition): MarkerCatalog {
  const catalog = new MarkerCatalog();
  for (const [id, marker] of Object.entries(definition.defaults)) {
    catalog.define(toMarkerType(id, marker));
  }
  for (const [file, markers] of Object.entries(definition.files)) {
    for (const [id, marker] of Object.entries(markers)) {
      catalog.define(toMarkerType(id, marker), file);
    }
  }
  return catalog;
}

function wrap(error: unknown, source: string): never {
  if (error instanceof CatalogError) throw error;
  if (error instanceof MarkwrightError) {
    throw new CatalogError(
      ErrorCodes.CATALOG_LOAD_ERROR,
      `Failed to load marker catalog from ${source}: ${error.message}`,
      { source, originalCode: error.code }
    );
  }
  throw error;
}

/**
 * Parse a catalog from YAML text.
 */
export function parseCatalog(content: string): MarkerCatalog {
  try {
    return buildCatalog(parseYamlWithSchema(content, CatalogSchema));
  } catch (error) {
    return wrap(error, 'inline YAML');
  }
}

/**
 * Load a catalog from a YAML file.
 */
export async function loadCatalog(filePath: string): Promise<MarkerCatalog> {
  try {
    return buildCatalog(await loadYamlWithSchema(filePath, CatalogSchema));
  } catch (error) {
    return wrap(error, filePath);
  }
}
