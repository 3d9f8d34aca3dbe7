export { MarkerCatalog, normalizeFileKey } from './catalog.js';
export { buildCatalog, loadCatalog, parseCatalog, toMarkerType } from './loader.js';
export {
  CatalogSchema,
  ContentSourceSchema,
  MarkerDefinitionSchema,
  type CatalogDefinition,
  type MarkerDefinition,
} from './schema.js';
