export { ConditionError, conditionKeys, conditionSyntaxError, evaluateCondition, parseCondition, type ConditionNode } from './conditions.js';
export { ContentGenerator, type ContentGeneratorOptions } from './content-generator.js';
export { markerDependencies } from './dependencies.js';
export { isTruthy, lookupInScopes, lookupPath, stringifyValue, type LookupResult, type ModelSnapshot } from './model.js';
export { GeneratorRegistry } from './registry.js';
export {
  applyGenerationStrategy,
  isConflictChecked,
  mergeImports,
  type ImportMergeResult,
  type ImportSortOrder,
} from './strategies.js';
export {
  MissingPlaceholderError,
  PlaceholderRenderer,
  extractPlaceholders,
  type TemplateRenderer,
} from './template-renderer.js';
export type * from './types.js';
