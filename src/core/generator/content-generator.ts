/**
 * ContentGenerator: computes fresh marker content from a model snapshot.
 *
 * Dispatches on marker kind and strategy. Pure with respect to its inputs:
 * no I/O, no shared state, and user functions are required to be pure too.
 * Every failure is returned as a GenerationError for that marker alone.
 */
import type {
  ConditionalMarker,
  ContentSource,
  GeneratedMarker,
  GeneratingMarker,
  ImportMarker,
  ParameterType,
  TemplateMarker,
} from '../markers/types.js';
import { ConditionError, evaluateCondition } from './conditions.js';
import { isTruthy, lookupInScopes, stringifyValue } from './model.js';
import { GeneratorRegistry } from './registry.js';
import { applyGenerationStrategy, mergeImports, type ImportSortOrder } from './strategies.js';
import {
  MissingPlaceholderError,
  PlaceholderRenderer,
  type TemplateRenderer,
} from './template-renderer.js';
import type {
  GenerationError,
  GenerationErrorCode,
  GenerationOutcome,
  GenerationRequest,
} from './types.js';

export interface ContentGeneratorOptions {
  renderer?: TemplateRenderer;
  registry?: GeneratorRegistry;
  /** Separator between template instances when the marker sets none */
  templateSeparator?: string;
  importSort?: ImportSortOrder;
}

/**
 * Internal failure carrying the code it should be reported with.
 */
class MarkerGenerationFailure extends Error {
  constructor(public readonly code: GenerationErrorCode, message: string) {
    super(message);
    this.name = 'MarkerGenerationFailure';
  }
}

function matchesType(value: unknown, type: ParameterType): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'float':
      return typeof value === 'number' && Number.isFinite(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'array':
      return Array.isArray(value);
    case 'object':
      return typeof value === 'object' && value !== null && !Array.isArray(value);
    case 'custom':
      return true;
  }
}

export class ContentGenerator {
  private readonly renderer: TemplateRenderer;
  private readonly registry: GeneratorRegistry;
  private readonly templateSeparator: string;
  private readonly importSort: ImportSortOrder;

  constructor(options: ContentGeneratorOptions = {}) {
    this.renderer = options.renderer ?? new PlaceholderRenderer();
    this.registry = options.registry ?? new GeneratorRegistry();
    this.templateSeparator = options.templateSeparator ?? '\n';
    this.importSort = options.importSort ?? 'codepoint';
  }

  /**
   * Compute the content a marker should hold. Guards never reach here.
   */
  generate(marker: GeneratingMarker, request: GenerationRequest): GenerationOutcome {
    try {
      switch (marker.kind) {
        case 'generated':
          return { ok: true, content: this.generateGenerated(marker, request) };
        case 'conditional':
          return { ok: true, content: this.generateConditional(marker, request) };
        case 'import':
          return { ok: true, ...this.generateImports(marker, request) };
        case 'template':
          return { ok: true, content: this.generateTemplate(marker, request) };
      }
    } catch (error) {
      return { ok: false, error: this.toGenerationError(marker, request, error) };
    }
  }

  private generateGenerated(marker: GeneratedMarker, request: GenerationRequest): string {
    const fresh = this.renderSource(marker.id, marker.source, request, [request.model]);
    return applyGenerationStrategy(marker.strategy, request.existing, fresh);
  }

  private generateConditional(marker: ConditionalMarker, request: GenerationRequest): string {
    const scopes = [request.model];
    const value = this.evaluate(marker.condition, scopes);

    if (marker.strategy === 'switch') {
      const alternatives = marker.alternatives ?? {};
      const key = stringifyValue(value);
      const template = Object.prototype.hasOwnProperty.call(alternatives, key)
        ? alternatives[key]
        : alternatives.default;
      if (template === undefined) {
        throw new MarkerGenerationFailure(
          'UNKNOWN_ALTERNATIVE',
          `Condition '${marker.condition}' evaluated to '${key}', which has no alternative and no default`
        );
      }
      return this.render(template, scopes);
    }

    const include = marker.strategy === 'include' ? isTruthy(value) : !isTruthy(value);
    if (!include || !marker.source) return '';
    return this.renderSource(marker.id, marker.source, request, scopes);
  }

  private generateImports(marker: ImportMarker, request: GenerationRequest): { content: string; pending?: string } {
    const required = this.renderSource(marker.id, marker.source, request, [request.model]);
    return mergeImports(marker.mergeStrategy, request.existing, required, this.importSort);
  }

  private generateTemplate(marker: TemplateMarker, request: GenerationRequest): string {
    const params = this.resolveParameters(marker, request);
    const baseScopes: unknown[] = [params, request.model];

    if (!marker.iteration) {
      return this.render(marker.body, baseScopes);
    }

    const { dataSource, itemVar, indexVar } = marker.iteration;
    const items = lookupInScopes(baseScopes, dataSource);
    if (!items.found) {
      throw new MarkerGenerationFailure('MISSING_DATA_SOURCE', `Iteration data source '${dataSource}' not found in model`);
    }
    if (!Array.isArray(items.value)) {
      throw new MarkerGenerationFailure('MISSING_DATA_SOURCE', `Iteration data source '${dataSource}' is not an array`);
    }

    const instances = items.value.map((item: unknown, index: number) => {
      const binding: Record<string, unknown> = { [itemVar]: item };
      if (indexVar) binding[indexVar] = index;
      return this.render(marker.body, [binding, ...baseScopes]);
    });
    return instances.join(marker.iteration.separator ?? this.templateSeparator);
  }

  private resolveParameters(marker: TemplateMarker, request: GenerationRequest): Record<string, unknown> {
    const values: Record<string, unknown> = {};

    for (const [name, parameter] of Object.entries(marker.parameters)) {
      const path = parameter.from ?? name;
      const found = lookupInScopes([request.model], path);
      let value: unknown;

      if (found.found) {
        value = found.value;
      } else if (parameter.default !== undefined) {
        value = parameter.default;
      } else if (parameter.required) {
        throw new MarkerGenerationFailure('MISSING_PARAMETER', `Required parameter '${name}' (model key '${path}') has no value`);
      } else {
        continue;
      }

      if (!matchesType(value, parameter.type)) {
        throw new MarkerGenerationFailure(
          'INVALID_PARAMETER',
          `Parameter '${name}' expects ${parameter.type} but got ${Array.isArray(value) ? 'array' : typeof value}`
        );
      }
      values[name] = value;
    }

    return values;
  }

  private renderSource(
    markerId: string,
    source: ContentSource,
    request: GenerationRequest,
    scopes: ReadonlyArray<unknown>
  ): string {
    switch (source.type) {
      case 'static':
        return source.text;
      case 'template':
        return this.render(source.template, scopes);
      case 'key': {
        const found = lookupInScopes(scopes, source.key);
        if (!found.found) {
          throw new MarkerGenerationFailure('MISSING_PARAMETER', `Model key '${source.key}' not found`);
        }
        if (Array.isArray(found.value)) {
          return found.value.map(stringifyValue).join(source.join ?? '\n');
        }
        return stringifyValue(found.value);
      }
      case 'function': {
        const fn = this.registry.getFunction(source.name);
        if (!fn) {
          throw new MarkerGenerationFailure('UNKNOWN_FUNCTION', `No generator function registered as '${source.name}'`);
        }
        return this.callUserCode(`function '${source.name}'`, () =>
          fn({ markerId, model: request.model, args: source.args ?? {}, existing: request.existing })
        );
      }
      case 'component': {
        const renderComponent = this.registry.getComponent(source.componentType);
        if (!renderComponent) {
          throw new MarkerGenerationFailure('UNKNOWN_FUNCTION', `No component renderer registered for '${source.componentType}'`);
        }
        return this.callUserCode(`component '${source.componentType}'`, () =>
          renderComponent({
            markerId,
            model: request.model,
            componentType: source.componentType,
            properties: source.properties,
          })
        );
      }
    }
  }

  private callUserCode(label: string, invoke: () => unknown): string {
    let result: unknown;
    try {
      result = invoke();
    } catch (error) {
      throw new MarkerGenerationFailure(
        'FUNCTION_FAILED',
        `Generator ${label} threw: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    if (typeof result !== 'string') {
      throw new MarkerGenerationFailure(
        'FUNCTION_FAILED',
        `Generator ${label} must synchronously return a string`
      );
    }
    return result;
  }

  private render(template: string, scopes: ReadonlyArray<unknown>): string {
    try {
      return this.renderer.render(template, scopes);
    } catch (error) {
      if (error instanceof MissingPlaceholderError) {
        throw new MarkerGenerationFailure('MISSING_PARAMETER', error.message);
      }
      throw error;
    }
  }

  private evaluate(condition: string, scopes: ReadonlyArray<unknown>): unknown {
    try {
      return evaluateCondition(condition, scopes);
    } catch (error) {
      if (error instanceof ConditionError) {
        throw new MarkerGenerationFailure('UNEVALUABLE_CONDITION', error.message);
      }
      throw error;
    }
  }

  private toGenerationError(
    marker: GeneratingMarker,
    request: GenerationRequest,
    error: unknown
  ): GenerationError {
    const base = { file: request.file, markerId: marker.id, kind: marker.kind };
    if (error instanceof MarkerGenerationFailure) {
      return { ...base, code: error.code, message: error.message };
    }
    // A custom renderer failing in its own way still only fails this marker
    return {
      ...base,
      code: 'FUNCTION_FAILED',
      message: error instanceof Error ? error.message : String(error),
    };
  }
}
