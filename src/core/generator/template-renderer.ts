/**
 * Literal `{{ path }}` substitution.
 *
 * The engine only needs the TemplateRenderer interface; callers with their
 * own template language plug theirs in through the ContentGenerator.
 */
import { lookupInScopes, stringifyValue } from './model.js';

const PLACEHOLDER_PATTERN = /\{\{\s*([A-Za-z_$][\w$-]*(?:\.[\w$-]+)*)\s*\}\}/g;

/**
 * Thrown by a renderer when a placeholder has no value in any scope.
 */
export class MissingPlaceholderError extends Error {
  constructor(public readonly placeholder: string) {
    super(`No value for placeholder '{{${placeholder}}}'`);
    this.name = 'MissingPlaceholderError';
  }
}

export interface TemplateRenderer {
  /**
   * Render a template. Scopes are searched in order; the first that
   * resolves a placeholder wins.
   */
  render(template: string, scopes: ReadonlyArray<unknown>): string;
}

export class PlaceholderRenderer implements TemplateRenderer {
  render(template: string, scopes: ReadonlyArray<unknown>): string {
    return template.replace(PLACEHOLDER_PATTERN, (_match, name: string) => {
      const result = lookupInScopes(scopes, name);
      if (!result.found) {
        throw new MissingPlaceholderError(name);
      }
      return stringifyValue(result.value);
    });
  }
}

/**
 * Placeholder paths referenced by a template, in first-use order.
 */
export function extractPlaceholders(template: string): string[] {
  const names: string[] = [];
  for (const match of template.matchAll(PLACEHOLDER_PATTERN)) {
    if (!names.includes(match[1])) names.push(match[1]);
  }
  return names;
}
