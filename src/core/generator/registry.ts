/**
 * Named generator functions and component renderers referenced by
 * `function` and `component` content sources.
 */
import type { ComponentRenderer, GeneratorFunction } from './types.js';

export class GeneratorRegistry {
  private readonly functions = new Map<string, GeneratorFunction>();
  private readonly components = new Map<string, ComponentRenderer>();

  registerFunction(name: string, fn: GeneratorFunction): this {
    this.functions.set(name, fn);
    return this;
  }

  registerComponent(componentType: string, renderer: ComponentRenderer): this {
    this.components.set(componentType, renderer);
    return this;
  }

  getFunction(name: string): GeneratorFunction | undefined {
    return this.functions.get(name);
  }

  getComponent(componentType: string): ComponentRenderer | undefined {
    return this.components.get(componentType);
  }

  hasFunction(name: string): boolean {
    return this.functions.has(name);
  }

  hasComponent(componentType: string): boolean {
    return this.components.has(componentType);
  }
}
