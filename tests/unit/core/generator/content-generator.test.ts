import { describe, it, expect, vi } from 'vitest';
import { ContentGenerator } from '../../../../src/core/generator/content-generator.js';
import { GeneratorRegistry } from '../../../../src/core/generator/registry.js';
import type { GenerationOutcome } from '../../../../src/core/generator/types.js';
import type {
  ConditionalMarker,
  GeneratedMarker,
  ImportMarker,
  TemplateMarker,
} from '../../../../src/core/markers/types.js';

function contentOf(outcome: GenerationOutcome): string {
  if (!outcome.ok) throw new Error(`${outcome.error.code}: ${outcome.error.message}`);
  return outcome.content;
}

function errorOf(outcome: GenerationOutcome) {
  if (outcome.ok) throw new Error(`expected failure, got '${outcome.content}'`);
  return outcome.error;
}

describe('ContentGenerator', () => {
  const generator = new ContentGenerator();

  describe('generated markers', () => {
    const props: GeneratedMarker = {
      kind: 'generated',
      id: 'props',
      strategy: 'replace',
      dependencies: ['schema.fields'],
      source: { type: 'key', key: 'schema.fields', join: ', ' },
    };

    it('should join array values from a key source', () => {
      const outcome = generator.generate(props, { model: { schema: { fields: ['a', 'b'] } }, existing: 'old' });
      expect(outcome).toEqual({ ok: true, content: 'a, b' });
    });

    it('should join with newlines when the source sets no separator', () => {
      const marker: GeneratedMarker = { ...props, source: { type: 'key', key: 'schema.fields' } };
      expect(contentOf(generator.generate(marker, { model: { schema: { fields: ['a', 'b'] } }, existing: '' }))).toBe('a\nb');
    });

    it('should apply the strategy to the existing body', () => {
      const marker: GeneratedMarker = { ...props, strategy: 'merge', source: { type: 'template', template: 'x\n{{ y }}' } };
      expect(contentOf(generator.generate(marker, { model: { y: 'z' }, existing: 'z\nmine' }))).toBe('z\nmine\nx');
    });

    it('should report a missing key source', () => {
      const error = errorOf(generator.generate(props, { model: {}, existing: '', file: 'src/a.ts' }));
      expect(error).toEqual({
        file: 'src/a.ts',
        markerId: 'props',
        kind: 'generated',
        code: 'MISSING_PARAMETER',
        message: "Model key 'schema.fields' not found",
      });
    });

    it('should report an unresolved template placeholder as a missing parameter', () => {
      const marker: GeneratedMarker = { ...props, source: { type: 'template', template: '{{ nope }}' } };
      expect(errorOf(generator.generate(marker, { model: {}, existing: '' })).code).toBe('MISSING_PARAMETER');
    });
  });

  describe('function and component sources', () => {
    const registry = new GeneratorRegistry()
      .registerFunction('upper', ({ args }) => String(args.text).toUpperCase())
      .registerFunction('broken', () => {
        throw new Error('boom');
      })
      .registerComponent('Button', ({ properties, markerId }) => `<Button id="${markerId}" label="${String(properties.label)}" />`);
    const withRegistry = new ContentGenerator({ registry });

    const marker = (source: GeneratedMarker['source']): GeneratedMarker => ({
      kind: 'generated',
      id: 'fn',
      strategy: 'replace',
      dependencies: [],
      source,
    });

    it('should call registered functions with their arguments', () => {
      const outcome = withRegistry.generate(marker({ type: 'function', name: 'upper', args: { text: 'hi' } }), {
        model: {},
        existing: '',
      });
      expect(contentOf(outcome)).toBe('HI');
    });

    it('should render registered components', () => {
      const outcome = withRegistry.generate(
        marker({ type: 'component', componentType: 'Button', properties: { label: 'Save' } }),
        { model: {}, existing: '' }
      );
      expect(contentOf(outcome)).toBe('<Button id="fn" label="Save" />');
    });

    it('should fail only the marker when a function throws', () => {
      const error = errorOf(withRegistry.generate(marker({ type: 'function', name: 'broken' }), { model: {}, existing: '' }));
      expect(error.code).toBe('FUNCTION_FAILED');
      expect(error.message).toBe("Generator function 'broken' threw: boom");
    });

    it('should report unregistered functions', () => {
      const error = errorOf(withRegistry.generate(marker({ type: 'function', name: 'missing' }), { model: {}, existing: '' }));
      expect(error.code).toBe('UNKNOWN_FUNCTION');
      expect(error.message).toBe("No generator function registered as 'missing'");
    });
  });

  describe('conditional markers', () => {
    const banner: ConditionalMarker = {
      kind: 'conditional',
      id: 'banner',
      condition: 'flags.beta',
      strategy: 'include',
      source: { type: 'static', text: '<BetaBanner />' },
      dependencies: [],
    };

    it('should include the source when the condition holds', () => {
      expect(contentOf(generator.generate(banner, { model: { flags: { beta: true } }, existing: '' }))).toBe('<BetaBanner />');
      expect(contentOf(generator.generate(banner, { model: { flags: { beta: false } }, existing: 'x' }))).toBe('');
    });

    it('should invert the condition for exclude', () => {
      const marker: ConditionalMarker = { ...banner, strategy: 'exclude' };
      expect(contentOf(generator.generate(marker, { model: { flags: { beta: false } }, existing: '' }))).toBe('<BetaBanner />');
    });

    const style: ConditionalMarker = {
      kind: 'conditional',
      id: 'style',
      condition: 'variant',
      strategy: 'switch',
      alternatives: { primary: 'btn btn-{{ size }}', default: 'btn' },
      dependencies: [],
    };

    it('should render the alternative matching the value', () => {
      expect(contentOf(generator.generate(style, { model: { variant: 'primary', size: 'lg' }, existing: '' }))).toBe('btn btn-lg');
    });

    it('should fall back to the default alternative', () => {
      expect(contentOf(generator.generate(style, { model: { variant: 'ghost' }, existing: '' }))).toBe('btn');
    });

    it('should report a value with no alternative and no default', () => {
      const marker: ConditionalMarker = { ...style, alternatives: { primary: 'p' } };
      const error = errorOf(generator.generate(marker, { model: { variant: 'ghost' }, existing: '' }));
      expect(error.code).toBe('UNKNOWN_ALTERNATIVE');
      expect(error.message).toBe("Condition 'variant' evaluated to 'ghost', which has no alternative and no default");
    });

    it('should report unparsable conditions', () => {
      const marker: ConditionalMarker = { ...banner, condition: 'flags.beta &&' };
      expect(errorOf(generator.generate(marker, { model: {}, existing: '' })).code).toBe('UNEVALUABLE_CONDITION');
    });
  });

  describe('import markers', () => {
    const imports: ImportMarker = {
      kind: 'import',
      id: 'imports',
      importType: 'module',
      mergeStrategy: 'interactive',
      source: { type: 'key', key: 'imports' },
      dependencies: [],
    };

    it('should return pending content for interactive merges', () => {
      const outcome = generator.generate(imports, { model: { imports: ['import b;'] }, existing: 'import a;' });
      expect(outcome).toEqual({ ok: true, content: 'import a;', pending: 'import a;\nimport b;' });
    });

    it('should sort by locale when configured', () => {
      const localeGenerator = new ContentGenerator({ importSort: 'locale' });
      const marker: ImportMarker = { ...imports, mergeStrategy: 'merge' };
      expect(contentOf(localeGenerator.generate(marker, { model: { imports: ['B'] }, existing: 'a' }))).toBe('a\nB');
    });
  });

  describe('template markers', () => {
    const heading: TemplateMarker = {
      kind: 'template',
      id: 'heading',
      body: '<h1>{{ title }}</h1>',
      parameters: { title: { type: 'string', from: 'page.title', required: true } },
      dependencies: [],
    };

    it('should resolve parameters from their model path', () => {
      expect(contentOf(generator.generate(heading, { model: { page: { title: 'Home' } }, existing: '' }))).toBe('<h1>Home</h1>');
    });

    it('should fall back to parameter defaults', () => {
      const marker: TemplateMarker = {
        ...heading,
        parameters: { title: { type: 'string', default: 'Untitled', required: true } },
      };
      expect(contentOf(generator.generate(marker, { model: {}, existing: '' }))).toBe('<h1>Untitled</h1>');
    });

    it('should report a missing required parameter', () => {
      const error = errorOf(generator.generate(heading, { model: {}, existing: '' }));
      expect(error.code).toBe('MISSING_PARAMETER');
      expect(error.message).toBe("Required parameter 'title' (model key 'page.title') has no value");
    });

    it('should report a parameter of the wrong type', () => {
      const error = errorOf(generator.generate(heading, { model: { page: { title: 3 } }, existing: '' }));
      expect(error.code).toBe('INVALID_PARAMETER');
      expect(error.message).toBe("Parameter 'title' expects string but got number");
    });

    const rows: TemplateMarker = {
      kind: 'template',
      id: 'rows',
      body: '{{ i }}:{{ row.name }}',
      parameters: {},
      iteration: { dataSource: 'rows', itemVar: 'row', indexVar: 'i', separator: ', ' },
      dependencies: [],
    };

    it('should render once per item in order', () => {
      const outcome = generator.generate(rows, { model: { rows: [{ name: 'a' }, { name: 'b' }] }, existing: '' });
      expect(contentOf(outcome)).toBe('0:a, 1:b');
    });

    it('should use the configured separator when the marker sets none', () => {
      const separated = new ContentGenerator({ templateSeparator: ' | ' });
      const marker: TemplateMarker = { ...rows, iteration: { dataSource: 'rows', itemVar: 'row', indexVar: 'i' } };
      expect(contentOf(separated.generate(marker, { model: { rows: [{ name: 'a' }, { name: 'b' }] }, existing: '' }))).toBe('0:a | 1:b');
    });

    it('should render nothing for an empty data source', () => {
      expect(contentOf(generator.generate(rows, { model: { rows: [] }, existing: 'old' }))).toBe('');
    });

    it('should report a missing or non-array data source', () => {
      expect(errorOf(generator.generate(rows, { model: {}, existing: '' })).message).toBe(
        "Iteration data source 'rows' not found in model"
      );
      expect(errorOf(generator.generate(rows, { model: { rows: 'x' }, existing: '' })).message).toBe(
        "Iteration data source 'rows' is not an array"
      );
    });
  });

  it('should use a custom renderer when given one', () => {
    const render = vi.fn((_template: string, _scopes: ReadonlyArray<unknown>) => 'rendered');
    const custom = new ContentGenerator({ renderer: { render } });
    const marker: GeneratedMarker = {
      kind: 'generated',
      id: 'x',
      strategy: 'replace',
      dependencies: [],
      source: { type: 'template', template: 'T' },
    };
    const model = { a: 1 };

    expect(contentOf(custom.generate(marker, { model, existing: '' }))).toBe('rendered');
    expect(render).toHaveBeenCalledWith('T', [model]);
  });
});
