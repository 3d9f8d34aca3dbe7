import { describe, it, expect } from 'vitest';
import { MarkerCatalog, normalizeFileKey } from '../../../../src/core/catalog/catalog.js';
import type { GeneratedMarker } from '../../../../src/core/markers/types.js';

const props: GeneratedMarker = {
  kind: 'generated',
  id: 'props',
  strategy: 'replace',
  dependencies: [],
  source: { type: 'key', key: 'schema.fields' },
};

describe('normalizeFileKey', () => {
  it('should use forward slashes without a leading ./', () => {
    expect(normalizeFileKey('.\\src\\a.ts')).toBe('src/a.ts');
    expect(normalizeFileKey('./src/a.ts')).toBe('src/a.ts');
  });
});

describe('MarkerCatalog', () => {
  it('should prefer file-specific definitions over defaults', () => {
    const fileProps: GeneratedMarker = { ...props, strategy: 'merge' };
    const catalog = new MarkerCatalog().define(props).define(fileProps, './src/a.ts');

    expect(catalog.definitionFor('src/a.ts', 'generated', 'props')).toBe(fileProps);
    expect(catalog.definitionFor('src/b.ts', 'generated', 'props')).toBe(props);
    expect(catalog.definitionFor(undefined, 'generated', 'props')).toBe(props);
  });

  it('should not hand out a definition of another kind', () => {
    const catalog = new MarkerCatalog().define(props);
    expect(catalog.definitionFor('src/a.ts', 'template', 'props')).toBeUndefined();
  });

  it('should give undefined guards a default definition', () => {
    const catalog = new MarkerCatalog();
    expect(catalog.definitionFor('src/a.ts', 'guard', 'logic')).toEqual({
      kind: 'guard',
      id: 'logic',
      preserveIndent: true,
    });
  });

  it('should count definitions and list files', () => {
    const catalog = new MarkerCatalog()
      .defineAll([props, { kind: 'guard', id: 'logic', preserveIndent: false }])
      .define(props, 'src/z.ts')
      .define(props, 'src/a.ts');

    expect(catalog.size()).toBe(4);
    expect(catalog.files()).toEqual(['src/a.ts', 'src/z.ts']);
  });
});
