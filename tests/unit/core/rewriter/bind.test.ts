import { describe, it, expect } from 'vitest';
import { MemoryBaselineStore } from '../../../../src/core/baselines/memory-store.js';
import { MarkerCatalog } from '../../../../src/core/catalog/catalog.js';
import { parseDocument, regionsOf } from '../../../../src/core/markers/parser.js';
import type { ParsedDocument } from '../../../../src/core/markers/types.js';
import { bindDocument, selectAffected } from '../../../../src/core/rewriter/bind.js';
import { TS } from '../../../helpers/profiles.js';

const TEXT = [
  '// <guard:logic:start>',
  'work();',
  '// <guard:logic:end>',
  '// <generated:props:start>',
  'a, b',
  '// <generated:props:end>',
  '// <template:rows:start>',
  '// <template:rows:end>',
  '// <generated:orphan:start>',
  '// <generated:orphan:end>',
  '',
].join('\n');

const catalog = new MarkerCatalog()
  .define({
    kind: 'generated',
    id: 'props',
    strategy: 'replace',
    dependencies: [],
    source: { type: 'key', key: 'schema.fields', join: ', ' },
  })
  .define({
    kind: 'template',
    id: 'rows',
    body: '{{ item }}',
    parameters: {},
    iteration: { dataSource: 'table.rows', itemVar: 'item' },
    dependencies: ['theme'],
  });

function parse(file?: string): ParsedDocument {
  const result = parseDocument(TEXT, TS, file);
  if (!result.success) throw new Error(result.error.message);
  return result.document;
}

describe('bindDocument', () => {
  it('should attach definitions and adopt raw content when no baseline is stored', () => {
    const regions = regionsOf(bindDocument(parse('src/a.ts'), { catalog }));

    expect(regions.map((r) => [r.id, r.marker?.kind])).toEqual([
      ['logic', 'guard'],
      ['props', 'generated'],
      ['rows', 'template'],
      ['orphan', undefined],
    ]);
    expect(regions[1].baselineContent).toBe('a, b\n');
    expect(regions[1].hasBaseline).toBe(false);
    expect(regions[1].isModified).toBe(false);
  });

  it('should flag regions whose body differs from the stored baseline', () => {
    const baselines = new MemoryBaselineStore();
    baselines.set('src/a.ts', 'props', 'a\n');
    const regions = regionsOf(bindDocument(parse('src/a.ts'), { catalog, baselines }));

    expect(regions[1].baselineContent).toBe('a\n');
    expect(regions[1].hasBaseline).toBe(true);
    expect(regions[1].isModified).toBe(true);
  });

  it('should not look up baselines for documents without a file', () => {
    const baselines = new MemoryBaselineStore();
    baselines.set('', 'props', 'a\n');
    const regions = regionsOf(bindDocument(parse(), { catalog, baselines }));

    expect(regions[1].hasBaseline).toBe(false);
  });
});

describe('selectAffected', () => {
  const doc = bindDocument(parse('src/a.ts'), { catalog });

  it('should select markers whose dependencies intersect the changed keys', () => {
    expect([...selectAffected(doc, ['schema'])]).toEqual(['props']);
    expect([...selectAffected(doc, ['theme', 'table.rows.0'])]).toEqual(['rows']);
    expect([...selectAffected(doc, ['other'])]).toEqual([]);
  });
});
