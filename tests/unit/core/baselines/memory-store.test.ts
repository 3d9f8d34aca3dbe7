import { describe, it, expect } from 'vitest';
import { MemoryBaselineStore } from '../../../../src/core/baselines/memory-store.js';

describe('MemoryBaselineStore', () => {
  it('should store baselines per file and marker', () => {
    const store = new MemoryBaselineStore();
    store.set('a.ts', 'props', 'a, b\n');
    store.set('b.ts', 'props', 'x\n');

    expect(store.get('a.ts', 'props')).toBe('a, b\n');
    expect(store.get('a.ts', 'missing')).toBeUndefined();
    expect(store.entries('b.ts')).toEqual(new Map([['props', 'x\n']]));
  });

  it('should retain only the given markers', () => {
    const store = new MemoryBaselineStore();
    store.set('a.ts', 'keep', '1');
    store.set('a.ts', 'drop', '2');
    store.retain('a.ts', ['keep']);

    expect([...store.entries('a.ts').keys()]).toEqual(['keep']);
  });

  it('should delete single baselines', () => {
    const store = new MemoryBaselineStore();
    store.set('a.ts', 'x', '1');
    store.delete('a.ts', 'x');

    expect(store.get('a.ts', 'x')).toBeUndefined();
    expect(store.entries('a.ts').size).toBe(0);
  });
});
