import { describe, it, expect } from 'vitest';
import { changedKeysBetween } from '../../../../src/core/dependencies/changes.js';

describe('changedKeysBetween', () => {
  it('should report the dotted paths of changed leaves', () => {
    const before = { schema: { title: 'A', fields: ['a', 'b'] }, theme: 'dark' };
    const after = { schema: { title: 'B', fields: ['a', 'b'] }, theme: 'dark' };

    expect(changedKeysBetween(before, after)).toEqual(['schema.title']);
  });

  it('should compare arrays as a whole', () => {
    expect(changedKeysBetween({ list: [1, 2] }, { list: [1, 2, 3] })).toEqual(['list']);
  });

  it('should report added and removed keys', () => {
    expect(changedKeysBetween({ a: 1 }, { b: 2 })).toEqual(['a', 'b']);
  });

  it('should report a key whose value changed shape', () => {
    expect(changedKeysBetween({ a: { x: 1 } }, { a: 'flat' })).toEqual(['a']);
  });

  it('should report nothing for equal snapshots', () => {
    expect(changedKeysBetween({ a: { b: [{ c: 1 }] } }, { a: { b: [{ c: 1 }] } })).toEqual([]);
  });
});
