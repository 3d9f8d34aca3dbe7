import { describe, it, expect, beforeEach } from 'vitest';
import { DependencyTracker } from '../../../../src/core/dependencies/tracker.js';

describe('DependencyTracker', () => {
  let tracker: DependencyTracker;

  beforeEach(() => {
    tracker = new DependencyTracker();
    tracker.record('src/b.ts', 'title', ['schema.title']);
    tracker.record('src/a.ts', 'props', ['schema.fields', 'theme']);
    tracker.record('src/a.ts', 'header', ['schema.title']);
  });

  it('should find markers affected by changed keys, sorted by file then id', () => {
    expect(tracker.affected(['schema'])).toEqual([
      { file: 'src/a.ts', markerId: 'header' },
      { file: 'src/a.ts', markerId: 'props' },
      { file: 'src/b.ts', markerId: 'title' },
    ]);
    expect(tracker.affected(['theme'])).toEqual([{ file: 'src/a.ts', markerId: 'props' }]);
    expect(tracker.affected(['unrelated'])).toEqual([]);
  });

  it('should match dotted descendants of a dependency', () => {
    expect(tracker.affected(['schema.fields.0'])).toEqual([{ file: 'src/a.ts', markerId: 'props' }]);
  });

  it('should list affected files and markers per file', () => {
    expect(tracker.affectedFiles(['schema.title'])).toEqual(['src/a.ts', 'src/b.ts']);
    expect([...tracker.affectedInFile('src/a.ts', ['schema.title'])]).toEqual(['header']);
  });

  it('should answer both directions of the index', () => {
    expect(tracker.dependenciesOf('src/a.ts', 'props')).toEqual(['schema.fields', 'theme']);
    expect(tracker.dependentsOf('schema.title')).toEqual([
      { file: 'src/a.ts', markerId: 'header' },
      { file: 'src/b.ts', markerId: 'title' },
    ]);
  });

  it('should replace a marker\'s keys when recorded again', () => {
    tracker.record('src/a.ts', 'props', ['schema.variants']);

    expect(tracker.dependenciesOf('src/a.ts', 'props')).toEqual(['schema.variants']);
    expect(tracker.affected(['theme'])).toEqual([]);
  });

  it('should forget every marker of a file', () => {
    tracker.forgetFile('src/a.ts');

    expect(tracker.files()).toEqual(['src/b.ts']);
    expect(tracker.dependentsOf('schema.title')).toEqual([{ file: 'src/b.ts', markerId: 'title' }]);
  });

  it('should round-trip through triples', () => {
    const copy = new DependencyTracker();
    copy.load(tracker.triples());

    expect(copy.triples()).toEqual(tracker.triples());
    expect(tracker.triples('src/a.ts')).toEqual([
      { modelKey: 'schema.title', file: 'src/a.ts', markerId: 'header' },
      { modelKey: 'schema.fields', file: 'src/a.ts', markerId: 'props' },
      { modelKey: 'theme', file: 'src/a.ts', markerId: 'props' },
    ]);
  });

  it('should give snapshots that do not see later records', () => {
    const view = tracker.snapshot();
    tracker.record('src/c.ts', 'late', ['schema.title']);

    expect(view.affectedFiles(['schema.title'])).toEqual(['src/a.ts', 'src/b.ts']);
    expect(tracker.affectedFiles(['schema.title'])).toEqual(['src/a.ts', 'src/b.ts', 'src/c.ts']);
  });
});
