/**
 * Derive a changed-keys delta from two model snapshots, for callers whose
 * upstream tool does not report one.
 */
import type { ModelSnapshot } from '../generator/model.js';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function sameValue(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) {
    return false;
  }
  return JSON.stringify(a) === JSON.stringify(b);
}

/**
 * Dotted paths whose values differ. Objects are descended into; arrays and
 * scalars are compared as a whole and reported at their own path.
 */
export function changedKeysBetween(previous: ModelSnapshot, next: ModelSnapshot): string[] {
  const changed: string[] = [];

  const walk = (before: unknown, after: unknown, prefix: string): void => {
    if (isPlainObject(before) && isPlainObject(after)) {
      const keys = new Set([...Object.keys(before), ...Object.keys(after)]);
      for (const key of [...keys].sort()) {
        walk(before[key], after[key], prefix ? `${prefix}.${key}` : key);
      }
      return;
    }
    if (!sameValue(before, after) && prefix) {
      changed.push(prefix);
    }
  };

  walk(previous, next, '');
  return changed;
}
