/**
 * Model snapshot access: dotted-path lookup and value rendering.
 */

/** Opaque upstream model; read through dotted paths such as `schema.fields`. */
export type ModelSnapshot = Readonly<Record<string, unknown>>;

export type LookupResult = { found: true; value: unknown } | { found: false };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Resolve a dotted path against a value. A literal key containing dots
 * (e.g. a flat `{"schema.fields": [...]}` environment) wins over traversal.
 */
export function lookupPath(root: unknown, path: string): LookupResult {
  if (isRecord(root) && Object.prototype.hasOwnProperty.call(root, path)) {
    return { found: true, value: root[path] };
  }

  let current: unknown = root;
  for (const part of path.split('.')) {
    if (Array.isArray(current) && /^\d+$/.test(part)) {
      const index = Number(part);
      if (index >= current.length) return { found: false };
      current = current[index];
    } else if (isRecord(current) && Object.prototype.hasOwnProperty.call(current, part)) {
      current = current[part];
    } else {
      return { found: false };
    }
  }
  return { found: true, value: current };
}

/**
 * Resolve a path against layered scopes; the first scope that has it wins.
 */
export function lookupInScopes(scopes: ReadonlyArray<unknown>, path: string): LookupResult {
  for (const scope of scopes) {
    const result = lookupPath(scope, path);
    if (result.found) return result;
  }
  return { found: false };
}

/**
 * Render a model value as source text: strings verbatim, arrays as
 * `[a, b]`, objects as `{k: v}`.
 */
export function stringifyValue(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map(stringifyValue).join(', ')}]`;
  }
  if (isRecord(value)) {
    const entries = Object.entries(value).map(([k, v]) => `${k}: ${stringifyValue(v)}`);
    return `{${entries.join(', ')}}`;
  }
  return String(value);
}

/**
 * Truthiness used by conditions: empty arrays and empty strings are false.
 */
export function isTruthy(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  return Boolean(value);
}
