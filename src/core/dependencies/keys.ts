/**
 * Dotted model-key matching.
 */

/**
 * A changed key affects a dependency when they are equal or when one is a
 * dotted-path ancestor of the other: `schema` affects `schema.fields`, and
 * `schema.fields.0` affects `schema.fields`.
 */
export function keysIntersect(changed: string, dependency: string): boolean {
  return (
    changed === dependency ||
    dependency.startsWith(`${changed}.`) ||
    changed.startsWith(`${dependency}.`)
  );
}

export function anyKeyIntersects(changed: Iterable<string>, dependencies: Iterable<string>): boolean {
  const deps = [...dependencies];
  for (const key of changed) {
    if (deps.some((dep) => keysIntersect(key, dep))) return true;
  }
  return false;
}
