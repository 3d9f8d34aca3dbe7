/**
 * Model keys a marker depends on: declared keys plus the keys its
 * definition reads.
 */
import type { ContentSource, MarkerType } from '../markers/types.js';
import { conditionKeys } from './conditions.js';
import { extractPlaceholders } from './template-renderer.js';

function sourceKeys(source: ContentSource | undefined): string[] {
  if (!source) return [];
  switch (source.type) {
    case 'key':
      return [source.key];
    case 'template':
      return extractPlaceholders(source.template);
    case 'static':
    case 'function':
    case 'component':
      return [];
  }
}

function isBoundName(path: string, names: ReadonlySet<string>): boolean {
  const head = path.split('.')[0];
  return names.has(head);
}

export function markerDependencies(marker: MarkerType): string[] {
  const keys = new Set<string>();
  const add = (values: Iterable<string>): void => {
    for (const value of values) keys.add(value);
  };

  switch (marker.kind) {
    case 'guard':
      return [];
    case 'generated':
      add(marker.dependencies);
      add(sourceKeys(marker.source));
      break;
    case 'import':
      add(marker.dependencies);
      add(sourceKeys(marker.source));
      break;
    case 'conditional':
      add(marker.dependencies);
      add(conditionKeys(marker.condition));
      add(sourceKeys(marker.source));
      for (const alternative of Object.values(marker.alternatives ?? {})) {
        add(extractPlaceholders(alternative));
      }
      break;
    case 'template': {
      add(marker.dependencies);
      const bound = new Set<string>(Object.keys(marker.parameters));
      for (const [name, parameter] of Object.entries(marker.parameters)) {
        keys.add(parameter.from ?? name);
      }
      if (marker.iteration) {
        if (!bound.has(marker.iteration.dataSource)) {
          keys.add(marker.iteration.dataSource);
        }
        bound.add(marker.iteration.itemVar);
        if (marker.iteration.indexVar) bound.add(marker.iteration.indexVar);
      }
      add(extractPlaceholders(marker.body).filter((path) => !isBoundName(path, bound)));
      break;
    }
  }

  return [...keys].sort();
}
