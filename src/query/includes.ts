import type { ApplyInclude, IncludableSource, QueryableSource } from '../types.js';
import type { FieldRegistry } from './registry.js';

/**
 * Splits the include parameter and keeps only names on the registry's
 * allow-set, spelled as declared and without duplicates.
 */
export function resolveIncludes<T>(include: string | undefined, registry: FieldRegistry<T>): string[] {
  if (include === undefined) return [];
  const names: string[] = [];
  for (const token of include.split(',').map((s) => s.trim())) {
    if (token === '') continue;
    const name = registry.includeName(token);
    if (name !== undefined && !names.includes(name)) names.push(name);
  }
  return names;
}

export function applyIncludes<T>(
  source: QueryableSource<T>,
  include: string | undefined,
  registry: FieldRegistry<T>,
  apply: ApplyInclude<T> | undefined,
): QueryableSource<T> {
  if (apply === undefined) return source;
  const names = resolveIncludes(include, registry);
  return names.length > 0 ? apply(source, names) : source;
}

export function supportsInclude<T>(source: QueryableSource<T>): source is IncludableSource<T> {
  return 'include' in source && typeof source.include === 'function';
}

/** ApplyInclude for sources that load relations themselves; others pass through. */
export function includeRelations<T>(source: QueryableSource<T>, includes: readonly string[]): QueryableSource<T> {
  return supportsInclude(source) ? source.include(includes) : source;
}
