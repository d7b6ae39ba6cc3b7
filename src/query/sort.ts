import type { OrderedQueryableSource, QueryableSource } from '../types.js';
import type { FieldRegistry } from './registry.js';
import type { SortKey } from './types.js';

/**
 * Parses `name,-createdAt` into sort keys. A leading `-` means descending.
 * Names missing from the sortable registry are skipped; the first surviving
 * key is the primary order, each later one breaks ties of the keys before it.
 */
export function compileSort<T>(sort: string | undefined, registry: FieldRegistry<T>): SortKey<T>[] {
  if (sort === undefined) return [];

  const keys: SortKey<T>[] = [];
  for (const token of sort.split(',').map((s) => s.trim())) {
    if (token === '') continue;
    const descending = token.startsWith('-');
    const name = descending ? token.slice(1).trim() : token;
    const field = registry.sortField(name);
    if (field === undefined) continue;
    keys.push({ field, direction: descending ? 'desc' : 'asc' });
  }
  return keys;
}

/** Newest first on the registry's creation timestamp, when it has one. */
export function defaultSort<T>(registry: FieldRegistry<T>): SortKey<T>[] {
  const field = registry.createdAtField;
  return field === undefined ? [] : [{ field, direction: 'desc' }];
}

/**
 * Compiled keys for a non-blank sort parameter; the default order only when
 * the parameter is absent or blank. A parameter whose keys are all unknown
 * leaves the source in its natural order.
 */
export function resolveSort<T>(sort: string | undefined, registry: FieldRegistry<T>): SortKey<T>[] {
  if (sort === undefined || sort.trim() === '') return defaultSort(registry);
  return compileSort(sort, registry);
}

export function applySort<T>(source: QueryableSource<T>, keys: readonly SortKey<T>[]): QueryableSource<T> {
  let ordered: OrderedQueryableSource<T> | undefined;
  for (const { field, direction } of keys) {
    ordered = ordered === undefined
      ? source.orderBy(field, direction)
      : ordered.thenBy(field, direction);
  }
  return ordered ?? source;
}
