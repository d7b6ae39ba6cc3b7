import type { FieldDefinition, Predicate, SortDirection } from './query/types.js';

export type Projection<T, R> = (entity: T) => R;

export interface Materializable<T> {
  toArray(signal?: AbortSignal): Promise<T[]>;
}

/**
 * Opaque, lazily evaluated sequence of entities. Every operation returns a
 * new source; existing instances are never mutated. Nothing is read until
 * count() or toArray() is awaited.
 */
export interface QueryableSource<T> extends Materializable<T> {
  where(predicate: Predicate<T>): QueryableSource<T>;
  orderBy(field: FieldDefinition<T>, direction: SortDirection): OrderedQueryableSource<T>;
  skip(count: number): QueryableSource<T>;
  take(count: number): QueryableSource<T>;
  select<R>(projection: Projection<T, R>): Materializable<R>;
  count(signal?: AbortSignal): Promise<number>;
}

export interface OrderedQueryableSource<T> extends QueryableSource<T> {
  /** Adds a tie-breaking key after the keys already applied. */
  thenBy(field: FieldDefinition<T>, direction: SortDirection): OrderedQueryableSource<T>;
}

/** A source that knows how to eager-load named relations itself. */
export interface IncludableSource<T> extends QueryableSource<T> {
  include(names: readonly string[]): QueryableSource<T>;
}

/**
 * Supplied by the entity owner. Receives only include names that passed
 * the registry allow-set.
 */
export type ApplyInclude<T> = (
  source: QueryableSource<T>,
  includes: readonly string[],
) => QueryableSource<T>;

export interface PagedResult<T> {
  items: T[];
  totalCount: number;
  page: number;
  pageSize: number;
}
