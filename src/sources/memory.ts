import { throwIfCancelled } from '../signal.js';
import type { CompareOp, FieldDefinition, FieldType, Literal, Predicate, SortDirection, SortKey } from '../query/types.js';
import type { IncludableSource, Materializable, OrderedQueryableSource, Projection, QueryableSource } from '../types.js';
import { ProjectedSource } from './projected.js';

export interface ArraySourceOptions<T> {
  /** Include name → function returning the entity with that relation attached. */
  relations?: Readonly<Record<string, (entity: T) => T>>;
}

type Comparable = string | number | bigint | boolean;

function toComparable(value: unknown, type: FieldType): Comparable | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value.getTime();
  if (typeof value === 'string') {
    if (type === 'uuid') return value.toLowerCase();
    if (type === 'date') {
      const time = Date.parse(value);
      return Number.isNaN(time) ? value : time;
    }
    return value;
  }
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') {
    return value;
  }
  return String(value);
}

/** Total order used for sorting: nulls first, numbers and bigints together, strings by code unit. */
export function compareValues(a: Comparable | null, b: Comparable | null): number {
  if (a === null || b === null) {
    return a === b ? 0 : a === null ? -1 : 1;
  }
  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return Number(a) - Number(b);
  }
  if ((typeof a === 'number' || typeof a === 'bigint') && (typeof b === 'number' || typeof b === 'bigint')) {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  const x = String(a);
  const y = String(b);
  return x < y ? -1 : x > y ? 1 : 0;
}

function read<T>(entity: T, field: FieldDefinition<T>): unknown {
  return entity[field.property];
}

function compareToLiteral<T>(entity: T, field: FieldDefinition<T>, value: Literal): number | null {
  const left = toComparable(read(entity, field), field.type);
  if (left === null) return null;
  return compareValues(left, toComparable(value, field.type));
}

function holds(op: CompareOp, result: number): boolean {
  switch (op) {
    case 'eq':
      return result === 0;
    case 'neq':
      return result !== 0;
    case 'gt':
      return result > 0;
    case 'gte':
      return result >= 0;
    case 'lt':
      return result < 0;
    case 'lte':
      return result <= 0;
  }
}

function asText(value: unknown): string {
  return value instanceof Date ? value.toISOString() : String(value);
}

/**
 * Evaluates a predicate against one entity. A null property never equals,
 * orders against or text-matches a value, but does satisfy `neq`.
 */
export function matches<T>(predicate: Predicate<T>, entity: T): boolean {
  switch (predicate.kind) {
    case 'and':
      return predicate.nodes.every((node) => matches(node, entity));
    case 'or':
      return predicate.nodes.some((node) => matches(node, entity));
    case 'isNull': {
      const value = read(entity, predicate.field);
      return value === null || value === undefined;
    }
    case 'notNull': {
      const value = read(entity, predicate.field);
      return value !== null && value !== undefined;
    }
    case 'compare': {
      const result = compareToLiteral(entity, predicate.field, predicate.value);
      return result === null ? predicate.op === 'neq' : holds(predicate.op, result);
    }
    case 'text': {
      const value = read(entity, predicate.field);
      if (value === null || value === undefined) return false;
      const text = asText(value);
      if (predicate.match === 'contains') return text.includes(predicate.value);
      if (predicate.match === 'startsWith') return text.startsWith(predicate.value);
      return text.endsWith(predicate.value);
    }
  }
}

function sortStable<T>(items: T[], keys: readonly SortKey<T>[]): T[] {
  return items.sort((a, b) => {
    for (const { field, direction } of keys) {
      const result = compareValues(
        toComparable(read(a, field), field.type),
        toComparable(read(b, field), field.type),
      );
      if (result !== 0) return direction === 'desc' ? -result : result;
    }
    return 0;
  });
}

/**
 * In-process source over an array. Operations are recorded as closures and
 * replayed on every count()/toArray(); the array itself is never modified.
 * Unordered results keep insertion order.
 */
export class ArraySource<T> implements OrderedQueryableSource<T>, IncludableSource<T> {
  private unordered: () => T[];
  private keys: readonly SortKey<T>[] = [];

  constructor(
    items: readonly T[],
    private readonly options: ArraySourceOptions<T> = {},
  ) {
    this.unordered = () => [...items];
  }

  private fork(unordered: () => T[], keys: readonly SortKey<T>[]): ArraySource<T> {
    const next = new ArraySource<T>([], this.options);
    next.unordered = unordered;
    next.keys = keys;
    return next;
  }

  private load(): T[] {
    const items = this.unordered();
    return this.keys.length === 0 ? items : sortStable(items, this.keys);
  }

  where(predicate: Predicate<T>): QueryableSource<T> {
    return this.fork(() => this.load().filter((item) => matches(predicate, item)), []);
  }

  orderBy(field: FieldDefinition<T>, direction: SortDirection): OrderedQueryableSource<T> {
    return this.fork(() => this.load(), [{ field, direction }]);
  }

  thenBy(field: FieldDefinition<T>, direction: SortDirection): OrderedQueryableSource<T> {
    return this.fork(this.unordered, [...this.keys, { field, direction }]);
  }

  skip(count: number): QueryableSource<T> {
    return this.fork(() => this.load().slice(Math.max(0, count)), []);
  }

  take(count: number): QueryableSource<T> {
    return this.fork(() => this.load().slice(0, Math.max(0, count)), []);
  }

  include(names: readonly string[]): QueryableSource<T> {
    const loaders = names.flatMap((name) => {
      const loader = this.options.relations?.[name];
      return loader === undefined ? [] : [loader];
    });
    if (loaders.length === 0) return this;
    return this.fork(
      () => this.load().map((item) => loaders.reduce((acc, load) => load(acc), item)),
      [],
    );
  }

  select<R>(projection: Projection<T, R>): Materializable<R> {
    return new ProjectedSource(this, projection);
  }

  async count(signal?: AbortSignal): Promise<number> {
    throwIfCancelled(signal);
    return this.load().length;
  }

  async toArray(signal?: AbortSignal): Promise<T[]> {
    throwIfCancelled(signal);
    return this.load();
  }
}
