export type FieldType =
  | 'string'
  | 'int'
  | 'bigint'
  | 'decimal'
  | 'number'
  | 'boolean'
  | 'date'
  | 'enum'
  | 'uuid'
  | 'text';

/** A coerced filter value, ready to be bound into a predicate. */
export type Literal = string | number | bigint | boolean | Date;

/**
 * A whitelisted, typed accessor for one entity property.
 * Built by defineField()/defineRegistry(), never from caller input.
 */
export interface FieldDefinition<T> {
  /** External name as it appears in filter/sort parameters. */
  readonly name: string;
  /** Entity property the field reads. */
  readonly property: keyof T & string;
  readonly type: FieldType;
  /** Storage column for SQL sources; defaults to `property`. */
  readonly column?: string;
  /** Member names, required for 'enum' fields. */
  readonly values?: readonly string[];
  /** Overrides the built-in coercion for `type`. */
  readonly parse?: (raw: string) => Literal | undefined;
}

export type CompareOp = 'eq' | 'neq' | 'gt' | 'gte' | 'lt' | 'lte';

export type TextMatch = 'contains' | 'startsWith' | 'endsWith';

export type SortDirection = 'asc' | 'desc';

export type Predicate<T> =
  | { kind: 'and'; nodes: Predicate<T>[] }
  | { kind: 'or'; nodes: Predicate<T>[] }
  | { kind: 'compare'; op: CompareOp; field: FieldDefinition<T>; value: Literal }
  | { kind: 'isNull'; field: FieldDefinition<T> }
  | { kind: 'notNull'; field: FieldDefinition<T> }
  | { kind: 'text'; match: TextMatch; field: FieldDefinition<T>; value: string };

export interface SortKey<T> {
  field: FieldDefinition<T>;
  direction: SortDirection;
}
