import { isTextual } from '../query/coerce.js';
import type { CompareOp, FieldDefinition, Predicate, SortKey, TextMatch } from '../query/types.js';

export interface CompiledQuery {
  sql: string;
  params: unknown[];
}

/** Everything a PostgresSource has accumulated before it is materialized. */
export interface SelectPlan<T> {
  table: string;
  filters: readonly Predicate<T>[];
  order: readonly SortKey<T>[];
  keyColumn?: string;
  offset?: number;
  limit?: number;
}

export interface RelationPlan {
  table: string;
  foreignKey: string;
  orderBy?: string;
}

const COMPARE_SQL: Record<CompareOp, string> = {
  eq: '=',
  neq: 'IS DISTINCT FROM',
  gt: '>',
  gte: '>=',
  lt: '<',
  lte: '<=',
};

/** Quotes an identifier, keeping a `schema.table` split. */
export function quoteIdentifier(name: string): string {
  return name
    .split('.')
    .map((part) => `"${part.replace(/"/g, '""')}"`)
    .join('.');
}

export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

function likePattern(match: TextMatch, value: string): string {
  const escaped = escapeLike(value);
  if (match === 'startsWith') return `${escaped}%`;
  if (match === 'endsWith') return `%${escaped}`;
  return `%${escaped}%`;
}

function columnOf<T>(field: FieldDefinition<T>): string {
  return quoteIdentifier(field.column ?? field.property);
}

// Dates render as UTC ISO-8601 with milliseconds, the form Date.toISOString() gives.
const ISO_UTC_FORMAT = `'YYYY-MM-DD"T"HH24:MI:SS.MS"Z"'`;

/** The text a `text` match runs against: uuid and numeric columns cast, dates in ISO form. */
function textRendering<T>(field: FieldDefinition<T>): string {
  const column = columnOf(field);
  if (isTextual(field.type)) return column;
  if (field.type === 'date') return `to_char(${column} AT TIME ZONE 'UTC', ${ISO_UTC_FORMAT})`;
  return `CAST(${column} AS TEXT)`;
}

function bind(value: unknown, params: unknown[], counter: { n: number }): string {
  params.push(value);
  counter.n += 1;
  return `$${counter.n}`;
}

/**
 * Compiles a predicate into a SQL fragment and appends its parameters.
 * The counter is shared so nested nodes number their placeholders in order.
 */
export function compilePredicateSql<T>(
  node: Predicate<T>,
  params: unknown[],
  counter: { n: number },
): string {
  switch (node.kind) {
    case 'and':
    case 'or': {
      const parts = node.nodes.map((child) => compilePredicateSql(child, params, counter));
      return `(${parts.join(node.kind === 'and' ? ' AND ' : ' OR ')})`;
    }
    case 'isNull':
      return `${columnOf(node.field)} IS NULL`;
    case 'notNull':
      return `${columnOf(node.field)} IS NOT NULL`;
    case 'compare':
      return `${columnOf(node.field)} ${COMPARE_SQL[node.op]} ${bind(node.value, params, counter)}`;
    case 'text': {
      const column = textRendering(node.field);
      return `${column} LIKE ${bind(likePattern(node.match, node.value), params, counter)} ESCAPE '\\'`;
    }
  }
}

function compileWhere<T>(filters: readonly Predicate<T>[], params: unknown[], counter: { n: number }): string | null {
  if (filters.length === 0) return null;
  const parts = filters.map((filter) => compilePredicateSql(filter, params, counter));
  return `WHERE ${parts.join(' AND ')}`;
}

/**
 * ASC sorts NULLS FIRST and DESC NULLS LAST, so nulls order as the smallest
 * value either way. The key column is appended as a final tie-breaker.
 */
export function compileOrderBy<T>(order: readonly SortKey<T>[], keyColumn?: string): string | null {
  const parts = order.map(({ field, direction }) =>
    direction === 'asc' ? `${columnOf(field)} ASC NULLS FIRST` : `${columnOf(field)} DESC NULLS LAST`,
  );
  if (keyColumn !== undefined && !order.some(({ field }) => (field.column ?? field.property) === keyColumn)) {
    parts.push(`${quoteIdentifier(keyColumn)} ASC`);
  }
  return parts.length > 0 ? `ORDER BY ${parts.join(', ')}` : null;
}

function compilePage<T>(plan: SelectPlan<T>, params: unknown[], counter: { n: number }): string[] {
  const lines: string[] = [];
  if (plan.limit !== undefined) lines.push(`LIMIT ${bind(plan.limit, params, counter)}`);
  if (plan.offset !== undefined) lines.push(`OFFSET ${bind(plan.offset, params, counter)}`);
  return lines;
}

export function compileSelectQuery<T>(plan: SelectPlan<T>): CompiledQuery {
  const params: unknown[] = [];
  const counter = { n: 0 };
  const lines = [
    'SELECT *',
    `FROM ${quoteIdentifier(plan.table)}`,
    compileWhere(plan.filters, params, counter),
    compileOrderBy(plan.order, plan.keyColumn),
    ...compilePage(plan, params, counter),
  ];
  return { sql: lines.filter((line) => line !== null).join('\n'), params };
}

/**
 * Counts the rows the plan would select. A paged plan is counted through a
 * subquery so LIMIT/OFFSET apply before COUNT.
 */
export function compileCountQuery<T>(plan: SelectPlan<T>): CompiledQuery {
  const params: unknown[] = [];
  const counter = { n: 0 };
  const where = compileWhere(plan.filters, params, counter);

  if (plan.offset === undefined && plan.limit === undefined) {
    const lines = ['SELECT COUNT(*) AS count', `FROM ${quoteIdentifier(plan.table)}`, where];
    return { sql: lines.filter((line) => line !== null).join('\n'), params };
  }

  const inner = [
    'SELECT 1',
    `FROM ${quoteIdentifier(plan.table)}`,
    where,
    compileOrderBy(plan.order, plan.keyColumn),
    ...compilePage(plan, params, counter),
  ].filter((line) => line !== null);
  return { sql: ['SELECT COUNT(*) AS count', `FROM (${inner.join(' ')}) AS page`].join('\n'), params };
}

/** Loads the related rows of every parent key in one round trip. */
export function compileRelationQuery(relation: RelationPlan, keys: readonly unknown[]): CompiledQuery {
  const lines = [
    'SELECT *',
    `FROM ${quoteIdentifier(relation.table)}`,
    `WHERE ${quoteIdentifier(relation.foreignKey)} = ANY($1)`,
  ];
  if (relation.orderBy !== undefined) lines.push(`ORDER BY ${quoteIdentifier(relation.orderBy)} ASC`);
  return { sql: lines.join('\n'), params: [keys] };
}
