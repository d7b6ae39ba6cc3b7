import { FilterValueError } from '../errors.js';
import { coerceValue, isOrderable } from './coerce.js';
import type { QueryFilters } from './params.js';
import type { FieldRegistry } from './registry.js';
import type { CompareOp, FieldDefinition, Literal, Predicate, TextMatch } from './types.js';

/**
 * What happens to a filter value that does not parse into its field's type:
 * 'ignore' drops that clause, 'reject' throws FilterValueError.
 */
export type FilterValuePolicy = 'ignore' | 'reject';

export type SkipReason =
  | 'unknown_field'
  | 'unknown_operator'
  | 'unsupported_operator'
  | 'invalid_value';

export interface SkippedClause {
  field: string;
  operator?: string;
  value?: string;
  reason: SkipReason;
}

export interface CompileOptions {
  valuePolicy?: FilterValuePolicy;
  /** Called for every filter clause that does not make it into the predicate. */
  onClauseSkipped?: (clause: SkippedClause) => void;
}

type ClauseOutcome<T> = { node: Predicate<T> } | { skipped: SkipReason };

const COMPARE_OPERATORS: ReadonlyMap<string, CompareOp> = new Map<string, CompareOp>([
  ['eq', 'eq'],
  ['neq', 'neq'],
  ['ne', 'neq'],
  ['gt', 'gt'],
  ['gte', 'gte'],
  ['lt', 'lt'],
  ['lte', 'lte'],
]);

const TEXT_OPERATORS: ReadonlyMap<string, TextMatch> = new Map<string, TextMatch>([
  ['contains', 'contains'],
  ['startswith', 'startsWith'],
  ['endswith', 'endsWith'],
]);

function isNullLiteral(raw: string): boolean {
  return raw.toLowerCase() === 'null';
}

/** ANDs the given nodes, flattening nested and-nodes. Null when nothing is left. */
export function allOf<T>(nodes: readonly (Predicate<T> | null)[]): Predicate<T> | null {
  const flat: Predicate<T>[] = [];
  for (const node of nodes) {
    if (node === null) continue;
    if (node.kind === 'and') flat.push(...node.nodes);
    else flat.push(node);
  }
  if (flat.length === 0) return null;
  if (flat.length === 1) return flat[0] ?? null;
  return { kind: 'and', nodes: flat };
}

/** ORs the given nodes. Null when nothing is left. */
export function anyOf<T>(nodes: readonly (Predicate<T> | null)[]): Predicate<T> | null {
  const present = nodes.filter((n): n is Predicate<T> => n !== null);
  if (present.length === 0) return null;
  if (present.length === 1) return present[0] ?? null;
  return { kind: 'or', nodes: present };
}

export function compare<T>(op: CompareOp, field: FieldDefinition<T>, value: Literal): Predicate<T> {
  return { kind: 'compare', op, field, value };
}

function compileIn<T>(
  field: FieldDefinition<T>,
  raw: string,
  policy: FilterValuePolicy,
): ClauseOutcome<T> {
  const nodes: Predicate<T>[] = [];
  for (const item of raw.split(',').map((s) => s.trim())) {
    if (item === '' || isNullLiteral(item)) continue;
    const value = coerceValue(item, field);
    if (value === undefined) {
      if (policy === 'reject') throw new FilterValueError(field.name, 'in', item);
      continue;
    }
    nodes.push(compare('eq', field, value));
  }
  const node = anyOf(nodes);
  return node === null ? { skipped: 'invalid_value' } : { node };
}

function compileClause<T>(
  field: FieldDefinition<T>,
  operator: string,
  raw: string,
  policy: FilterValuePolicy,
): ClauseOutcome<T> {
  if (operator === 'notnull') {
    return { node: { kind: 'notNull', field } };
  }

  if (operator === 'in') {
    if (isNullLiteral(raw)) return { skipped: 'invalid_value' };
    return compileIn(field, raw, policy);
  }

  const textMatch = TEXT_OPERATORS.get(operator);
  if (textMatch !== undefined) {
    if (isNullLiteral(raw)) return { skipped: 'invalid_value' };
    return { node: { kind: 'text', match: textMatch, field, value: raw } };
  }

  const op = COMPARE_OPERATORS.get(operator);
  if (op === undefined) return { skipped: 'unknown_operator' };

  if (op === 'eq' || op === 'neq') {
    if (isNullLiteral(raw)) {
      return { node: { kind: op === 'eq' ? 'isNull' : 'notNull', field } };
    }
  } else {
    if (!isOrderable(field.type)) return { skipped: 'unsupported_operator' };
    if (isNullLiteral(raw)) return { skipped: 'invalid_value' };
  }

  const value = coerceValue(raw, field);
  if (value === undefined) {
    if (policy === 'reject') throw new FilterValueError(field.name, operator, raw);
    return { skipped: 'invalid_value' };
  }
  return { node: compare(op, field, value) };
}

/**
 * Compiles the filter map into one predicate: clauses on the same field are
 * ANDed into a group, groups are ANDed together. Fields missing from the
 * registry and clauses that do not compile are left out. Returns null when
 * no clause survives.
 */
export function compilePredicate<T>(
  filters: QueryFilters,
  registry: FieldRegistry<T>,
  options: CompileOptions = {},
): Predicate<T> | null {
  const policy = options.valuePolicy ?? 'ignore';
  const skip = (clause: SkippedClause): void => {
    options.onClauseSkipped?.(clause);
  };

  const groups: (Predicate<T> | null)[] = [];
  for (const [fieldName, operators] of Object.entries(filters)) {
    const field = registry.filterField(fieldName);
    if (field === undefined) {
      skip({ field: fieldName, reason: 'unknown_field' });
      continue;
    }

    const clauses: Predicate<T>[] = [];
    for (const [rawOperator, raw] of Object.entries(operators)) {
      const operator = rawOperator.toLowerCase();
      const outcome = compileClause(field, operator, raw, policy);
      if ('node' in outcome) {
        clauses.push(outcome.node);
      } else {
        skip({ field: fieldName, operator, value: raw, reason: outcome.skipped });
      }
    }
    groups.push(allOf(clauses));
  }
  return allOf(groups);
}

/**
 * Builds the free-text clause: a `contains` match on the registry's search
 * field. Null when the term is blank or the registry has no search field.
 */
export function compileFreeText<T>(
  freeText: string | undefined,
  registry: FieldRegistry<T>,
): Predicate<T> | null {
  if (freeText === undefined || freeText.trim() === '') return null;
  const field = registry.searchField;
  if (field === undefined) return null;
  return { kind: 'text', match: 'contains', field, value: freeText };
}
