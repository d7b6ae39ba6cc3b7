export const DEFAULT_PAGE = 1;
export const DEFAULT_PAGE_SIZE = 20;
export const MIN_PAGE_SIZE = 1;
export const MAX_PAGE_SIZE = 500;
/** Largest signed 32-bit integer; larger paging values are not accepted. */
export const MAX_PAGE = 2_147_483_647;
export const DEFAULT_OPERATOR = 'eq';

export const QUERY_SEARCH_KEY = 'q';
export const QUERY_SORT_KEY = 'sort';
export const QUERY_INCLUDE_KEY = 'include';
export const QUERY_PAGE_KEY = 'page';
export const QUERY_PAGE_SIZE_KEY = 'pageSize';

/** filter[field] or filter[field][operator] */
const FILTER_KEY_PATTERN = /^filter\[([^[\]]+)\](?:\[([^[\]]+)\])?$/;
const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

/** field name → operator → raw value */
export type QueryFilters = Readonly<Record<string, Readonly<Record<string, string>>>>;

/** Normalized search request. Frozen after binding. */
export interface QueryParams {
  readonly freeText?: string;
  readonly filters: QueryFilters;
  readonly sort?: string;
  readonly include?: string;
  readonly page: number;
  readonly pageSize: number;
}

export interface QueryParamsInput {
  freeText?: string | undefined;
  filters?: Readonly<Record<string, Readonly<Record<string, string>>>>;
  sort?: string | undefined;
  include?: string | undefined;
  page?: number | undefined;
  pageSize?: number | undefined;
}

function normalizeInteger(value: number | undefined, fallback: number): number {
  if (value === undefined || !Number.isFinite(value)) return fallback;
  return Math.trunc(value);
}

function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

export function createQueryParams(input: QueryParamsInput = {}): QueryParams {
  // fromEntries defines own properties, so a "__proto__" key stays plain data
  const filters = Object.freeze(
    Object.fromEntries(
      Object.entries(input.filters ?? {}).map(([field, operators]) => [
        field,
        Object.freeze(Object.fromEntries(Object.entries(operators))),
      ]),
    ),
  );

  const freeText = blankToUndefined(input.freeText);
  const sort = blankToUndefined(input.sort);
  const include = blankToUndefined(input.include);

  return Object.freeze({
    ...(freeText !== undefined ? { freeText } : {}),
    filters,
    ...(sort !== undefined ? { sort } : {}),
    ...(include !== undefined ? { include } : {}),
    page: normalizeInteger(input.page, DEFAULT_PAGE),
    pageSize: normalizeInteger(input.pageSize, DEFAULT_PAGE_SIZE),
  });
}

export type RawQuery = Readonly<Record<string, string | readonly string[] | undefined>>;

interface FilterEntry {
  field: string;
  operator: string;
  value: string;
}

/** Repeated keys are joined with commas, so `a=1&a=2` reads as "1,2". */
function readValue(raw: RawQuery, key: string): string | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  return typeof value === 'string' ? value : value.join(',');
}

function readInteger(raw: RawQuery, key: string, fallback: number): number {
  const value = readValue(raw, key);
  if (value === undefined || !INTEGER_PATTERN.test(value)) return fallback;
  const n = Number.parseInt(value, 10);
  return n >= -MAX_PAGE - 1 && n <= MAX_PAGE ? n : fallback;
}

export function parseFilterKey(key: string): { field: string; operator: string } | undefined {
  const match = FILTER_KEY_PATTERN.exec(key);
  if (match === null) return undefined;
  const [, field, operator] = match;
  if (field === undefined) return undefined;
  return { field, operator: (operator ?? DEFAULT_OPERATOR).toLowerCase() };
}

function compareIgnoreCase(a: string, b: string): number {
  const x = a.toLowerCase();
  const y = b.toLowerCase();
  return x < y ? -1 : x > y ? 1 : 0;
}

/**
 * Binds raw query-string pairs into QueryParams. Filter keys take the form
 * `filter[field]` (operator `eq`) or `filter[field][operator]`; malformed
 * filter keys are ignored. Filter entries are applied sorted by field, then
 * operator, so the result does not depend on the order of the query string.
 */
export function bindQueryParams(raw: RawQuery): QueryParams {
  const entries: FilterEntry[] = [];
  for (const key of Object.keys(raw)) {
    const parsed = parseFilterKey(key);
    const value = readValue(raw, key);
    if (parsed === undefined || value === undefined) continue;
    entries.push({ ...parsed, value });
  }

  entries.sort(
    (a, b) => compareIgnoreCase(a.field, b.field) || compareIgnoreCase(a.operator, b.operator),
  );

  const filters = new Map<string, Map<string, string>>();
  for (const entry of entries) {
    const operators = filters.get(entry.field) ?? new Map<string, string>();
    operators.set(entry.operator, entry.value);
    filters.set(entry.field, operators);
  }

  return createQueryParams({
    freeText: readValue(raw, QUERY_SEARCH_KEY),
    filters: Object.fromEntries(
      [...filters].map(([field, operators]) => [field, Object.fromEntries(operators)]),
    ),
    sort: readValue(raw, QUERY_SORT_KEY),
    include: readValue(raw, QUERY_INCLUDE_KEY),
    page: readInteger(raw, QUERY_PAGE_KEY, DEFAULT_PAGE),
    pageSize: readInteger(raw, QUERY_PAGE_SIZE_KEY, DEFAULT_PAGE_SIZE),
  });
}
