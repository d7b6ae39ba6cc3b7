export { QueryBuilder, transition } from './engine/builder.js';
export type { BuilderAction, BuilderState, Transition } from './engine/builder.js';
export { clampPagination, executeQuery } from './engine/pipeline.js';
export type { Pagination, QueryExecution, QueryOptions } from './engine/pipeline.js';
export { defineField, defineRegistry, FieldRegistry } from './query/registry.js';
export type { FieldSpec, RegistryDefinition } from './query/registry.js';
export {
  bindQueryParams,
  createQueryParams,
  parseFilterKey,
  DEFAULT_PAGE,
  DEFAULT_PAGE_SIZE,
  MAX_PAGE,
  MAX_PAGE_SIZE,
  MIN_PAGE_SIZE,
} from './query/params.js';
export type { QueryFilters, QueryParams, QueryParamsInput, RawQuery } from './query/params.js';
export { allOf, anyOf, compare, compileFreeText, compilePredicate } from './query/predicate.js';
export type { CompileOptions, FilterValuePolicy, SkippedClause, SkipReason } from './query/predicate.js';
export { coerceValue, parseUtcDate } from './query/coerce.js';
export { applySort, compileSort, defaultSort, resolveSort } from './query/sort.js';
export { applyIncludes, includeRelations, resolveIncludes } from './query/includes.js';
export { canonicalizeParams, queryCacheKey, queryCachePattern } from './query/cache-key.js';
export type {
  CompareOp,
  FieldDefinition,
  FieldType,
  Literal,
  Predicate,
  SortDirection,
  SortKey,
  TextMatch,
} from './query/types.js';
export type {
  ApplyInclude,
  IncludableSource,
  Materializable,
  OrderedQueryableSource,
  PagedResult,
  Projection,
  QueryableSource,
} from './types.js';
export { ArraySource, matches } from './sources/memory.js';
export type { ArraySourceOptions } from './sources/memory.js';
export { PostgresSource } from './sources/postgres.js';
export type { PostgresSourceConfig, RelationConfig, Row } from './sources/postgres.js';
export { FilterValueError, QueryCancelledError, QueryStateError, SourceError } from './errors.js';
export type { QueryStateErrorCode } from './errors.js';
