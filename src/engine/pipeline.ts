import { throwIfCancelled } from '../signal.js';
import { applyIncludes } from '../query/includes.js';
import { DEFAULT_PAGE, DEFAULT_PAGE_SIZE, MAX_PAGE, MAX_PAGE_SIZE, MIN_PAGE_SIZE } from '../query/params.js';
import type { QueryParams } from '../query/params.js';
import { allOf, compileFreeText, compilePredicate } from '../query/predicate.js';
import type { CompileOptions } from '../query/predicate.js';
import type { FieldRegistry } from '../query/registry.js';
import { applySort, resolveSort } from '../query/sort.js';
import type { ApplyInclude, PagedResult, Projection, QueryableSource } from '../types.js';

export type QueryOptions = CompileOptions;

export interface QueryExecution<T, R> {
  source: QueryableSource<T>;
  params: QueryParams;
  registry: FieldRegistry<T>;
  projection: Projection<T, R>;
  applyInclude?: ApplyInclude<T> | undefined;
  options?: QueryOptions | undefined;
  signal?: AbortSignal | undefined;
}

export interface Pagination {
  page: number;
  pageSize: number;
  skip: number;
}

/** page is kept within [1, MAX_PAGE], pageSize within [1, 500]. */
export function clampPagination(page: number, pageSize: number): Pagination {
  const p = Number.isFinite(page) ? Math.min(MAX_PAGE, Math.max(DEFAULT_PAGE, Math.trunc(page))) : DEFAULT_PAGE;
  const size = Number.isFinite(pageSize)
    ? Math.min(MAX_PAGE_SIZE, Math.max(MIN_PAGE_SIZE, Math.trunc(pageSize)))
    : DEFAULT_PAGE_SIZE;
  return { page: p, pageSize: size, skip: (p - 1) * size };
}

/**
 * Runs one search: includes, filters and free text, total count, sort,
 * pagination, projection. The count is taken after filtering and before
 * paging, so totalCount is the size of the whole filtered set.
 */
export async function executeQuery<T, R>(execution: QueryExecution<T, R>): Promise<PagedResult<R>> {
  const { params, registry, signal } = execution;
  throwIfCancelled(signal);

  let source = applyIncludes(execution.source, params.include, registry, execution.applyInclude);

  const predicate = allOf([
    compilePredicate(params.filters, registry, execution.options),
    compileFreeText(params.freeText, registry),
  ]);
  if (predicate !== null) source = source.where(predicate);

  const totalCount = await source.count(signal);
  throwIfCancelled(signal);

  const { page, pageSize, skip } = clampPagination(params.page, params.pageSize);
  const paged = applySort(source, resolveSort(params.sort, registry)).skip(skip).take(pageSize);

  // source failures propagate unchanged, even once the signal has aborted
  const items = await paged.select(execution.projection).toArray(signal);
  throwIfCancelled(signal);

  return { items, totalCount, page, pageSize };
}
