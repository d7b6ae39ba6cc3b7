import { createHash } from 'node:crypto';
import type { QueryParams } from './params.js';

const KEY_SEGMENT = 'querier';

function byKey<V>(entries: [string, V][]): [string, V][] {
  return entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Produces a stable canonical string for the params: filters sorted by field
 * and operator, absent members omitted. Equal searches give equal strings.
 */
export function canonicalizeParams(params: QueryParams): string {
  const filters = byKey(Object.entries(params.filters)).map(([field, operators]) => [
    field,
    byKey(Object.entries(operators)),
  ]);
  return JSON.stringify({
    q: params.freeText,
    filters,
    sort: params.sort,
    include: params.include,
    page: params.page,
    pageSize: params.pageSize,
  });
}

/**
 * Cache key for one search: `{entity}:querier:{hash}`, the hash being the
 * first 16 hex characters of a SHA-256 over the canonical params.
 */
export function queryCacheKey(entity: string, params: QueryParams): string {
  const hash = createHash('sha256').update(canonicalizeParams(params)).digest('hex').slice(0, 16);
  return `${entity.toLowerCase()}:${KEY_SEGMENT}:${hash}`;
}

/** Matches every cached search of an entity, for invalidation after writes. */
export function queryCachePattern(entity: string): string {
  return `${entity.toLowerCase()}:${KEY_SEGMENT}:*`;
}
