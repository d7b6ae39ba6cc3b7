import { describe, it, expect, vi } from 'vitest';
import { clampPagination, executeQuery } from '../../src/engine/pipeline.js';
import type { QueryOptions } from '../../src/engine/pipeline.js';
import { FilterValueError, QueryCancelledError } from '../../src/errors.js';
import { includeRelations } from '../../src/query/includes.js';
import { bindQueryParams, createQueryParams } from '../../src/query/params.js';
import type { RawQuery } from '../../src/query/params.js';
import { ArraySource } from '../../src/sources/memory.js';
import type { QueryableSource } from '../../src/types.js';
import type { Account } from './fixtures.js';
import { accountRegistry, accountSource, day, ids, makeAccount } from './fixtures.js';

function run(source: QueryableSource<Account>, raw: RawQuery, options?: QueryOptions) {
  return executeQuery({
    source,
    params: bindQueryParams(raw),
    registry: accountRegistry,
    projection: (a: Account) => a,
    applyInclude: includeRelations,
    options,
  });
}

// 25 accounts, 12 of them named foo-*; created one day apart
const numbered = Array.from({ length: 25 }, (_, i) =>
  makeAccount({ id: `a${i}`, name: i < 12 ? `foo-${i}` : `bar-${i}`, createdAt: day(i + 1) }),
);

const statuses = [
  makeAccount({ id: 's1', name: 'Alpha', status: 'open', tier: 4 }),
  makeAccount({ id: 's2', name: 'Bravo', status: 'closed', tier: 1 }),
  makeAccount({ id: 's3', name: 'Charlie', status: 'frozen', tier: 3 }),
  makeAccount({ id: 's4', name: 'Delta', status: null, tier: 2 }),
  makeAccount({ id: 's5', name: 'Echo', status: 'open', tier: 5 }),
];

describe('executeQuery()', () => {
  it('counts every match and returns one page of them', async () => {
    const result = await run(accountSource(numbered), {
      'filter[name][contains]': 'foo',
      page: '1',
      pageSize: '10',
    });
    expect(result.totalCount).toBe(12);
    expect(result.items).toHaveLength(10);
    expect(result.page).toBe(1);
    expect(result.pageSize).toBe(10);
  });

  it('returns min(pageSize, totalCount - (page - 1) * pageSize) items per page', async () => {
    const lengths: number[] = [];
    for (const page of ['1', '2', '3', '4']) {
      const result = await run(accountSource(numbered), { 'filter[name][contains]': 'foo', page, pageSize: '5' });
      lengths.push(result.items.length);
    }
    expect(lengths).toEqual([5, 5, 2, 0]);
  });

  it('defaults to 20 items of page 1', async () => {
    const result = await run(accountSource(numbered), {});
    expect(result).toMatchObject({ totalCount: 25, page: 1, pageSize: 20 });
    expect(result.items).toHaveLength(20);
  });

  it.each<[RawQuery, number, number]>([
    [{ page: '0' }, 1, 20],
    [{ page: '-3' }, 1, 20],
    [{ pageSize: '0' }, 1, 1],
    [{ pageSize: '1000' }, 1, 500],
  ])('clamps %j to page %i of size %i', async (raw, page, pageSize) => {
    const result = await run(accountSource(numbered), raw);
    expect(result.page).toBe(page);
    expect(result.pageSize).toBe(pageSize);
    expect(result.items).toHaveLength(Math.min(pageSize, 25));
  });

  it('serves page 1 for a page number beyond 32-bit range', async () => {
    const result = await run(accountSource(numbered), { page: '1000000000000000000', pageSize: '5' });
    expect(result).toMatchObject({ totalCount: 25, page: 1, pageSize: 5 });
    expect(result.items).toHaveLength(5);
  });

  it('returns an empty last page when the page number is capped', async () => {
    const result = await executeQuery({
      source: accountSource(numbered),
      params: createQueryParams({ page: 1e18, pageSize: 5 }),
      registry: accountRegistry,
      projection: (a: Account) => a,
    });
    expect(result).toEqual({ items: [], totalCount: 25, page: 2147483647, pageSize: 5 });
  });

  it.each<[string, string[]]>([
    ['gt', ['t3', 't4']],
    ['gte', ['t2', 't3', 't4']],
    ['lt', ['t1']],
    ['lte', ['t1', 't2']],
  ])('selects exactly the tiers %s 2', async (operator, expected) => {
    const tiers = [
      makeAccount({ id: 't1', name: 'One', tier: 1 }),
      makeAccount({ id: 't2', name: 'Two', tier: 2 }),
      makeAccount({ id: 't3', name: 'Three', tier: 3 }),
      makeAccount({ id: 't4', name: 'Four', tier: 4 }),
      makeAccount({ id: 't0', name: 'None', tier: null }),
    ];
    const result = await run(accountSource(tiers), { [`filter[tier][${operator}]`]: '2', sort: 'tier' });
    expect(ids(result.items)).toEqual(expected);
  });

  it('breaks ties of the first sort key with the second', async () => {
    const accounts = [
      makeAccount({ id: 'd', name: 'Delta', createdAt: day(2) }),
      makeAccount({ id: 'a', name: 'Alpha', createdAt: day(2) }),
      makeAccount({ id: 'c', name: 'Charlie', createdAt: day(1) }),
      makeAccount({ id: 'b', name: 'Bravo', createdAt: day(2) }),
    ];
    const result = await run(accountSource(accounts), { sort: '-createdAt,name' });
    expect(ids(result.items)).toEqual(['a', 'b', 'd', 'c']);
  });

  it('orders newest first when no sort is given', async () => {
    const accounts = [
      makeAccount({ id: 'mid', createdAt: day(2) }),
      makeAccount({ id: 'old', createdAt: day(1) }),
      makeAccount({ id: 'new', createdAt: day(3) }),
    ];
    const result = await run(accountSource(accounts), {});
    expect(ids(result.items)).toEqual(['new', 'mid', 'old']);
  });

  it('keeps natural order when the sort names only unknown fields', async () => {
    const result = await run(accountSource(statuses), { sort: 'password' });
    expect(ids(result.items)).toEqual(['s1', 's2', 's3', 's4', 's5']);
  });

  it('returns the reverse of an ascending sort for a descending one', async () => {
    const asc = await run(accountSource(statuses), { sort: 'tier' });
    const desc = await run(accountSource(statuses), { sort: '-tier' });
    expect(ids(asc.items)).toEqual(['s2', 's4', 's3', 's1', 's5']);
    expect(ids(desc.items)).toEqual(ids(asc.items).reverse());
  });

  it('treats in as the union of its equalities', async () => {
    const within = await run(accountSource(statuses), { 'filter[status][in]': 'open,frozen', sort: 'name' });
    const open = await run(accountSource(statuses), { 'filter[status]': 'open', sort: 'name' });
    const frozen = await run(accountSource(statuses), { 'filter[status]': 'frozen', sort: 'name' });
    expect(ids(within.items)).toEqual(['s1', 's3', 's5']);
    expect(new Set(ids(within.items))).toEqual(new Set([...ids(open.items), ...ids(frozen.items)]));
  });

  it('finds null values with filter[field]=null', async () => {
    const result = await run(accountSource(statuses), { 'filter[status]': 'null' });
    expect(ids(result.items)).toEqual(['s4']);
  });

  it('gives the same result with or without an unregistered filter', async () => {
    const plain = await run(accountSource(statuses), { sort: 'name' });
    const probed = await run(accountSource(statuses), { sort: 'name', 'filter[password]': 'hunter' });
    expect(probed).toEqual(plain);
  });

  it('matches the free-text term against the search field', async () => {
    const result = await run(accountSource(statuses), { q: 'ha', sort: 'name' });
    expect(ids(result.items)).toEqual(['s1', 's3']);
  });

  it('combines free text with filters', async () => {
    const result = await run(accountSource(statuses), { q: 'ha', 'filter[status]': 'open' });
    expect(ids(result.items)).toEqual(['s1']);
  });

  it('loads allowed includes through the applier', async () => {
    const accounts = [makeAccount({ id: 'a1' }), makeAccount({ id: 'a3' })];
    const result = await run(accountSource(accounts), { include: 'tags,secrets' });
    expect(result.items.map((a) => a.tags)).toEqual([['vip', 'eu'], ['trial']]);
  });

  it('ignores includes when no applier is configured', async () => {
    const result = await executeQuery({
      source: accountSource([makeAccount({ id: 'a1' })]),
      params: bindQueryParams({ include: 'tags' }),
      registry: accountRegistry,
      projection: (a: Account) => a,
    });
    expect(result.items[0]?.tags).toBeUndefined();
  });

  it('projects the page', async () => {
    const result = await executeQuery({
      source: accountSource(statuses),
      params: bindQueryParams({ sort: '-name', pageSize: '2' }),
      registry: accountRegistry,
      projection: (a: Account) => a.name,
    });
    expect(result).toEqual({ items: ['Echo', 'Delta'], totalCount: 5, page: 1, pageSize: 2 });
  });

  it('reports skipped clauses through the options', async () => {
    const onClauseSkipped = vi.fn();
    await run(accountSource(statuses), { 'filter[password]': 'x' }, { onClauseSkipped });
    expect(onClauseSkipped).toHaveBeenCalledWith({ field: 'password', reason: 'unknown_field' });
  });

  it("rejects unparsable values under the 'reject' policy", async () => {
    await expect(
      run(accountSource(statuses), { 'filter[tier]': 'abc' }, { valuePolicy: 'reject' }),
    ).rejects.toBeInstanceOf(FilterValueError);
  });

  describe('failures and cancellation', () => {
    it('does not touch the source once the signal is aborted', async () => {
      const source = accountSource(statuses);
      const count = vi.spyOn(source, 'count');
      const controller = new AbortController();
      controller.abort();
      await expect(
        executeQuery({
          source,
          params: bindQueryParams({}),
          registry: accountRegistry,
          projection: (a: Account) => a,
          signal: controller.signal,
        }),
      ).rejects.toBeInstanceOf(QueryCancelledError);
      expect(count).not.toHaveBeenCalled();
    });

    it('propagates source errors unchanged', async () => {
      const boom = new Error('disk on fire');
      class FailingSource extends ArraySource<Account> {
        override async count(): Promise<number> {
          throw boom;
        }
      }
      await expect(run(new FailingSource([]), {})).rejects.toBe(boom);
    });

    it('propagates a source failure unchanged even after the signal aborts', async () => {
      const controller = new AbortController();
      const dropped = new Error('socket closed');
      class DroppingSource extends ArraySource<Account> {
        override async count(): Promise<number> {
          controller.abort();
          throw dropped;
        }
      }
      const result = executeQuery({
        source: new DroppingSource([]),
        params: bindQueryParams({}),
        registry: accountRegistry,
        projection: (a: Account) => a,
        signal: controller.signal,
      });
      await expect(result).rejects.toBe(dropped);
    });

    it('stops between count and materialization when aborted', async () => {
      const controller = new AbortController();
      class AbortAfterCount extends ArraySource<Account> {
        override async count(): Promise<number> {
          controller.abort();
          return 0;
        }
      }
      await expect(
        executeQuery({
          source: new AbortAfterCount([]),
          params: bindQueryParams({}),
          registry: accountRegistry,
          projection: (a: Account) => a,
          signal: controller.signal,
        }),
      ).rejects.toBeInstanceOf(QueryCancelledError);
    });
  });
});

describe('clampPagination()', () => {
  it('derives the offset from the clamped values', () => {
    expect(clampPagination(3, 20)).toEqual({ page: 3, pageSize: 20, skip: 40 });
    expect(clampPagination(0, 900)).toEqual({ page: 1, pageSize: 500, skip: 0 });
    expect(clampPagination(2, -4)).toEqual({ page: 2, pageSize: 1, skip: 1 });
    expect(clampPagination(1e18, 20)).toEqual({ page: 2147483647, pageSize: 20, skip: 42949672920 });
  });
});
