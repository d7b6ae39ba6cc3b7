import { describe, it, expect, vi, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import pg from 'pg';
import { includeRelations } from 'records-querier';
import { buildServer } from '../../src/api/server.js';
import { createCustomerSource } from '../../src/features/customers/source.js';
import { COMPANY } from './fixtures.js';

// Helper to create a mock pool whose query() resolves each batch of rows in turn
function makeMockPool(...batches: object[][]) {
  const query = vi.fn();
  for (const rows of batches) {
    query.mockResolvedValueOnce({ rows, rowCount: rows.length });
  }
  return { query, connect: vi.fn(), end: vi.fn() };
}

const row = {
  id: 'c1',
  company_id: COMPANY,
  code: 'C-001',
  name: 'Acme Corp',
  company_name: null,
  type: 'Business',
  status: 'Active',
  email: null,
  phone: null,
  city: 'Berlin',
  country: 'DE',
  industry: null,
  credit_limit: '5000.00',
  payment_term_days: 30,
  is_active: true,
  created_at: new Date('2024-01-03T00:00:00Z'),
  updated_at: null,
  is_deleted: false,
};

describe('createCustomerSource()', () => {
  it('scopes every query to the company and live rows', async () => {
    const pool = makeMockPool([row]);
    const customers = createCustomerSource(pool as unknown as pg.Pool);
    const items = await customers(COMPANY).toArray();
    expect(items.map((c) => c.creditLimit)).toEqual([5000]);
    expect(pool.query).toHaveBeenCalledWith(
      'SELECT *\nFROM "customers"\nWHERE ("company_id" = $1 AND "is_deleted" = $2)\nORDER BY "id" ASC',
      [COMPANY, false],
    );
  });

  it('loads contacts for the selected customers', async () => {
    const pool = makeMockPool(
      [row],
      [{ id: 'k1', customer_id: 'c1', name: 'Dana Buyer', email: null, phone: null, role: null, is_primary: true }],
    );
    const customers = createCustomerSource(pool as unknown as pg.Pool);
    const [customer] = await includeRelations(customers(COMPANY), ['contacts']).toArray();
    expect(customer?.contacts?.map((c) => c.name)).toEqual(['Dana Buyer']);
    expect(pool.query.mock.calls[1]).toEqual([
      'SELECT *\nFROM "customer_contacts"\nWHERE "customer_id" = ANY($1)\nORDER BY "name" ASC',
      [['c1']],
    ]);
  });
});

describe('GET /api/v1/customers over PostgreSQL', () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  it('counts, then selects the requested page', async () => {
    const pool = makeMockPool([{ count: '7' }], [row]);
    app = buildServer({ customers: createCustomerSource(pool as unknown as pg.Pool), logger: false });

    const res = await app.inject({
      method: 'GET',
      url: '/api/v1/customers',
      query: { 'filter[city]': 'Berlin', sort: 'name', page: '2', pageSize: '5' },
      headers: { 'x-company-id': COMPANY },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ totalCount: 7, page: 2, pageSize: 5 });
    expect(pool.query.mock.calls).toEqual([
      [
        'SELECT COUNT(*) AS count\nFROM "customers"\nWHERE ("company_id" = $1 AND "is_deleted" = $2) AND "city" = $3',
        [COMPANY, false, 'Berlin'],
      ],
      [
        [
          'SELECT *',
          'FROM "customers"',
          'WHERE ("company_id" = $1 AND "is_deleted" = $2) AND "city" = $3',
          'ORDER BY "name" ASC NULLS FIRST, "id" ASC',
          'LIMIT $4',
          'OFFSET $5',
        ].join('\n'),
        [COMPANY, false, 'Berlin', 5, 5],
      ],
    ]);
  });

  it('answers 500 when the database fails', async () => {
    const pool = makeMockPool();
    pool.query.mockRejectedValueOnce(new Error('connection refused'));
    app = buildServer({ customers: createCustomerSource(pool as unknown as pg.Pool), logger: false });

    const res = await app.inject({
      method: 'GET',
      url: '/api/v1/customers',
      headers: { 'x-company-id': COMPANY },
    });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: 'InternalError', message: 'Internal server error' });
  });
});
