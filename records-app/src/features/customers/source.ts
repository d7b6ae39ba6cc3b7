import type pg from 'pg';
import { compare, defineField, PostgresSource } from 'records-querier';
import type { QueryableSource } from 'records-querier';
import type { Customer } from '../../domain/customers.js';
import { mapCustomerRow } from '../../db/row-mapper.js';

/** Resolves the customers visible to one company. */
export type CustomerSourceFactory = (companyId: string) => QueryableSource<Customer>;

// Not part of the registry: callers can never filter or sort on these.
const companyIdField = defineField<Customer>('companyId', { property: 'companyId', type: 'uuid', column: 'company_id' });
const isDeletedField = defineField<Customer>('isDeleted', { property: 'isDeleted', type: 'boolean', column: 'is_deleted' });

/** Narrows a source to one tenant's customers that are not soft-deleted. */
export function scopeToCompany(source: QueryableSource<Customer>, companyId: string): QueryableSource<Customer> {
  return source.where({
    kind: 'and',
    nodes: [compare('eq', companyIdField, companyId.toLowerCase()), compare('eq', isDeletedField, false)],
  });
}

export function createCustomerSource(pool: pg.Pool): CustomerSourceFactory {
  const customers = new PostgresSource<Customer>({
    pool,
    table: 'customers',
    keyColumn: 'id',
    mapRow: mapCustomerRow,
    relations: {
      contacts: { table: 'customer_contacts', foreignKey: 'customer_id', orderBy: 'name' },
      addresses: { table: 'customer_addresses', foreignKey: 'customer_id', orderBy: 'type' },
    },
  });
  return (companyId) => scopeToCompany(customers, companyId);
}
