import { defineRegistry } from 'records-querier';
import type { FieldSpec } from 'records-querier';
import { CUSTOMER_STATUSES, CUSTOMER_TYPES } from '../../domain/customers.js';
import type { Customer } from '../../domain/customers.js';

const name: FieldSpec<Customer> = { property: 'name', type: 'string' };
const code: FieldSpec<Customer> = { property: 'code', type: 'string' };
const status: FieldSpec<Customer> = { property: 'status', type: 'enum', values: CUSTOMER_STATUSES };
const city: FieldSpec<Customer> = { property: 'city', type: 'string' };
const country: FieldSpec<Customer> = { property: 'country', type: 'string' };
const creditLimit: FieldSpec<Customer> = { property: 'creditLimit', type: 'decimal', column: 'credit_limit' };
const createdAt: FieldSpec<Customer> = { property: 'createdAt', type: 'date', column: 'created_at' };

export const CUSTOMER_INCLUDES = ['contacts', 'addresses'] as const;

export const customerRegistry = defineRegistry<Customer>({
  filterable: {
    code,
    name,
    companyName: { property: 'companyName', type: 'string', column: 'company_name' },
    type: { property: 'type', type: 'enum', values: CUSTOMER_TYPES },
    status,
    email: { property: 'email', type: 'string' },
    city,
    country,
    industry: { property: 'industry', type: 'string' },
    creditLimit,
    paymentTermDays: { property: 'paymentTermDays', type: 'int', column: 'payment_term_days' },
    isActive: { property: 'isActive', type: 'boolean', column: 'is_active' },
    createdAt,
  },
  sortable: {
    name,
    code,
    createdAt,
    updatedAt: { property: 'updatedAt', type: 'date', column: 'updated_at' },
    creditLimit,
    city,
    country,
    status,
  },
  includes: CUSTOMER_INCLUDES,
  searchField: 'name',
});
