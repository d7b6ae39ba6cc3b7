import { ArraySource } from 'records-querier';
import type { Customer, CustomerContact } from '../../src/domain/customers.js';
import { scopeToCompany } from '../../src/features/customers/source.js';
import type { CustomerSourceFactory } from '../../src/features/customers/source.js';

export const COMPANY = '11111111-1111-4111-8111-111111111111';
export const OTHER_COMPANY = '22222222-2222-4222-8222-222222222222';

export function makeCustomer(overrides: Partial<Customer> & Pick<Customer, 'id' | 'code' | 'name'>): Customer {
  return {
    companyId: COMPANY,
    companyName: null,
    type: 'Business',
    status: 'Active',
    email: null,
    phone: null,
    city: null,
    country: null,
    industry: null,
    creditLimit: 0,
    paymentTermDays: 30,
    isActive: true,
    createdAt: new Date('2024-01-01T00:00:00Z'),
    updatedAt: null,
    isDeleted: false,
    ...overrides,
  };
}

export const customers: Customer[] = [
  makeCustomer({
    id: 'c1',
    code: 'C-001',
    name: 'Acme Corp',
    city: 'Berlin',
    country: 'DE',
    creditLimit: 5000,
    createdAt: new Date('2024-01-03T00:00:00Z'),
  }),
  makeCustomer({
    id: 'c2',
    code: 'C-002',
    name: 'Beta Ltd',
    status: 'Suspended',
    city: 'Paris',
    country: 'FR',
    creditLimit: 1000,
    paymentTermDays: 60,
    createdAt: new Date('2024-01-02T00:00:00Z'),
  }),
  makeCustomer({
    id: 'c3',
    code: 'C-003',
    name: 'Carol Smith',
    type: 'Individual',
    city: 'Berlin',
    country: 'DE',
    paymentTermDays: 15,
    createdAt: new Date('2024-01-01T00:00:00Z'),
  }),
  makeCustomer({
    id: 'c4',
    code: 'C-004',
    name: 'Deleted Co',
    isDeleted: true,
    createdAt: new Date('2024-01-04T00:00:00Z'),
  }),
  makeCustomer({
    id: 'c5',
    code: 'C-005',
    name: 'Other Tenant Inc',
    companyId: OTHER_COMPANY,
    createdAt: new Date('2024-01-05T00:00:00Z'),
  }),
];

const contacts: Record<string, CustomerContact[]> = {
  c1: [
    {
      id: 'k1',
      customerId: 'c1',
      name: 'Dana Buyer',
      email: 'dana@example.test',
      phone: null,
      role: 'Purchasing',
      isPrimary: true,
    },
  ],
};

/** Same scoping as the Postgres factory, over the in-memory customers. */
export function inMemoryCustomers(items: readonly Customer[] = customers): CustomerSourceFactory {
  const source = new ArraySource<Customer>(items, {
    relations: {
      contacts: (customer) => ({ ...customer, contacts: contacts[customer.id] ?? [] }),
      addresses: (customer) => ({ ...customer, addresses: [] }),
    },
  });
  return (companyId) => scopeToCompany(source, companyId);
}
