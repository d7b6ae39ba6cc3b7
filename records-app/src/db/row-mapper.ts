import type { Row } from 'records-querier';
import { ADDRESS_TYPES, CUSTOMER_STATUSES, CUSTOMER_TYPES } from '../domain/customers.js';
import type { Customer, CustomerAddress, CustomerContact } from '../domain/customers.js';

export class RowShapeError extends Error {
  constructor(table: string, column: string, expected: string, actual: unknown) {
    super(`${table}.${column}: expected ${expected}, got ${actual === null ? 'null' : typeof actual}`);
    this.name = 'RowShapeError';
  }
}

/** Typed readers over one raw row. pg returns NUMERIC as a string and TIMESTAMPTZ as a Date. */
function reader(table: string, row: Row) {
  const text = (column: string): string => {
    const value = row[column];
    if (typeof value !== 'string') throw new RowShapeError(table, column, 'text', value);
    return value;
  };
  const optionalText = (column: string): string | null => {
    const value = row[column];
    return value === null || value === undefined ? null : text(column);
  };
  const numeric = (column: string): number => {
    const value = row[column];
    const n = typeof value === 'string' ? Number(value) : value;
    if (typeof n !== 'number' || !Number.isFinite(n)) throw new RowShapeError(table, column, 'number', value);
    return n;
  };
  const bool = (column: string): boolean => {
    const value = row[column];
    if (typeof value !== 'boolean') throw new RowShapeError(table, column, 'boolean', value);
    return value;
  };
  const timestamp = (column: string): Date => {
    const value = row[column];
    const date = typeof value === 'string' ? new Date(value) : value;
    if (!(date instanceof Date) || Number.isNaN(date.getTime())) {
      throw new RowShapeError(table, column, 'timestamp', value);
    }
    return date;
  };
  const optionalTimestamp = (column: string): Date | null => {
    const value = row[column];
    return value === null || value === undefined ? null : timestamp(column);
  };
  const oneOf = <V extends string>(column: string, values: readonly V[]): V => {
    const value = text(column);
    const member = values.find((v) => v === value);
    if (member === undefined) throw new RowShapeError(table, column, values.join('|'), value);
    return member;
  };
  return { text, optionalText, numeric, bool, timestamp, optionalTimestamp, oneOf };
}

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function related(row: Row, property: string): Row[] | undefined {
  const value = row[property];
  if (!Array.isArray(value)) return undefined;
  return value.filter(isRow);
}

export function mapContactRow(row: Row): CustomerContact {
  const r = reader('customer_contacts', row);
  return {
    id: r.text('id'),
    customerId: r.text('customer_id'),
    name: r.text('name'),
    email: r.optionalText('email'),
    phone: r.optionalText('phone'),
    role: r.optionalText('role'),
    isPrimary: r.bool('is_primary'),
  };
}

export function mapAddressRow(row: Row): CustomerAddress {
  const r = reader('customer_addresses', row);
  return {
    id: r.text('id'),
    customerId: r.text('customer_id'),
    type: r.oneOf('type', ADDRESS_TYPES),
    line1: r.text('line1'),
    line2: r.optionalText('line2'),
    city: r.text('city'),
    postalCode: r.optionalText('postal_code'),
    country: r.text('country'),
    isDefault: r.bool('is_default'),
  };
}

/** Maps a customers row; `contacts` and `addresses` are set only when they were loaded. */
export function mapCustomerRow(row: Row): Customer {
  const r = reader('customers', row);
  const contacts = related(row, 'contacts');
  const addresses = related(row, 'addresses');
  return {
    id: r.text('id'),
    companyId: r.text('company_id'),
    code: r.text('code'),
    name: r.text('name'),
    companyName: r.optionalText('company_name'),
    type: r.oneOf('type', CUSTOMER_TYPES),
    status: r.oneOf('status', CUSTOMER_STATUSES),
    email: r.optionalText('email'),
    phone: r.optionalText('phone'),
    city: r.optionalText('city'),
    country: r.optionalText('country'),
    industry: r.optionalText('industry'),
    creditLimit: r.numeric('credit_limit'),
    paymentTermDays: r.numeric('payment_term_days'),
    isActive: r.bool('is_active'),
    createdAt: r.timestamp('created_at'),
    updatedAt: r.optionalTimestamp('updated_at'),
    isDeleted: r.bool('is_deleted'),
    ...(contacts !== undefined ? { contacts: contacts.map(mapContactRow) } : {}),
    ...(addresses !== undefined ? { addresses: addresses.map(mapAddressRow) } : {}),
  };
}
