export const CUSTOMER_TYPES = ['Individual', 'Business', 'Government'] as const;
export type CustomerType = (typeof CUSTOMER_TYPES)[number];

export const CUSTOMER_STATUSES = ['Active', 'Inactive', 'Suspended', 'Blacklisted'] as const;
export type CustomerStatus = (typeof CUSTOMER_STATUSES)[number];

export const ADDRESS_TYPES = ['Billing', 'Shipping'] as const;
export type AddressType = (typeof ADDRESS_TYPES)[number];

export interface CustomerContact {
  id: string;
  customerId: string;
  name: string;
  email: string | null;
  phone: string | null;
  role: string | null;
  isPrimary: boolean;
}

export interface CustomerAddress {
  id: string;
  customerId: string;
  type: AddressType;
  line1: string;
  line2: string | null;
  city: string;
  postalCode: string | null;
  country: string;
  isDefault: boolean;
}

/** A customer record owned by one company (the tenant). */
export interface Customer {
  id: string;
  companyId: string;
  code: string;
  name: string;
  companyName: string | null;
  type: CustomerType;
  status: CustomerStatus;
  email: string | null;
  phone: string | null;
  city: string | null;
  country: string | null;
  industry: string | null;
  creditLimit: number;
  paymentTermDays: number;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date | null;
  isDeleted: boolean;
  /** Present only when requested with `include=contacts`. */
  contacts?: CustomerContact[];
  /** Present only when requested with `include=addresses`. */
  addresses?: CustomerAddress[];
}

/** What the API returns for a customer: tenant and soft-delete columns are left out. */
export type CustomerView = Omit<Customer, 'companyId' | 'isDeleted'>;

export function toCustomerView(customer: Customer): CustomerView {
  const { companyId: _companyId, isDeleted: _isDeleted, ...view } = customer;
  return view;
}
