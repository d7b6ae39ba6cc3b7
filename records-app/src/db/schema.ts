import type pg from 'pg';

export const DDL_CREATE_CUSTOMERS = `
CREATE TABLE IF NOT EXISTS customers (
  id                 UUID          PRIMARY KEY DEFAULT gen_random_uuid(),
  company_id         UUID          NOT NULL,
  code               VARCHAR(50)   NOT NULL,
  name               VARCHAR(200)  NOT NULL,
  company_name       VARCHAR(200),
  type               VARCHAR(20)   NOT NULL,
  status             VARCHAR(20)   NOT NULL DEFAULT 'Active',
  email              VARCHAR(255),
  phone              VARCHAR(50),
  city               VARCHAR(100),
  country            VARCHAR(100),
  industry           VARCHAR(100),
  credit_limit       NUMERIC(18,2) NOT NULL DEFAULT 0,
  payment_term_days  INTEGER       NOT NULL DEFAULT 30,
  is_active          BOOLEAN       NOT NULL DEFAULT TRUE,
  created_at         TIMESTAMPTZ   NOT NULL DEFAULT NOW(),
  updated_at         TIMESTAMPTZ,
  is_deleted         BOOLEAN       NOT NULL DEFAULT FALSE,
  UNIQUE (company_id, code)
)
`.trim();

export const DDL_CREATE_CUSTOMERS_TENANT_INDEX = `
CREATE INDEX IF NOT EXISTS idx_customers_company_created
  ON customers (company_id, created_at DESC)
  WHERE is_deleted = FALSE
`.trim();

export const DDL_CREATE_CONTACTS = `
CREATE TABLE IF NOT EXISTS customer_contacts (
  id           UUID          PRIMARY KEY DEFAULT gen_random_uuid(),
  customer_id  UUID          NOT NULL REFERENCES customers (id) ON DELETE CASCADE,
  name         VARCHAR(200)  NOT NULL,
  email        VARCHAR(255),
  phone        VARCHAR(50),
  role         VARCHAR(100),
  is_primary   BOOLEAN       NOT NULL DEFAULT FALSE
)
`.trim();

export const DDL_CREATE_ADDRESSES = `
CREATE TABLE IF NOT EXISTS customer_addresses (
  id           UUID          PRIMARY KEY DEFAULT gen_random_uuid(),
  customer_id  UUID          NOT NULL REFERENCES customers (id) ON DELETE CASCADE,
  type         VARCHAR(20)   NOT NULL,
  line1        VARCHAR(200)  NOT NULL,
  line2        VARCHAR(200),
  city         VARCHAR(100)  NOT NULL,
  postal_code  VARCHAR(20),
  country      VARCHAR(100)  NOT NULL,
  is_default   BOOLEAN       NOT NULL DEFAULT FALSE
)
`.trim();

export const DDL_CREATE_RELATION_INDEXES = [
  'CREATE INDEX IF NOT EXISTS idx_customer_contacts_customer ON customer_contacts (customer_id)',
  'CREATE INDEX IF NOT EXISTS idx_customer_addresses_customer ON customer_addresses (customer_id)',
];

export async function applySchema(client: pg.ClientBase): Promise<void> {
  await client.query(DDL_CREATE_CUSTOMERS);
  await client.query(DDL_CREATE_CUSTOMERS_TENANT_INDEX);
  await client.query(DDL_CREATE_CONTACTS);
  await client.query(DDL_CREATE_ADDRESSES);
  for (const ddl of DDL_CREATE_RELATION_INDEXES) {
    await client.query(ddl);
  }
}
