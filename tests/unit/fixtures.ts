import { defineRegistry } from '../../src/query/registry.js';
import { ArraySource } from '../../src/sources/memory.js';

export interface Account {
  id: string;
  name: string;
  status: 'open' | 'closed' | 'frozen' | null;
  tier: number | null;
  balance: number;
  ownerId: string | null;
  archived: boolean;
  createdAt: Date;
  tags?: string[];
}

export const ACCOUNT_STATUSES = ['open', 'closed', 'frozen'] as const;

export const accountRegistry = defineRegistry<Account>({
  filterable: {
    name: { property: 'name', type: 'string' },
    status: { property: 'status', type: 'enum', values: ACCOUNT_STATUSES },
    tier: { property: 'tier', type: 'int' },
    balance: { property: 'balance', type: 'decimal' },
    ownerId: { property: 'ownerId', type: 'uuid', column: 'owner_id' },
    archived: { property: 'archived', type: 'boolean' },
    createdAt: { property: 'createdAt', type: 'date', column: 'created_at' },
  },
  sortable: {
    name: { property: 'name', type: 'string' },
    tier: { property: 'tier', type: 'int' },
    balance: { property: 'balance', type: 'decimal' },
    createdAt: { property: 'createdAt', type: 'date', column: 'created_at' },
  },
  includes: ['tags'],
});

export function makeAccount(overrides: Partial<Account> & Pick<Account, 'id'>): Account {
  return {
    name: `Account ${overrides.id}`,
    status: 'open',
    tier: 1,
    balance: 0,
    ownerId: null,
    archived: false,
    createdAt: new Date('2024-01-01T00:00:00Z'),
    ...overrides,
  };
}

/** day 1 → 2024-01-01T00:00:00Z */
export function day(n: number): Date {
  return new Date(Date.UTC(2024, 0, n));
}

export const TAGS: Record<string, string[]> = {
  a1: ['vip', 'eu'],
  a3: ['trial'],
};

export function accountSource(accounts: readonly Account[]): ArraySource<Account> {
  return new ArraySource(accounts, {
    relations: {
      tags: (account) => ({ ...account, tags: TAGS[account.id] ?? [] }),
    },
  });
}

export function ids(items: readonly { id: string }[]): string[] {
  return items.map((item) => item.id);
}
