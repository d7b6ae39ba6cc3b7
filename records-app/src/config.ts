import type { FilterValuePolicy } from 'records-querier';
import { ConfigError } from './domain/errors.js';

export interface AppConfig {
  databaseUrl: string;
  port: number;
  logLevel: LogLevel;
  filterValuePolicy: FilterValuePolicy;
}

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const VALUE_POLICIES: readonly FilterValuePolicy[] = ['ignore', 'reject'];

function pick<V extends string>(name: string, raw: string | undefined, allowed: readonly V[], fallback: V): V {
  if (raw === undefined || raw.trim() === '') return fallback;
  const wanted = raw.trim().toLowerCase();
  const value = allowed.find((v) => v === wanted);
  if (value === undefined) {
    throw new ConfigError(`${name} must be one of ${allowed.join(', ')}; got "${raw}"`);
  }
  return value;
}

/** Reads the service configuration from environment variables. */
export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const databaseUrl = env['DATABASE_URL'];
  if (databaseUrl === undefined || databaseUrl.trim() === '') {
    throw new ConfigError('DATABASE_URL environment variable is required');
  }

  const rawPort = env['PORT'] ?? '3000';
  const port = /^\d+$/.test(rawPort.trim()) ? Number(rawPort.trim()) : Number.NaN;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigError(`PORT must be an integer between 1 and 65535; got "${rawPort}"`);
  }

  return {
    databaseUrl,
    port,
    logLevel: pick('LOG_LEVEL', env['LOG_LEVEL'], LOG_LEVELS, 'info'),
    filterValuePolicy: pick('FILTER_VALUE_POLICY', env['FILTER_VALUE_POLICY'], VALUE_POLICIES, 'ignore'),
  };
}
