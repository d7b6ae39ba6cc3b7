import { validate as isUuid } from 'uuid';
import type { FieldDefinition, FieldType, Literal } from './types.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:e[+-]?\d+)?$/i;
const DATE_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?)?(Z|[+-]\d{2}:?\d{2})?$/i;

const INT32_MIN = -2_147_483_648;
const INT32_MAX = 2_147_483_647;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

const ORDERABLE_TYPES: ReadonlySet<FieldType> = new Set(['int', 'bigint', 'decimal', 'number', 'date']);

export function isOrderable(type: FieldType): boolean {
  return ORDERABLE_TYPES.has(type);
}

export function isTextual(type: FieldType): boolean {
  return type === 'string' || type === 'text';
}

function parseInt32(raw: string): number | undefined {
  const s = raw.trim();
  if (!INTEGER_PATTERN.test(s)) return undefined;
  const n = Number(s);
  return n >= INT32_MIN && n <= INT32_MAX ? n : undefined;
}

function parseInt64(raw: string): bigint | undefined {
  const s = raw.trim();
  if (!INTEGER_PATTERN.test(s)) return undefined;
  const n = BigInt(s);
  return n >= INT64_MIN && n <= INT64_MAX ? n : undefined;
}

function parseDecimal(raw: string, pattern: RegExp): number | undefined {
  const s = raw.trim();
  if (!pattern.test(s)) return undefined;
  const n = Number(s);
  return Number.isFinite(n) ? n : undefined;
}

function parseBoolean(raw: string): boolean | undefined {
  const s = raw.trim().toLowerCase();
  if (s === 'true') return true;
  if (s === 'false') return false;
  return undefined;
}

function parseOffsetMinutes(offset: string | undefined): number {
  if (offset === undefined || offset.toUpperCase() === 'Z') return 0;
  const sign = offset.startsWith('-') ? -1 : 1;
  const digits = offset.slice(1).replace(':', '');
  return sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4)));
}

/**
 * Parses an ISO-8601 date or date-time. Values without an offset are taken
 * as UTC; values with one are converted to UTC.
 */
export function parseUtcDate(raw: string): Date | undefined {
  const match = DATE_PATTERN.exec(raw.trim());
  if (match === null) return undefined;
  const [, year, month, day, hour = '0', minute = '0', second = '0', fraction = '0', offset] = match;

  const y = Number(year);
  const mo = Number(month) - 1;
  const d = Number(day);
  const h = Number(hour);
  const mi = Number(minute);
  const s = Number(second);
  if (h > 23 || mi > 59 || s > 59) return undefined;

  const date = new Date(0);
  date.setUTCFullYear(y, mo, d);
  date.setUTCHours(h, mi, s, Number(fraction.slice(0, 3).padEnd(3, '0')));
  // setUTCFullYear rolls invalid days over into the next month
  if (date.getUTCFullYear() !== y || date.getUTCMonth() !== mo || date.getUTCDate() !== d) {
    return undefined;
  }
  return new Date(date.getTime() - parseOffsetMinutes(offset) * 60_000);
}

function parseEnum(raw: string, values: readonly string[]): string | undefined {
  const wanted = raw.trim().toLowerCase();
  return values.find((v) => v.toLowerCase() === wanted);
}

/**
 * Converts a raw filter value into the type of the field it targets.
 * Returns undefined when the value does not parse.
 */
export function coerceValue<T>(raw: string, field: FieldDefinition<T>): Literal | undefined {
  if (field.parse !== undefined) return field.parse(raw);

  switch (field.type) {
    case 'string':
      return raw;
    case 'int':
      return parseInt32(raw);
    case 'bigint':
      return parseInt64(raw);
    case 'decimal':
      return parseDecimal(raw, DECIMAL_PATTERN);
    case 'number':
      return parseDecimal(raw, FLOAT_PATTERN);
    case 'boolean':
      return parseBoolean(raw);
    case 'date':
      return parseUtcDate(raw);
    case 'enum':
      return parseEnum(raw, field.values ?? []);
    case 'uuid': {
      const s = raw.trim();
      return isUuid(s) ? s.toLowerCase() : undefined;
    }
    case 'text':
      return raw.trim();
  }
}
