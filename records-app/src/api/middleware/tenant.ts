import type { FastifyRequest } from 'fastify';
import { validate as isUuid } from 'uuid';
import { TenantRequiredError } from '../../domain/errors.js';

export const TENANT_HEADER = 'x-company-id';

/** Reads the caller's company from the tenant header; every records query is scoped to it. */
export function readCompanyId(request: FastifyRequest): string {
  const header = request.headers[TENANT_HEADER];
  const value = Array.isArray(header) ? header[0] : header;
  if (value === undefined || value.trim() === '') {
    throw new TenantRequiredError(`Header ${TENANT_HEADER} is required`);
  }
  const companyId = value.trim();
  if (!isUuid(companyId)) {
    throw new TenantRequiredError(`Header ${TENANT_HEADER} must be a UUID`);
  }
  return companyId.toLowerCase();
}
