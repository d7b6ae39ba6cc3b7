import type { FastifyInstance } from 'fastify';
import { bindQueryParams, includeRelations, QueryBuilder } from 'records-querier';
import type { FilterValuePolicy, RawQuery } from 'records-querier';
import { toCustomerView } from '../../domain/customers.js';
import { readCompanyId } from '../../api/middleware/tenant.js';
import { customerRegistry } from './queries.js';
import type { CustomerSourceFactory } from './source.js';

export interface CustomerRouteOptions {
  customers: CustomerSourceFactory;
  filterValuePolicy: FilterValuePolicy;
}

export async function registerCustomerRoutes(
  app: FastifyInstance,
  options: CustomerRouteOptions,
): Promise<void> {
  // GET /customers: filter, search, sort and page a company's customers
  app.get<{ Querystring: RawQuery }>('/customers', async (request, reply) => {
    const companyId = readCompanyId(request);

    const abort = new AbortController();
    reply.raw.once('close', () => {
      if (!reply.raw.writableFinished) abort.abort(new Error('client closed the connection'));
    });

    const page = await QueryBuilder.projecting(toCustomerView)
      .withSource(options.customers(companyId))
      .withParams(bindQueryParams(request.query))
      .withRegistry(customerRegistry)
      .withIncludes(includeRelations)
      .withOptions({
        valuePolicy: options.filterValuePolicy,
        onClauseSkipped: (clause) => request.log.debug({ clause }, 'filter clause skipped'),
      })
      .execute(abort.signal);

    return reply.status(200).send(page);
  });
}
