import Fastify from 'fastify';
import type { FastifyServerOptions } from 'fastify';
import type { FilterValuePolicy } from 'records-querier';
import { registerErrorHandler } from './middleware/error-handler.js';
import { registerCustomerRoutes } from '../features/customers/routes.js';
import type { CustomerSourceFactory } from '../features/customers/source.js';

export interface ServerDeps {
  customers: CustomerSourceFactory;
  filterValuePolicy?: FilterValuePolicy;
  logger?: FastifyServerOptions['logger'];
}

export function buildServer(deps: ServerDeps) {
  const app = Fastify({ logger: deps.logger ?? true });

  registerErrorHandler(app);

  app.get('/health', async () => ({ status: 'ok' }));

  const prefix = '/api/v1';

  app.register(async (instance) => {
    await registerCustomerRoutes(instance, {
      customers: deps.customers,
      filterValuePolicy: deps.filterValuePolicy ?? 'ignore',
    });
  }, { prefix });

  return app;
}
