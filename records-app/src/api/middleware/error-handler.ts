import type { FastifyInstance } from 'fastify';
import { FilterValueError, QueryCancelledError, QueryStateError, SourceError } from 'records-querier';
import { TenantRequiredError } from '../../domain/errors.js';

/** nginx's "client closed request"; nobody is left to read it. */
const CLIENT_CLOSED_REQUEST = 499;

function hasStatusCode(error: Error): error is Error & { statusCode: number } {
  return 'statusCode' in error && typeof error.statusCode === 'number';
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((unknownError, request, reply) => {
    const error = unknownError instanceof Error ? unknownError : new Error(String(unknownError));

    // Unparsable filter value under the 'reject' policy → 400
    if (error instanceof FilterValueError) {
      return reply.status(400).send({
        error: error.name,
        message: error.message,
        field: error.field,
        operator: error.operator,
      });
    }

    if (error instanceof TenantRequiredError) {
      return reply.status(400).send({ error: error.name, message: error.message });
    }

    if (error instanceof QueryCancelledError) {
      request.log.info('query cancelled by client');
      return reply.status(CLIENT_CLOSED_REQUEST).send({ error: error.name, message: error.message });
    }

    // Storage failures and builder misuse are ours, not the caller's
    if (error instanceof SourceError || error instanceof QueryStateError) {
      request.log.error(error);
      return reply.status(500).send({ error: 'InternalError', message: 'Internal server error' });
    }

    // Fastify built-in errors (validation, 404, payload) carry their own status
    if (hasStatusCode(error) && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ error: error.name, message: error.message });
    }

    request.log.error(error);
    return reply.status(500).send({ error: 'InternalError', message: 'Internal server error' });
  });
}
