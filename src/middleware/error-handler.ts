import { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { AppError, InvalidQueryError } from '../utils/errors';
import { createChildLogger } from '../utils/logger';

const logger = createChildLogger({ component: 'error-handler' });

function fromZod(error: ZodError): InvalidQueryError {
  const issue = error.issues[0];
  const field = issue?.path.join('.') || undefined;
  const message = issue ? issue.message : 'Invalid request';
  return new InvalidQueryError('MALFORMED_REQUEST', field ? `${field}: ${message}` : message, field);
}

export const errorHandler = (
  error: FastifyError | AppError | Error,
  request: FastifyRequest,
  reply: FastifyReply
) => {
  const known = error instanceof ZodError ? fromZod(error) : error;

  if (known instanceof AppError) {
    const level = known.statusCode >= 500 ? 'error' : 'warn';
    logger[level]({
      error: { message: known.message, code: known.code, details: known.details },
      request: { method: request.method, url: request.url },
    }, 'Request error');

    return reply.status(known.statusCode).send({
      success: false,
      error: known.message,
      code: known.code,
      details: known.details,
    });
  }

  // Fastify's own validation and body parsing errors
  if ('validation' in known && known.validation) {
    return reply.status(400).send({
      success: false,
      error: known.message,
      code: 'INVALID_QUERY',
      details: { reason: 'MALFORMED_REQUEST' },
    });
  }

  const statusCode = 'statusCode' in known && typeof known.statusCode === 'number' ? known.statusCode : 500;
  const code = 'code' in known && typeof known.code === 'string' ? known.code : 'REQUEST_ERROR';

  logger.error({
    error: { message: known.message, stack: known.stack, name: known.name },
    request: { method: request.method, url: request.url },
  }, 'Request error');

  return reply.status(statusCode).send({
    success: false,
    error: statusCode >= 500 ? 'Internal server error' : known.message,
    code: statusCode >= 500 ? 'INTERNAL_ERROR' : code,
  });
};

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler(errorHandler);

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      success: false,
      error: `Route ${request.method} ${request.url} not found`,
      code: 'NOT_FOUND',
    });
  });
}
