import pino from 'pino';
import type { FastifyRequest, FastifyReply } from 'fastify';

const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
const LOG_FORMAT = process.env.LOG_FORMAT || (process.env.NODE_ENV === 'production' ? 'json' : 'pretty');

/**
 * Fields replaced with '[REDACTED]' before a line is written.
 * Search requests carry session identifiers when fraud suppression is on.
 */
const REDACT_FIELDS = [
  'authorization',
  'token',
  'apiKey',
  'secret',
  'sessionId',
  '*.authorization',
  '*.token',
  '*.apiKey',
  '*.secret',
  '*.sessionId',
  'req.headers.authorization',
  'req.headers.cookie',
  'req.headers["x-api-key"]',
  'req.headers["x-service-token"]',
];

const logger = pino({
  level: LOG_LEVEL,
  transport: LOG_FORMAT === 'pretty' ? {
    target: 'pino-pretty',
    options: {
      translateTime: 'HH:MM:ss Z',
      ignore: 'pid,hostname'
    }
  } : undefined,
  formatters: {
    level: (label) => {
      return { level: label };
    }
  },
  base: {
    service: 'event-search-service'
  },
  redact: {
    paths: REDACT_FIELDS,
    censor: '[REDACTED]',
  },
});

export type Logger = pino.Logger;

/**
 * Create a child logger with additional context.
 * Every component takes one with its own `component` binding.
 */
export function createChildLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

const requestStarts = new WeakMap<FastifyRequest, number>();

export async function onRequestLoggingHook(
  request: FastifyRequest,
  _reply: FastifyReply
): Promise<void> {
  requestStarts.set(request, Date.now());

  if (logger.isLevelEnabled('debug')) {
    logger.debug({
      requestId: request.id,
      method: request.method,
      url: request.url,
    }, 'Request started');
  }
}

export async function onResponseLoggingHook(
  request: FastifyRequest,
  reply: FastifyReply
): Promise<void> {
  const startTime = requestStarts.get(request);
  if (startTime === undefined) return;

  const logData = {
    requestId: request.id,
    method: request.method,
    url: request.url,
    statusCode: reply.statusCode,
    responseTime: Date.now() - startTime,
    responseTimeUnit: 'ms',
  };

  if (reply.statusCode >= 500) {
    logger.error(logData, 'Request completed with server error');
  } else if (reply.statusCode >= 400) {
    logger.warn(logData, 'Request completed with client error');
  } else {
    logger.info(logData, 'Request completed');
  }
}

export const requestLoggingHooks = {
  onRequest: onRequestLoggingHook,
  onResponse: onResponseLoggingHook,
};

/**
 * Reduce an event to the fields worth logging.
 */
export function sanitizeEventData(event: {
  id: string;
  category: string;
  version: number;
  availability: { available: number; total: number };
}): Record<string, unknown> {
  return {
    id: event.id,
    category: event.category,
    version: event.version,
    available: event.availability.available,
    total: event.availability.total,
  };
}

export { logger };
