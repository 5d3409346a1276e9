/**
 * Internal Routes - catalog ingestion, inventory deltas and search analytics
 *
 * Service-to-service only, authenticated with an HMAC over
 * `${service}:${timestamp}:${url}` in the x-internal-* headers.
 */

import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import * as crypto from 'crypto';
import {
  analyticsReportSchema,
  catalogEventSchema,
  eventDetailsPatchSchema,
  inventoryDeltaSchema,
  popularityRefreshSchema,
} from '../schemas/search.schema';

const MAX_CLOCK_SKEW_MS = 5 * 60 * 1000;

function header(request: FastifyRequest, name: string): string | undefined {
  const value = request.headers[name];
  return typeof value === 'string' ? value : undefined;
}

export function signInternalRequest(secret: string, serviceName: string, timestamp: string, url: string): string {
  return crypto
    .createHmac('sha256', secret)
    .update(`${serviceName}:${timestamp}:${url}`)
    .digest('hex');
}

function unauthorized(reply: FastifyReply, error: string) {
  return reply.status(401).send({ success: false, error, code: 'UNAUTHORIZED' });
}

export default async function internalRoutes(app: FastifyInstance): Promise<void> {
  const { config, availabilitySynchronizer, searchAnalytics } = app.container.cradle;
  const secret = config.internal.serviceSecret;

  if (!secret) {
    app.log.warn('INTERNAL_SERVICE_SECRET not set - internal routes will reject all requests');
  }

  /**
   * Verify internal service authentication using HMAC signature
   */
  async function verifyInternalService(request: FastifyRequest, reply: FastifyReply): Promise<void> {
    const serviceName = header(request, 'x-internal-service');
    const timestamp = header(request, 'x-internal-timestamp');
    const signature = header(request, 'x-internal-signature');

    if (!serviceName || !timestamp || !signature) {
      return unauthorized(reply, 'Missing required headers');
    }

    const requestTime = parseInt(timestamp, 10);
    if (isNaN(requestTime) || Math.abs(Date.now() - requestTime) > MAX_CLOCK_SKEW_MS) {
      request.log.warn({ service: serviceName }, 'Internal request with expired timestamp');
      return unauthorized(reply, 'Request expired');
    }

    if (!secret) {
      return unauthorized(reply, 'Internal authentication not configured');
    }

    const signatureBuffer = Buffer.from(signature, 'hex');
    const expectedBuffer = Buffer.from(signInternalRequest(secret, serviceName, timestamp, request.url), 'hex');

    if (signatureBuffer.length !== expectedBuffer.length ||
        !crypto.timingSafeEqual(signatureBuffer, expectedBuffer)) {
      request.log.warn({ service: serviceName }, 'Invalid internal service signature');
      return unauthorized(reply, 'Invalid signature');
    }
  }

  app.addHook('preHandler', verifyInternalService);

  /**
   * POST /internal/events
   * Catalog ingestion
   */
  app.post('/internal/events', async (request, reply) => {
    const payload = catalogEventSchema.parse(request.body);
    const event = await availabilitySynchronizer.ingest(payload);
    return reply.status(201).send({ success: true, data: event });
  });

  /**
   * PATCH /internal/events/:eventId
   * Catalog detail edits
   */
  app.patch<{ Params: { eventId: string } }>('/internal/events/:eventId', async (request, reply) => {
    const patch = eventDetailsPatchSchema.parse(request.body);
    const event = await availabilitySynchronizer.updateDetails(request.params.eventId, patch);
    return reply.send({ success: true, data: event });
  });

  /**
   * POST /internal/events/popularity
   * Externally computed popularity scores keyed by event id. Ids whose
   * write failed come back under `failed`; the rest stay applied.
   */
  app.post('/internal/events/popularity', async (request, reply) => {
    const scores = popularityRefreshSchema.parse(request.body);
    const { applied, failed } = await availabilitySynchronizer.refreshPopularity(scores);
    return reply.send({ success: true, data: { updated: applied, failed } });
  });

  /**
   * POST /internal/events/archive
   * Run the retention policy now
   */
  app.post('/internal/events/archive', async (_request, reply) => {
    const { applied, failed } = await availabilitySynchronizer.archiveExpired();
    return reply.send({ success: true, data: { archived: applied, failed } });
  });

  /**
   * GET /internal/analytics/search
   * Search volume, popular queries and filter usage
   */
  app.get('/internal/analytics/search', async (request, reply) => {
    const { limit } = analyticsReportSchema.parse(request.query);
    return reply.send({ success: true, data: searchAnalytics.report(limit) });
  });

  /**
   * POST /internal/inventory-deltas
   * Synchronous delta apply, for producers that do not go through the queue
   */
  app.post('/internal/inventory-deltas', async (request, reply) => {
    const delta = inventoryDeltaSchema.parse(request.body);
    const outcome = await availabilitySynchronizer.apply(delta);

    if (outcome.status === 'stale') {
      return reply.send({ success: true, data: { status: 'stale', storedVersion: outcome.storedVersion } });
    }
    return reply.send({
      success: true,
      data: {
        status: 'applied',
        eventId: outcome.event.id,
        version: outcome.event.version,
        availability: outcome.event.availability,
      },
    });
  });
}
