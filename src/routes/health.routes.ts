import { FastifyInstance } from 'fastify';
import { register } from '../utils/metrics';

export default async function healthRoutes(app: FastifyInstance) {
  const { searchService } = app.container.cradle;

  /**
   * GET /health/live
   * Liveness only; no dependency checks.
   */
  app.get('/health/live', async (_request, reply) => {
    return reply.status(200).send({
      status: 'ok',
      timestamp: Date.now(),
      service: 'event-search-service',
    });
  });

  /**
   * GET /health
   * Serving mode, invalidation lag and cache statistics. The service keeps
   * answering while DEGRADED, so this stays 200.
   */
  app.get('/health', async (_request, reply) => {
    const report = searchService.health();
    return reply.status(200).send({
      status: report.state === 'HEALTHY' ? 'healthy' : 'degraded',
      service: 'event-search-service',
      ...report,
    });
  });

  /**
   * GET /metrics
   * Prometheus exposition
   */
  app.get('/metrics', async (_request, reply) => {
    const body = await register.metrics();
    return reply.header('Content-Type', register.contentType).send(body);
  });
}
