import { FastifyInstance } from 'fastify';
import searchRoutes from './search.routes';
import healthRoutes from './health.routes';
import internalRoutes from './internal.routes';

/**
 * Public API routes, mounted under /api/v1
 */
export default async function routes(app: FastifyInstance) {
  await app.register(searchRoutes);
}

export { healthRoutes, internalRoutes };
