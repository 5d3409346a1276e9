import { FastifyInstance, FastifyRequest } from 'fastify';

type QueryParams = Record<string, string | string[] | undefined>;

const GEO_PARAMS: ReadonlySet<string> = new Set(['lat', 'lon', 'radius', 'unit']);

/**
 * Query strings are flat: `lat`, `lon`, `radius` and `unit` are folded into
 * the `geo` object the query builder expects.
 */
export function toSearchRequest(query: QueryParams): Record<string, unknown> {
  const request: Record<string, unknown> = {};
  const geo: Record<string, unknown> = {};

  for (const [name, value] of Object.entries(query)) {
    if (value === undefined) continue;
    if (GEO_PARAMS.has(name)) {
      geo[name] = value;
    } else {
      request[name] = value;
    }
  }

  if (Object.keys(geo).length > 0) {
    request.geo = geo;
  }
  return request;
}

/** Optional caller identity, set by the gateway for signed-in users */
function userIdOf(request: FastifyRequest): string | undefined {
  const value = request.headers['x-user-id'];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export default async function searchRoutes(app: FastifyInstance) {
  const { searchService, recommendationService } = app.container.cradle;

  /**
   * GET /api/v1/search
   * Faceted, geo-aware event search
   */
  app.get<{ Querystring: QueryParams }>('/search', async (request, reply) => {
    const controller = new AbortController();
    const onClose = () => {
      if (!reply.raw.writableFinished) {
        controller.abort();
      }
    };
    reply.raw.on('close', onClose);

    try {
      const result = await searchService.search(toSearchRequest(request.query), {
        signal: controller.signal,
        userId: userIdOf(request),
      });
      return reply.send({ success: true, data: result });
    } finally {
      reply.raw.removeListener('close', onClose);
    }
  });

  /**
   * GET /api/v1/suggest
   * Prefix autocomplete over titles and artists
   */
  app.get<{ Querystring: QueryParams }>('/suggest', async (request, reply) => {
    const suggestions = searchService.suggest(request.query);
    return reply.send({ success: true, data: { suggestions } });
  });

  /**
   * GET /api/v1/recommendations
   * Upcoming events for the caller, or the most popular ones
   */
  app.get<{ Querystring: QueryParams }>('/recommendations', async (request, reply) => {
    const recommendations = recommendationService.recommend(request.query, userIdOf(request));
    return reply.send({ success: true, data: recommendations });
  });
}
