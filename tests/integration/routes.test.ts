/**
 * Integration Tests for the HTTP surface
 *
 * Public search routes, HMAC-authenticated internal routes, health and
 * metrics, exercised through fastify's inject.
 */

import { FastifyInstance } from 'fastify';
import { buildApp } from '../../src/app';
import { signInternalRequest } from '../../src/routes/internal.routes';
import { TEST_SECRET, makePayload, testConfig, venues } from '../fixtures/events';

function signedHeaders(url: string, secret: string = TEST_SECRET, timestamp: number = Date.now()): Record<string, string> {
  const ts = String(timestamp);
  return {
    'x-internal-service': 'catalog-service',
    'x-internal-timestamp': ts,
    'x-internal-signature': signInternalRequest(secret, 'catalog-service', ts, url),
  };
}

describe('HTTP routes (integration)', () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    app = await buildApp({ config: testConfig(), containerOptions: { jitter: false } });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  async function ingest(overrides: Parameters<typeof makePayload>[0]) {
    return app.inject({
      method: 'POST',
      url: '/internal/events',
      headers: signedHeaders('/internal/events'),
      payload: makePayload(overrides),
    });
  }

  describe('internal authentication', () => {
    it('should reject requests without the internal headers', async () => {
      const response = await app.inject({ method: 'POST', url: '/internal/events', payload: makePayload({ id: 'e1' }) });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toEqual({ success: false, error: 'Missing required headers', code: 'UNAUTHORIZED' });
    });

    it('should reject a signature made with another secret', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/internal/events',
        headers: signedHeaders('/internal/events', 'wrong-secret'),
        payload: makePayload({ id: 'e1' }),
      });

      expect(response.statusCode).toBe(401);
      expect(response.json().error).toBe('Invalid signature');
    });

    it('should reject a signature for another url', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/internal/events/archive',
        headers: signedHeaders('/internal/events'),
      });

      expect(response.statusCode).toBe(401);
      expect(response.json().error).toBe('Invalid signature');
    });

    it('should reject timestamps outside the allowed skew', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/internal/events',
        headers: signedHeaders('/internal/events', TEST_SECRET, Date.now() - 6 * 60 * 1000),
        payload: makePayload({ id: 'e1' }),
      });

      expect(response.statusCode).toBe(401);
      expect(response.json().error).toBe('Request expired');
    });

    it('should reject everything when no secret is configured', async () => {
      const open = await buildApp({ config: testConfig({ internal: { serviceSecret: undefined } }) });
      try {
        const response = await open.inject({
          method: 'POST',
          url: '/internal/events/archive',
          headers: signedHeaders('/internal/events/archive'),
        });

        expect(response.statusCode).toBe(401);
        expect(response.json().error).toBe('Internal authentication not configured');
      } finally {
        await open.close();
      }
    });
  });

  describe('catalog and inventory', () => {
    it('should ingest an event and refuse a duplicate', async () => {
      const created = await ingest({ id: 'e1', title: 'Spring Gala' });

      expect(created.statusCode).toBe(201);
      expect(created.json()).toMatchObject({
        success: true,
        data: { id: 'e1', title: 'Spring Gala', availability: { total: 100, available: 100, soldOut: false } },
      });

      const duplicate = await ingest({ id: 'e1', title: 'Spring Gala' });
      expect(duplicate.statusCode).toBe(409);
      expect(duplicate.json()).toMatchObject({ success: false, code: 'CONFLICT' });
    });

    it('should reject a malformed catalog payload', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/internal/events',
        headers: signedHeaders('/internal/events'),
        payload: { id: 'e1' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ success: false, code: 'INVALID_QUERY', details: { reason: 'MALFORMED_REQUEST' } });
    });

    it('should apply deltas once and report redeliveries as stale', async () => {
      await ingest({ id: 'e1' });
      const delta = { op: 'decrement', eventId: 'e1', version: 2, quantity: 30 };

      const applied = await app.inject({
        method: 'POST',
        url: '/internal/inventory-deltas',
        headers: signedHeaders('/internal/inventory-deltas'),
        payload: delta,
      });
      const redelivered = await app.inject({
        method: 'POST',
        url: '/internal/inventory-deltas',
        headers: signedHeaders('/internal/inventory-deltas'),
        payload: delta,
      });

      expect(applied.json()).toEqual({
        success: true,
        data: { status: 'applied', eventId: 'e1', version: 2, availability: { total: 100, available: 70, soldOut: false } },
      });
      expect(redelivered.json()).toEqual({ success: true, data: { status: 'stale', storedVersion: 2 } });
    });

    it('should answer 404 for deltas on unknown events', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/internal/inventory-deltas',
        headers: signedHeaders('/internal/inventory-deltas'),
        payload: { op: 'set', eventId: 'ghost', version: 1, available: 0 },
      });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toMatchObject({ success: false, code: 'NOT_FOUND' });
    });

    it('should edit details and refresh popularity', async () => {
      await ingest({ id: 'e1', title: 'Spring Gala' });

      const edited = await app.inject({
        method: 'PATCH',
        url: '/internal/events/e1',
        headers: signedHeaders('/internal/events/e1'),
        payload: { title: 'Spring Gala Encore' },
      });
      const refreshed = await app.inject({
        method: 'POST',
        url: '/internal/events/popularity',
        headers: signedHeaders('/internal/events/popularity'),
        payload: { e1: 4, ghost: 2 },
      });

      expect(edited.json().data).toMatchObject({ id: 'e1', title: 'Spring Gala Encore', version: 1 });
      expect(refreshed.json()).toEqual({ success: true, data: { updated: ['e1'], failed: [] } });
    });
  });

  describe('search and suggest', () => {
    beforeEach(async () => {
      await ingest({ id: 'near', title: 'Taylor Swift | The Eras Tour', artist: 'Taylor Swift' });
      await ingest({ id: 'far', title: 'Taylor Swift | The Eras Tour', artist: 'Taylor Swift', venue: venues.upstate });
    });

    it('should fold flat geo parameters into the query', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/search?text=taylor%20swift&lat=40.7128&lon=-74.006&radius=50&unit=mi',
      });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.success).toBe(true);
      expect(body.data.hits.map((hit: { eventId: string }) => hit.eventId)).toEqual(['near']);
      expect(body.data.degraded).toBe(false);
    });

    it('should report invalid queries with their reason', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/search?sort=distance' });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        success: false,
        error: 'sort=distance requires a geo origin',
        code: 'INVALID_QUERY',
        details: { reason: 'SORT_REQUIRES_GEO', field: 'sort' },
      });
    });

    it('should reject unknown query parameters', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/search?colour=blue' });

      expect(response.statusCode).toBe(400);
      expect(response.json().details).toEqual({ reason: 'MALFORMED_REQUEST' });
    });

    it('should suggest titles and artists', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/suggest?prefix=tay&types=artist' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        success: true,
        data: { suggestions: [{ text: 'Taylor Swift', type: 'artist', score: 1 }] },
      });
    });
  });

  describe('recommendations and analytics', () => {
    beforeEach(async () => {
      await ingest({ id: 'near', title: 'Taylor Swift | The Eras Tour', artist: 'Taylor Swift' });
      await ingest({ id: 'far', title: 'Taylor Swift | The Eras Tour', artist: 'Taylor Swift', venue: venues.upstate });
    });

    it('should recommend popular events to anonymous callers', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/recommendations?limit=5' });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.data.strategy).toBe('popular');
      expect(body.data.hits.map((hit: { eventId: string }) => hit.eventId)).toEqual(['far', 'near']);
    });

    it('should personalize recommendations from the caller\'s searches', async () => {
      const headers = { 'x-user-id': 'user-1' };
      await app.inject({ method: 'GET', url: '/api/v1/search?cities=new%20york', headers });

      const response = await app.inject({ method: 'GET', url: '/api/v1/recommendations', headers });

      const body = response.json();
      expect(body.data.strategy).toBe('personalized');
      expect(body.data.hits.map((hit: { eventId: string }) => hit.eventId)).toEqual(['near', 'far']);
    });

    it('should reject an invalid recommendation limit', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/recommendations?limit=0' });

      expect(response.statusCode).toBe(400);
      expect(response.json().details).toEqual({ reason: 'MALFORMED_REQUEST', field: 'limit' });
    });

    it('should report search analytics to internal callers only', async () => {
      await app.inject({ method: 'GET', url: '/api/v1/search?text=Taylor%20Swift' });
      await app.inject({ method: 'GET', url: '/api/v1/search?text=taylor%20swift&cities=newburgh' });
      const url = '/internal/analytics/search?limit=5';

      const unsigned = await app.inject({ method: 'GET', url });
      const response = await app.inject({ method: 'GET', url, headers: signedHeaders(url) });

      expect(unsigned.statusCode).toBe(401);
      expect(response.statusCode).toBe(200);
      const { data } = response.json();
      expect(data.totalSearches).toBe(2);
      expect(data.zeroResultSearches).toBe(0);
      expect(data.popularQueries).toEqual([{ query: 'taylor swift', count: 2 }]);
      expect(data.filterUsage.city).toBe(1);
    });
  });

  describe('health and metrics', () => {
    it('should answer liveness', async () => {
      const response = await app.inject({ method: 'GET', url: '/health/live' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ status: 'ok', service: 'event-search-service' });
    });

    it('should report serving mode and cache state', async () => {
      const response = await app.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({
        status: 'healthy',
        state: 'HEALTHY',
        lagMillis: 0,
        cacheEntries: 0,
        degradedEvents: 0,
      });
    });

    it('should expose prometheus metrics', async () => {
      const response = await app.inject({ method: 'GET', url: '/metrics' });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toContain('text/plain');
      expect(response.body).toContain('search_requests_total');
    });

    it('should answer unknown routes in the error shape', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/nope' });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({ success: false, error: 'Route GET /api/v1/nope not found', code: 'NOT_FOUND' });
    });
  });
});
