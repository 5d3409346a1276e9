import { Registry, collectDefaultMetrics, Counter, Histogram, Gauge } from 'prom-client';

export const register = new Registry();

let defaultMetricsEnabled = false;

/**
 * Process metrics (CPU, memory, GC). Enabled by the server entrypoint only.
 */
export function enableDefaultMetrics(): void {
  if (defaultMetricsEnabled) return;
  collectDefaultMetrics({ register });
  defaultMetricsEnabled = true;
}

// Read path

export const searchRequestsTotal = new Counter({
  name: 'search_requests_total',
  help: 'Total search requests by outcome',
  labelNames: ['outcome'],
  registers: [register]
});

export const searchDuration = new Histogram({
  name: 'search_duration_seconds',
  help: 'Duration of search requests in seconds',
  labelNames: ['source'],
  buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1],
  registers: [register]
});

export const suggestRequestsTotal = new Counter({
  name: 'suggest_requests_total',
  help: 'Total autocomplete requests',
  registers: [register]
});

export const recommendationRequestsTotal = new Counter({
  name: 'recommendation_requests_total',
  help: 'Recommendation requests by strategy served',
  labelNames: ['strategy'],
  registers: [register]
});

// Cache

export const cacheLookupsTotal = new Counter({
  name: 'search_cache_lookups_total',
  help: 'Cache lookups by namespace and result',
  labelNames: ['namespace', 'result'],
  registers: [register]
});

export const cacheInvalidationsTotal = new Counter({
  name: 'search_cache_invalidations_total',
  help: 'Cache entries invalidated by dependency',
  labelNames: ['namespace'],
  registers: [register]
});

export const cacheRecomputationsTotal = new Counter({
  name: 'search_cache_recomputations_total',
  help: 'Upstream recomputations started on cache miss',
  labelNames: ['namespace'],
  registers: [register]
});

export const cacheSelfHealsTotal = new Counter({
  name: 'search_cache_self_heals_total',
  help: 'Namespace resets after a dependency index violation',
  labelNames: ['namespace'],
  registers: [register]
});

// Write path

export const deltasTotal = new Counter({
  name: 'inventory_deltas_total',
  help: 'Inventory deltas by outcome',
  labelNames: ['outcome'],
  registers: [register]
});

export const invalidationLag = new Histogram({
  name: 'invalidation_lag_seconds',
  help: 'Time from a committed mutation to its cache invalidation',
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5],
  registers: [register]
});

export const degradedEvents = new Gauge({
  name: 'degraded_events',
  help: 'Events whose index projection is behind after exhausted retries',
  registers: [register]
});

// Degradation

export const servingMode = new Gauge({
  name: 'serving_mode',
  help: 'Serving mode (0 healthy, 1 recovering, 2 degraded)',
  registers: [register]
});

export const servingModeTransitionsTotal = new Counter({
  name: 'serving_mode_transitions_total',
  help: 'Serving mode transitions',
  labelNames: ['from', 'to'],
  registers: [register]
});
