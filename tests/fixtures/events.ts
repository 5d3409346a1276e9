/**
 * Catalog fixtures shared by unit and integration tests.
 * All dates sit in March 2030 so the injected clock decides past and future.
 */

import { SearchServiceConfig, ConfigOverrides, loadConfig } from '../../src/config';
import { CatalogEventPayload, catalogEventSchema } from '../../src/schemas/search.schema';
import { CatalogEvent, Venue } from '../../src/types';

export const NOW = Date.parse('2030-03-01T12:00:00.000Z');

export const TEST_SECRET = 'test-secret';

export const NEW_YORK = { lat: 40.7128, lon: -74.006 };

export const venues = {
  /** Under a mile from NEW_YORK */
  downtown: {
    name: 'Bowery Ballroom',
    location: { lat: 40.7204, lon: -73.9934 },
    city: 'New York',
    capacity: 575,
  },
  /** About 2.7 miles from NEW_YORK */
  midtown: {
    name: 'Madison Square Garden',
    location: { lat: 40.7505, lon: -73.9934 },
    city: 'New York',
    capacity: 20000,
  },
  /** 60 miles due north of NEW_YORK */
  upstate: {
    name: 'Hudson Valley Amphitheater',
    location: { lat: 41.5812, lon: -74.006 },
    city: 'Newburgh',
    capacity: 8000,
  },
  /** Far outside any test radius */
  austin: {
    name: 'Moody Center',
    location: { lat: 30.2849, lon: -97.7341 },
    city: 'Austin',
    capacity: 15000,
  },
} satisfies Record<string, Venue>;

type EventOverrides = Partial<Omit<CatalogEvent, 'availability'>> & {
  id: string;
  availability?: { total: number; available: number };
};

/**
 * A catalog event with sensible defaults; `soldOut` follows `available`.
 */
export function makeEvent(overrides: EventOverrides): CatalogEvent {
  const availability = overrides.availability ?? { total: 100, available: 100 };
  return {
    title: `Event ${overrides.id}`,
    artist: 'House Band',
    venue: venues.downtown,
    category: 'music',
    date: '2030-03-10T20:00:00.000Z',
    priceRange: { min: 60, max: 150 },
    popularityScore: 1,
    version: 1,
    updatedAt: new Date(NOW).toISOString(),
    ...overrides,
    availability: {
      total: availability.total,
      available: availability.available,
      soldOut: availability.available === 0,
    },
  };
}

/**
 * Ingestion payload for `AvailabilitySynchronizer.ingest`, validated the
 * same way the internal route validates it.
 */
export function makePayload(overrides: EventOverrides): CatalogEventPayload {
  const event = makeEvent(overrides);
  return catalogEventSchema.parse({
    id: event.id,
    title: event.title,
    artist: event.artist,
    venue: event.venue,
    category: event.category,
    date: event.date,
    priceRange: event.priceRange,
    availability: { total: event.availability.total, available: event.availability.available },
    popularityScore: event.popularityScore,
    version: event.version,
  });
}

/**
 * Configuration from defaults only, with a placeholder internal secret and
 * no backoff delay worth waiting for.
 */
export function testConfig(overrides: ConfigOverrides = {}): SearchServiceConfig {
  return loadConfig(
    {
      NODE_ENV: 'test',
      INTERNAL_SERVICE_SECRET: TEST_SECRET,
      SYNC_INITIAL_DELAY_MS: '1',
      SYNC_MAX_DELAY_MS: '1',
    },
    overrides
  );
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Let queued setImmediate callbacks (channel deliveries) run */
export function flushImmediate(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
