/**
 * Input Validation Schemas
 *
 * Structural validation only. Cross-field rules (inverted ranges, sort
 * needing geo, cursor binding) live in the query builder so every
 * violation carries a specific reason code.
 */

import { z } from 'zod';

const SORT_FIELDS = ['relevance', 'date', 'price', 'popularity', 'distance'] as const;
const SUGGESTION_TYPES = ['event', 'artist'] as const;

/** Accepts `a,b` query strings as well as arrays */
const stringList = z.preprocess(
  (value) => (typeof value === 'string' ? value.split(',') : value),
  z.array(z.string().trim().min(1).max(100)).max(20)
);

const booleanFlag = z.union([
  z.boolean(),
  z.enum(['true', 'false']).transform((value) => value === 'true'),
]);

const isoDate = z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
  message: 'Invalid ISO 8601 date',
});

export const geoSchema = z.object({
  lat: z.coerce.number(),
  lon: z.coerce.number(),
  radius: z.coerce.number(),
  unit: z.enum(['mi', 'km']).default('mi'),
}).strict();

export const searchRequestSchema = z.object({
  text: z.string().optional(),
  categories: stringList.optional(),
  cities: stringList.optional(),
  artists: stringList.optional(),
  priceMin: z.coerce.number().nonnegative().optional(),
  priceMax: z.coerce.number().nonnegative().optional(),
  dateFrom: isoDate.optional(),
  dateTo: isoDate.optional(),
  geo: geoSchema.optional(),
  sort: z.enum(SORT_FIELDS).optional(),
  page: z.coerce.number().int().optional(),
  pageSize: z.coerce.number().int().optional(),
  cursor: z.string().max(512).optional(),
  availableOnly: booleanFlag.optional(),
  suppressFlagged: booleanFlag.optional(),
}).strict();

export type SearchRequest = z.input<typeof searchRequestSchema>;
export type ParsedSearchRequest = z.output<typeof searchRequestSchema>;

export const suggestRequestSchema = z.object({
  prefix: z.string().max(100),
  limit: z.coerce.number().int().positive().optional(),
  types: z.preprocess(
    (value) => (typeof value === 'string' ? value.split(',') : value),
    z.array(z.enum(SUGGESTION_TYPES))
  ).optional(),
  city: z.string().max(100).optional(),
}).strict();

export type SuggestRequest = z.input<typeof suggestRequestSchema>;

export const recommendationRequestSchema = z.object({
  limit: z.coerce.number().int().positive().optional(),
}).strict();

export const analyticsReportSchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
}).strict();

/**
 * Inventory deltas as delivered by the inventory stream.
 */
export const inventoryDeltaSchema = z.discriminatedUnion('op', [
  z.object({
    op: z.literal('decrement'),
    eventId: z.string().min(1),
    version: z.number().int().positive(),
    quantity: z.number().int().positive(),
    occurredAt: z.number().int().nonnegative().optional(),
  }),
  z.object({
    op: z.literal('increment'),
    eventId: z.string().min(1),
    version: z.number().int().positive(),
    quantity: z.number().int().positive(),
    occurredAt: z.number().int().nonnegative().optional(),
  }),
  z.object({
    op: z.literal('set'),
    eventId: z.string().min(1),
    version: z.number().int().positive(),
    available: z.number().int().nonnegative(),
    occurredAt: z.number().int().nonnegative().optional(),
  }),
]);

const geoPointSchema = z.object({
  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180),
});

export const venueSchema = z.object({
  name: z.string().min(1),
  location: geoPointSchema,
  city: z.string().min(1),
  capacity: z.number().int().nonnegative(),
});

const priceRangeSchema = z.object({
  min: z.number().nonnegative(),
  max: z.number().nonnegative(),
}).refine((range) => range.min <= range.max, { message: 'priceRange.min must not exceed priceRange.max' });

/**
 * Catalog ingestion payload. Availability and version are authoritative
 * inputs from the inventory system; `soldOut` is derived.
 */
export const catalogEventSchema = z.object({
  id: z.string().min(1).max(128),
  title: z.string().min(1).max(300),
  artist: z.string().min(1).max(300),
  venue: venueSchema,
  category: z.string().min(1).max(100),
  date: isoDate,
  priceRange: priceRangeSchema,
  availability: z.object({
    total: z.number().int().nonnegative(),
    available: z.number().int().nonnegative(),
  }).refine((value) => value.available <= value.total, { message: 'available must not exceed total' }),
  popularityScore: z.number().nonnegative().default(0),
  version: z.number().int().nonnegative().default(0),
  tags: z.array(z.string()).optional(),
  description: z.string().max(5000).optional(),
});

export type CatalogEventInput = z.input<typeof catalogEventSchema>;

export const invalidationSignalSchema = z.object({
  id: z.string().min(1),
  key: z.string().min(1),
  dependencies: z.array(z.string().min(1)),
  appliedAt: z.number(),
  origin: z.string().optional(),
});

export type CatalogEventPayload = z.output<typeof catalogEventSchema>;

/** Detail edits; availability and version are owned by the inventory stream */
export const eventDetailsPatchSchema = z.object({
  title: z.string().min(1).max(300).optional(),
  artist: z.string().min(1).max(300).optional(),
  venue: venueSchema.optional(),
  category: z.string().min(1).max(100).optional(),
  date: isoDate.optional(),
  priceRange: priceRangeSchema.optional(),
  tags: z.array(z.string()).optional(),
  description: z.string().max(5000).optional(),
}).strict();

export const popularityRefreshSchema = z.record(z.string().min(1), z.number().nonnegative());
