import { createHash } from 'crypto';
import { z } from 'zod';
import { SearchServiceConfig } from '../config';
import { searchRequestSchema, ParsedSearchRequest } from '../schemas/search.schema';
import { QueryFilter, QueryPlan, TermField } from '../types';
import { InvalidQueryError } from '../utils/errors';
import { kmToMiles } from '../utils/geo';
import { normalizeKeyword, uniqueTerms } from '../utils/text';

export type QueryBounds = SearchServiceConfig['query'];

const cursorSchema = z.object({
  q: z.string().min(1),
  p: z.number().int().positive(),
  s: z.number().int().positive(),
});

export interface CursorPosition {
  queryId: string;
  page: number;
  pageSize: number;
}

export function encodeCursor(position: CursorPosition): string {
  const payload = JSON.stringify({ q: position.queryId, p: position.page, s: position.pageSize });
  return Buffer.from(payload, 'utf8').toString('base64url');
}

export function decodeCursor(token: string): CursorPosition | null {
  try {
    const decoded: unknown = JSON.parse(Buffer.from(token, 'base64url').toString('utf8'));
    const parsed = cursorSchema.safeParse(decoded);
    if (!parsed.success) return null;
    return { queryId: parsed.data.q, page: parsed.data.p, pageSize: parsed.data.s };
  } catch {
    return null;
  }
}

function sha256(value: string): string {
  return createHash('sha256').update(value).digest('hex');
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function normalizedValues(values: string[] | undefined): string[] {
  if (!values) return [];
  return Array.from(new Set(values.map(normalizeKeyword).filter((value) => value.length > 0))).sort();
}

/**
 * Validates and normalizes raw search requests into immutable query plans.
 *
 * Stateless; safe to share across any number of concurrent requests.
 */
export class QueryBuilder {
  constructor(private readonly bounds: QueryBounds) {}

  build(raw: unknown): QueryPlan {
    const parsed = searchRequestSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue.path.join('.') || undefined;
      throw new InvalidQueryError(
        'MALFORMED_REQUEST',
        field ? `${field}: ${issue.message}` : issue.message,
        field
      );
    }

    return this.plan(parsed.data);
  }

  private plan(request: ParsedSearchRequest): QueryPlan {
    const text = request.text ?? '';
    if (text.length > this.bounds.maxTextLength) {
      throw new InvalidQueryError(
        'TEXT_TOO_LONG',
        `text must be at most ${this.bounds.maxTextLength} characters`,
        'text'
      );
    }
    const terms = uniqueTerms(text);
    if (terms.length === 0 && text.trim().length > 0) {
      throw new InvalidQueryError('TEXT_WITHOUT_TERMS', 'text contains no searchable terms', 'text');
    }

    const filters: QueryFilter[] = [];
    if (terms.length > 0) {
      filters.push({ kind: 'text', terms });
    }

    const termFields: Array<[TermField, string[] | undefined]> = [
      ['category', request.categories],
      ['city', request.cities],
      ['artist', request.artists],
    ];
    for (const [field, values] of termFields) {
      const normalized = normalizedValues(values);
      if (normalized.length > 0) {
        filters.push({ kind: 'term', field, values: normalized });
      }
    }

    if (request.priceMin !== undefined && request.priceMax !== undefined && request.priceMin > request.priceMax) {
      throw new InvalidQueryError('PRICE_RANGE_INVERTED', 'priceMin must not exceed priceMax', 'priceMin');
    }
    if (request.priceMin !== undefined || request.priceMax !== undefined) {
      filters.push({ kind: 'range', field: 'price', min: request.priceMin, max: request.priceMax });
    }

    const dateFrom = request.dateFrom !== undefined ? Date.parse(request.dateFrom) : undefined;
    const dateTo = request.dateTo !== undefined ? Date.parse(request.dateTo) : undefined;
    if (dateFrom !== undefined && dateTo !== undefined && dateFrom > dateTo) {
      throw new InvalidQueryError('DATE_RANGE_INVERTED', 'dateFrom must not be after dateTo', 'dateFrom');
    }
    if (dateFrom !== undefined || dateTo !== undefined) {
      filters.push({ kind: 'range', field: 'date', min: dateFrom, max: dateTo });
    }

    if (request.geo) {
      const { lat, lon, radius, unit } = request.geo;
      if (!Number.isFinite(lat) || !Number.isFinite(lon) || lat < -90 || lat > 90 || lon < -180 || lon > 180) {
        throw new InvalidQueryError('INVALID_COORDINATES', 'geo.lat must be within ±90 and geo.lon within ±180', 'geo');
      }
      if (!Number.isFinite(radius) || radius <= 0) {
        throw new InvalidQueryError('INVALID_RADIUS', 'geo.radius must be greater than 0', 'geo.radius');
      }
      const radiusMiles = unit === 'km' ? kmToMiles(radius) : radius;
      if (radiusMiles > this.bounds.maxRadiusMiles) {
        throw new InvalidQueryError(
          'INVALID_RADIUS',
          `geo.radius must not exceed ${this.bounds.maxRadiusMiles} miles`,
          'geo.radius'
        );
      }
      filters.push({ kind: 'geo', origin: { lat, lon }, radiusMiles });
    }

    const sort = request.sort ?? 'relevance';
    if (sort === 'distance' && !request.geo) {
      throw new InvalidQueryError('SORT_REQUIRES_GEO', 'sort=distance requires a geo origin', 'sort');
    }

    const availableOnly = request.availableOnly ?? true;
    const suppressFlagged = request.suppressFlagged ?? false;

    const queryId = sha256(JSON.stringify({ terms, filters, sort, availableOnly, suppressFlagged }));

    let page = request.page ?? 1;
    let pageSize = request.pageSize ?? this.bounds.defaultPageSize;
    if (request.cursor !== undefined) {
      const position = decodeCursor(request.cursor);
      if (!position) {
        throw new InvalidQueryError('INVALID_CURSOR', 'cursor is malformed', 'cursor');
      }
      if (position.queryId !== queryId) {
        throw new InvalidQueryError('INVALID_CURSOR', 'cursor belongs to a different query', 'cursor');
      }
      page = position.page;
      pageSize = position.pageSize;
    }

    if (page < 1) {
      throw new InvalidQueryError('PAGE_OUT_OF_BOUNDS', 'page must be 1 or greater', 'page');
    }
    if (pageSize < 1 || pageSize > this.bounds.maxPageSize) {
      throw new InvalidQueryError(
        'PAGE_SIZE_OUT_OF_BOUNDS',
        `pageSize must be between 1 and ${this.bounds.maxPageSize}`,
        'pageSize'
      );
    }

    return deepFreeze({
      terms,
      filters,
      sort,
      pagination: { page, pageSize },
      availableOnly,
      suppressFlagged,
      fingerprint: sha256(`${queryId}|${page}|${pageSize}`),
      queryId,
    });
  }
}

/**
 * Cursor pointing at the page after `plan`'s.
 */
export function nextCursor(plan: QueryPlan): string {
  return encodeCursor({
    queryId: plan.queryId,
    page: plan.pagination.page + 1,
    pageSize: plan.pagination.pageSize,
  });
}
