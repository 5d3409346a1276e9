import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { RankingWeights } from '../config';
import {
  CatalogEvent,
  GeoFilter,
  QueryFilter,
  QueryPlan,
  RankedPage,
  RiskSignalSource,
  SearchHit,
  SortField,
} from '../types';
import { RequestCancelledError } from '../utils/errors';
import { distanceMiles } from '../utils/geo';
import { normalizeKeyword, tokenize } from '../utils/text';
import { FacetAccumulator } from './facet-aggregator';

/**
 * Read-only view of the index at one version. Never mutated once handed out.
 */
export interface IndexSnapshot {
  readonly version: number;
  readonly events: readonly CatalogEvent[];
}

export interface RankingContext {
  weights: RankingWeights;
  /** Clock used for date facets */
  now: number;
  degradedEventIds: ReadonlySet<string>;
  risk?: RiskSignalSource;
  riskSuppressThreshold: number;
  /** Filters-only fallback: no facet aggregation */
  skipFacets: boolean;
  maxPages: number;
  facetSizes: { categories: number; cities: number };
  signal?: AbortSignal;
  /** Candidates scanned between cancellation checks */
  chunkSize?: number;
}

export interface EventTokens {
  title: Set<string>;
  artist: Set<string>;
  venue: Set<string>;
  category: string;
  city: string;
  artistKeyword: string;
  time: number;
}

export interface Candidate {
  event: CatalogEvent;
  score: number;
  time: number;
  distance?: number;
  stale: boolean;
}

const DEFAULT_CHUNK_SIZE = 256;

// Events are immutable records; tokens are computed once per record.
const tokenCache = new WeakMap<CatalogEvent, EventTokens>();

function tokensFor(event: CatalogEvent): EventTokens {
  let tokens = tokenCache.get(event);
  if (!tokens) {
    tokens = {
      title: new Set(tokenize(event.title)),
      artist: new Set(tokenize(event.artist)),
      venue: new Set(tokenize(event.venue.name)),
      category: normalizeKeyword(event.category),
      city: normalizeKeyword(event.venue.city),
      artistKeyword: normalizeKeyword(event.artist),
      time: Date.parse(event.date),
    };
    tokenCache.set(event, tokens);
  }
  return tokens;
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function primaryOrder(sort: SortField, a: Candidate, b: Candidate): number {
  switch (sort) {
    case 'date':
      return a.time - b.time;
    case 'price':
      return a.event.priceRange.min - b.event.priceRange.min;
    case 'popularity':
      return b.event.popularityScore - a.event.popularityScore;
    case 'distance':
      return (a.distance ?? Infinity) - (b.distance ?? Infinity);
    case 'relevance':
    default:
      return b.score - a.score;
  }
}

/**
 * Total order: the requested sort, then score, then earlier date, then lower id.
 */
export function compareCandidates(sort: SortField, a: Candidate, b: Candidate): number {
  return (
    primaryOrder(sort, a, b) ||
    b.score - a.score ||
    a.time - b.time ||
    compareStrings(a.event.id, b.event.id)
  );
}

function roundScore(score: number): number {
  return Math.round(score * 10000) / 10000;
}

/** Client-facing projection of a scored event */
export function toSearchHit(event: CatalogEvent, score: number, stale: boolean, distance?: number): SearchHit {
  return {
    eventId: event.id,
    title: event.title,
    artist: event.artist,
    venue: { name: event.venue.name, city: event.venue.city, location: event.venue.location },
    category: event.category,
    date: event.date,
    priceRange: event.priceRange,
    availability: event.availability,
    popularityScore: event.popularityScore,
    score: roundScore(score),
    ...(distance !== undefined && { distanceMiles: Math.round(distance * 100) / 100 }),
    stale,
  };
}

/**
 * Scores, filters, sorts, paginates and aggregates candidates from an index
 * snapshot. A pure function of (plan, snapshot, context): it reads nothing
 * else and writes nothing.
 */
export class RankingEngine {
  async execute(plan: QueryPlan, snapshot: IndexSnapshot, context: RankingContext): Promise<RankedPage> {
    const { page, pageSize } = plan.pagination;

    if (page > context.maxPages) {
      return { hits: [], facets: null, total: 0, refineSearch: true, hasMore: false };
    }

    const facets = context.skipFacets ? null : new FacetAccumulator(context.now, context.facetSizes);
    const geo = plan.filters.find((filter): filter is GeoFilter => filter.kind === 'geo');
    const chunkSize = context.chunkSize ?? DEFAULT_CHUNK_SIZE;
    const candidates: Candidate[] = [];

    this.throwIfCancelled(context.signal);

    for (let index = 0; index < snapshot.events.length; index++) {
      if (index > 0 && index % chunkSize === 0) {
        await yieldToEventLoop();
        this.throwIfCancelled(context.signal);
      }

      const candidate = this.evaluate(snapshot.events[index], plan, geo, context);
      if (candidate) {
        candidates.push(candidate);
        facets?.add(candidate.event, candidate.time);
      }
    }

    candidates.sort((a, b) => compareCandidates(plan.sort, a, b));

    const offset = (page - 1) * pageSize;
    const hits = candidates.slice(offset, offset + pageSize).map((candidate) => this.toHit(candidate));

    return {
      hits,
      facets: facets ? facets.result() : null,
      total: candidates.length,
      refineSearch: false,
      hasMore: candidates.length > page * pageSize && page < context.maxPages,
    };
  }

  /**
   * Returns the scored candidate, or null when any filter rejects the event.
   */
  evaluate(
    event: CatalogEvent,
    plan: QueryPlan,
    geo: GeoFilter | undefined,
    context: RankingContext
  ): Candidate | null {
    if (plan.availableOnly && event.availability.soldOut) return null;

    const tokens = tokensFor(event);
    let textScore = 0;

    for (const filter of plan.filters) {
      if (!this.passesStructural(filter, event, tokens)) return null;
    }

    let distance: number | undefined;
    if (geo) {
      distance = distanceMiles(geo.origin, event.venue.location);
      if (distance > geo.radiusMiles) return null;
    }

    if (plan.terms.length > 0) {
      textScore = this.textScore(plan.terms, tokens, context.weights);
      if (textScore === 0) return null;
    }

    let riskPenalty = 0;
    if (plan.suppressFlagged && context.risk) {
      const risk = context.risk.riskScore(event.id);
      if (risk !== undefined) {
        if (risk >= context.riskSuppressThreshold) return null;
        riskPenalty = context.weights.risk * risk;
      }
    }

    const stale = context.degradedEventIds.has(event.id);
    const { weights } = context;
    const score =
      weights.text * textScore +
      weights.popularity * event.popularityScore +
      (distance !== undefined ? weights.geo * (1 / (1 + distance)) : 0) -
      (stale ? weights.stalenessPenalty : 0) -
      riskPenalty;

    return { event, score, time: tokens.time, distance, stale };
  }

  /**
   * Field-boosted text score: for each field, the boost times the share of
   * query terms found in it. Zero means no field matched any term.
   */
  textScore(terms: readonly string[], tokens: EventTokens, weights: RankingWeights): number {
    const fields: Array<[Set<string>, number]> = [
      [tokens.title, weights.titleBoost],
      [tokens.artist, weights.artistBoost],
      [tokens.venue, weights.venueBoost],
    ];

    let score = 0;
    for (const [fieldTokens, boost] of fields) {
      let matched = 0;
      for (const term of terms) {
        if (fieldTokens.has(term)) matched++;
      }
      score += boost * (matched / terms.length);
    }
    return score;
  }

  private passesStructural(filter: QueryFilter, event: CatalogEvent, tokens: EventTokens): boolean {
    switch (filter.kind) {
      case 'term': {
        const value =
          filter.field === 'category' ? tokens.category :
          filter.field === 'city' ? tokens.city :
          tokens.artistKeyword;
        return filter.values.includes(value);
      }
      case 'range': {
        const value = filter.field === 'price' ? event.priceRange.min : tokens.time;
        return (filter.min === undefined || value >= filter.min) && (filter.max === undefined || value <= filter.max);
      }
      case 'text':
      case 'geo':
        // scored separately
        return true;
    }
  }

  private toHit(candidate: Candidate): SearchHit {
    return toSearchHit(candidate.event, candidate.score, candidate.stale, candidate.distance);
  }

  private throwIfCancelled(signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
      throw new RequestCancelledError('Search cancelled during scoring');
    }
  }
}
