import { LRUCache } from 'lru-cache';
import { SearchServiceConfig } from '../config';
import {
  FilterDimension,
  HourlyCount,
  QueryCount,
  QueryFilter,
  SearchAnalyticsReport,
  UserPreferences,
} from '../types';
import { createChildLogger } from '../utils/logger';

const HOUR_MS = 60 * 60 * 1000;
const PREFERRED_CATEGORIES = 5;
const PREFERRED_CITIES = 3;
const PREFERRED_ARTISTS = 5;

/** One answered search, as seen by analytics */
export interface SearchActivity {
  userId?: string;
  terms: readonly string[];
  filters: readonly QueryFilter[];
  resultCount: number;
  at: number;
}

interface QueryStat {
  count: number;
  lastSeenAt: number;
}

interface UserSearch {
  at: number;
  categories: string[];
  cities: string[];
  artists: string[];
  priceMax?: number;
}

export interface SearchAnalyticsOptions {
  analytics: SearchServiceConfig['analytics'];
  now?: () => number;
}

function emptyFilterUsage(): Record<FilterDimension, number> {
  return { category: 0, city: 0, artist: 0, price: 0, date: 0, geo: 0 };
}

function dimensionOf(filter: QueryFilter): FilterDimension | null {
  switch (filter.kind) {
    case 'term':
    case 'range':
      return filter.field;
    case 'geo':
      return 'geo';
    case 'text':
      return null;
  }
}

/** Most frequent values first, ties alphabetical */
function topValues(values: string[], limit: number): string[] {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return Array.from(counts.entries())
    .sort(([a, countA], [b, countB]) => countB - countA || (a < b ? -1 : a > b ? 1 : 0))
    .slice(0, limit)
    .map(([value]) => value);
}

/**
 * In-process search analytics: query popularity, filter usage, hourly
 * volume and the per-user history recommendations are built from.
 *
 * Distinct queries and users are each held in an LRU, so memory stays
 * bounded however many distinct searches arrive. Hourly buckets older than
 * the configured history are dropped.
 */
export class SearchAnalytics {
  private queries: LRUCache<string, QueryStat>;
  private users: LRUCache<string, UserSearch[]>;
  private hourly: Map<number, number> = new Map();
  private filterUsage = emptyFilterUsage();
  private totalSearches = 0;
  private zeroResultSearches = 0;
  private readonly settings: SearchServiceConfig['analytics'];
  private readonly now: () => number;
  private logger = createChildLogger({ component: 'search-analytics' });

  constructor(options: SearchAnalyticsOptions) {
    this.settings = options.analytics;
    this.now = options.now ?? Date.now;
    this.queries = new LRUCache<string, QueryStat>({ max: this.settings.maxTrackedQueries });
    this.users = new LRUCache<string, UserSearch[]>({ max: this.settings.maxTrackedUsers });
  }

  record(activity: SearchActivity): void {
    this.totalSearches++;
    if (activity.resultCount === 0) {
      this.zeroResultSearches++;
    }

    const hour = Math.floor(activity.at / HOUR_MS) * HOUR_MS;
    this.hourly.set(hour, (this.hourly.get(hour) ?? 0) + 1);
    this.pruneHours(activity.at);

    for (const filter of activity.filters) {
      const dimension = dimensionOf(filter);
      if (dimension) this.filterUsage[dimension]++;
    }

    if (activity.terms.length > 0) {
      const query = activity.terms.join(' ');
      const stat = this.queries.get(query);
      this.queries.set(query, { count: (stat?.count ?? 0) + 1, lastSeenAt: activity.at });
    }

    if (activity.userId !== undefined) {
      this.recordForUser(activity.userId, activity);
    }
  }

  /**
   * Totals since start, the most searched queries and hourly volume over
   * the retained history.
   */
  report(limit: number, now: number = this.now()): SearchAnalyticsReport {
    this.pruneHours(now);

    const popularQueries: QueryCount[] = Array.from(this.queries.entries())
      .map(([query, stat]) => ({ query, count: stat.count }))
      .sort((a, b) => b.count - a.count || (a.query < b.query ? -1 : a.query > b.query ? 1 : 0))
      .slice(0, limit);

    const searchesByHour: HourlyCount[] = Array.from(this.hourly.entries())
      .sort(([a], [b]) => a - b)
      .map(([hour, count]) => ({ hour: new Date(hour).toISOString(), count }));

    return {
      totalSearches: this.totalSearches,
      zeroResultSearches: this.zeroResultSearches,
      trackedQueries: this.queries.size,
      popularQueries,
      filterUsage: { ...this.filterUsage },
      searchesByHour,
    };
  }

  /**
   * What a user filtered on within the preference window, or null when
   * there is nothing to personalize from.
   */
  preferencesFor(userId: string, now: number = this.now()): UserPreferences | null {
    const history = this.users.get(userId);
    if (!history) return null;

    const cutoff = now - this.settings.preferenceWindowMs;
    const recent = history.filter((search) => search.at >= cutoff);

    const categories = topValues(recent.flatMap((search) => search.categories), PREFERRED_CATEGORIES);
    const cities = topValues(recent.flatMap((search) => search.cities), PREFERRED_CITIES);
    const artists = topValues(recent.flatMap((search) => search.artists), PREFERRED_ARTISTS);
    if (categories.length === 0 && cities.length === 0 && artists.length === 0) {
      return null;
    }

    const ceilings = recent
      .map((search) => search.priceMax)
      .filter((value): value is number => value !== undefined);
    const maxPrice = ceilings.length > 0
      ? Math.round((ceilings.reduce((sum, value) => sum + value, 0) / ceilings.length) * 100) / 100
      : undefined;

    return { categories, cities, artists, ...(maxPrice !== undefined && { maxPrice }) };
  }

  private recordForUser(userId: string, activity: SearchActivity): void {
    const search: UserSearch = { at: activity.at, categories: [], cities: [], artists: [] };
    for (const filter of activity.filters) {
      if (filter.kind === 'term') {
        const target = filter.field === 'category' ? search.categories : filter.field === 'city' ? search.cities : search.artists;
        target.push(...filter.values);
      } else if (filter.kind === 'range' && filter.field === 'price' && filter.max !== undefined) {
        search.priceMax = filter.max;
      }
    }

    const history = this.users.get(userId) ?? [];
    history.push(search);
    if (history.length > this.settings.userHistoryLength) {
      history.splice(0, history.length - this.settings.userHistoryLength);
    }
    this.users.set(userId, history);
    this.logger.debug({ userId, searches: history.length }, 'Recorded user search');
  }

  private pruneHours(now: number): void {
    const oldest = Math.floor(now / HOUR_MS) * HOUR_MS - (this.settings.historyHours - 1) * HOUR_MS;
    for (const hour of this.hourly.keys()) {
      if (hour < oldest) this.hourly.delete(hour);
    }
  }
}
