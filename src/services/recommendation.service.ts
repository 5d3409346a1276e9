import { SearchServiceConfig } from '../config';
import { recommendationRequestSchema } from '../schemas/search.schema';
import { CatalogEvent, Recommendations, UserPreferences } from '../types';
import { InvalidQueryError } from '../utils/errors';
import { createChildLogger } from '../utils/logger';
import { recommendationRequestsTotal } from '../utils/metrics';
import { normalizeKeyword } from '../utils/text';
import { toSearchHit } from './ranking.service';
import { DegradedEventSource } from './search.service';

/** Boosts applied to a matched preference */
const PREFERENCE_BOOSTS = { category: 2, artist: 3, city: 1.5 } as const;
const POPULARITY_FACTOR = 1.2;
const IN_BUDGET_WEIGHT = 1.3;

export interface CatalogSource {
  listEvents(): CatalogEvent[];
}

export interface PreferenceSource {
  preferencesFor(userId: string, now?: number): UserPreferences | null;
}

export interface RecommendationDependencies {
  config: SearchServiceConfig;
  catalog: CatalogSource;
  preferences: PreferenceSource;
  degradedEvents: DegradedEventSource;
}

interface Scored {
  event: CatalogEvent;
  score: number;
  time: number;
}

function byScoreThenDate(a: Scored, b: Scored): number {
  return b.score - a.score || a.time - b.time || (a.event.id < b.event.id ? -1 : a.event.id > b.event.id ? 1 : 0);
}

/**
 * Upcoming events a user is likely to want.
 *
 * With search history, each bookable event scores the sum of its matched
 * preference boosts plus a popularity term, itself weighted up when the
 * cheapest ticket fits the user's usual price ceiling. Without history the
 * answer is the most popular bookable events.
 */
export class RecommendationService {
  private readonly settings: SearchServiceConfig['recommend'];
  private readonly catalog: CatalogSource;
  private readonly preferences: PreferenceSource;
  private readonly degradedEvents: DegradedEventSource;
  private readonly now: () => number;
  private logger = createChildLogger({ component: 'recommendation-service' });

  constructor(dependencies: RecommendationDependencies, options: { now?: () => number } = {}) {
    this.settings = dependencies.config.recommend;
    this.catalog = dependencies.catalog;
    this.preferences = dependencies.preferences;
    this.degradedEvents = dependencies.degradedEvents;
    this.now = options.now ?? Date.now;
  }

  recommend(raw: unknown, userId?: string): Recommendations {
    const parsed = recommendationRequestSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue.path.join('.') || undefined;
      throw new InvalidQueryError('MALFORMED_REQUEST', field ? `${field}: ${issue.message}` : issue.message, field);
    }

    const limit = Math.min(parsed.data.limit ?? this.settings.defaultLimit, this.settings.maxLimit);
    const now = this.now();
    const bookable = this.catalog
      .listEvents()
      .filter((event) => !event.availability.soldOut && Date.parse(event.date) >= now);

    const preferences = userId !== undefined ? this.preferences.preferencesFor(userId, now) : null;
    const scored = preferences
      ? bookable.map((event) => this.personalized(event, preferences))
      : bookable.map((event) => ({ event, score: event.popularityScore, time: Date.parse(event.date) }));

    const strategy = preferences ? 'personalized' : 'popular';
    recommendationRequestsTotal.inc({ strategy });
    this.logger.debug({ userId, strategy, candidates: bookable.length }, 'Recommendations computed');

    const degraded = this.degradedEvents.degradedEventIds();
    return {
      strategy,
      hits: scored
        .sort(byScoreThenDate)
        .slice(0, limit)
        .map(({ event, score }) => toSearchHit(event, score, degraded.has(event.id))),
    };
  }

  private personalized(event: CatalogEvent, preferences: UserPreferences): Scored {
    let matched = 0;
    if (preferences.categories.includes(normalizeKeyword(event.category))) matched += PREFERENCE_BOOSTS.category;
    if (preferences.artists.includes(normalizeKeyword(event.artist))) matched += PREFERENCE_BOOSTS.artist;
    if (preferences.cities.includes(normalizeKeyword(event.venue.city))) matched += PREFERENCE_BOOSTS.city;

    const maxPrice = preferences.maxPrice ?? this.settings.defaultMaxPrice;
    const popularity = Math.sqrt(POPULARITY_FACTOR * Math.max(0, event.popularityScore));
    const budgetWeight = event.priceRange.min <= maxPrice ? IN_BUDGET_WEIGHT : 1;

    return { event, score: matched + popularity * budgetWeight, time: Date.parse(event.date) };
  }
}
