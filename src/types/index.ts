/**
 * Shared type contracts for the event search service.
 * Consumed by the query layer (builder, ranking, cache) and by the
 * write path (synchronizer, invalidation channel).
 */

export interface GeoPoint {
  lat: number;
  lon: number;
}

export interface Venue {
  name: string;
  location: GeoPoint;
  city: string;
  capacity: number;
}

export interface PriceRange {
  min: number;
  max: number;
}

export interface Availability {
  total: number;
  available: number;
  soldOut: boolean;
}

/**
 * Catalog event as owned by the availability synchronizer.
 * `version` is the inventory-stream ordering version.
 */
export interface CatalogEvent {
  id: string;
  title: string;
  artist: string;
  venue: Venue;
  category: string;
  /** ISO-8601 start date */
  date: string;
  priceRange: PriceRange;
  availability: Availability;
  popularityScore: number;
  version: number;
  /** ISO-8601 timestamp of the last accepted change */
  updatedAt: string;
  tags?: string[];
  description?: string;
}

// ============================================================================
// QUERY PLAN
// ============================================================================

export type SortField = 'relevance' | 'date' | 'price' | 'popularity' | 'distance';

export type RangeField = 'price' | 'date';

export type TermField = 'category' | 'city' | 'artist';

export interface TextFilter {
  readonly kind: 'text';
  readonly terms: readonly string[];
}

export interface RangeFilter {
  readonly kind: 'range';
  readonly field: RangeField;
  readonly min?: number;
  readonly max?: number;
}

export interface GeoFilter {
  readonly kind: 'geo';
  readonly origin: Readonly<GeoPoint>;
  readonly radiusMiles: number;
}

export interface TermFilter {
  readonly kind: 'term';
  readonly field: TermField;
  readonly values: readonly string[];
}

export type QueryFilter = TextFilter | RangeFilter | GeoFilter | TermFilter;

export interface Pagination {
  readonly page: number;
  readonly pageSize: number;
}

export interface QueryPlan {
  readonly terms: readonly string[];
  readonly filters: readonly QueryFilter[];
  readonly sort: SortField;
  readonly pagination: Pagination;
  readonly availableOnly: boolean;
  readonly suppressFlagged: boolean;
  /** Hash of the whole normalized plan */
  readonly fingerprint: string;
  /** Hash of the plan without pagination; cursors are bound to it */
  readonly queryId: string;
}

// ============================================================================
// RESULTS
// ============================================================================

export interface SearchHit {
  eventId: string;
  title: string;
  artist: string;
  venue: { name: string; city: string; location: GeoPoint };
  category: string;
  date: string;
  priceRange: PriceRange;
  availability: Availability;
  popularityScore: number;
  score: number;
  distanceMiles?: number;
  /** The event's index projection is behind its authoritative state */
  stale: boolean;
}

export interface FacetBucket {
  key: string;
  count: number;
}

export interface Facets {
  categories: FacetBucket[];
  cities: FacetBucket[];
  priceRanges: FacetBucket[];
  dates: FacetBucket[];
  availability: FacetBucket[];
}

export interface RankedPage {
  hits: SearchHit[];
  facets: Facets | null;
  total: number;
  refineSearch: boolean;
  hasMore: boolean;
}

export interface QueryExecution extends RankedPage {
  indexVersion: number;
}

export type ServingMode = 'HEALTHY' | 'DEGRADED' | 'RECOVERING';

export interface SearchResponse {
  hits: SearchHit[];
  facets: Facets | null;
  total: number;
  cursor: string | null;
  refineSearch: boolean;
  degraded: boolean;
  mode: ServingMode;
  indexVersion: number;
}

// ============================================================================
// WRITE PATH
// ============================================================================

export type InventoryDelta =
  | { op: 'decrement'; eventId: string; version: number; quantity: number; occurredAt?: number }
  | { op: 'increment'; eventId: string; version: number; quantity: number; occurredAt?: number }
  | { op: 'set'; eventId: string; version: number; available: number; occurredAt?: number };

export type ApplyOutcome =
  | { status: 'applied'; event: CatalogEvent }
  | { status: 'stale'; storedVersion: number };

/** Per-id result of a catalog batch; skipped ids appear in neither list */
export interface BatchOutcome {
  applied: string[];
  failed: string[];
}

export interface AvailabilityPatch {
  available: number;
  soldOut: boolean;
}

export type MutationResult =
  | { status: 'applied'; newVersion: number }
  | { status: 'stale'; currentVersion: number };

export interface InvalidationSignal {
  id: string;
  /** Key the channel orders delivery by (the event id) */
  key: string;
  /** Dependency ids, e.g. `event:e1`, `category:music`, `catalog` */
  dependencies: string[];
  /** Epoch millis at which the underlying change was committed */
  appliedAt: number;
  /** Instance that published the signal, set when relayed between replicas */
  origin?: string;
}

export interface EventDetailsPatch {
  title?: string;
  artist?: string;
  venue?: Venue;
  category?: string;
  date?: string;
  priceRange?: PriceRange;
  tags?: string[];
  description?: string;
}

// ============================================================================
// SUGGESTIONS & HEALTH
// ============================================================================

export type SuggestionType = 'event' | 'artist';

export interface Suggestion {
  text: string;
  type: SuggestionType;
  score: number;
}

export interface SuggestContext {
  limit?: number;
  types?: SuggestionType[];
  city?: string;
}

export interface HealthReport {
  state: ServingMode;
  lagMillis: number;
  cacheHitRate: number;
  cacheEntries: number;
  degradedEvents: number;
  since: string;
}

// ============================================================================
// ANALYTICS & RECOMMENDATIONS
// ============================================================================

/** Filter dimensions counted by search analytics; text is counted per query */
export type FilterDimension = 'category' | 'city' | 'artist' | 'price' | 'date' | 'geo';

export interface QueryCount {
  query: string;
  count: number;
}

export interface HourlyCount {
  /** Start of the hour, ISO 8601 */
  hour: string;
  count: number;
}

export interface SearchAnalyticsReport {
  totalSearches: number;
  zeroResultSearches: number;
  trackedQueries: number;
  popularQueries: QueryCount[];
  filterUsage: Record<FilterDimension, number>;
  searchesByHour: HourlyCount[];
}

/** Normalized values a user filtered on recently, most used first */
export interface UserPreferences {
  categories: string[];
  cities: string[];
  artists: string[];
  /** Mean of the user's price ceilings, absent when they never set one */
  maxPrice?: number;
}

export type RecommendationStrategy = 'personalized' | 'popular';

export interface Recommendations {
  strategy: RecommendationStrategy;
  hits: SearchHit[];
}

/** Optional fraud/risk collaborator; scores are in [0, 1] */
export interface RiskSignalSource {
  riskScore(eventId: string): number | undefined;
}
