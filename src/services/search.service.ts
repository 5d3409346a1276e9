import { createHash } from 'crypto';
import { SearchServiceConfig } from '../config';
import { suggestRequestSchema } from '../schemas/search.schema';
import {
  HealthReport,
  QueryExecution,
  QueryPlan,
  RangeFilter,
  RiskSignalSource,
  SearchResponse,
  ServingMode,
  Suggestion,
} from '../types';
import {
  ExhaustedError,
  InvalidQueryError,
  RequestCancelledError,
  errorMessage,
} from '../utils/errors';
import { createChildLogger } from '../utils/logger';
import { searchDuration, searchRequestsTotal, suggestRequestsTotal } from '../utils/metrics';
import { RetryBudgetExceeded, withRetry } from '../utils/retry';
import { DegradationController } from './degradation-controller.service';
import { DocumentStore, QueryContext } from './document-store';
import { EpochRegistry, eventDependency } from './epoch-registry';
import { LagMonitor } from './lag-monitor';
import { QueryBuilder, nextCursor } from './query-builder.service';
import { SearchAnalytics } from './search-analytics.service';
import { ComputedValue, SearchCache } from './search-cache.service';
import { SuggestionIndex } from './suggestion-index.service';

/** Read-side view of the synchronizer's degraded set */
export interface DegradedEventSource {
  degradedEventIds(): ReadonlySet<string>;
}

export interface SearchServiceDependencies {
  config: SearchServiceConfig;
  queryBuilder: QueryBuilder;
  searchCache: SearchCache<QueryExecution>;
  documentStore: DocumentStore;
  epochRegistry: EpochRegistry;
  degradationController: DegradationController;
  suggestionIndex: SuggestionIndex;
  lagMonitor: LagMonitor;
  degradedEvents: DegradedEventSource;
  searchAnalytics: SearchAnalytics;
  riskSignals?: RiskSignalSource;
}

export interface SearchServiceOptions {
  /** Randomize backoff delays (default: true) */
  jitter?: boolean;
  now?: () => number;
}

export interface SearchOptions {
  /** Caller cancellation, e.g. the client went away */
  signal?: AbortSignal;
  /** Attributes the search to a user in analytics */
  userId?: string;
}

type ResponseSource = 'cache' | 'compute' | 'shared' | 'stale' | 'fallback';

interface ResponseMeta {
  mode: ServingMode;
  source: ResponseSource;
  servedStale: boolean;
  deadlineHit: boolean;
  userId?: string;
}

const EMPTY_EXECUTION: QueryExecution = {
  hits: [],
  facets: null,
  total: 0,
  refineSearch: false,
  hasMore: false,
  indexVersion: 0,
};

function dateFilterOf(plan: QueryPlan): RangeFilter | undefined {
  return plan.filters.find((filter): filter is RangeFilter => filter.kind === 'range' && filter.field === 'date');
}

/**
 * Search, Suggest and Health.
 *
 * A search builds its plan (failing fast on invalid input), then reads the
 * cache under the plan's current epochs. Misses are computed once per key
 * with retries, all under the request deadline. Anything short of a fresh,
 * complete result is flagged `degraded`.
 */
export class SearchService {
  private readonly config: SearchServiceConfig;
  private readonly queryBuilder: QueryBuilder;
  private readonly cache: SearchCache<QueryExecution>;
  private readonly store: DocumentStore;
  private readonly epochs: EpochRegistry;
  private readonly controller: DegradationController;
  private readonly suggestions: SuggestionIndex;
  private readonly lagMonitor: LagMonitor;
  private readonly degradedEvents: DegradedEventSource;
  private readonly analytics: SearchAnalytics;
  private readonly riskSignals?: RiskSignalSource;
  private readonly now: () => number;
  private logger = createChildLogger({ component: 'search-service' });

  constructor(dependencies: SearchServiceDependencies, private readonly options: SearchServiceOptions = {}) {
    this.config = dependencies.config;
    this.queryBuilder = dependencies.queryBuilder;
    this.cache = dependencies.searchCache;
    this.store = dependencies.documentStore;
    this.epochs = dependencies.epochRegistry;
    this.controller = dependencies.degradationController;
    this.suggestions = dependencies.suggestionIndex;
    this.lagMonitor = dependencies.lagMonitor;
    this.degradedEvents = dependencies.degradedEvents;
    this.analytics = dependencies.searchAnalytics;
    this.riskSignals = dependencies.riskSignals;
    this.now = options.now ?? Date.now;
  }

  async search(raw: unknown, options: SearchOptions = {}): Promise<SearchResponse> {
    const endTimer = searchDuration.startTimer();

    let plan: QueryPlan;
    try {
      plan = this.queryBuilder.build(raw);
    } catch (error: unknown) {
      searchRequestsTotal.inc({ outcome: 'invalid' });
      throw error;
    }

    if (options.signal?.aborted) {
      searchRequestsTotal.inc({ outcome: 'cancelled' });
      throw new RequestCancelledError();
    }

    const mode = this.controller.state;
    const key = this.cacheKey(plan);

    if (mode === 'DEGRADED') {
      const cached = this.bestCached(plan, key);
      if (cached) {
        return this.respond(plan, cached, { mode, source: 'stale', servedStale: true, deadlineHit: false, userId: options.userId }, endTimer);
      }
    }

    const deadline = new AbortController();
    const timeout = setTimeout(() => deadline.abort(), this.config.search.deadlineMs);
    const onCallerAbort = () => deadline.abort();
    options.signal?.addEventListener('abort', onCallerAbort, { once: true });

    try {
      const outcome = await this.cache.getOrCompute(
        key,
        (signal) => this.compute(plan, mode, signal),
        { signal: deadline.signal }
      );
      const source: ResponseSource = outcome.source === 'computed' ? 'compute' : outcome.source;
      return this.respond(plan, outcome.value, { mode, source, servedStale: false, deadlineHit: false, userId: options.userId }, endTimer);
    } catch (error: unknown) {
      if (options.signal?.aborted) {
        searchRequestsTotal.inc({ outcome: 'cancelled' });
        throw new RequestCancelledError();
      }

      if (deadline.signal.aborted || error instanceof ExhaustedError) {
        const deadlineHit = deadline.signal.aborted;
        this.logger.warn({
          queryId: plan.queryId,
          reason: deadlineHit ? 'deadline' : 'exhausted',
          error: errorMessage(error),
        }, 'Search falling back');

        const cached = this.bestCached(plan, key);
        if (cached) {
          return this.respond(plan, cached, { mode, source: 'stale', servedStale: true, deadlineHit, userId: options.userId }, endTimer);
        }
        if (deadlineHit) {
          return this.respond(plan, EMPTY_EXECUTION, { mode, source: 'fallback', servedStale: false, deadlineHit, userId: options.userId }, endTimer);
        }
      }

      searchRequestsTotal.inc({ outcome: 'error' });
      throw error;
    } finally {
      clearTimeout(timeout);
      options.signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  suggest(raw: unknown): Suggestion[] {
    const parsed = suggestRequestSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue.path.join('.') || undefined;
      throw new InvalidQueryError(
        field === 'prefix' ? 'INVALID_PREFIX' : 'MALFORMED_REQUEST',
        field ? `${field}: ${issue.message}` : issue.message,
        field
      );
    }

    suggestRequestsTotal.inc();
    const { prefix, limit, types, city } = parsed.data;
    return this.suggestions.suggest(prefix, { limit, types, city });
  }

  health(): HealthReport {
    const stats = this.cache.stats();
    return {
      state: this.controller.state,
      lagMillis: this.lagMonitor.lagMillis(this.now()),
      cacheHitRate: Math.round(stats.hitRate * 10000) / 10000,
      cacheEntries: stats.entries,
      degradedEvents: this.degradedEvents.degradedEventIds().size,
      since: new Date(this.controller.since).toISOString(),
    };
  }

  /**
   * SHA-256 of the plan fingerprint and the epochs the plan depends on.
   */
  cacheKey(plan: QueryPlan): string {
    return createHash('sha256')
      .update(`${plan.fingerprint}|${this.epochs.snapshotFor(plan)}`)
      .digest('hex');
  }

  /**
   * Short TTL when any hit is close to selling out, none when the whole
   * date range is in the past, long otherwise.
   */
  ttlFor(plan: QueryPlan, execution: QueryExecution): number | null {
    const dates = dateFilterOf(plan);
    if (dates?.max !== undefined && dates.max < this.now()) {
      return null;
    }

    const { nearSoldOutRatio, shortTtlMs, longTtlMs } = this.config.cache;
    const nearSoldOut = execution.hits.some(
      (hit) => hit.availability.total > 0 && hit.availability.available / hit.availability.total <= nearSoldOutRatio
    );
    return nearSoldOut ? shortTtlMs : longTtlMs;
  }

  private async compute(plan: QueryPlan, mode: ServingMode, signal: AbortSignal): Promise<ComputedValue<QueryExecution>> {
    const context: QueryContext = {
      now: this.now(),
      degradedEventIds: this.degradedEvents.degradedEventIds(),
      skipFacets: mode === 'RECOVERING',
      risk: this.riskSignals,
    };

    let execution: QueryExecution;
    try {
      execution = await withRetry(() => this.store.executeQuery(plan, context, signal), {
        maxRetries: this.config.sync.maxRetries,
        initialDelayMs: this.config.sync.initialDelayMs,
        maxDelayMs: this.config.sync.maxDelayMs,
        jitter: this.options.jitter ?? true,
        operationName: 'executeQuery',
        signal,
        onAttemptFailed: (error) => {
          if (!(error instanceof RequestCancelledError)) {
            this.controller.recordBackendOutcome(false);
          }
        },
      });
    } catch (error: unknown) {
      if (error instanceof RetryBudgetExceeded) {
        throw new ExhaustedError('executeQuery', error.attempts, errorMessage(error.lastError), plan.queryId);
      }
      throw error;
    }
    this.controller.recordBackendOutcome(true);

    const hasStaleHits = execution.hits.some((hit) => hit.stale);
    return {
      value: execution,
      dependencies: [
        ...execution.hits.map((hit) => eventDependency(hit.eventId)),
        ...this.epochs.dependenciesFor(plan),
      ],
      ttlMs: this.ttlFor(plan, execution),
      fingerprint: plan.fingerprint,
      cacheable: execution.facets !== null && !hasStaleHits,
    };
  }

  private bestCached(plan: QueryPlan, key: string): QueryExecution | null {
    const cached = this.cache.get(key, { allowStale: true });
    if (cached.hit) return cached.value;
    const latest = this.cache.latestFor(plan.fingerprint);
    return latest.hit ? latest.value : null;
  }

  private respond(
    plan: QueryPlan,
    execution: QueryExecution,
    meta: ResponseMeta,
    endTimer: ReturnType<typeof searchDuration.startTimer>
  ): SearchResponse {
    const partialFacets = execution.facets === null && !execution.refineSearch;
    const degraded =
      meta.mode !== 'HEALTHY' ||
      meta.servedStale ||
      meta.deadlineHit ||
      partialFacets ||
      execution.hits.some((hit) => hit.stale);

    searchRequestsTotal.inc({ outcome: degraded ? 'degraded' : 'ok' });
    endTimer({ source: meta.source });

    // Later pages of the same query are not new searches
    if (plan.pagination.page === 1) {
      this.analytics.record({
        userId: meta.userId,
        terms: plan.terms,
        filters: plan.filters,
        resultCount: execution.total,
        at: this.now(),
      });
    }

    return {
      hits: execution.hits,
      facets: execution.facets,
      total: execution.total,
      cursor: execution.hasMore ? nextCursor(plan) : null,
      refineSearch: execution.refineSearch,
      degraded,
      mode: meta.mode,
      indexVersion: execution.indexVersion,
    };
  }
}
