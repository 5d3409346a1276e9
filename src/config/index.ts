import dotenv from 'dotenv';
import { validateEnv, ValidatedEnv } from './env-validation';

dotenv.config();

export interface RankingWeights {
  /** Field boosts inside the text score */
  titleBoost: number;
  artistBoost: number;
  venueBoost: number;
  /** Weighted-sum coefficients */
  text: number;
  popularity: number;
  geo: number;
  stalenessPenalty: number;
  risk: number;
}

export interface SearchServiceConfig {
  environment: ValidatedEnv['NODE_ENV'];
  port: number;
  host: string;
  redis: {
    url?: string;
    invalidationChannel: string;
  };
  rabbitmq: {
    url?: string;
    deltaQueue: string;
    prefetch: number;
  };
  internal: {
    /** HMAC secret for /internal routes; unset rejects all internal calls */
    serviceSecret?: string;
  };
  query: {
    defaultPageSize: number;
    maxPageSize: number;
    maxPages: number;
    maxTextLength: number;
    maxRadiusMiles: number;
  };
  ranking: {
    weights: RankingWeights;
    /** Events at or above this risk score are dropped when suppression is on */
    riskSuppressThreshold: number;
    facetSizes: { categories: number; cities: number };
  };
  cache: {
    maxEntries: number;
    shortTtlMs: number;
    longTtlMs: number;
    nearSoldOutRatio: number;
  };
  search: {
    deadlineMs: number;
  };
  suggest: {
    defaultLimit: number;
    maxLimit: number;
    maxPrefixLength: number;
  };
  sync: {
    stalenessSlaMs: number;
    maxRetries: number;
    initialDelayMs: number;
    maxDelayMs: number;
    retentionMs: number;
  };
  degradation: {
    sustainWindowMs: number;
    recoveryWindowMs: number;
    errorWindowMs: number;
    errorRateThreshold: number;
    minSamples: number;
    evaluationIntervalMs: number;
  };
  analytics: {
    /** Distinct normalized queries counted before the least recent is evicted */
    maxTrackedQueries: number;
    maxTrackedUsers: number;
    /** Searches remembered per user for preference analysis */
    userHistoryLength: number;
    /** Preferences only look at searches this recent */
    preferenceWindowMs: number;
    historyHours: number;
  };
  recommend: {
    defaultLimit: number;
    maxLimit: number;
    /** Price ceiling assumed when a user never filtered on price */
    defaultMaxPrice: number;
  };
}

const DAY_MS = 24 * 60 * 60 * 1000;

export const defaultRankingWeights: RankingWeights = {
  titleBoost: 2,
  artistBoost: 3,
  venueBoost: 1,
  text: 1,
  popularity: 0.5,
  geo: 1,
  stalenessPenalty: 0.5,
  risk: 2,
};

export function buildConfig(env: ValidatedEnv): SearchServiceConfig {
  return {
    environment: env.NODE_ENV,
    port: env.PORT,
    host: env.HOST,
    redis: {
      url: env.REDIS_URL,
      invalidationChannel: env.INVALIDATION_CHANNEL,
    },
    rabbitmq: {
      url: env.RABBITMQ_URL,
      deltaQueue: env.INVENTORY_DELTA_QUEUE,
      prefetch: env.INVENTORY_DELTA_PREFETCH,
    },
    internal: {
      serviceSecret: env.INTERNAL_SERVICE_SECRET,
    },
    query: {
      defaultPageSize: env.SEARCH_DEFAULT_PAGE_SIZE,
      maxPageSize: env.SEARCH_MAX_PAGE_SIZE,
      maxPages: env.SEARCH_MAX_PAGES,
      maxTextLength: env.SEARCH_MAX_TEXT_LENGTH,
      maxRadiusMiles: env.SEARCH_MAX_RADIUS_MILES,
    },
    ranking: {
      weights: { ...defaultRankingWeights },
      riskSuppressThreshold: 0.8,
      facetSizes: { categories: 20, cities: 15 },
    },
    cache: {
      maxEntries: env.CACHE_MAX_ENTRIES,
      shortTtlMs: env.CACHE_SHORT_TTL_MS,
      longTtlMs: env.CACHE_LONG_TTL_MS,
      nearSoldOutRatio: env.CACHE_NEAR_SOLD_OUT_RATIO,
    },
    search: {
      deadlineMs: env.SEARCH_DEADLINE_MS,
    },
    suggest: {
      defaultLimit: 8,
      maxLimit: 20,
      maxPrefixLength: 20,
    },
    sync: {
      stalenessSlaMs: env.SYNC_STALENESS_SLA_MS,
      maxRetries: env.SYNC_MAX_RETRIES,
      initialDelayMs: env.SYNC_INITIAL_DELAY_MS,
      maxDelayMs: env.SYNC_MAX_DELAY_MS,
      retentionMs: env.EVENT_RETENTION_DAYS * DAY_MS,
    },
    degradation: {
      sustainWindowMs: env.DEGRADE_SUSTAIN_WINDOW_MS,
      recoveryWindowMs: env.DEGRADE_RECOVERY_WINDOW_MS,
      errorWindowMs: env.DEGRADE_ERROR_WINDOW_MS,
      errorRateThreshold: env.DEGRADE_ERROR_RATE_THRESHOLD,
      minSamples: env.DEGRADE_MIN_SAMPLES,
      evaluationIntervalMs: env.DEGRADE_EVALUATION_INTERVAL_MS,
    },
    analytics: {
      maxTrackedQueries: env.ANALYTICS_MAX_TRACKED_QUERIES,
      maxTrackedUsers: env.ANALYTICS_MAX_TRACKED_USERS,
      userHistoryLength: 50,
      preferenceWindowMs: 30 * DAY_MS,
      historyHours: env.ANALYTICS_HISTORY_HOURS,
    },
    recommend: {
      defaultLimit: 10,
      maxLimit: 50,
      defaultMaxPrice: 300,
    },
  };
}

/**
 * Load and validate configuration from the environment.
 * `overrides` is merged one level deep, mainly for tests.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): SearchServiceConfig {
  return mergeConfig(buildConfig(validateEnv(env)), overrides);
}

export type ConfigOverrides = {
  [K in keyof SearchServiceConfig]?: SearchServiceConfig[K] extends object
    ? Partial<SearchServiceConfig[K]>
    : SearchServiceConfig[K];
};

export function mergeConfig(base: SearchServiceConfig, overrides: ConfigOverrides): SearchServiceConfig {
  return {
    ...base,
    ...(overrides.environment !== undefined && { environment: overrides.environment }),
    ...(overrides.port !== undefined && { port: overrides.port }),
    ...(overrides.host !== undefined && { host: overrides.host }),
    redis: { ...base.redis, ...overrides.redis },
    rabbitmq: { ...base.rabbitmq, ...overrides.rabbitmq },
    internal: { ...base.internal, ...overrides.internal },
    query: { ...base.query, ...overrides.query },
    ranking: { ...base.ranking, ...overrides.ranking },
    cache: { ...base.cache, ...overrides.cache },
    search: { ...base.search, ...overrides.search },
    suggest: { ...base.suggest, ...overrides.suggest },
    sync: { ...base.sync, ...overrides.sync },
    degradation: { ...base.degradation, ...overrides.degradation },
    analytics: { ...base.analytics, ...overrides.analytics },
    recommend: { ...base.recommend, ...overrides.recommend },
  };
}
