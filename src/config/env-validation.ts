import Joi from 'joi';
import { logger } from '../utils/logger';

export interface ValidatedEnv {
  NODE_ENV: 'development' | 'staging' | 'production' | 'test';
  PORT: number;
  HOST: string;
  REDIS_URL?: string;
  INVALIDATION_CHANNEL: string;
  RABBITMQ_URL?: string;
  INTERNAL_SERVICE_SECRET?: string;
  INVENTORY_DELTA_QUEUE: string;
  INVENTORY_DELTA_PREFETCH: number;
  SEARCH_DEFAULT_PAGE_SIZE: number;
  SEARCH_MAX_PAGE_SIZE: number;
  SEARCH_MAX_PAGES: number;
  SEARCH_MAX_TEXT_LENGTH: number;
  SEARCH_MAX_RADIUS_MILES: number;
  SEARCH_DEADLINE_MS: number;
  CACHE_MAX_ENTRIES: number;
  CACHE_SHORT_TTL_MS: number;
  CACHE_LONG_TTL_MS: number;
  CACHE_NEAR_SOLD_OUT_RATIO: number;
  SYNC_STALENESS_SLA_MS: number;
  SYNC_MAX_RETRIES: number;
  SYNC_INITIAL_DELAY_MS: number;
  SYNC_MAX_DELAY_MS: number;
  EVENT_RETENTION_DAYS: number;
  DEGRADE_SUSTAIN_WINDOW_MS: number;
  DEGRADE_RECOVERY_WINDOW_MS: number;
  DEGRADE_ERROR_WINDOW_MS: number;
  DEGRADE_ERROR_RATE_THRESHOLD: number;
  DEGRADE_MIN_SAMPLES: number;
  DEGRADE_EVALUATION_INTERVAL_MS: number;
  ANALYTICS_MAX_TRACKED_QUERIES: number;
  ANALYTICS_MAX_TRACKED_USERS: number;
  ANALYTICS_HISTORY_HOURS: number;
}

/**
 * Environment contract. Every tunable has a default so a bare
 * `npm start` runs a single-node instance with the in-memory projection.
 */
const envSchema = Joi.object<ValidatedEnv>({
  NODE_ENV: Joi.string()
    .valid('development', 'staging', 'production', 'test')
    .default('development'),
  PORT: Joi.number().port().default(3012),
  HOST: Joi.string().default('0.0.0.0'),

  // Optional transports
  REDIS_URL: Joi.string().uri({ scheme: ['redis', 'rediss'] }).optional(),
  INVALIDATION_CHANNEL: Joi.string().default('search:invalidations'),
  RABBITMQ_URL: Joi.string().uri({ scheme: ['amqp', 'amqps'] }).optional(),
  INTERNAL_SERVICE_SECRET: Joi.string().min(8).optional(),
  INVENTORY_DELTA_QUEUE: Joi.string().default('inventory.deltas'),
  INVENTORY_DELTA_PREFETCH: Joi.number().integer().min(1).default(64),

  // Query bounds
  SEARCH_DEFAULT_PAGE_SIZE: Joi.number().integer().min(1).default(20),
  SEARCH_MAX_PAGE_SIZE: Joi.number().integer().min(1).max(500).default(100),
  SEARCH_MAX_PAGES: Joi.number().integer().min(1).default(50),
  SEARCH_MAX_TEXT_LENGTH: Joi.number().integer().min(1).default(256),
  SEARCH_MAX_RADIUS_MILES: Joi.number().positive().default(500),
  SEARCH_DEADLINE_MS: Joi.number().integer().min(1).default(800),

  // Cache
  CACHE_MAX_ENTRIES: Joi.number().integer().min(1).default(10000),
  CACHE_SHORT_TTL_MS: Joi.number().integer().min(1).default(5000),
  CACHE_LONG_TTL_MS: Joi.number().integer().min(1).default(30000),
  CACHE_NEAR_SOLD_OUT_RATIO: Joi.number().min(0).max(1).default(0.1),

  // Synchronizer
  SYNC_STALENESS_SLA_MS: Joi.number().integer().min(1).default(1000),
  SYNC_MAX_RETRIES: Joi.number().integer().min(0).default(3),
  SYNC_INITIAL_DELAY_MS: Joi.number().integer().min(0).default(50),
  SYNC_MAX_DELAY_MS: Joi.number().integer().min(0).default(2000),
  EVENT_RETENTION_DAYS: Joi.number().integer().min(0).default(30),

  // Degradation controller
  DEGRADE_SUSTAIN_WINDOW_MS: Joi.number().integer().min(0).default(5000),
  DEGRADE_RECOVERY_WINDOW_MS: Joi.number().integer().min(0).default(15000),
  DEGRADE_ERROR_WINDOW_MS: Joi.number().integer().min(1).default(10000),
  DEGRADE_ERROR_RATE_THRESHOLD: Joi.number().min(0).max(1).default(0.5),
  DEGRADE_MIN_SAMPLES: Joi.number().integer().min(1).default(10),
  DEGRADE_EVALUATION_INTERVAL_MS: Joi.number().integer().min(10).default(250),

  // Search analytics
  ANALYTICS_MAX_TRACKED_QUERIES: Joi.number().integer().min(1).default(5000),
  ANALYTICS_MAX_TRACKED_USERS: Joi.number().integer().min(1).default(10000),
  ANALYTICS_HISTORY_HOURS: Joi.number().integer().min(1).max(24 * 31).default(168),
}).unknown(true);


/**
 * Validate the environment. Throws with every violation listed.
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): ValidatedEnv {
  const { error, value } = envSchema.validate(env, {
    abortEarly: false,
    convert: true,
  });

  if (error) {
    const details = error.details.map((detail) => detail.message);
    logger.fatal({ details }, 'Environment validation failed');
    throw new Error(`Environment validation failed: ${details.join('; ')}`);
  }

  return value;
}
