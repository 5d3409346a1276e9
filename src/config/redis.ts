import Redis from 'ioredis';
import { createChildLogger } from '../utils/logger';

const logger = createChildLogger({ component: 'redis' });

/**
 * One connection per role: a subscribed connection cannot issue commands.
 */
export const createRedisConnection = (url: string, role: 'publisher' | 'subscriber'): Redis => {
  const redis = new Redis(url, {
    retryStrategy: (times: number) => {
      const delay = Math.min(times * 50, 2000);
      return delay;
    },
    maxRetriesPerRequest: 3,
  });

  redis.on('connect', () => {
    logger.info({ role }, 'Redis connection established');
  });

  redis.on('error', (error: Error) => {
    logger.error({ role, error: error.message }, 'Redis connection error');
  });

  return redis;
};
