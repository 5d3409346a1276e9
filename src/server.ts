import { loadConfig } from './config';
import { createRedisConnection } from './config/redis';
import { buildApp } from './app';
import { RedisInvalidationRelay } from './clients/redis-invalidation-relay';
import { ArchiveExpiredJob } from './jobs/archive-expired.job';
import { enableDefaultMetrics } from './utils/metrics';
import { logger } from './utils/logger';
import { errorMessage } from './utils/errors';

type Closer = () => Promise<void> | void;

const PRESTOP_DELAY_MS = parseInt(process.env.PRESTOP_DELAY_MS || '0', 10);

// Shutdown steps, run in reverse registration order
const closers: Array<{ name: string; close: Closer }> = [];

async function start(): Promise<void> {
  const config = loadConfig();
  enableDefaultMetrics();

  const app = await buildApp({ config });
  closers.push({ name: 'http', close: () => app.close() });

  const { degradationController, availabilitySynchronizer, invalidationChannel, inventoryDeltaConsumer } =
    app.container.cradle;

  degradationController.start();

  const archiveJob = new ArchiveExpiredJob(availabilitySynchronizer);
  archiveJob.start();
  closers.push({ name: 'archive-job', close: () => archiveJob.stop() });

  // Cross-replica invalidation fan-out
  if (config.redis.url) {
    const publisher = createRedisConnection(config.redis.url, 'publisher');
    const subscriber = createRedisConnection(config.redis.url, 'subscriber');
    const relay = new RedisInvalidationRelay(
      invalidationChannel,
      publisher,
      subscriber,
      config.redis.invalidationChannel
    );
    await relay.start();
    closers.push({
      name: 'redis',
      close: async () => {
        await relay.stop();
        await Promise.all([publisher.quit(), subscriber.quit()]);
      },
    });
  } else {
    logger.info('REDIS_URL not set - invalidations stay local to this instance');
  }

  await inventoryDeltaConsumer.start();
  closers.push({ name: 'delta-consumer', close: () => inventoryDeltaConsumer.stop() });

  await app.listen({ port: config.port, host: config.host });
  logger.info({ port: config.port, host: config.host }, 'Event search service running');
}

const gracefulShutdown = async (signal: string) => {
  logger.info({ signal }, 'Shutdown signal received, shutting down gracefully');

  try {
    if (PRESTOP_DELAY_MS > 0) {
      logger.info({ delayMs: PRESTOP_DELAY_MS }, 'PreStop delay: waiting for LB to drain connections');
      await new Promise(resolve => setTimeout(resolve, PRESTOP_DELAY_MS));
    }

    while (closers.length > 0) {
      const closer = closers.pop();
      if (!closer) break;
      await closer.close();
      logger.info({ resource: closer.name }, 'Closed');
    }

    logger.info('Graceful shutdown completed successfully');
    process.exit(0);
  } catch (error) {
    logger.error({ error: errorMessage(error) }, 'Error during graceful shutdown');
    process.exit(1);
  }
};

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));

start().catch((error: unknown) => {
  logger.error({ error: errorMessage(error) }, 'Failed to start event search service');
  process.exit(1);
});
