import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import { AwilixContainer } from 'awilix';
import { SearchServiceConfig } from './config';
import { ContainerOptions, Dependencies, createDependencyContainer, warmContainer } from './config/dependencies';
import routes, { healthRoutes, internalRoutes } from './routes';
import { registerErrorHandler } from './middleware/error-handler';
import { requestLoggingHooks } from './utils/logger';

declare module 'fastify' {
  interface FastifyInstance {
    container: AwilixContainer<Dependencies>;
  }
}

export interface BuildAppOptions {
  config: SearchServiceConfig;
  /** Prebuilt container; created from `config` when omitted */
  container?: AwilixContainer<Dependencies>;
  containerOptions?: ContainerOptions;
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false,
    requestTimeout: 30000,
    connectionTimeout: 10000,
    keepAliveTimeout: 72000
  });

  const container = options.container ?? createDependencyContainer(options.config, options.containerOptions);
  warmContainer(container);

  // Decorate Fastify with container
  app.decorate('container', container);

  app.addHook('onRequest', requestLoggingHooks.onRequest);
  app.addHook('onResponse', requestLoggingHooks.onResponse);

  // Register plugins
  await app.register(helmet, {
    contentSecurityPolicy: false
  });

  await app.register(cors, {
    origin: true,
    credentials: true
  });

  registerErrorHandler(app);

  await app.register(healthRoutes);
  await app.register(internalRoutes);

  // Register API routes with prefix
  await app.register(routes, { prefix: '/api/v1' });

  app.addHook('onClose', async () => {
    const { degradationController, cacheInvalidator, invalidationChannel } = container.cradle;
    degradationController.stop();
    cacheInvalidator.stop();
    await invalidationChannel.close();
  });

  return app;
}
