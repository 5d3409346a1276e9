import { createContainer, asFunction, asValue, AwilixContainer, InjectionMode } from 'awilix';
import { SearchServiceConfig } from './index';
import { QueryExecution, RiskSignalSource } from '../types';
import { InventoryDeltaConsumer } from '../consumers/inventory-delta.consumer';
import { AvailabilitySynchronizer } from '../services/availability-synchronizer.service';
import { CacheInvalidator } from '../services/cache-invalidator';
import { DegradationController } from '../services/degradation-controller.service';
import { DocumentStore, InMemoryDocumentStore } from '../services/document-store';
import { EpochRegistry } from '../services/epoch-registry';
import { InProcessInvalidationChannel } from '../services/invalidation-channel';
import { LagMonitor } from '../services/lag-monitor';
import { QueryBuilder } from '../services/query-builder.service';
import { RecommendationService } from '../services/recommendation.service';
import { SearchAnalytics } from '../services/search-analytics.service';
import { SearchCache } from '../services/search-cache.service';
import { SearchService } from '../services/search.service';
import { SuggestionIndex } from '../services/suggestion-index.service';

export interface Dependencies {
  config: SearchServiceConfig;
  clock: () => number;
  queryBuilder: QueryBuilder;
  documentStore: DocumentStore;
  epochRegistry: EpochRegistry;
  invalidationChannel: InProcessInvalidationChannel;
  lagMonitor: LagMonitor;
  degradationController: DegradationController;
  suggestionIndex: SuggestionIndex;
  searchCache: SearchCache<QueryExecution>;
  cacheInvalidator: CacheInvalidator;
  availabilitySynchronizer: AvailabilitySynchronizer;
  searchAnalytics: SearchAnalytics;
  searchService: SearchService;
  recommendationService: RecommendationService;
  inventoryDeltaConsumer: InventoryDeltaConsumer;
}

export interface ContainerOptions {
  /** Injected clock; defaults to Date.now */
  now?: () => number;
  /** Randomize retry backoff (default: true) */
  jitter?: boolean;
  /** Search backend; defaults to the in-process projection */
  documentStore?: DocumentStore;
  riskSignals?: RiskSignalSource;
}

export const createDependencyContainer = (
  config: SearchServiceConfig,
  options: ContainerOptions = {}
): AwilixContainer<Dependencies> => {
  const container = createContainer<Dependencies>({
    injectionMode: InjectionMode.PROXY
  });

  container.register({
    // Configuration
    config: asValue(config),
    clock: asValue(options.now ?? Date.now),

    // Read projection and invalidation plumbing
    documentStore: options.documentStore
      ? asValue(options.documentStore)
      : asFunction(() => new InMemoryDocumentStore(config.ranking, config.query.maxPages)).singleton(),

    epochRegistry: asFunction(() => new EpochRegistry()).singleton(),

    invalidationChannel: asFunction(({ clock }: Dependencies) =>
      new InProcessInvalidationChannel({ now: clock })
    ).singleton(),

    lagMonitor: asFunction(({ invalidationChannel, clock }: Dependencies) =>
      new LagMonitor(invalidationChannel, clock)
    ).singleton(),

    degradationController: asFunction(({ lagMonitor, clock }: Dependencies) =>
      new DegradationController({
        ...config.degradation,
        stalenessSlaMs: config.sync.stalenessSlaMs,
        lagSource: () => lagMonitor.lagMillis(),
        now: clock,
      })
    ).singleton(),

    // Services
    queryBuilder: asFunction(() => new QueryBuilder(config.query)).singleton(),

    suggestionIndex: asFunction(() => new SuggestionIndex(config.suggest)).singleton(),

    searchCache: asFunction(({ clock }: Dependencies) =>
      new SearchCache<QueryExecution>({ namespace: 'search', maxEntries: config.cache.maxEntries, now: clock })
    ).singleton(),

    cacheInvalidator: asFunction(({ invalidationChannel, searchCache }: Dependencies) => {
      const invalidator = new CacheInvalidator(invalidationChannel);
      invalidator.register(searchCache);
      invalidator.start();
      return invalidator;
    }).singleton(),

    availabilitySynchronizer: asFunction((cradle: Dependencies) =>
      new AvailabilitySynchronizer({
        documentStore: cradle.documentStore,
        invalidationChannel: cradle.invalidationChannel,
        epochRegistry: cradle.epochRegistry,
        suggestionIndex: cradle.suggestionIndex,
        backendHealth: cradle.degradationController,
      }, { sync: config.sync, jitter: options.jitter, now: cradle.clock })
    ).singleton(),

    searchAnalytics: asFunction(({ clock }: Dependencies) =>
      new SearchAnalytics({ analytics: config.analytics, now: clock })
    ).singleton(),

    searchService: asFunction((cradle: Dependencies) =>
      new SearchService({
        config,
        queryBuilder: cradle.queryBuilder,
        searchCache: cradle.searchCache,
        documentStore: cradle.documentStore,
        epochRegistry: cradle.epochRegistry,
        degradationController: cradle.degradationController,
        suggestionIndex: cradle.suggestionIndex,
        lagMonitor: cradle.lagMonitor,
        degradedEvents: cradle.availabilitySynchronizer,
        searchAnalytics: cradle.searchAnalytics,
        riskSignals: options.riskSignals,
      }, { jitter: options.jitter, now: cradle.clock })
    ).singleton(),

    recommendationService: asFunction((cradle: Dependencies) =>
      new RecommendationService({
        config,
        catalog: cradle.availabilitySynchronizer,
        preferences: cradle.searchAnalytics,
        degradedEvents: cradle.availabilitySynchronizer,
      }, { now: cradle.clock })
    ).singleton(),

    // Messaging
    inventoryDeltaConsumer: asFunction(({ availabilitySynchronizer }: Dependencies) =>
      new InventoryDeltaConsumer(availabilitySynchronizer, config.rabbitmq)
    ).singleton(),
  });

  return container;
};

/**
 * Resolve the singletons whose constructors wire listeners, so invalidation
 * reaches the cache before the first write.
 */
export const warmContainer = (container: AwilixContainer<Dependencies>): void => {
  container.resolve('cacheInvalidator');
  container.resolve('lagMonitor');
  container.resolve('searchService');
};
