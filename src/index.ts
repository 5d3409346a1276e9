export * from './types';
export { buildApp, BuildAppOptions } from './app';
export { loadConfig, buildConfig, mergeConfig, SearchServiceConfig, ConfigOverrides, RankingWeights } from './config';
export { createDependencyContainer, warmContainer, Dependencies, ContainerOptions } from './config/dependencies';
export { QueryBuilder, encodeCursor, decodeCursor } from './services/query-builder.service';
export { RankingEngine, IndexSnapshot, RankingContext } from './services/ranking.service';
export { DocumentStore, InMemoryDocumentStore, QueryContext } from './services/document-store';
export { SearchCache, CacheLookup, ComputeOutcome, CacheStats } from './services/search-cache.service';
export { EpochRegistry } from './services/epoch-registry';
export { InvalidationChannel, InProcessInvalidationChannel } from './services/invalidation-channel';
export { CacheInvalidator, InvalidationTarget } from './services/cache-invalidator';
export { AvailabilitySynchronizer } from './services/availability-synchronizer.service';
export { SuggestionIndex } from './services/suggestion-index.service';
export { DegradationController, ModeTransition, TransitionReason } from './services/degradation-controller.service';
export { LagMonitor } from './services/lag-monitor';
export { SearchService, SearchOptions } from './services/search.service';
export { InventoryDeltaConsumer, DeliveryDecision } from './consumers/inventory-delta.consumer';
export { RedisInvalidationRelay } from './clients/redis-invalidation-relay';
export {
  AppError,
  InvalidQueryError,
  TransientBackendError,
  ExhaustedError,
  InvalidCacheStateError,
  NotFoundError,
  ConflictError,
  RequestCancelledError,
} from './utils/errors';
