import { SearchServiceConfig } from '../config';
import {
  AvailabilityPatch,
  CatalogEvent,
  MutationResult,
  QueryExecution,
  QueryPlan,
  RiskSignalSource,
} from '../types';
import { createChildLogger } from '../utils/logger';
import { IndexSnapshot, RankingEngine } from './ranking.service';

/**
 * Per-request inputs the store cannot derive from the plan.
 */
export interface QueryContext {
  now: number;
  degradedEventIds: ReadonlySet<string>;
  skipFacets: boolean;
  risk?: RiskSignalSource;
}

/**
 * Search backend collaborator. Implementations throw `TransientBackendError`
 * for timeouts and failures that are worth retrying.
 */
export interface DocumentStore {
  executeQuery(plan: QueryPlan, context: QueryContext, signal?: AbortSignal): Promise<QueryExecution>;
  applyMutation(eventId: string, patch: AvailabilityPatch, version: number): Promise<MutationResult>;
  upsert(event: CatalogEvent): Promise<void>;
  remove(eventId: string): Promise<void>;
}

/**
 * In-process read projection of the catalog.
 *
 * Documents are replaced, never edited in place, so a snapshot handed to a
 * running query stays valid while writes continue. The snapshot is rebuilt
 * lazily the first time a query sees a new store version.
 */
export class InMemoryDocumentStore implements DocumentStore {
  private documents: Map<string, CatalogEvent> = new Map();
  private storeVersion = 0;
  private snapshotCache: IndexSnapshot | null = null;
  private readonly engine: RankingEngine;
  private logger = createChildLogger({ component: 'document-store' });

  constructor(
    private readonly ranking: SearchServiceConfig['ranking'],
    private readonly maxPages: number,
    engine?: RankingEngine
  ) {
    this.engine = engine ?? new RankingEngine();
  }

  async executeQuery(plan: QueryPlan, context: QueryContext, signal?: AbortSignal): Promise<QueryExecution> {
    const snapshot = this.snapshot();
    const page = await this.engine.execute(plan, snapshot, {
      weights: this.ranking.weights,
      now: context.now,
      degradedEventIds: context.degradedEventIds,
      risk: context.risk,
      riskSuppressThreshold: this.ranking.riskSuppressThreshold,
      skipFacets: context.skipFacets,
      maxPages: this.maxPages,
      facetSizes: this.ranking.facetSizes,
      signal,
    });

    return { ...page, indexVersion: snapshot.version };
  }

  async applyMutation(eventId: string, patch: AvailabilityPatch, version: number): Promise<MutationResult> {
    const current = this.documents.get(eventId);
    if (!current) {
      // Missing projection; the caller re-upserts the full document.
      this.logger.warn({ eventId, version }, 'Mutation for unknown document');
      return { status: 'stale', currentVersion: 0 };
    }

    if (version <= current.version) {
      return { status: 'stale', currentVersion: current.version };
    }

    this.write({
      ...current,
      availability: { ...current.availability, available: patch.available, soldOut: patch.soldOut },
      version,
    });
    return { status: 'applied', newVersion: version };
  }

  async upsert(event: CatalogEvent): Promise<void> {
    this.write(event);
  }

  async remove(eventId: string): Promise<void> {
    if (this.documents.delete(eventId)) {
      this.storeVersion++;
    }
  }

  get(eventId: string): CatalogEvent | undefined {
    return this.documents.get(eventId);
  }

  get size(): number {
    return this.documents.size;
  }

  /**
   * Immutable view at the current store version, sorted by event id.
   */
  snapshot(): IndexSnapshot {
    if (this.snapshotCache?.version !== this.storeVersion) {
      const events = Array.from(this.documents.values()).sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
      this.snapshotCache = Object.freeze({ version: this.storeVersion, events: Object.freeze(events) });
    }
    return this.snapshotCache;
  }

  private write(event: CatalogEvent): void {
    this.documents.set(event.id, event);
    this.storeVersion++;
  }
}
