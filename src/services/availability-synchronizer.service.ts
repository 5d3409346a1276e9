import { v4 as uuidv4 } from 'uuid';
import { SearchServiceConfig } from '../config';
import { CatalogEventPayload } from '../schemas/search.schema';
import {
  ApplyOutcome,
  Availability,
  BatchOutcome,
  CatalogEvent,
  EventDetailsPatch,
  InventoryDelta,
} from '../types';
import { ConflictError, ExhaustedError, NotFoundError, errorMessage } from '../utils/errors';
import { KeyedLock } from '../utils/keyed-lock';
import { createChildLogger, sanitizeEventData } from '../utils/logger';
import { degradedEvents, deltasTotal } from '../utils/metrics';
import { RetryBudgetExceeded, RetryOptions, withRetry } from '../utils/retry';
import { DocumentStore } from './document-store';
import { EpochRegistry, eventDependency } from './epoch-registry';
import { InvalidationChannel } from './invalidation-channel';

/** Receives catalog changes off the inventory path */
export interface SuggestionSink {
  upsert(event: CatalogEvent): void;
  remove(eventId: string): void;
}

export interface BackendOutcomeRecorder {
  recordBackendOutcome(ok: boolean): void;
}

export interface SynchronizerDependencies {
  documentStore: DocumentStore;
  invalidationChannel: InvalidationChannel;
  epochRegistry: EpochRegistry;
  suggestionIndex: SuggestionSink;
  backendHealth?: BackendOutcomeRecorder;
}

export interface SynchronizerOptions {
  sync: SearchServiceConfig['sync'];
  /** Randomize backoff delays (default: true) */
  jitter?: boolean;
  now?: () => number;
}

/**
 * Resulting availability after a delta, clamped into [0, total].
 */
export function nextAvailability(current: Availability, delta: InventoryDelta): Availability {
  let available: number;
  switch (delta.op) {
    case 'decrement':
      available = current.available - delta.quantity;
      break;
    case 'increment':
      available = current.available + delta.quantity;
      break;
    case 'set':
      available = delta.available;
      break;
  }
  available = Math.min(current.total, Math.max(0, available));
  return { total: current.total, available, soldOut: available === 0 };
}

/**
 * Sole owner of catalog event state.
 *
 * Inventory deltas are applied under a per-event lock and accepted only
 * when their version is newer than the stored one. Each accepted change is
 * written to the document store, bumps the event's epochs and publishes an
 * invalidation signal. Catalog edits (ingest, details, popularity, archival)
 * go through the same lock and publish the same way.
 */
export class AvailabilitySynchronizer {
  private events: Map<string, CatalogEvent> = new Map();
  private degraded: Set<string> = new Set();
  private locks = new KeyedLock();
  private readonly store: DocumentStore;
  private readonly channel: InvalidationChannel;
  private readonly epochs: EpochRegistry;
  private readonly suggestions: SuggestionSink;
  private readonly backendHealth?: BackendOutcomeRecorder;
  private readonly now: () => number;
  private logger = createChildLogger({ component: 'availability-synchronizer' });

  constructor(dependencies: SynchronizerDependencies, private readonly options: SynchronizerOptions) {
    this.store = dependencies.documentStore;
    this.channel = dependencies.invalidationChannel;
    this.epochs = dependencies.epochRegistry;
    this.suggestions = dependencies.suggestionIndex;
    this.backendHealth = dependencies.backendHealth;
    this.now = options.now ?? Date.now;
  }

  async apply(delta: InventoryDelta): Promise<ApplyOutcome> {
    return this.locks.run<ApplyOutcome>(delta.eventId, async () => {
      const current = this.events.get(delta.eventId);
      if (!current) {
        deltasTotal.inc({ outcome: 'unknown_event' });
        throw new NotFoundError('Event', delta.eventId);
      }

      if (delta.version <= current.version) {
        deltasTotal.inc({ outcome: 'stale' });
        this.logger.debug({
          eventId: delta.eventId,
          version: delta.version,
          storedVersion: current.version,
        }, 'Dropped stale delta');
        return { status: 'stale', storedVersion: current.version };
      }

      const availability = nextAvailability(current.availability, delta);
      const updated: CatalogEvent = {
        ...current,
        availability,
        version: delta.version,
        updatedAt: new Date(this.now()).toISOString(),
      };

      try {
        const result = await this.withBackendRetry('applyMutation', () =>
          this.store.applyMutation(delta.eventId, { available: availability.available, soldOut: availability.soldOut }, delta.version)
        );
        // A store that lost the document answers stale below this version; rewrite it whole.
        // At or past this version means an earlier attempt landed.
        if (result.status === 'stale' && result.currentVersion < delta.version) {
          await this.withBackendRetry('upsert', () => this.store.upsert(updated));
        }
      } catch (error: unknown) {
        if (error instanceof RetryBudgetExceeded) {
          return this.exhaust(current, error);
        }
        throw error;
      }

      this.events.set(updated.id, updated);
      if (this.degraded.delete(updated.id)) {
        degradedEvents.set(this.degraded.size);
        this.logger.info({ eventId: updated.id }, 'Event recovered from degraded state');
      }

      const bumped = this.epochs.bumpFor(updated);
      await this.publish(updated.id, [eventDependency(updated.id), ...bumped]);

      deltasTotal.inc({ outcome: 'applied' });
      this.logger.debug({ ...sanitizeEventData(updated), op: delta.op }, 'Applied inventory delta');
      return { status: 'applied', event: updated };
    });
  }

  /**
   * Register a new catalog event.
   */
  async ingest(payload: CatalogEventPayload): Promise<CatalogEvent> {
    return this.locks.run(payload.id, async () => {
      if (this.events.has(payload.id)) {
        throw new ConflictError(`Event ${payload.id} already exists`, { eventId: payload.id });
      }

      const event: CatalogEvent = {
        id: payload.id,
        title: payload.title,
        artist: payload.artist,
        venue: payload.venue,
        category: payload.category,
        date: payload.date,
        priceRange: payload.priceRange,
        availability: {
          total: payload.availability.total,
          available: payload.availability.available,
          soldOut: payload.availability.available === 0,
        },
        popularityScore: payload.popularityScore,
        version: payload.version,
        updatedAt: new Date(this.now()).toISOString(),
        ...(payload.tags && { tags: payload.tags }),
        ...(payload.description !== undefined && { description: payload.description }),
      };

      await this.writeOrExhaust(event.id, () => this.store.upsert(event));

      this.events.set(event.id, event);
      this.suggestions.upsert(event);
      const bumped = this.epochs.bumpFor(event);
      await this.publish(event.id, [eventDependency(event.id), ...bumped]);

      this.logger.info(sanitizeEventData(event), 'Event ingested');
      return event;
    });
  }

  /**
   * Edit catalog details. The inventory version is left untouched.
   */
  async updateDetails(eventId: string, patch: EventDetailsPatch): Promise<CatalogEvent> {
    return this.locks.run(eventId, async () => {
      const current = this.requireEvent(eventId);
      const updated: CatalogEvent = { ...current, ...patch, updatedAt: new Date(this.now()).toISOString() };

      await this.writeOrExhaust(eventId, () => this.store.upsert(updated));

      this.events.set(eventId, updated);
      this.suggestions.upsert(updated);

      const bumped = new Set(this.epochs.bumpFor(updated));
      if (current.category !== updated.category || current.venue.city !== updated.venue.city) {
        this.epochs.bumpFor(current).forEach((id) => bumped.add(id));
      }
      await this.publish(eventId, [eventDependency(eventId), ...bumped]);

      this.logger.info({ eventId, fields: Object.keys(patch) }, 'Event details updated');
      return updated;
    });
  }

  /**
   * Apply externally computed popularity scores. Unknown ids and unchanged
   * scores are skipped. Each id is written independently, so one exhausted
   * write leaves the rest of the batch applied.
   */
  async refreshPopularity(scores: Record<string, number>): Promise<BatchOutcome> {
    const entries = Object.entries(scores);
    const settled = await Promise.allSettled(entries.map(([eventId, score]) =>
      this.locks.run(eventId, async () => {
        const current = this.events.get(eventId);
        if (!current || current.popularityScore === score) return false;

        const updated: CatalogEvent = { ...current, popularityScore: score, updatedAt: new Date(this.now()).toISOString() };
        await this.writeOrExhaust(eventId, () => this.store.upsert(updated));

        this.events.set(eventId, updated);
        this.suggestions.upsert(updated);
        const bumped = this.epochs.bumpFor(updated);
        await this.publish(eventId, [eventDependency(eventId), ...bumped]);
        return true;
      })
    ));

    const outcome: BatchOutcome = { applied: [], failed: [] };
    settled.forEach((result, index) => {
      const eventId = entries[index][0];
      if (result.status === 'rejected') {
        outcome.failed.push(eventId);
        this.logger.error({ eventId, error: errorMessage(result.reason) }, 'Popularity update failed');
      } else if (result.value) {
        outcome.applied.push(eventId);
      }
    });

    this.logger.info({
      submitted: entries.length,
      updated: outcome.applied.length,
      failed: outcome.failed.length,
    }, 'Popularity scores refreshed');
    return outcome;
  }

  /**
   * Remove events whose date plus the retention window has passed. A failed
   * removal is logged and the rest of the expired events still go.
   */
  async archiveExpired(now: number = this.now()): Promise<BatchOutcome> {
    const expired = Array.from(this.events.values())
      .filter((event) => Date.parse(event.date) + this.options.sync.retentionMs < now)
      .map((event) => event.id);

    const outcome: BatchOutcome = { applied: [], failed: [] };
    for (const eventId of expired) {
      try {
        const archived = await this.locks.run(eventId, async () => {
          const current = this.events.get(eventId);
          if (!current) return false;

          await this.writeOrExhaust(eventId, () => this.store.remove(eventId));

          this.events.delete(eventId);
          if (this.degraded.delete(eventId)) {
            degradedEvents.set(this.degraded.size);
          }
          this.suggestions.remove(eventId);
          const bumped = this.epochs.bumpFor(current);
          await this.publish(eventId, [eventDependency(eventId), ...bumped]);
          return true;
        });
        if (archived) outcome.applied.push(eventId);
      } catch (error: unknown) {
        outcome.failed.push(eventId);
        this.logger.error({ eventId, error: errorMessage(error) }, 'Archiving expired event failed');
      }
    }

    if (outcome.applied.length > 0 || outcome.failed.length > 0) {
      this.logger.info({ archived: outcome.applied.length, failed: outcome.failed.length }, 'Archived expired events');
    }
    return outcome;
  }

  listEvents(): CatalogEvent[] {
    return Array.from(this.events.values());
  }

  getEvent(eventId: string): CatalogEvent | undefined {
    return this.events.get(eventId);
  }

  isDegraded(eventId: string): boolean {
    return this.degraded.has(eventId);
  }

  /** Copy of the degraded set, stable for the duration of one query */
  degradedEventIds(): ReadonlySet<string> {
    return new Set(this.degraded);
  }

  get eventCount(): number {
    return this.events.size;
  }

  private requireEvent(eventId: string): CatalogEvent {
    const current = this.events.get(eventId);
    if (!current) {
      throw new NotFoundError('Event', eventId);
    }
    return current;
  }

  /**
   * Retry budget ran out: mark the event degraded and push it out of the
   * cache. The stored version stays put so a redelivery re-applies.
   */
  private async exhaust(current: CatalogEvent, error: RetryBudgetExceeded): Promise<never> {
    this.degraded.add(current.id);
    degradedEvents.set(this.degraded.size);
    deltasTotal.inc({ outcome: 'exhausted' });

    await this.publish(current.id, [eventDependency(current.id)]);

    this.logger.error({
      eventId: current.id,
      version: current.version,
      attempts: error.attempts,
      error: errorMessage(error.lastError),
    }, 'Event marked degraded after exhausted retries');

    throw new ExhaustedError('applyMutation', error.attempts, errorMessage(error.lastError), current.id);
  }

  private async writeOrExhaust(eventId: string, write: () => Promise<void>): Promise<void> {
    try {
      await this.withBackendRetry('upsert', write);
    } catch (error: unknown) {
      if (error instanceof RetryBudgetExceeded) {
        throw new ExhaustedError('upsert', error.attempts, errorMessage(error.lastError), eventId);
      }
      throw error;
    }
  }

  private async withBackendRetry<T>(operationName: string, fn: () => Promise<T>): Promise<T> {
    const { maxRetries, initialDelayMs, maxDelayMs } = this.options.sync;
    const retryOptions: RetryOptions = {
      maxRetries,
      initialDelayMs,
      maxDelayMs,
      jitter: this.options.jitter ?? true,
      operationName,
      onAttemptFailed: () => this.backendHealth?.recordBackendOutcome(false),
    };

    const result = await withRetry(fn, retryOptions);
    this.backendHealth?.recordBackendOutcome(true);
    return result;
  }

  /** Call only after the backend acknowledged the write; lag starts here. */
  private async publish(eventId: string, dependencies: string[]): Promise<void> {
    await this.channel.publish({
      id: uuidv4(),
      key: eventId,
      dependencies: Array.from(new Set(dependencies)),
      appliedAt: this.now(),
    });
  }
}
