/**
 * Unit Tests for AvailabilitySynchronizer
 *
 * Versioned applies, clamping, exhaustion, catalog edits and the
 * invalidation signals each change publishes.
 */

import { AvailabilitySynchronizer, nextAvailability } from '../../src/services/availability-synchronizer.service';
import { DocumentStore, InMemoryDocumentStore } from '../../src/services/document-store';
import { EpochRegistry } from '../../src/services/epoch-registry';
import { InProcessInvalidationChannel } from '../../src/services/invalidation-channel';
import { LagMonitor } from '../../src/services/lag-monitor';
import { SuggestionIndex } from '../../src/services/suggestion-index.service';
import { AvailabilityPatch, InvalidationSignal, MutationResult } from '../../src/types';
import { ConflictError, ExhaustedError, NotFoundError, TransientBackendError } from '../../src/utils/errors';
import { NOW, deferred, makePayload, testConfig, venues } from '../fixtures/events';

/** Wraps the in-memory store so tests can inject backend failures */
class FlakyStore implements DocumentStore {
  failuresLeft = 0;
  /** Writes for these ids always fail */
  readonly brokenIds = new Set<string>();
  readonly inner: InMemoryDocumentStore;

  constructor(inner: InMemoryDocumentStore) {
    this.inner = inner;
  }

  executeQuery: DocumentStore['executeQuery'] = (plan, context, signal) => this.inner.executeQuery(plan, context, signal);

  async applyMutation(eventId: string, patch: AvailabilityPatch, version: number): Promise<MutationResult> {
    this.maybeFail('applyMutation');
    return this.inner.applyMutation(eventId, patch, version);
  }

  async upsert(...args: Parameters<DocumentStore['upsert']>): Promise<void> {
    this.failIfBroken('upsert', args[0].id);
    this.maybeFail('upsert');
    return this.inner.upsert(...args);
  }

  async remove(eventId: string): Promise<void> {
    this.failIfBroken('remove', eventId);
    return this.inner.remove(eventId);
  }

  private failIfBroken(operation: string, eventId: string): void {
    if (this.brokenIds.has(eventId)) {
      throw new TransientBackendError(operation, `shard for ${eventId} unavailable`);
    }
  }

  private maybeFail(operation: string): void {
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new TransientBackendError(operation, 'backend timeout');
    }
  }
}

describe('AvailabilitySynchronizer', () => {
  const config = testConfig({ sync: { maxRetries: 2 } });
  let store: FlakyStore;
  let channel: InProcessInvalidationChannel;
  let epochs: EpochRegistry;
  let suggestions: SuggestionIndex;
  let backendHealth: { recordBackendOutcome: jest.Mock };
  let published: InvalidationSignal[];
  let synchronizer: AvailabilitySynchronizer;
  let clock: number;

  beforeEach(() => {
    clock = NOW;
    store = new FlakyStore(new InMemoryDocumentStore(config.ranking, config.query.maxPages));
    channel = new InProcessInvalidationChannel();
    epochs = new EpochRegistry();
    suggestions = new SuggestionIndex(config.suggest);
    backendHealth = { recordBackendOutcome: jest.fn() };
    published = [];
    channel.on('published', (signal) => published.push(signal));

    synchronizer = new AvailabilitySynchronizer(
      { documentStore: store, invalidationChannel: channel, epochRegistry: epochs, suggestionIndex: suggestions, backendHealth },
      { sync: config.sync, jitter: false, now: () => clock }
    );
  });

  afterEach(async () => {
    await channel.close();
  });

  describe('nextAvailability', () => {
    const current = { total: 100, available: 10, soldOut: false };

    it.each([
      ['decrement', { op: 'decrement' as const, eventId: 'e1', version: 2, quantity: 4 }, 6, false],
      ['decrement past zero', { op: 'decrement' as const, eventId: 'e1', version: 2, quantity: 40 }, 0, true],
      ['increment', { op: 'increment' as const, eventId: 'e1', version: 2, quantity: 5 }, 15, false],
      ['increment past total', { op: 'increment' as const, eventId: 'e1', version: 2, quantity: 500 }, 100, false],
      ['set', { op: 'set' as const, eventId: 'e1', version: 2, available: 0 }, 0, true],
      ['set above total', { op: 'set' as const, eventId: 'e1', version: 2, available: 120 }, 100, false],
    ])('should clamp %s into [0, total]', (_label, delta, available, soldOut) => {
      expect(nextAvailability(current, delta)).toEqual({ total: 100, available, soldOut });
    });
  });

  describe('ingest', () => {
    it('should store the event and publish its event and epoch dependencies', async () => {
      const event = await synchronizer.ingest(makePayload({ id: 'e1', category: 'Music' }));

      expect(event.availability).toEqual({ total: 100, available: 100, soldOut: false });
      expect(event.updatedAt).toBe(new Date(NOW).toISOString());
      expect(store.inner.get('e1')).toEqual(event);
      expect(synchronizer.eventCount).toBe(1);
      expect(published).toHaveLength(1);
      expect(published[0]).toMatchObject({
        key: 'e1',
        dependencies: ['event:e1', 'category:music', 'city:new york', 'catalog'],
        appliedAt: NOW,
      });
      expect(suggestions.suggest('event e')).toEqual([{ text: 'Event e1', type: 'event', score: 1 }]);
    });

    it('should refuse an id that already exists', async () => {
      await synchronizer.ingest(makePayload({ id: 'e1' }));

      await expect(synchronizer.ingest(makePayload({ id: 'e1' }))).rejects.toBeInstanceOf(ConflictError);
    });

    it('should derive soldOut from the ingested availability', async () => {
      const event = await synchronizer.ingest(makePayload({ id: 'e1', availability: { total: 50, available: 0 } }));

      expect(event.availability.soldOut).toBe(true);
    });
  });

  describe('apply', () => {
    beforeEach(async () => {
      await synchronizer.ingest(makePayload({ id: 'e1', availability: { total: 100, available: 100 }, version: 1 }));
      published.length = 0;
    });

    it('should walk availability down to sold out and ignore redelivery', async () => {
      const first = await synchronizer.apply({ op: 'decrement', eventId: 'e1', version: 2, quantity: 30 });
      expect(first.status).toBe('applied');
      expect(synchronizer.getEvent('e1')?.availability).toEqual({ total: 100, available: 70, soldOut: false });

      await synchronizer.apply({ op: 'decrement', eventId: 'e1', version: 3, quantity: 70 });
      expect(synchronizer.getEvent('e1')?.availability).toEqual({ total: 100, available: 0, soldOut: true });

      const redelivered = await synchronizer.apply({ op: 'decrement', eventId: 'e1', version: 2, quantity: 30 });
      expect(redelivered).toEqual({ status: 'stale', storedVersion: 3 });
      expect(synchronizer.getEvent('e1')?.availability).toEqual({ total: 100, available: 0, soldOut: true });
      expect(store.inner.get('e1')?.availability).toEqual({ total: 100, available: 0, soldOut: true });
      expect(store.inner.get('e1')?.version).toBe(3);
    });

    it('should publish one invalidation per accepted delta and none for stale ones', async () => {
      await synchronizer.apply({ op: 'set', eventId: 'e1', version: 2, available: 40 });
      await synchronizer.apply({ op: 'set', eventId: 'e1', version: 2, available: 10 });

      expect(published).toHaveLength(1);
      expect(published[0].dependencies).toEqual(['event:e1', 'category:music', 'city:new york', 'catalog']);
    });

    it('should throw NotFound for an event it does not own', async () => {
      await expect(
        synchronizer.apply({ op: 'decrement', eventId: 'ghost', version: 1, quantity: 1 })
      ).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should keep versions monotonic under concurrent deltas', async () => {
      const outcomes = await Promise.all([
        synchronizer.apply({ op: 'decrement', eventId: 'e1', version: 3, quantity: 5 }),
        synchronizer.apply({ op: 'decrement', eventId: 'e1', version: 2, quantity: 5 }),
        synchronizer.apply({ op: 'decrement', eventId: 'e1', version: 4, quantity: 5 }),
      ]);

      expect(outcomes.map((outcome) => outcome.status)).toEqual(['applied', 'stale', 'applied']);
      expect(synchronizer.getEvent('e1')?.version).toBe(4);
      expect(synchronizer.getEvent('e1')?.availability.available).toBe(90);
    });

    it('should absorb transient backend failures within the retry budget', async () => {
      store.failuresLeft = 2;

      const outcome = await synchronizer.apply({ op: 'decrement', eventId: 'e1', version: 2, quantity: 1 });

      expect(outcome.status).toBe('applied');
      expect(backendHealth.recordBackendOutcome.mock.calls).toEqual([[false], [false], [true]]);
      expect(synchronizer.isDegraded('e1')).toBe(false);
    });

    it('should mark the event degraded when retries run out and recover on the next apply', async () => {
      store.failuresLeft = 3;

      await expect(
        synchronizer.apply({ op: 'decrement', eventId: 'e1', version: 2, quantity: 1 })
      ).rejects.toBeInstanceOf(ExhaustedError);

      expect(synchronizer.isDegraded('e1')).toBe(true);
      expect(Array.from(synchronizer.degradedEventIds())).toEqual(['e1']);
      expect(synchronizer.getEvent('e1')?.version).toBe(1);
      expect(published).toHaveLength(1);
      expect(published[0].dependencies).toEqual(['event:e1']);

      const retried = await synchronizer.apply({ op: 'decrement', eventId: 'e1', version: 2, quantity: 1 });

      expect(retried.status).toBe('applied');
      expect(synchronizer.isDegraded('e1')).toBe(false);
      expect(store.inner.get('e1')?.availability.available).toBe(99);
    });

    it('should rewrite a document the store has lost', async () => {
      await store.inner.remove('e1');

      const outcome = await synchronizer.apply({ op: 'set', eventId: 'e1', version: 2, available: 12 });

      expect(outcome.status).toBe('applied');
      expect(store.inner.get('e1')?.availability).toEqual({ total: 100, available: 12, soldOut: false });
      expect(store.inner.get('e1')?.version).toBe(2);
    });

    it('should hand out a copy of the degraded set', async () => {
      store.failuresLeft = 3;
      await synchronizer.apply({ op: 'decrement', eventId: 'e1', version: 2, quantity: 1 }).catch(() => undefined);
      const snapshot = synchronizer.degradedEventIds();

      await synchronizer.apply({ op: 'decrement', eventId: 'e1', version: 2, quantity: 1 });

      expect(snapshot.has('e1')).toBe(true);
      expect(synchronizer.degradedEventIds().size).toBe(0);
    });

    it('should stamp the invalidation once the backend acknowledges the write', async () => {
      const lagMonitor = new LagMonitor(channel, () => clock);
      const original = store.inner.applyMutation.bind(store.inner);
      const applyMutation = jest.spyOn(store.inner, 'applyMutation').mockImplementation(async (eventId, patch, version) => {
        clock += 1500;
        return original(eventId, patch, version);
      });

      await synchronizer.apply({ op: 'set', eventId: 'e1', version: 2, available: 50 });

      expect(published).toHaveLength(1);
      expect(published[0].appliedAt).toBe(NOW + 1500);
      expect(synchronizer.getEvent('e1')?.updatedAt).toBe(new Date(NOW).toISOString());
      expect(lagMonitor.lagMillis()).toBe(0);
      applyMutation.mockRestore();
    });

    it('should not let a slow apply for one event hold up another', async () => {
      await synchronizer.ingest(makePayload({ id: 'e2' }));
      const gate = deferred<void>();
      const original = store.inner.applyMutation.bind(store.inner);
      const applyMutation = jest.spyOn(store.inner, 'applyMutation').mockImplementation(async (eventId, patch, version) => {
        if (eventId === 'e1') await gate.promise;
        return original(eventId, patch, version);
      });

      const slow = synchronizer.apply({ op: 'decrement', eventId: 'e1', version: 2, quantity: 1 });
      const fast = await synchronizer.apply({ op: 'decrement', eventId: 'e2', version: 2, quantity: 1 });

      expect(fast.status).toBe('applied');
      gate.resolve();
      expect((await slow).status).toBe('applied');
      applyMutation.mockRestore();
    });
  });

  describe('catalog edits', () => {
    beforeEach(async () => {
      await synchronizer.ingest(makePayload({ id: 'e1', title: 'Spring Gala', category: 'music', version: 4 }));
      published.length = 0;
    });

    it('should update details without touching the inventory version', async () => {
      const updated = await synchronizer.updateDetails('e1', { title: 'Spring Gala Encore' });

      expect(updated.title).toBe('Spring Gala Encore');
      expect(updated.version).toBe(4);
      expect(store.inner.get('e1')?.title).toBe('Spring Gala Encore');
      expect(suggestions.suggest('spring')).toEqual([{ text: 'Spring Gala Encore', type: 'event', score: 1 }]);
    });

    it('should invalidate both the old and new epochs when an event moves', async () => {
      await synchronizer.updateDetails('e1', { category: 'comedy', venue: venues.austin });

      expect(published[0].dependencies).toEqual([
        'event:e1',
        'category:comedy',
        'city:austin',
        'catalog',
        'category:music',
        'city:new york',
      ]);
      expect(epochs.current('category:music')).toBe(2);
    });

    it('should reject edits for unknown events', async () => {
      await expect(synchronizer.updateDetails('ghost', { title: 'x' })).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should apply changed popularity scores only', async () => {
      await synchronizer.ingest(makePayload({ id: 'e2', popularityScore: 3 }));
      published.length = 0;

      const outcome = await synchronizer.refreshPopularity({ e1: 7, e2: 3, ghost: 9 });

      expect(outcome).toEqual({ applied: ['e1'], failed: [] });
      expect(synchronizer.getEvent('e1')?.popularityScore).toBe(7);
      expect(published.map((signal) => signal.key)).toEqual(['e1']);
    });

    it('should archive events past the retention window everywhere', async () => {
      await synchronizer.ingest(makePayload({ id: 'old', title: 'Winter Gala', date: '2030-01-01T20:00:00.000Z' }));
      published.length = 0;

      const archived = await synchronizer.archiveExpired(Date.parse('2030-02-15T00:00:00.000Z'));

      expect(archived).toEqual({ applied: ['old'], failed: [] });
      expect(synchronizer.getEvent('old')).toBeUndefined();
      expect(store.inner.get('old')).toBeUndefined();
      expect(suggestions.suggest('winter')).toEqual([]);
      expect(published.map((signal) => signal.dependencies[0])).toEqual(['event:old']);
    });

    it('should keep the rest of a popularity batch when one write is exhausted', async () => {
      await synchronizer.ingest(makePayload({ id: 'bad' }));
      published.length = 0;
      store.brokenIds.add('bad');

      const outcome = await synchronizer.refreshPopularity({ bad: 9, e1: 5 });

      expect(outcome).toEqual({ applied: ['e1'], failed: ['bad'] });
      expect(synchronizer.getEvent('e1')?.popularityScore).toBe(5);
      expect(store.inner.get('e1')?.popularityScore).toBe(5);
      expect(synchronizer.getEvent('bad')?.popularityScore).toBe(1);
      expect(published.map((signal) => signal.key)).toEqual(['e1']);
    });

    it('should archive the remaining expired events when one removal is exhausted', async () => {
      await synchronizer.ingest(makePayload({ id: 'old', date: '2030-01-01T20:00:00.000Z' }));
      await synchronizer.ingest(makePayload({ id: 'older', date: '2029-12-01T20:00:00.000Z' }));
      published.length = 0;
      store.brokenIds.add('old');

      const outcome = await synchronizer.archiveExpired(Date.parse('2030-02-15T00:00:00.000Z'));

      expect(outcome).toEqual({ applied: ['older'], failed: ['old'] });
      expect(synchronizer.getEvent('old')).toBeDefined();
      expect(synchronizer.getEvent('older')).toBeUndefined();
      expect(store.inner.get('older')).toBeUndefined();
      expect(published.map((signal) => signal.key)).toEqual(['older']);
    });
  });
});
