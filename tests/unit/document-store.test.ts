/**
 * Unit Tests for the in-process read projection
 */

import { InMemoryDocumentStore, QueryContext } from '../../src/services/document-store';
import { QueryBuilder } from '../../src/services/query-builder.service';
import { NOW, makeEvent, testConfig } from '../fixtures/events';

describe('InMemoryDocumentStore', () => {
  const config = testConfig();
  const builder = new QueryBuilder(config.query);
  const queryContext: QueryContext = { now: NOW, degradedEventIds: new Set(), skipFacets: false };
  let store: InMemoryDocumentStore;

  beforeEach(() => {
    store = new InMemoryDocumentStore(config.ranking, config.query.maxPages);
  });

  it('should answer queries with the index version they ran against', async () => {
    await store.upsert(makeEvent({ id: 'e1' }));
    await store.upsert(makeEvent({ id: 'e2' }));

    const result = await store.executeQuery(builder.build({}), queryContext);

    expect(result.indexVersion).toBe(2);
    expect(result.hits.map((hit) => hit.eventId)).toEqual(['e1', 'e2']);
    expect(result.facets).not.toBeNull();
  });

  describe('applyMutation', () => {
    beforeEach(async () => {
      await store.upsert(makeEvent({ id: 'e1', version: 3 }));
    });

    it('should apply a newer version', async () => {
      const result = await store.applyMutation('e1', { available: 0, soldOut: true }, 4);

      expect(result).toEqual({ status: 'applied', newVersion: 4 });
      expect(store.get('e1')?.availability).toEqual({ total: 100, available: 0, soldOut: true });
      expect(store.get('e1')?.version).toBe(4);
    });

    it('should refuse a version at or below the stored one', async () => {
      expect(await store.applyMutation('e1', { available: 5, soldOut: false }, 3)).toEqual({
        status: 'stale',
        currentVersion: 3,
      });
      expect(await store.applyMutation('e1', { available: 5, soldOut: false }, 2)).toEqual({
        status: 'stale',
        currentVersion: 3,
      });
      expect(store.get('e1')?.availability.available).toBe(100);
    });

    it('should report an unknown document as stale at version 0', async () => {
      expect(await store.applyMutation('missing', { available: 1, soldOut: false }, 7)).toEqual({
        status: 'stale',
        currentVersion: 0,
      });
    });
  });

  describe('snapshots', () => {
    it('should keep a handed-out snapshot unchanged while writes continue', async () => {
      await store.upsert(makeEvent({ id: 'b' }));
      const before = store.snapshot();

      await store.upsert(makeEvent({ id: 'a' }));
      await store.applyMutation('b', { available: 10, soldOut: false }, 2);
      const after = store.snapshot();

      expect(before.events.map((event) => event.id)).toEqual(['b']);
      expect(before.events[0].availability.available).toBe(100);
      expect(after.events.map((event) => event.id)).toEqual(['a', 'b']);
      expect(after.version).toBe(before.version + 2);
      expect(Object.isFrozen(after.events)).toBe(true);
    });

    it('should reuse the snapshot until the store changes', async () => {
      await store.upsert(makeEvent({ id: 'a' }));

      expect(store.snapshot()).toBe(store.snapshot());
    });

    it('should only bump the version when remove finds the document', async () => {
      await store.upsert(makeEvent({ id: 'a' }));
      const version = store.snapshot().version;

      await store.remove('missing');
      expect(store.snapshot().version).toBe(version);

      await store.remove('a');
      expect(store.snapshot().version).toBe(version + 1);
      expect(store.size).toBe(0);
    });
  });
});
