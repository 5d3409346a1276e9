import { CatalogEvent, QueryPlan } from '../types';
import { normalizeKeyword } from '../utils/text';

export type EpochDimension = 'category' | 'city';

export const CATALOG_EPOCH = 'catalog';

export function epochId(dimension: EpochDimension, value: string): string {
  return `${dimension}:${normalizeKeyword(value)}`;
}

export function eventDependency(eventId: string): string {
  return `event:${eventId}`;
}

/**
 * Coarse epoch counters used for bulk cache invalidation.
 *
 * Counters only ever increase. A plan's cache key embeds the counters it
 * depends on, so any bump makes the old key unreachable.
 */
export class EpochRegistry {
  private counters: Map<string, number> = new Map([[CATALOG_EPOCH, 0]]);

  current(id: string): number {
    return this.counters.get(id) ?? 0;
  }

  /**
   * Bump the category, city and catalog epochs an event belongs to.
   * Returns the bumped epoch ids.
   */
  bumpFor(event: Pick<CatalogEvent, 'category' | 'venue'>): string[] {
    const ids = [
      epochId('category', event.category),
      epochId('city', event.venue.city),
      CATALOG_EPOCH,
    ];
    for (const id of ids) {
      this.counters.set(id, this.current(id) + 1);
    }
    return ids;
  }

  /**
   * Epoch ids a plan's results depend on: its category and city term
   * filters when present, otherwise the catalog-wide epoch.
   */
  dependenciesFor(plan: QueryPlan): string[] {
    const ids: string[] = [];
    for (const filter of plan.filters) {
      if (filter.kind === 'term' && (filter.field === 'category' || filter.field === 'city')) {
        for (const value of filter.values) {
          ids.push(epochId(filter.field, value));
        }
      }
    }
    if (ids.length === 0) {
      ids.push(CATALOG_EPOCH);
    }
    return ids.sort();
  }

  /**
   * `id=counter` pairs in a stable order, ready to be hashed into a cache key.
   */
  snapshotFor(plan: QueryPlan): string {
    return this.dependenciesFor(plan)
      .map((id) => `${id}=${this.current(id)}`)
      .join(',');
  }
}
