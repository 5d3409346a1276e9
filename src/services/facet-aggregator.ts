import { CatalogEvent, FacetBucket, Facets } from '../types';
import { normalizeKeyword } from '../utils/text';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface RangeBucket {
  key: string;
  from?: number;
  to?: number;
}

export const PRICE_BUCKETS: readonly RangeBucket[] = [
  { key: 'under_50', to: 50 },
  { key: '50_to_100', from: 50, to: 100 },
  { key: '100_to_200', from: 100, to: 200 },
  { key: '200_to_500', from: 200, to: 500 },
  { key: 'over_500', from: 500 },
];

function dateBuckets(now: number): RangeBucket[] {
  const startOfDay = now - (now % DAY_MS);
  return [
    { key: 'today', from: startOfDay, to: startOfDay + DAY_MS },
    { key: 'next_7_days', from: now, to: now + 7 * DAY_MS },
    { key: 'next_30_days', from: now, to: now + 30 * DAY_MS },
    { key: 'next_90_days', from: now, to: now + 90 * DAY_MS },
  ];
}

function inBucket(bucket: RangeBucket, value: number): boolean {
  return (bucket.from === undefined || value >= bucket.from) && (bucket.to === undefined || value < bucket.to);
}

function topTerms(counts: Map<string, number>, size: number): FacetBucket[] {
  return Array.from(counts, ([key, count]) => ({ key, count }))
    .sort((a, b) => b.count - a.count || (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))
    .slice(0, size);
}

/**
 * Single-pass facet accumulation over the filtered candidate set.
 * Range buckets may overlap (date windows) and are always all reported.
 */
export class FacetAccumulator {
  private categories: Map<string, number> = new Map();
  private cities: Map<string, number> = new Map();
  private priceCounts: number[] = PRICE_BUCKETS.map(() => 0);
  private dateCounts: number[];
  private readonly dates: RangeBucket[];
  private available = 0;
  private soldOut = 0;

  constructor(now: number, private readonly sizes: { categories: number; cities: number }) {
    this.dates = dateBuckets(now);
    this.dateCounts = this.dates.map(() => 0);
  }

  add(event: CatalogEvent, eventTime: number): void {
    const category = normalizeKeyword(event.category);
    this.categories.set(category, (this.categories.get(category) ?? 0) + 1);

    const city = normalizeKeyword(event.venue.city);
    this.cities.set(city, (this.cities.get(city) ?? 0) + 1);

    PRICE_BUCKETS.forEach((bucket, index) => {
      if (inBucket(bucket, event.priceRange.min)) this.priceCounts[index]++;
    });

    this.dates.forEach((bucket, index) => {
      if (inBucket(bucket, eventTime)) this.dateCounts[index]++;
    });

    if (event.availability.soldOut) {
      this.soldOut++;
    } else {
      this.available++;
    }
  }

  result(): Facets {
    return {
      categories: topTerms(this.categories, this.sizes.categories),
      cities: topTerms(this.cities, this.sizes.cities),
      priceRanges: PRICE_BUCKETS.map((bucket, index) => ({ key: bucket.key, count: this.priceCounts[index] })),
      dates: this.dates.map((bucket, index) => ({ key: bucket.key, count: this.dateCounts[index] })),
      availability: [
        { key: 'available', count: this.available },
        { key: 'sold_out', count: this.soldOut },
      ],
    };
  }
}
