import { LRUCache } from 'lru-cache';
import { InvalidCacheStateError, RequestCancelledError, errorMessage } from '../utils/errors';
import { createChildLogger } from '../utils/logger';
import {
  cacheInvalidationsTotal,
  cacheLookupsTotal,
  cacheRecomputationsTotal,
  cacheSelfHealsTotal,
} from '../utils/metrics';

export interface CacheEntry<T> {
  key: string;
  value: T;
  dependencies: readonly string[];
  /** Plan fingerprint, used to find the newest entry across epochs */
  fingerprint?: string;
  createdAt: number;
  /** null = no expiry */
  expiresAt: number | null;
  stale: boolean;
}

export type CacheLookup<T> =
  | { hit: false }
  | { hit: true; value: T; stale: boolean; createdAt: number };

export interface PutOptions {
  dependencies: readonly string[];
  /** Milliseconds; null stores the entry without expiry */
  ttlMs: number | null;
  fingerprint?: string;
  createdAt?: number;
}

export interface GetOptions {
  /** Serve expired or invalidated entries, flagged stale */
  allowStale?: boolean;
}

/**
 * What a recomputation hands back to the cache. `cacheable: false` results
 * reach every waiter but are never stored.
 */
export interface ComputedValue<T> extends Omit<PutOptions, 'createdAt'> {
  value: T;
  cacheable: boolean;
}

export interface ComputeOutcome<T> {
  value: T;
  source: 'cache' | 'computed' | 'shared';
}

export interface CacheStats {
  hits: number;
  misses: number;
  hitRate: number;
  entries: number;
  inFlight: number;
}

export interface SearchCacheOptions {
  namespace?: string;
  maxEntries: number;
  now?: () => number;
}

interface Flight<T> {
  promise: Promise<T>;
  controller: AbortController;
  waiters: number;
  startedAt: number;
  /** Dependencies invalidated while the computation ran */
  invalidated: Set<string>;
}

/**
 * Query result cache with dependency invalidation and single-flight misses.
 *
 * Entries are bounded by LRU. Expiry is checked here rather than by the LRU
 * so DEGRADED serving can still reach expired and invalidated entries.
 * The dependency index maps every dependency id to the keys of the live
 * entries that depend on it.
 */
export class SearchCache<T> {
  readonly namespace: string;
  private lru: LRUCache<string, CacheEntry<T>>;
  private dependencyIndex: Map<string, Set<string>> = new Map();
  private byFingerprint: Map<string, string> = new Map();
  private flights: Map<string, Flight<T>> = new Map();
  private hits = 0;
  private misses = 0;
  private readonly now: () => number;
  private logger = createChildLogger({ component: 'search-cache' });

  constructor(options: SearchCacheOptions) {
    this.namespace = options.namespace ?? 'search';
    this.now = options.now ?? Date.now;
    this.lru = new LRUCache<string, CacheEntry<T>>({
      max: options.maxEntries,
      dispose: (entry, key) => this.unindex(key, entry),
    });
  }

  get(key: string, options: GetOptions = {}): CacheLookup<T> {
    const entry = this.lru.get(key);

    if (entry && !entry.stale && !this.indexConsistent(entry)) {
      this.selfHeal(new InvalidCacheStateError(this.namespace, `Entry ${key} missing from dependency index`));
      return this.recordMiss();
    }

    if (!entry) {
      return this.recordMiss();
    }

    const stale = entry.stale || this.isExpired(entry);
    if (stale && !options.allowStale) {
      return this.recordMiss();
    }

    this.hits++;
    cacheLookupsTotal.inc({ namespace: this.namespace, result: stale ? 'stale' : 'hit' });
    return { hit: true, value: entry.value, stale, createdAt: entry.createdAt };
  }

  /**
   * Newest entry stored for a plan fingerprint under any epoch, always
   * flagged stale. Used as the DEGRADED and deadline fallback.
   */
  latestFor(fingerprint: string): CacheLookup<T> {
    const key = this.byFingerprint.get(fingerprint);
    const entry = key !== undefined ? this.lru.get(key) : undefined;
    if (!entry) {
      return { hit: false };
    }
    return { hit: true, value: entry.value, stale: true, createdAt: entry.createdAt };
  }

  put(key: string, value: T, options: PutOptions): void {
    const createdAt = options.createdAt ?? this.now();
    const entry: CacheEntry<T> = {
      key,
      value,
      dependencies: Array.from(new Set(options.dependencies)),
      fingerprint: options.fingerprint,
      createdAt,
      expiresAt: options.ttlMs === null ? null : createdAt + options.ttlMs,
      stale: false,
    };

    this.lru.delete(key);
    this.lru.set(key, entry);

    for (const dependency of entry.dependencies) {
      let keys = this.dependencyIndex.get(dependency);
      if (!keys) {
        keys = new Set();
        this.dependencyIndex.set(dependency, keys);
      }
      keys.add(key);
    }

    if (entry.fingerprint !== undefined) {
      const previousKey = this.byFingerprint.get(entry.fingerprint);
      const previous = previousKey !== undefined ? this.lru.peek(previousKey) : undefined;
      if (!previous || previous.createdAt <= createdAt) {
        this.byFingerprint.set(entry.fingerprint, key);
      }
    }
  }

  /**
   * Marks every entry depending on `dependency` stale. Returns the number of
   * entries affected. Idempotent.
   */
  invalidate(dependency: string): number {
    for (const flight of this.flights.values()) {
      flight.invalidated.add(dependency);
    }

    const keys = this.dependencyIndex.get(dependency);
    if (!keys) return 0;

    let count = 0;
    for (const key of Array.from(keys)) {
      const entry = this.lru.peek(key);
      if (!entry) {
        this.selfHeal(new InvalidCacheStateError(this.namespace, `Dependency ${dependency} points at missing entry ${key}`));
        return count;
      }
      entry.stale = true;
      this.unindex(key, entry, false);
      count++;
    }

    if (count > 0) {
      cacheInvalidationsTotal.inc({ namespace: this.namespace }, count);
    }
    return count;
  }

  /**
   * Cache-aside lookup with single-flight recomputation.
   *
   * Concurrent misses for one key share one computation. A caller whose
   * signal aborts stops waiting; the shared computation is aborted only once
   * every waiter has left. Only fully computed results are stored, and only
   * when none of their dependencies were invalidated mid-flight.
   */
  async getOrCompute(
    key: string,
    compute: (signal: AbortSignal) => Promise<ComputedValue<T>>,
    options: { signal?: AbortSignal } = {}
  ): Promise<ComputeOutcome<T>> {
    const lookup = this.get(key);
    if (lookup.hit) {
      return { value: lookup.value, source: 'cache' };
    }

    let flight = this.flights.get(key);
    const shared = flight !== undefined;
    if (!flight) {
      flight = this.startFlight(key, compute);
    }

    const value = await this.wait(flight, options.signal);
    return { value, source: shared ? 'shared' : 'computed' };
  }

  /** Drops every entry; in-flight computations continue */
  clear(): void {
    this.lru.clear();
    this.dependencyIndex.clear();
    this.byFingerprint.clear();
  }

  stats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      hitRate: lookups === 0 ? 0 : this.hits / lookups,
      entries: this.lru.size,
      inFlight: this.flights.size,
    };
  }

  /** Keys registered under a dependency, for inspection */
  keysFor(dependency: string): string[] {
    return Array.from(this.dependencyIndex.get(dependency) ?? []);
  }

  get size(): number {
    return this.lru.size;
  }

  private startFlight(key: string, compute: (signal: AbortSignal) => Promise<ComputedValue<T>>): Flight<T> {
    const controller = new AbortController();
    const startedAt = this.now();
    const invalidated = new Set<string>();

    cacheRecomputationsTotal.inc({ namespace: this.namespace });

    const promise = compute(controller.signal)
      .then((result) => {
        const touched = result.dependencies.some((dependency) => invalidated.has(dependency));
        if (result.cacheable && !touched && !controller.signal.aborted) {
          this.put(key, result.value, {
            dependencies: result.dependencies,
            ttlMs: result.ttlMs,
            fingerprint: result.fingerprint,
            createdAt: startedAt,
          });
        }
        return result.value;
      })
      .finally(() => {
        if (this.flights.get(key) === flight) {
          this.flights.delete(key);
        }
      });

    const flight: Flight<T> = { promise, controller, waiters: 0, startedAt, invalidated };
    this.flights.set(key, flight);
    return flight;
  }

  private wait(flight: Flight<T>, signal?: AbortSignal): Promise<T> {
    flight.waiters++;

    return new Promise<T>((resolve, reject) => {
      let settled = false;

      const leave = () => {
        if (settled) return false;
        settled = true;
        signal?.removeEventListener('abort', onAbort);
        flight.waiters--;
        return true;
      };

      const onAbort = () => {
        if (!leave()) return;
        if (flight.waiters === 0) {
          flight.controller.abort();
        }
        reject(new RequestCancelledError('Search cancelled while waiting for a shared computation'));
      };

      if (signal?.aborted) {
        onAbort();
      } else {
        signal?.addEventListener('abort', onAbort, { once: true });
      }

      flight.promise.then(
        (value) => {
          if (leave()) resolve(value);
        },
        (error: unknown) => {
          if (leave()) reject(error);
        }
      );
    });
  }

  private isExpired(entry: CacheEntry<T>): boolean {
    return entry.expiresAt !== null && this.now() >= entry.expiresAt;
  }

  private indexConsistent(entry: CacheEntry<T>): boolean {
    return entry.dependencies.every((dependency) => this.dependencyIndex.get(dependency)?.has(entry.key) === true);
  }

  private unindex(key: string, entry: CacheEntry<T>, dropFingerprint = true): void {
    for (const dependency of entry.dependencies) {
      const keys = this.dependencyIndex.get(dependency);
      if (!keys) continue;
      keys.delete(key);
      if (keys.size === 0) {
        this.dependencyIndex.delete(dependency);
      }
    }
    if (dropFingerprint && entry.fingerprint !== undefined && this.byFingerprint.get(entry.fingerprint) === key) {
      this.byFingerprint.delete(entry.fingerprint);
    }
  }

  private recordMiss(): CacheLookup<T> {
    this.misses++;
    cacheLookupsTotal.inc({ namespace: this.namespace, result: 'miss' });
    return { hit: false };
  }

  private selfHeal(error: InvalidCacheStateError): void {
    this.logger.error({ namespace: this.namespace, error: errorMessage(error) }, 'Dependency index violation, clearing namespace');
    cacheSelfHealsTotal.inc({ namespace: this.namespace });
    this.clear();
  }
}
