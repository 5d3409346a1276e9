import { EventEmitter } from 'events';
import { InvalidationSignal } from '../types';
import { createChildLogger } from '../utils/logger';
import { InvalidationChannel } from './invalidation-channel';

/** The part of a cache the invalidator drives */
export interface InvalidationTarget {
  readonly namespace: string;
  invalidate(dependency: string): number;
}

export interface InvalidationReport {
  signal: InvalidationSignal;
  namespace: string;
  entries: number;
}

/**
 * Applies invalidation signals from the channel to one or more caches.
 * Emits `invalidated` with an InvalidationReport per cache and signal.
 */
export class CacheInvalidator extends EventEmitter {
  private targets: InvalidationTarget[] = [];
  private unsubscribe: (() => void) | null = null;
  private logger = createChildLogger({ component: 'cache-invalidator' });

  constructor(private readonly channel: InvalidationChannel) {
    super();
  }

  register(target: InvalidationTarget): void {
    this.targets.push(target);
  }

  start(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.channel.subscribe((signal) => this.process(signal));
  }

  stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  /**
   * Invalidate every dependency the signal names. Safe to repeat.
   */
  process(signal: InvalidationSignal): void {
    for (const target of this.targets) {
      let entries = 0;
      for (const dependency of signal.dependencies) {
        entries += target.invalidate(dependency);
      }

      if (entries > 0) {
        this.logger.debug({
          signalId: signal.id,
          namespace: target.namespace,
          entries,
        }, 'Cache entries invalidated');
      }

      const report: InvalidationReport = { signal, namespace: target.namespace, entries };
      this.emit('invalidated', report);
    }
  }
}
