import { InvalidationSignal } from '../types';
import { invalidationLag } from '../utils/metrics';
import { InvalidationChannel } from './invalidation-channel';

/**
 * Measures how far cache invalidation trails committed mutations.
 *
 * The lag is the age of the oldest published but undelivered signal, zero
 * when nothing is outstanding. Delivered lags feed the histogram.
 */
export class LagMonitor {
  private pending: Map<string, number> = new Map();
  private readonly now: () => number;

  constructor(channel: InvalidationChannel, now: () => number = Date.now) {
    this.now = now;
    channel.on('published', (signal) => this.onPublished(signal));
    channel.on('delivered', (signal, deliveredAt) => this.onSettled(signal, deliveredAt));
    channel.on('dead-letter', (signal) => this.onSettled(signal, this.now()));
  }

  lagMillis(now: number = this.now()): number {
    let oldest: number | undefined;
    for (const appliedAt of this.pending.values()) {
      if (oldest === undefined || appliedAt < oldest) {
        oldest = appliedAt;
      }
    }
    return oldest === undefined ? 0 : Math.max(0, now - oldest);
  }

  get outstanding(): number {
    return this.pending.size;
  }

  private onPublished(signal: InvalidationSignal): void {
    this.pending.set(signal.id, signal.appliedAt);
  }

  private onSettled(signal: InvalidationSignal, settledAt: number): void {
    this.pending.delete(signal.id);
    invalidationLag.observe(Math.max(0, settledAt - signal.appliedAt) / 1000);
  }
}
