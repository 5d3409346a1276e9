import { EventEmitter } from 'events';
import { InvalidationSignal } from '../types';
import { createChildLogger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

export type InvalidationHandler = (signal: InvalidationSignal) => void | Promise<void>;

/**
 * Channel between the synchronizer (publisher) and cache layers (subscribers).
 *
 * Delivery contract:
 * - at-least-once: a signal is redelivered while any handler throws, up to
 *   `maxDeliveryAttempts`, then reported on `dead-letter`;
 * - ordered per key: signals sharing `signal.key` reach handlers in publish
 *   order, one at a time; different keys are delivered independently;
 * - asynchronous: `publish` only enqueues, handlers never run on the
 *   publisher's call stack.
 *
 * Handlers must be idempotent.
 */
export interface InvalidationChannel {
  publish(signal: InvalidationSignal): Promise<void>;
  subscribe(handler: InvalidationHandler): () => void;
  on(event: 'published', listener: (signal: InvalidationSignal) => void): this;
  on(event: 'delivered', listener: (signal: InvalidationSignal, deliveredAt: number) => void): this;
  on(event: 'dead-letter', listener: (signal: InvalidationSignal, error: unknown) => void): this;
  close(): Promise<void>;
}

export interface InProcessChannelOptions {
  maxDeliveryAttempts?: number;
  now?: () => number;
}

export class InProcessInvalidationChannel extends EventEmitter implements InvalidationChannel {
  private handlers: Set<InvalidationHandler> = new Set();
  private queues: Map<string, InvalidationSignal[]> = new Map();
  private draining: Set<string> = new Set();
  private idleWaiters: Array<() => void> = [];
  private paused = false;
  private closed = false;
  private readonly maxDeliveryAttempts: number;
  private readonly now: () => number;
  private logger = createChildLogger({ component: 'invalidation-channel' });

  constructor(options: InProcessChannelOptions = {}) {
    super();
    this.maxDeliveryAttempts = options.maxDeliveryAttempts ?? 5;
    this.now = options.now ?? Date.now;
  }

  async publish(signal: InvalidationSignal): Promise<void> {
    if (this.closed) {
      throw new Error('Invalidation channel is closed');
    }

    const queue = this.queues.get(signal.key);
    if (queue) {
      queue.push(signal);
    } else {
      this.queues.set(signal.key, [signal]);
    }
    this.emit('published', signal);
    this.schedule(signal.key);
  }

  subscribe(handler: InvalidationHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  /**
   * Hold deliveries; published signals keep queueing.
   */
  pause(): void {
    this.paused = true;
  }

  resume(): void {
    this.paused = false;
    for (const key of this.queues.keys()) {
      this.schedule(key);
    }
  }

  /** Signals published but not yet delivered */
  get pending(): number {
    let count = 0;
    for (const queue of this.queues.values()) {
      count += queue.length;
    }
    return count;
  }

  /**
   * Resolves once every queued signal has been delivered or dead-lettered.
   */
  async drain(): Promise<void> {
    if (this.pending === 0 && this.draining.size === 0) return;
    await new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  async close(): Promise<void> {
    this.closed = true;
    if (!this.paused) {
      await this.drain();
    }
    this.handlers.clear();
    this.removeAllListeners();
  }

  private schedule(key: string): void {
    if (this.paused || this.draining.has(key)) return;
    this.draining.add(key);
    setImmediate(() => {
      this.drainKey(key).catch((error: unknown) => {
        this.logger.error({ key, error: errorMessage(error) }, 'Invalidation drain failed');
      });
    });
  }

  private async drainKey(key: string): Promise<void> {
    try {
      let queue = this.queues.get(key);
      while (!this.paused && queue && queue.length > 0) {
        const signal = queue[0];
        await this.deliver(signal);
        queue.shift();
        if (queue.length === 0) {
          this.queues.delete(key);
          queue = undefined;
        }
      }
    } finally {
      this.draining.delete(key);
      this.notifyIdle();
    }
  }

  private async deliver(signal: InvalidationSignal): Promise<void> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxDeliveryAttempts; attempt++) {
      try {
        for (const handler of Array.from(this.handlers)) {
          await handler(signal);
        }
        this.emit('delivered', signal, this.now());
        return;
      } catch (error: unknown) {
        lastError = error;
        this.logger.warn({
          signalId: signal.id,
          key: signal.key,
          attempt,
          error: errorMessage(error),
        }, 'Invalidation delivery failed, redelivering');
      }
    }

    this.logger.error({ signalId: signal.id, key: signal.key }, 'Invalidation signal dead-lettered');
    this.emit('dead-letter', signal, lastError);
  }

  private notifyIdle(): void {
    if (this.pending > 0 || this.draining.size > 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach((resolve) => resolve());
  }
}
