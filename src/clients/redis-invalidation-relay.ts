import { v4 as uuidv4 } from 'uuid';
import { invalidationSignalSchema } from '../schemas/search.schema';
import { InvalidationSignal } from '../types';
import { errorMessage } from '../utils/errors';
import { createChildLogger } from '../utils/logger';
import { InvalidationChannel } from '../services/invalidation-channel';

/**
 * The subset of ioredis the relay uses. Publisher and subscriber must be
 * separate connections: a subscribed ioredis client cannot publish.
 */
export interface RelayPublisher {
  publish(channel: string, message: string): Promise<number>;
}

export interface RelaySubscriber {
  subscribe(channel: string): Promise<unknown>;
  unsubscribe(channel: string): Promise<unknown>;
  on(event: 'message', listener: (channel: string, message: string) => void): unknown;
  removeListener(event: 'message', listener: (channel: string, message: string) => void): unknown;
}

/**
 * Fans invalidation signals out to other replicas over Redis pub/sub.
 *
 * Local signals are published with this instance's id as `origin`; remote
 * signals are republished on the local channel. Signals carrying our own
 * origin are ignored, so nothing loops.
 */
export class RedisInvalidationRelay {
  readonly instanceId: string;
  private unsubscribeLocal: (() => void) | null = null;
  private logger = createChildLogger({ component: 'redis-invalidation-relay' });

  private readonly onMessage = (channel: string, message: string): void => {
    if (channel !== this.redisChannel) return;
    this.receive(message).catch((error: unknown) => {
      this.logger.error({ error: errorMessage(error) }, 'Failed to relay remote invalidation');
    });
  };

  constructor(
    private readonly local: InvalidationChannel,
    private readonly publisher: RelayPublisher,
    private readonly subscriber: RelaySubscriber,
    private readonly redisChannel: string,
    instanceId?: string
  ) {
    this.instanceId = instanceId ?? uuidv4();
  }

  async start(): Promise<void> {
    this.subscriber.on('message', this.onMessage);
    await this.subscriber.subscribe(this.redisChannel);
    this.unsubscribeLocal = this.local.subscribe((signal) => this.forward(signal));
    this.logger.info({ channel: this.redisChannel, instanceId: this.instanceId }, 'Invalidation relay started');
  }

  async stop(): Promise<void> {
    this.unsubscribeLocal?.();
    this.unsubscribeLocal = null;
    this.subscriber.removeListener('message', this.onMessage);
    await this.subscriber.unsubscribe(this.redisChannel);
  }

  /**
   * Publish a locally originated signal. Relayed signals are not sent back.
   * A failed publish is logged and never fails local delivery.
   */
  async forward(signal: InvalidationSignal): Promise<void> {
    if (signal.origin !== undefined) return;
    try {
      await this.publisher.publish(this.redisChannel, JSON.stringify({ ...signal, origin: this.instanceId }));
    } catch (error: unknown) {
      this.logger.error({
        signalId: signal.id,
        key: signal.key,
        error: errorMessage(error),
      }, 'Failed to publish invalidation to other replicas');
    }
  }

  async receive(message: string): Promise<boolean> {
    let decoded: unknown;
    try {
      decoded = JSON.parse(message);
    } catch (error: unknown) {
      this.logger.warn({ error: errorMessage(error) }, 'Dropping non-JSON invalidation message');
      return false;
    }

    const parsed = invalidationSignalSchema.safeParse(decoded);
    if (!parsed.success) {
      this.logger.warn({ issues: parsed.error.issues.map((issue) => issue.message) }, 'Dropping malformed invalidation message');
      return false;
    }
    if (parsed.data.origin === undefined || parsed.data.origin === this.instanceId) {
      return false;
    }

    await this.local.publish(parsed.data);
    return true;
  }
}
