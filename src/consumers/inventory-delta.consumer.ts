/**
 * Inventory Delta Consumer
 *
 * Consumes inventory deltas (purchases, cancellations, admin corrections)
 * from RabbitMQ and hands them to the availability synchronizer.
 *
 * Delivery is at-least-once and ordered per event id. Acknowledgement:
 * - applied and stale deltas are acked (redelivery is a no-op);
 * - exhausted or transient failures are nacked with requeue;
 * - malformed payloads and unknown events are nacked without requeue.
 */

import * as amqp from 'amqplib';
import type { Channel, ConsumeMessage } from 'amqplib';
import { SearchServiceConfig } from '../config';
import { inventoryDeltaSchema } from '../schemas/search.schema';
import { ApplyOutcome, InventoryDelta } from '../types';
import { ExhaustedError, NotFoundError, TransientBackendError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { deltasTotal } from '../utils/metrics';

const log = logger.child({ component: 'InventoryDeltaConsumer' });

export type DeliveryDecision = 'ack' | 'requeue' | 'reject';

export interface DeltaApplier {
  apply(delta: InventoryDelta): Promise<ApplyOutcome>;
}

type AmqpConnection = Awaited<ReturnType<typeof amqp.connect>>;

export class InventoryDeltaConsumer {
  private connection: AmqpConnection | null = null;
  private channel: Channel | null = null;
  private consumerTag: string | null = null;

  constructor(
    private readonly synchronizer: DeltaApplier,
    private readonly settings: SearchServiceConfig['rabbitmq']
  ) {}

  /**
   * Connect, declare the queue and start consuming.
   */
  async start(): Promise<void> {
    if (!this.settings.url) {
      log.warn('RABBITMQ_URL not set, inventory delta consumer disabled');
      return;
    }

    log.info({
      url: this.settings.url.replace(/:[^:@]+@/, ':***@'),
      queue: this.settings.deltaQueue,
    }, 'Connecting to RabbitMQ...');

    const connection = await amqp.connect(this.settings.url);
    const channel = await connection.createChannel();
    this.connection = connection;
    this.channel = channel;

    connection.on('error', (error: unknown) => {
      log.error({ error: errorMessage(error) }, 'RabbitMQ connection error');
    });
    connection.on('close', () => {
      log.warn('RabbitMQ connection closed');
    });

    await channel.assertQueue(this.settings.deltaQueue, { durable: true });
    await channel.prefetch(this.settings.prefetch);

    const { consumerTag } = await channel.consume(this.settings.deltaQueue, (message) => {
      this.handleMessage(channel, message).catch((error: unknown) => {
        log.error({ error: errorMessage(error) }, 'Failed to settle inventory delta');
      });
    });
    this.consumerTag = consumerTag;

    log.info({ queue: this.settings.deltaQueue, prefetch: this.settings.prefetch }, 'Inventory delta consumer started');
  }

  async stop(): Promise<void> {
    if (this.channel && this.consumerTag) {
      await this.channel.cancel(this.consumerTag);
    }
    await this.channel?.close();
    await this.connection?.close();
    this.channel = null;
    this.connection = null;
    this.consumerTag = null;
    log.info('Inventory delta consumer stopped');
  }

  /**
   * Parse, apply and decide how the broker should settle one message body.
   */
  async processPayload(content: Buffer): Promise<DeliveryDecision> {
    let decoded: unknown;
    try {
      decoded = JSON.parse(content.toString('utf8'));
    } catch (error: unknown) {
      deltasTotal.inc({ outcome: 'malformed' });
      log.warn({ error: errorMessage(error) }, 'Rejecting non-JSON inventory delta');
      return 'reject';
    }

    const parsed = inventoryDeltaSchema.safeParse(decoded);
    if (!parsed.success) {
      deltasTotal.inc({ outcome: 'malformed' });
      log.warn({ issues: parsed.error.issues.map((issue) => issue.message) }, 'Rejecting malformed inventory delta');
      return 'reject';
    }

    try {
      await this.synchronizer.apply(parsed.data);
      return 'ack';
    } catch (error: unknown) {
      if (error instanceof ExhaustedError || error instanceof TransientBackendError) {
        log.warn({ eventId: parsed.data.eventId, version: parsed.data.version }, 'Requeueing inventory delta');
        return 'requeue';
      }
      if (error instanceof NotFoundError) {
        log.warn({ eventId: parsed.data.eventId }, 'Rejecting delta for unknown event');
        return 'reject';
      }
      log.error({ eventId: parsed.data.eventId, error: errorMessage(error) }, 'Unexpected error applying delta');
      return 'reject';
    }
  }

  private async handleMessage(channel: Channel, message: ConsumeMessage | null): Promise<void> {
    if (!message) {
      log.warn('Consumer cancelled by broker');
      return;
    }

    const decision = await this.processPayload(message.content);
    switch (decision) {
      case 'ack':
        channel.ack(message);
        break;
      case 'requeue':
        channel.nack(message, false, true);
        break;
      case 'reject':
        channel.nack(message, false, false);
        break;
    }
  }
}
