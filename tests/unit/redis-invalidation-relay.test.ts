/**
 * Unit Tests for RedisInvalidationRelay
 *
 * Redis is replaced by an in-process bus shared by publisher and subscriber
 * fakes, so two relays can talk to each other.
 */

import { EventEmitter } from 'events';
import { RedisInvalidationRelay, RelayPublisher, RelaySubscriber } from '../../src/clients/redis-invalidation-relay';
import { InProcessInvalidationChannel } from '../../src/services/invalidation-channel';
import { InvalidationSignal } from '../../src/types';
import { flushImmediate } from '../fixtures/events';

const REDIS_CHANNEL = 'search:invalidations';

class FakeRedisBus {
  private subscribers: Set<FakeSubscriber> = new Set();
  readonly published: Array<{ channel: string; message: string }> = [];

  publisher(): RelayPublisher {
    return {
      publish: async (channel: string, message: string) => {
        this.published.push({ channel, message });
        let receivers = 0;
        for (const subscriber of this.subscribers) {
          if (subscriber.channels.has(channel)) {
            subscriber.emit('message', channel, message);
            receivers++;
          }
        }
        return receivers;
      },
    };
  }

  subscriber(): FakeSubscriber {
    const subscriber = new FakeSubscriber();
    this.subscribers.add(subscriber);
    return subscriber;
  }
}

class FakeSubscriber extends EventEmitter implements RelaySubscriber {
  readonly channels: Set<string> = new Set();

  async subscribe(channel: string): Promise<number> {
    this.channels.add(channel);
    return this.channels.size;
  }

  async unsubscribe(channel: string): Promise<number> {
    this.channels.delete(channel);
    return this.channels.size;
  }
}

function signal(overrides: Partial<InvalidationSignal> = {}): InvalidationSignal {
  return { id: 'sig-1', key: 'e1', dependencies: ['event:e1', 'catalog'], appliedAt: 1000, ...overrides };
}

describe('RedisInvalidationRelay', () => {
  let bus: FakeRedisBus;
  let local: InProcessInvalidationChannel;
  let relay: RedisInvalidationRelay;
  let received: InvalidationSignal[];

  beforeEach(() => {
    bus = new FakeRedisBus();
    local = new InProcessInvalidationChannel();
    relay = new RedisInvalidationRelay(local, bus.publisher(), bus.subscriber(), REDIS_CHANNEL, 'replica-a');
    received = [];
    local.subscribe((delivered) => {
      received.push(delivered);
    });
  });

  afterEach(async () => {
    await local.close();
  });

  describe('forward', () => {
    it('should publish local signals stamped with the instance id', async () => {
      await relay.forward(signal());

      expect(bus.published).toEqual([
        {
          channel: REDIS_CHANNEL,
          message: JSON.stringify({ ...signal(), origin: 'replica-a' }),
        },
      ]);
    });

    it('should keep local delivery going when Redis refuses the publish', async () => {
      const publish = jest.fn<Promise<number>, [string, string]>().mockRejectedValue(new Error('connection closed'));
      const failing = new RedisInvalidationRelay(local, { publish }, bus.subscriber(), REDIS_CHANNEL, 'replica-a');
      const deadLetters: InvalidationSignal[] = [];
      local.on('dead-letter', (dropped) => deadLetters.push(dropped));
      await failing.start();

      await local.publish(signal());
      await local.drain();

      expect(publish).toHaveBeenCalledTimes(1);
      expect(received).toEqual([signal()]);
      expect(deadLetters).toEqual([]);
      await failing.stop();
    });

    it('should not send relayed signals back out', async () => {
      await relay.forward(signal({ origin: 'replica-b' }));

      expect(bus.published).toEqual([]);
    });
  });

  describe('receive', () => {
    it('should republish remote signals locally', async () => {
      const remote = signal({ origin: 'replica-b' });

      await expect(relay.receive(JSON.stringify(remote))).resolves.toBe(true);
      await local.drain();

      expect(received).toEqual([remote]);
    });

    it.each([
      ['non-JSON', 'not json'],
      ['malformed', JSON.stringify({ id: 'sig-1', key: 'e1' })],
      ['origin-less', JSON.stringify(signal())],
      ['own', JSON.stringify(signal({ origin: 'replica-a' }))],
    ])('should drop %s messages', async (_label, message) => {
      await expect(relay.receive(message)).resolves.toBe(false);
      expect(local.pending).toBe(0);
    });
  });

  it('should carry a signal from one replica to another exactly once', async () => {
    const otherLocal = new InProcessInvalidationChannel();
    const otherReceived: InvalidationSignal[] = [];
    otherLocal.subscribe((delivered) => {
      otherReceived.push(delivered);
    });
    const other = new RedisInvalidationRelay(otherLocal, bus.publisher(), bus.subscriber(), REDIS_CHANNEL, 'replica-b');

    await relay.start();
    await other.start();

    await local.publish(signal());
    await local.drain();
    await flushImmediate();
    await otherLocal.drain();

    expect(received).toEqual([signal()]);
    expect(otherReceived).toEqual([{ ...signal(), origin: 'replica-a' }]);
    expect(bus.published).toHaveLength(1);

    await relay.stop();
    await other.stop();
    await otherLocal.close();
  });
});
