import 'reflect-metadata';
import { describe, it, expect, beforeEach } from 'vitest';
import type { ReplySummary } from '@chorus/shared';
import { BroadcastBus } from './broadcast-bus.js';
import { ConfigService } from '../config/config-service.js';
import { Logger } from '../../logger.js';
import { makeConfig } from '../../testing/fixtures.js';

const summary = (reply: string): ReplySummary => ({
  persona: 'penny',
  reply,
  actions: [],
  requestId: 'req-1',
  sessionId: 'default',
  timestamp: 1,
});

describe('BroadcastBus', () => {
  let bus: BroadcastBus;

  beforeEach(() => {
    const logger = new Logger();
    const config = new ConfigService(logger).use(makeConfig({ broadcast: { queueSize: 2 } }));
    bus = new BroadcastBus(config, logger);
  });

  it('should deliver to every subscriber', async () => {
    const a = bus.subscribe();
    const b = bus.subscribe();

    expect(bus.publish(summary('hi'))).toBe(2);
    expect(await a.channel.next()).toEqual({ value: summary('hi'), done: false });
    expect(await b.channel.next()).toEqual({ value: summary('hi'), done: false });
  });

  it('should drop the oldest summary for a slow subscriber', () => {
    const slow = bus.subscribe();
    ['one', 'two', 'three'].forEach((reply) => bus.publish(summary(reply)));
    expect(slow.channel.size).toBe(2);
    expect(slow.channel.droppedCount).toBe(1);
  });

  it('should stop delivering after unsubscribe', () => {
    const sub = bus.subscribe();
    bus.unsubscribe(sub.id);
    expect(bus.subscriberCount).toBe(0);
    expect(sub.channel.isClosed).toBe(true);
    expect(bus.publish(summary('hi'))).toBe(0);
  });

  it('should close every subscription and refuse new ones', () => {
    const sub = bus.subscribe();
    bus.close();
    expect(sub.channel.isClosed).toBe(true);
    expect(bus.subscribe().channel.isClosed).toBe(true);
    expect(bus.publish(summary('late'))).toBe(0);
  });
});
