/**
 * @file packages/gateway/src/infrastructure/events/broadcast-bus.ts
 * @description Fans completed replies out to passive listeners.
 */

import { inject, singleton } from 'tsyringe';
import { v4 as uuidv4 } from 'uuid';
import type { ReplySummary } from '@chorus/shared';
import { ConfigService } from '../config/config-service.js';
import { Logger } from '../../logger.js';
import { EventChannel } from './event-channel.js';

export interface BroadcastSubscription {
  id: string;
  channel: EventChannel<ReplySummary>;
}

/**
 * Each subscriber owns a bounded channel that drops its oldest summary
 * when full, so a slow listener never holds up `publish`.
 */
@singleton()
export class BroadcastBus {
  private readonly subscribers = new Map<string, EventChannel<ReplySummary>>();
  private closed = false;

  constructor(
    @inject(ConfigService) private config: ConfigService,
    @inject(Logger) private logger: Logger,
  ) {}

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  /**
   * Registers a listener. On a closed bus the returned channel is already closed.
   */
  subscribe(): BroadcastSubscription {
    const id = uuidv4();
    const channel = new EventChannel<ReplySummary>({
      capacity: this.config.get('broadcast').queueSize,
    });
    if (this.closed) {
      channel.close();
    } else {
      this.subscribers.set(id, channel);
      this.logger.debug({ subscriberId: id, subscribers: this.subscribers.size }, 'Broadcast subscriber added');
    }
    return { id, channel };
  }

  unsubscribe(id: string): void {
    const channel = this.subscribers.get(id);
    if (!channel) return;
    channel.close();
    this.subscribers.delete(id);
    this.logger.debug({ subscriberId: id, subscribers: this.subscribers.size }, 'Broadcast subscriber removed');
  }

  /**
   * Delivers the summary to every subscriber without waiting on any of them.
   * @returns Number of subscribers it was queued for.
   */
  publish(summary: ReplySummary): number {
    if (this.closed) return 0;
    let delivered = 0;
    for (const channel of this.subscribers.values()) {
      if (channel.push(summary)) delivered += 1;
    }
    return delivered;
  }

  /**
   * Ends every subscription; later publishes are ignored.
   */
  close(): void {
    this.closed = true;
    for (const channel of this.subscribers.values()) channel.close();
    this.subscribers.clear();
  }
}
