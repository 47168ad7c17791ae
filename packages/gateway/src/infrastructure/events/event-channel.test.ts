import { describe, it, expect } from 'vitest';
import { CHANNEL_TIMEOUT, EventChannel } from './event-channel.js';

describe('EventChannel', () => {
  it('should hand queued items out in order', async () => {
    const channel = new EventChannel<number>();
    channel.push(1);
    channel.push(2);
    expect(await channel.next()).toEqual({ value: 1, done: false });
    expect(await channel.next()).toEqual({ value: 2, done: false });
  });

  it('should wake a waiting consumer', async () => {
    const channel = new EventChannel<string>();
    const pending = channel.next();
    channel.push('hello');
    expect(await pending).toEqual({ value: 'hello', done: false });
  });

  it('should drop the oldest item when full', () => {
    const channel = new EventChannel<number>({ capacity: 2 });
    [1, 2, 3].forEach((n) => channel.push(n));
    expect(channel.size).toBe(2);
    expect(channel.droppedCount).toBe(1);
  });

  it('should time out when nothing arrives', async () => {
    const channel = new EventChannel<number>();
    expect(await channel.next(5)).toBe(CHANNEL_TIMEOUT);
    // the timed-out waiter must not swallow the next item
    channel.push(7);
    expect(await channel.next(5)).toEqual({ value: 7, done: false });
  });

  it('should drain queued items after close', async () => {
    const channel = new EventChannel<number>();
    channel.push(1);
    channel.push(2);
    channel.close();
    expect(channel.push(3)).toBe(false);

    const seen: number[] = [];
    for await (const item of channel) seen.push(item);
    expect(seen).toEqual([1, 2]);
  });
});
