/**
 * @file packages/gateway/src/infrastructure/cache/audio-blob-cache.ts
 * @description Short-lived in-memory store handing synthesized audio to clients by opaque id.
 */

import { inject, singleton } from 'tsyringe';
import { v4 as uuidv4 } from 'uuid';
import { AUDIO_MIME_BY_PROVIDER, DEFAULT_AUDIO_MIME } from '@chorus/shared';
import { ConfigService } from '../config/config-service.js';
import { Mutex } from '../utils/mutex.js';

export interface AudioBlob {
  id: string;
  bytes: Buffer;
  mime: string;
  provider: string;
  createdAt: number;
}

export interface StoredAudio {
  id: string;
  mime: string;
}

export const mimeForProvider = (provider: string): string =>
  AUDIO_MIME_BY_PROVIDER[provider.toLowerCase()] ?? DEFAULT_AUDIO_MIME;

/**
 * Entries live for `audio.ttlSeconds`; at most `audio.maxItems` are kept,
 * evicting oldest first. Every operation runs under one mutex.
 */
@singleton()
export class AudioBlobCache {
  private readonly entries = new Map<string, AudioBlob>();
  private readonly mutex = new Mutex();
  private now: () => number = Date.now;

  constructor(@inject(ConfigService) private config: ConfigService) {}

  /** Replaces the clock (epoch milliseconds). */
  useClock(now: () => number): this {
    this.now = now;
    return this;
  }

  get size(): number {
    return this.entries.size;
  }

  async put(bytes: Buffer, provider: string, mime?: string): Promise<StoredAudio> {
    return this.mutex.runExclusive(() => {
      const now = this.now();
      const { maxItems } = this.config.get('audio');
      this.purgeExpired(now);

      // Map iteration follows insertion order, which is creation order here.
      for (const id of this.entries.keys()) {
        if (this.entries.size < maxItems) break;
        this.entries.delete(id);
      }

      const blob: AudioBlob = {
        id: uuidv4(),
        bytes,
        mime: mime ?? mimeForProvider(provider),
        provider,
        createdAt: now,
      };
      this.entries.set(blob.id, blob);
      return { id: blob.id, mime: blob.mime };
    });
  }

  /**
   * @returns The blob, or null when unknown or expired (expired entries are removed).
   */
  async get(id: string): Promise<AudioBlob | null> {
    return this.mutex.runExclusive(() => {
      const blob = this.entries.get(id);
      if (!blob) return null;
      if (this.isExpired(blob, this.now())) {
        this.entries.delete(id);
        return null;
      }
      return blob;
    });
  }

  async clear(): Promise<void> {
    await this.mutex.runExclusive(() => this.entries.clear());
  }

  private purgeExpired(now: number): void {
    for (const [id, blob] of this.entries) {
      if (this.isExpired(blob, now)) this.entries.delete(id);
    }
  }

  private isExpired(blob: AudioBlob, now: number): boolean {
    return now - blob.createdAt > this.config.get('audio').ttlSeconds * 1000;
  }
}
