import 'reflect-metadata';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { DependencyContainer } from 'tsyringe';
import { AskRequestSchema, type AskRequestInput, type StreamEvent } from '@chorus/shared';
import { FanoutCoordinator } from './fanout-coordinator.js';
import { BackendRegistry } from '../../infrastructure/llm/backend-registry.js';
import { TtsService } from '../../infrastructure/tts/tts-service.js';
import { AudioBlobCache } from '../../infrastructure/cache/audio-blob-cache.js';
import { BroadcastBus } from '../../infrastructure/events/broadcast-bus.js';
import { MemoryService } from '../../application/services/memory-service.js';
import { ACTION_EXECUTOR } from '../interfaces/action-executor.interface.js';
import { AppError, BackendError } from '../errors/app-error.js';
import {
  FakeActionExecutor,
  FakeBackend,
  FakeSynthesizer,
  makeConfig,
  makeContainer,
  silentLogger,
} from '../../testing/fixtures.js';

const LIGHTS_ACTION = {
  type: 'ha_call_service',
  data: { service: 'light.turn_on', entity_id: 'light.office' },
};

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

const collect = async (events: AsyncIterable<StreamEvent>): Promise<StreamEvent[]> => {
  const out: StreamEvent[] = [];
  for await (const event of events) out.push(event);
  return out;
};

describe('FanoutCoordinator', () => {
  let container: DependencyContainer;
  let executor: FakeActionExecutor;
  let coordinator: FanoutCoordinator;
  let dominoDelayMs: number;

  const ask = (input: AskRequestInput, execute = true) =>
    coordinator.ask(AskRequestSchema.parse(input), { execute });
  const stream = (input: AskRequestInput) =>
    coordinator.stream(AskRequestSchema.parse(input), { execute: true });

  const setup = (keepaliveSeconds = 15) => {
    container = makeContainer(makeConfig({ stream: { keepaliveSeconds } }));
    const backends = container.resolve(BackendRegistry);
    backends.register(
      new FakeBackend('lmstudio', async (request) => {
        if (dominoDelayMs > 0) await delay(dominoDelayMs);
        return request.userText === 'lights on'
          ? `Done.<actions>${JSON.stringify([LIGHTS_ACTION])}</actions>`
          : 'Domino here.';
      }),
    );
    backends.register(new FakeBackend('openai', () => 'Penny here.'));
    backends.register(
      new FakeBackend('gemini', () => {
        throw new BackendError('gemini unavailable', 'gemini');
      }),
    );

    executor = new FakeActionExecutor();
    container.register(ACTION_EXECUTOR, { useValue: executor });
    container.register(TtsService, {
      useValue: new TtsService([new FakeSynthesizer('fish')], silentLogger()),
    });
    coordinator = container.resolve(FanoutCoordinator);
  };

  beforeEach(() => {
    dominoDelayMs = 0;
    setup();
  });

  afterEach(() => {
    container.resolve(MemoryService).close();
  });

  describe('ask', () => {
    it('should answer a callout with audio', async () => {
      const response = await ask({ text: 'hey penny, plan my day' });

      expect(response.persona).toBe('penny');
      expect(response.reply).toBe('Penny here.');
      expect(response.audio?.mime).toBe('audio/wav');
      expect(response.audio?.ttsProvider).toBe('fish');

      const blob = await container.resolve(AudioBlobCache).get(response.audio?.audioId ?? '');
      expect(blob?.bytes.toString()).toBe('fish:Penny here.');
    });

    it('should wrap fan-out replies in target order and keep failures per target', async () => {
      const response = await ask({ text: 'collective status', noAudio: true });

      expect(response).toEqual({
        persona: 'collective',
        reply: '',
        actions: [],
        responses: [
          { persona: 'domino', reply: 'Domino here.', actions: [] },
          { persona: 'penny', reply: 'Penny here.', actions: [] },
          { persona: 'jimmy', reply: '', actions: [], error: 'gemini unavailable' },
        ],
      });
    });

    it('should execute actions and report failed ones', async () => {
      executor.execute.mockResolvedValueOnce([
        { action: LIGHTS_ACTION, status: 'failed', detail: 'light.turn_on on light.office: HTTP 500' },
      ]);

      const response = await ask({ persona: 'domino', text: 'lights on', noAudio: true });

      expect(executor.execute).toHaveBeenCalledWith([LIGHTS_ACTION]);
      expect(response).toEqual({
        persona: 'domino',
        reply: 'Done.',
        actions: [LIGHTS_ACTION],
        error: 'action_error: light.turn_on on light.office: HTTP 500',
      });
    });

    it('should skip actions when execution is off', async () => {
      const response = await ask({ persona: 'domino', text: 'lights on', noAudio: true }, false);
      expect(response.actions).toEqual([LIGHTS_ACTION]);
      expect(executor.execute).not.toHaveBeenCalled();
    });

    it('should reject an unknown persona before running anything', async () => {
      await expect(ask({ persona: 'bogus', text: 'hi' })).rejects.toBeInstanceOf(AppError);
    });

    it('should broadcast each completed reply', async () => {
      const subscription = container.resolve(BroadcastBus).subscribe();

      await ask({ persona: 'penny', text: 'hi', noAudio: true, sessionId: 's9' });

      const next = await subscription.channel.next(0);
      expect(next).toMatchObject({
        done: false,
        value: { persona: 'penny', reply: 'Penny here.', sessionId: 's9' },
      });
    });
  });

  describe('stream', () => {
    it('should frame target events between meta and done', async () => {
      const events = await collect(await stream({ text: 'collective status', noAudio: true }));

      expect(events[0]).toEqual({
        type: 'meta',
        persona: 'collective',
        targets: ['domino', 'penny', 'jimmy'],
      });
      expect(events[events.length - 1]).toEqual({ type: 'done', persona: 'collective' });

      const middle = events.slice(1, -1);
      expect(middle).toHaveLength(3);
      expect(middle).toContainEqual({
        type: 'message',
        persona: 'domino',
        reply: 'Domino here.',
        actions: [],
      });
      expect(middle).toContainEqual({
        type: 'message',
        persona: 'penny',
        reply: 'Penny here.',
        actions: [],
      });
      expect(middle).toContainEqual({ type: 'error', persona: 'jimmy', error: 'gemini unavailable' });
    });

    it('should send each target its message before its audio reference', async () => {
      dominoDelayMs = 30;

      const events = await collect(await stream({ text: 'collective status' }));
      const indexOf = (type: StreamEvent['type'], persona: string) =>
        events.findIndex((e) => e.type === type && 'persona' in e && e.persona === persona);

      for (const persona of ['domino', 'penny']) {
        expect(indexOf('message', persona)).toBeGreaterThan(0);
        expect(indexOf('audio', persona)).toBeGreaterThan(indexOf('message', persona));
      }
      expect(indexOf('audio', 'penny')).toBeLessThan(indexOf('message', 'domino'));
      expect(indexOf('audio', 'jimmy')).toBe(-1);

      const audio = events.filter((e) => e.type === 'audio');
      expect(audio).toEqual([
        {
          type: 'audio',
          persona: 'penny',
          audioId: expect.any(String),
          mime: 'audio/wav',
          ttsProvider: 'fish',
        },
        {
          type: 'audio',
          persona: 'domino',
          audioId: expect.any(String),
          mime: 'audio/wav',
          ttsProvider: 'fish',
        },
      ]);

      const cache = container.resolve(AudioBlobCache);
      const stored = await Promise.all(
        audio.map((e) => (e.type === 'audio' ? cache.get(e.audioId) : null)),
      );
      expect(stored.map((blob) => blob?.bytes.toString())).toEqual([
        'fish:Penny here.',
        'fish:Domino here.',
      ]);
    });

    it('should apply inferred preferences when auto-promotion is on', async () => {
      const events = await collect(
        await stream({
          persona: 'penny',
          text: "I'm in Austin",
          noAudio: true,
          context: { autoPromote: true },
        }),
      );

      expect(events[1]).toMatchObject({
        type: 'memory',
        memory: {
          kind: 'promoted_state',
          mode: 'applied',
          patch: { location: 'Austin' },
          reasons: ['Detected location: Austin'],
        },
      });
      expect((await container.resolve(MemoryService).getPromotedState()).location).toBe('Austin');
    });

    it('should only suggest inferred preferences by default', async () => {
      const events = await collect(
        await stream({ persona: 'penny', text: 'please use metric', noAudio: true }),
      );

      expect(events[1]).toMatchObject({
        type: 'memory',
        memory: { mode: 'suggested', appliedAt: null, patch: { preferredUnits: 'metric' } },
      });
      expect((await container.resolve(MemoryService).getPromotedState()).preferredUnits).not.toBe(
        'metric',
      );
    });

    it('should send keepalives while a target is slow', async () => {
      container.resolve(MemoryService).close();
      dominoDelayMs = 60;
      setup(0.01);

      const events = await collect(await stream({ persona: 'domino', text: 'hi', noAudio: true }));

      expect(events[0].type).toBe('meta');
      expect(events.some((e) => e.type === 'keepalive')).toBe(true);
      expect(events.filter((e) => e.type === 'message')).toHaveLength(1);
      expect(events[events.length - 1]).toEqual({ type: 'done', persona: 'domino' });
    });
  });
});
