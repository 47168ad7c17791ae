/**
 * @file packages/gateway/src/domain/logic/fanout-coordinator.ts
 * @description Runs every resolved target concurrently and reports replies as one response or an event stream.
 */

import { inject, singleton } from 'tsyringe';
import { v4 as uuidv4 } from 'uuid';
import {
  DEFAULT_SESSION_ID,
  type AskRequest,
  type AskResponse,
  type AudioRef,
  type MemoryEventPayload,
  type PersonaReply,
  type PromotedState,
  type RequestContext,
  type StreamEvent,
} from '@chorus/shared';
import { Logger } from '../../logger.js';
import { ConfigService } from '../../infrastructure/config/config-service.js';
import { MemoryService } from '../../application/services/memory-service.js';
import { AudioBlobCache } from '../../infrastructure/cache/audio-blob-cache.js';
import { BroadcastBus } from '../../infrastructure/events/broadcast-bus.js';
import { CHANNEL_TIMEOUT, EventChannel } from '../../infrastructure/events/event-channel.js';
import { TtsService, pickTtsPreference } from '../../infrastructure/tts/tts-service.js';
import {
  ACTION_EXECUTOR,
  type ActionExecutor,
} from '../interfaces/action-executor.interface.js';
import { PersonaRegistry } from '../personas/persona-registry.js';
import { errorMessage } from '../errors/app-error.js';
import { PersonaPipeline, type PipelineResult } from './persona-pipeline.js';
import { resolveTargets, type Resolution } from './persona-resolver.js';
import { inferPromotedPatch } from './promoted-inference.js';

export interface AskOptions {
  /** Execute device actions found in replies. */
  execute: boolean;
}

/**
 * A request resolved to targets, with promoted state loaded.
 */
export interface PreparedAsk {
  requestId: string;
  sessionId: string;
  resolution: Resolution;
  context?: RequestContext;
  promoted: PromotedState;
  memoryEvent?: MemoryEventPayload;
  noAudio: boolean;
}

type EventSink = (event: StreamEvent) => void;

@singleton()
export class FanoutCoordinator {
  constructor(
    @inject(PersonaRegistry) private personas: PersonaRegistry,
    @inject(PersonaPipeline) private pipeline: PersonaPipeline,
    @inject(MemoryService) private memory: MemoryService,
    @inject(TtsService) private tts: TtsService,
    @inject(AudioBlobCache) private audioCache: AudioBlobCache,
    @inject(BroadcastBus) private bus: BroadcastBus,
    @inject(ACTION_EXECUTOR) private actions: ActionExecutor,
    @inject(ConfigService) private config: ConfigService,
    @inject(Logger) private logger: Logger,
  ) {}

  /**
   * Resolves targets, touches the session and applies or suggests
   * promoted-state changes. Throws before any target runs, so an unknown
   * persona fails the whole request.
   */
  async prepare(request: AskRequest): Promise<PreparedAsk> {
    const resolution = resolveTargets(
      request.persona,
      request.text,
      this.personas,
      this.config.get('resolver'),
    );
    const sessionId = request.sessionId ?? request.context?.sessionId ?? DEFAULT_SESSION_ID;
    await this.memory.touch(sessionId);

    const context = request.context
      ? { ...request.context, room: request.context.room ?? request.room }
      : request.room
        ? { room: request.room, extensions: {} }
        : undefined;

    const autoPromote = request.context?.autoPromote ?? this.config.get('autoPromoteDefault');
    const memoryEvent = await this.promoteFromText(resolution.text, autoPromote);
    const promoted = await this.memory.getPromotedState();

    return {
      requestId: uuidv4(),
      sessionId,
      resolution,
      context,
      promoted,
      memoryEvent,
      noAudio: request.noAudio,
    };
  }

  /**
   * Aggregate mode: waits for every target and returns one response.
   */
  async ask(request: AskRequest, options: AskOptions): Promise<AskResponse> {
    const prepared = await this.prepare(request);
    const { resolution } = prepared;
    this.logger.info(
      { requestId: prepared.requestId, sessionId: prepared.sessionId, targets: resolution.targets },
      'Ask',
    );

    const replies = await Promise.all(
      resolution.targets.map((target) => this.runTarget(target, prepared, options, () => {})),
    );

    if (resolution.mode === 'single') return replies[0];
    return { persona: resolution.label, reply: '', actions: [], responses: replies };
  }

  /**
   * Streaming mode: `meta`, an optional `memory` event, then per-target
   * `message` / `audio` / `error` events in completion order, keepalives
   * while idle, and `done` once every target has settled.
   */
  async stream(request: AskRequest, options: AskOptions): Promise<AsyncIterable<StreamEvent>> {
    const prepared = await this.prepare(request);
    this.logger.info(
      {
        requestId: prepared.requestId,
        sessionId: prepared.sessionId,
        targets: prepared.resolution.targets,
      },
      'Ask stream',
    );
    return this.events(prepared, options);
  }

  private async *events(prepared: PreparedAsk, options: AskOptions): AsyncGenerator<StreamEvent> {
    const { resolution } = prepared;
    const channel = new EventChannel<StreamEvent>();
    const keepaliveMs = this.config.get('stream').keepaliveSeconds * 1000;

    yield { type: 'meta', persona: resolution.label, targets: resolution.targets };
    if (prepared.memoryEvent) yield { type: 'memory', memory: prepared.memoryEvent };

    const settled = Promise.allSettled(
      resolution.targets.map((target) =>
        this.runTarget(target, prepared, options, (event) => channel.push(event)),
      ),
    ).then(() => channel.close());

    for (;;) {
      const next = await channel.next(keepaliveMs);
      if (next === CHANNEL_TIMEOUT) {
        yield { type: 'keepalive' };
        continue;
      }
      if (next.done) break;
      yield next.value;
    }
    await settled;

    yield { type: 'done', persona: resolution.label };
  }

  /**
   * Pipeline, actions, audio and broadcast for one target. Never throws:
   * failures become `error` events and the reply's `error` field.
   */
  private async runTarget(
    target: string,
    prepared: PreparedAsk,
    options: AskOptions,
    emit: EventSink,
  ): Promise<PersonaReply> {
    let firstError: string | undefined;
    const fail = (error: string) => {
      firstError = firstError ?? error;
      emit({ type: 'error', persona: target, error });
    };

    let result: PipelineResult;
    try {
      result = await this.pipeline.run(target, prepared.resolution.text, {
        sessionId: prepared.sessionId,
        promoted: prepared.promoted,
        context: prepared.context,
      });
    } catch (err) {
      this.logger.error(
        { requestId: prepared.requestId, persona: target, err: errorMessage(err) },
        'Persona pipeline failed',
      );
      fail(errorMessage(err));
      return { persona: target, reply: '', actions: [], error: firstError };
    }

    emit({
      type: 'message',
      persona: result.persona,
      reply: result.reply,
      actions: result.actions,
      ...(result.tone ? { tone: result.tone } : {}),
    });

    if (options.execute && result.actions.length > 0) {
      try {
        const outcomes = await this.actions.execute(result.actions);
        for (const outcome of outcomes) {
          if (outcome.status === 'failed') fail(`action_error: ${outcome.detail ?? 'failed'}`);
        }
      } catch (err) {
        fail(`action_error: ${errorMessage(err)}`);
      }
    }

    let audio: AudioRef | undefined;
    if (!prepared.noAudio) {
      try {
        const synthesized = await this.tts.synthesize({
          persona: result.persona,
          text: result.speech,
          tone: result.tone,
          preference: pickTtsPreference(prepared.promoted, result.persona),
          tuning: prepared.promoted.fishTts,
        });
        if (synthesized) {
          const stored = await this.audioCache.put(
            synthesized.bytes,
            synthesized.provider,
            synthesized.mime,
          );
          audio = { audioId: stored.id, mime: stored.mime, ttsProvider: synthesized.provider };
          emit({ type: 'audio', persona: result.persona, ...audio });
        }
      } catch (err) {
        fail(`tts_error: ${errorMessage(err)}`);
      }
    }

    const reply: PersonaReply = {
      persona: result.persona,
      reply: result.reply,
      actions: result.actions,
      ...(result.tone ? { tone: result.tone } : {}),
      ...(audio ? { audio } : {}),
      ...(firstError ? { error: firstError } : {}),
    };
    this.bus.publish({
      ...reply,
      requestId: prepared.requestId,
      sessionId: prepared.sessionId,
      timestamp: Date.now(),
    });
    return reply;
  }

  /**
   * Infers preference changes from the text; applies them when enabled,
   * otherwise only reports them as a suggestion.
   */
  private async promoteFromText(
    text: string,
    autoApply: boolean,
  ): Promise<MemoryEventPayload | undefined> {
    const eventTs = Date.now();
    try {
      const { patch, reasons } = inferPromotedPatch(text, this.personas.names());
      if (Object.keys(patch).length === 0) return undefined;
      if (autoApply) {
        await this.memory.patchPromotedState(patch);
        this.logger.info({ reasons }, 'Applied inferred promoted state');
      }
      return {
        eventId: uuidv4(),
        eventTs,
        kind: 'promoted_state',
        mode: autoApply ? 'applied' : 'suggested',
        source: 'auto_promote',
        appliedAt: autoApply ? eventTs : null,
        patch,
        reasons,
      };
    } catch (err) {
      this.logger.warn({ err: errorMessage(err) }, 'Promoted state inference failed');
      return {
        eventId: uuidv4(),
        eventTs,
        kind: 'promoted_state',
        mode: 'error',
        source: 'auto_promote',
        appliedAt: null,
        error: errorMessage(err),
      };
    }
  }
}
