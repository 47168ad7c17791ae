/**
 * @file packages/gateway/src/api/controllers/health.controller.ts
 * @description Liveness and clock endpoints.
 */

import { FastifyRequest } from 'fastify';
import { singleton, inject } from 'tsyringe';
import { z } from 'zod';
import { CHORUS_VERSION, DEFAULT_SESSION_ID } from '@chorus/shared';
import { MemoryService } from '../../application/services/memory-service.js';
import { PersonaRegistry } from '../../domain/personas/persona-registry.js';
import { readClock } from '../../domain/logic/prompt-builder.js';
import {
  ACTION_EXECUTOR,
  type ActionExecutor,
} from '../../domain/interfaces/action-executor.interface.js';
import { BackendRegistry } from '../../infrastructure/llm/backend-registry.js';
import { TtsService } from '../../infrastructure/tts/tts-service.js';
import { BroadcastBus } from '../../infrastructure/events/broadcast-bus.js';

const TimeQuerySchema = z.object({
  sessionId: z.string().trim().min(1).default(DEFAULT_SESSION_ID),
});

@singleton()
export class HealthController {
  constructor(
    @inject(PersonaRegistry) private personas: PersonaRegistry,
    @inject(BackendRegistry) private backends: BackendRegistry,
    @inject(TtsService) private tts: TtsService,
    @inject(ACTION_EXECUTOR) private actions: ActionExecutor,
    @inject(MemoryService) private memory: MemoryService,
    @inject(BroadcastBus) private bus: BroadcastBus,
  ) {}

  public async check() {
    return {
      status: 'ok',
      version: CHORUS_VERSION,
      personas: this.personas.names(),
      defaultPersona: this.personas.defaultPersona().name,
      backends: this.backends.status(),
      tts: this.tts.enabledProviders(),
      homeAssistant: this.actions.isEnabled(),
      retrieval: this.memory.retrievalAvailable(),
      broadcastSubscribers: this.bus.subscriberCount,
    };
  }

  /**
   * Current time in the promoted timezone.
   */
  public async time(request: FastifyRequest) {
    const { sessionId } = TimeQuerySchema.parse(request.query ?? {});
    await this.memory.touch(sessionId);
    const promoted = await this.memory.getPromotedState();
    const clock = readClock(promoted.timezone);
    return {
      sessionId,
      now: clock.stamp,
      timezone: clock.zone,
      iso: clock.date.toISOString(),
    };
  }
}
