/**
 * @file packages/gateway/src/container.ts
 * @description Registers the hub's services, adapters and controllers with tsyringe.
 */

import 'reflect-metadata';
import { container, instanceCachingFactory, type DependencyContainer } from 'tsyringe';
import type { HubConfig } from '@chorus/shared';
import { Logger } from './logger.js';
import { ConfigService } from './infrastructure/config/config-service.js';
import { SqliteMemoryRepository } from './infrastructure/repositories/sqlite-memory-repository.js';
import { BackendRegistry } from './infrastructure/llm/backend-registry.js';
import { AudioBlobCache } from './infrastructure/cache/audio-blob-cache.js';
import { BroadcastBus } from './infrastructure/events/broadcast-bus.js';
import { TtsService } from './infrastructure/tts/tts-service.js';
import { FishSpeechSynthesizer } from './infrastructure/tts/fish-synthesizer.js';
import { ElevenLabsSynthesizer } from './infrastructure/tts/elevenlabs-synthesizer.js';
import { HomeAssistantExecutor } from './infrastructure/actions/home-assistant-executor.js';
import { MemoryService } from './application/services/memory-service.js';
import { PersonaRegistry } from './domain/personas/persona-registry.js';
import { PersonaPipeline } from './domain/logic/persona-pipeline.js';
import { FanoutCoordinator } from './domain/logic/fanout-coordinator.js';
import { MEMORY_REPOSITORY } from './domain/interfaces/memory-repository.interface.js';
import { ACTION_EXECUTOR } from './domain/interfaces/action-executor.interface.js';

import { AskController } from './api/controllers/ask.controller.js';
import { AudioController } from './api/controllers/audio.controller.js';
import { HealthController } from './api/controllers/health.controller.js';
import { MemoryController } from './api/controllers/memory.controller.js';

/**
 * Executes setup container.
 * @param config - Use this configuration instead of loading it from disk.
 */
export function setupContainer(config?: HubConfig): DependencyContainer {
  container.registerSingleton(Logger);
  container.registerSingleton(ConfigService);
  if (config) container.resolve(ConfigService).use(config);

  const hubConfig = (c: DependencyContainer) => c.resolve(ConfigService).getFullConfig();

  // Repositories
  container.registerSingleton(SqliteMemoryRepository);
  container.register(MEMORY_REPOSITORY, {
    useFactory: instanceCachingFactory((c) => c.resolve(SqliteMemoryRepository)),
  });

  // Adapters
  container.registerSingleton(BackendRegistry);
  container.registerSingleton(AudioBlobCache);
  container.registerSingleton(BroadcastBus);
  container.register(TtsService, {
    useFactory: instanceCachingFactory((c) => {
      const { tts } = hubConfig(c);
      return new TtsService(
        [new FishSpeechSynthesizer(tts.fish), new ElevenLabsSynthesizer(tts.elevenlabs)],
        c.resolve(Logger),
      );
    }),
  });
  container.register(ACTION_EXECUTOR, {
    useFactory: instanceCachingFactory(
      (c) => new HomeAssistantExecutor(hubConfig(c).homeAssistant, c.resolve(Logger)),
    ),
  });

  // Services
  container.register(PersonaRegistry, {
    useFactory: instanceCachingFactory((c) => PersonaRegistry.fromConfig(hubConfig(c))),
  });
  container.registerSingleton(MemoryService);
  container.registerSingleton(PersonaPipeline);
  container.registerSingleton(FanoutCoordinator);

  // Controllers
  container.registerSingleton(AskController);
  container.registerSingleton(AudioController);
  container.registerSingleton(HealthController);
  container.registerSingleton(MemoryController);

  return container;
}

export { container };
