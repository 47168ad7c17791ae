/**
 * @file packages/gateway/src/infrastructure/llm/backend-registry.ts
 * @description Maps backend kinds to generation backends.
 */

import { inject, singleton } from 'tsyringe';
import type { BackendKind } from '@chorus/shared';
import { ConfigService } from '../config/config-service.js';
import type { GenerationBackend } from '../../domain/interfaces/generation-backend.interface.js';
import { OpenAICompatibleBackend } from './openai-compatible-backend.js';
import { BackendError } from '../../domain/errors/app-error.js';

@singleton()
export class BackendRegistry {
  private readonly backends = new Map<string, GenerationBackend>();

  constructor(@inject(ConfigService) config: ConfigService) {
    const { lmstudio, openai, gemini } = config.get('backends');
    this.register(new OpenAICompatibleBackend('lmstudio', lmstudio, 0.6));
    this.register(new OpenAICompatibleBackend('openai', openai, 0.5));
    this.register(new OpenAICompatibleBackend('gemini', gemini, 0.7));
  }

  /** Replaces the backend of the same name. */
  register(backend: GenerationBackend): void {
    this.backends.set(backend.name, backend);
  }

  get(kind: BackendKind): GenerationBackend {
    const backend = this.backends.get(kind);
    if (!backend) throw new BackendError(`Unsupported backend '${kind}'`, kind);
    return backend;
  }

  /** Configuration flags reported by the health endpoint. */
  status(): Record<string, boolean> {
    return Object.fromEntries(
      [...this.backends.entries()].map(([name, backend]) => [name, backend.isConfigured()]),
    );
  }
}
