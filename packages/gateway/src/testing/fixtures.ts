/**
 * @file packages/gateway/src/testing/fixtures.ts
 * @description In-process stand-ins and configuration builders shared by the test suites.
 */

import 'reflect-metadata';
import { vi } from 'vitest';
import {
  HubConfigSchema,
  type Action,
  type HubConfig,
  type HubConfigInput,
} from '@chorus/shared';
import { container } from 'tsyringe';
import { DEFAULT_PERSONAS } from '../config.js';
import { setupContainer } from '../container.js';
import { Logger } from '../logger.js';
import type {
  GenerationBackend,
  GenerationRequest,
} from '../domain/interfaces/generation-backend.interface.js';
import type {
  SpeechSynthesizer,
  SynthesisRequest,
  SynthesizedAudio,
} from '../domain/interfaces/speech-synthesizer.interface.js';
import type {
  ActionExecutor,
  ActionOutcome,
} from '../domain/interfaces/action-executor.interface.js';

/**
 * A validated configuration backed by an in-memory database.
 */
export function makeConfig(overrides: Partial<HubConfigInput> = {}): HubConfig {
  return HubConfigSchema.parse({
    dataPath: '/tmp/chorus-test',
    dbPath: ':memory:',
    personas: DEFAULT_PERSONAS,
    backends: {
      lmstudio: { model: 'test-local', baseUrl: 'http://127.0.0.1:1234/v1', apiKey: 'lm-studio' },
      openai: { model: 'test-openai', apiKey: 'test-secret' },
      gemini: { model: 'test-gemini', apiKey: 'test-secret' },
    },
    ...overrides,
  });
}

/**
 * Resets the global container and registers the hub against `config`.
 */
export function makeContainer(config: HubConfig = makeConfig()) {
  container.reset();
  return setupContainer(config);
}

export const silentLogger = (): Logger => new Logger();

type Responder = (request: GenerationRequest) => string | Promise<string>;

export class FakeBackend implements GenerationBackend {
  readonly requests: GenerationRequest[] = [];

  constructor(
    readonly name: string,
    private respond: Responder,
  ) {}

  isConfigured(): boolean {
    return true;
  }

  async generate(request: GenerationRequest): Promise<string> {
    this.requests.push(request);
    return this.respond(request);
  }
}

export class FakeSynthesizer implements SpeechSynthesizer {
  readonly requests: SynthesisRequest[] = [];
  enabled = true;

  constructor(
    readonly provider: string,
    private produce: (request: SynthesisRequest) => SynthesizedAudio | null = (request) => ({
      bytes: Buffer.from(`${provider}:${request.text}`),
      provider,
    }),
  ) {}

  isEnabled(): boolean {
    return this.enabled;
  }

  async synthesize(request: SynthesisRequest): Promise<SynthesizedAudio | null> {
    this.requests.push(request);
    return this.produce(request);
  }
}

export class FakeActionExecutor implements ActionExecutor {
  readonly execute = vi.fn(
    async (actions: Action[]): Promise<ActionOutcome[]> =>
      actions.map((action) => ({ action, status: 'ok' as const })),
  );

  isEnabled(): boolean {
    return true;
  }
}
