/**
 * @file packages/gateway/src/infrastructure/tts/tts-service.ts
 * @description Picks speech engines by per-persona preference and falls through on failure.
 */

import {
  TtsPreferenceSchema,
  type FishTuning,
  type PromotedState,
  type ToneTag,
  type TtsPreference,
} from '@chorus/shared';
import type {
  SpeechSynthesizer,
  SynthesizedAudio,
} from '../../domain/interfaces/speech-synthesizer.interface.js';
import { errorMessage } from '../../domain/errors/app-error.js';
import { Logger } from '../../logger.js';

const ENGINE_ORDER: Record<TtsPreference, string[]> = {
  auto: ['fish', 'elevenlabs'],
  fish: ['fish'],
  elevenlabs: ['elevenlabs'],
  browser: [],
  off: [],
};

/**
 * The persona's preference from `ttsOverrides`; anything unknown means auto.
 */
export function pickTtsPreference(promoted: PromotedState, persona: string): TtsPreference {
  const raw = promoted.ttsOverrides?.[persona];
  const parsed = TtsPreferenceSchema.safeParse((raw ?? '').trim().toLowerCase());
  return parsed.success ? parsed.data : 'auto';
}

export interface SpeechRequest {
  persona: string;
  text: string;
  tone?: ToneTag;
  preference: TtsPreference;
  tuning?: FishTuning;
}

export class TtsService {
  private readonly engines = new Map<string, SpeechSynthesizer>();

  constructor(
    synthesizers: SpeechSynthesizer[],
    private readonly logger: Logger,
  ) {
    for (const synth of synthesizers) this.engines.set(synth.provider, synth);
  }

  /** Providers that are enabled, for the health endpoint. */
  enabledProviders(): string[] {
    return [...this.engines.values()].filter((e) => e.isEnabled()).map((e) => e.provider);
  }

  /**
   * Tries each engine allowed by the preference in order. Engine failures
   * are logged and the next engine is tried.
   * @returns Audio, or null when the client should synthesize locally.
   */
  async synthesize(request: SpeechRequest): Promise<SynthesizedAudio | null> {
    if (!request.text) return null;

    for (const provider of ENGINE_ORDER[request.preference]) {
      const engine = this.engines.get(provider);
      if (!engine || !engine.isEnabled()) continue;
      try {
        const audio = await engine.synthesize({
          persona: request.persona,
          text: request.text,
          tone: request.tone,
          tuning: request.tuning,
        });
        if (audio) return audio;
      } catch (err) {
        this.logger.warn(
          { persona: request.persona, provider, err: errorMessage(err) },
          'TTS engine failed',
        );
      }
    }
    return null;
  }
}
