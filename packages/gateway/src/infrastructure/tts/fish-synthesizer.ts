/**
 * @file packages/gateway/src/infrastructure/tts/fish-synthesizer.ts
 * @description Fish Speech `/v1/tts` client.
 */

import { TONE_TAGS, type FishTuning, type HubConfig } from '@chorus/shared';
import type {
  SpeechSynthesizer,
  SynthesisRequest,
  SynthesizedAudio,
} from '../../domain/interfaces/speech-synthesizer.interface.js';

type FishSettings = HubConfig['tts']['fish'];

const BASE_TEMPERATURE = 0.8;
const BASE_TOP_P = 0.8;

export interface FishPayload {
  text: string;
  chunk_length: number;
  format: string;
  references: unknown[];
  reference_id: string | null;
  seed: null;
  use_memory_cache: 'off';
  normalize: boolean;
  streaming: false;
  max_new_tokens: number;
  top_p: number;
  repetition_penalty: number;
  temperature: number;
}

const hasToneTag = (text: string): boolean => TONE_TAGS.some((tag) => text.includes(`(${tag})`));

/**
 * Builds the request body. Promoted tuning wins over settings; a tone tag
 * in the text lifts low temperature/top_p so the emotion can override the
 * reference voice's prosody.
 */
export function buildFishPayload(
  text: string,
  persona: string,
  settings: FishSettings,
  tuning: FishTuning = {},
): FishPayload {
  let temperature = tuning.temperature ?? BASE_TEMPERATURE;
  let topP = tuning.topP ?? BASE_TOP_P;
  if (hasToneTag(text)) {
    if (temperature <= 0.8) temperature = 1.2;
    if (topP <= 0.8) topP = 0.95;
  }

  return {
    text,
    chunk_length: tuning.chunkLength ?? 200,
    format: (tuning.format ?? settings.format).toLowerCase(),
    references: [],
    reference_id: tuning.refs?.[persona] ?? settings.refs[persona] ?? null,
    seed: null,
    use_memory_cache: 'off',
    normalize: tuning.normalize ?? settings.normalize,
    streaming: false,
    max_new_tokens: tuning.maxNewTokens ?? 1024,
    top_p: topP,
    repetition_penalty: tuning.repetitionPenalty ?? 1.1,
    temperature,
  };
}

const mimeForFormat = (format: string): string =>
  format === 'mp3' ? 'audio/mpeg' : `audio/${format}`;

export class FishSpeechSynthesizer implements SpeechSynthesizer {
  readonly provider = 'fish';

  constructor(private readonly settings: FishSettings) {}

  isEnabled(): boolean {
    return this.settings.enabled;
  }

  async synthesize(request: SynthesisRequest): Promise<SynthesizedAudio | null> {
    if (!request.text) return null;
    const payload = buildFishPayload(request.text, request.persona, this.settings, request.tuning);
    const timeoutMs =
      request.tuning?.timeoutSec !== undefined
        ? request.tuning.timeoutSec * 1000
        : this.settings.timeoutMs;

    const res = await fetch(`${this.settings.baseUrl.replace(/\/+$/, '')}/v1/tts`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(timeoutMs),
    });
    if (!res.ok) throw new Error(`Fish TTS returned HTTP ${res.status}`);

    const bytes = Buffer.from(await res.arrayBuffer());
    if (bytes.length === 0) return null;
    return { bytes, provider: this.provider, mime: mimeForFormat(payload.format) };
  }
}
