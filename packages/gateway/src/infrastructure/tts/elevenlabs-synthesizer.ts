/**
 * @file packages/gateway/src/infrastructure/tts/elevenlabs-synthesizer.ts
 * @description ElevenLabs text-to-speech client.
 */

import type { HubConfig } from '@chorus/shared';
import type {
  SpeechSynthesizer,
  SynthesisRequest,
  SynthesizedAudio,
} from '../../domain/interfaces/speech-synthesizer.interface.js';

type ElevenLabsSettings = HubConfig['tts']['elevenlabs'];

const API_BASE = 'https://api.elevenlabs.io/v1/text-to-speech';

export class ElevenLabsSynthesizer implements SpeechSynthesizer {
  readonly provider = 'elevenlabs';

  constructor(private readonly settings: ElevenLabsSettings) {}

  isEnabled(): boolean {
    return Boolean(this.settings.apiKey);
  }

  async synthesize(request: SynthesisRequest): Promise<SynthesizedAudio | null> {
    const voiceId = this.settings.voices[request.persona];
    if (!this.settings.apiKey || !voiceId || !request.text) return null;

    const res = await fetch(`${API_BASE}/${encodeURIComponent(voiceId)}`, {
      method: 'POST',
      headers: {
        'xi-api-key': this.settings.apiKey,
        'Content-Type': 'application/json',
        Accept: 'audio/mpeg',
      },
      body: JSON.stringify({
        text: request.text,
        model_id: this.settings.modelId,
        voice_settings: { stability: 0.5, similarity_boost: 0.75 },
      }),
      signal: AbortSignal.timeout(this.settings.timeoutMs),
    });
    if (!res.ok) throw new Error(`ElevenLabs returned HTTP ${res.status}`);

    const bytes = Buffer.from(await res.arrayBuffer());
    if (bytes.length === 0) return null;
    return { bytes, provider: this.provider, mime: 'audio/mpeg' };
  }
}
