import type { FishTuning, ToneTag } from '@chorus/shared';

export interface SynthesisRequest {
  persona: string;
  /** Text to speak; may start with a `(tone)` tag. */
  text: string;
  tone?: ToneTag;
  /** Tuning overrides from the promoted state. */
  tuning?: FishTuning;
}

export interface SynthesizedAudio {
  bytes: Buffer;
  provider: string;
  mime?: string;
}

export interface SpeechSynthesizer {
  readonly provider: string;
  isEnabled(): boolean;
  /** Resolves to null when the engine produced nothing. Throws on failure. */
  synthesize(request: SynthesisRequest): Promise<SynthesizedAudio | null>;
}
