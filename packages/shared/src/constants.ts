/**
 * @file packages/shared/src/constants.ts
 * @description Shared constants for the Chorus hub and its clients.
 */

// ─── Chorus Constants ─────────────────────────────────────────

export const CHORUS_VERSION = '0.1.0';

export const DEFAULT_PORTS = {
  hub: 2424,
  lmstudio: 1234,
} as const;

/** Selector value that lets the hub pick the target persona(s). */
export const AUTO_SELECTOR = 'auto';

/** Label used for fan-out responses and events. */
export const COLLECTIVE_LABEL = 'collective';

/** Session used when a request carries no session id. */
export const DEFAULT_SESSION_ID = 'default';

export const TONE_TAGS = [
  'joyful',
  'sad',
  'angry',
  'excited',
  'surprised',
  'scared',
  'whisper',
] as const;

export const TTS_PREFERENCES = ['auto', 'fish', 'elevenlabs', 'browser', 'off'] as const;

/** Promoted-state fields that are merged one level deep on patch. */
export const NESTED_PROMOTED_KEYS = ['ttsOverrides', 'baseUrls', 'fishTts', 'whisperStt'] as const;

export const AUDIO_MIME_BY_PROVIDER: Record<string, string> = {
  elevenlabs: 'audio/mpeg',
  fish: 'audio/wav',
};

export const DEFAULT_AUDIO_MIME = 'audio/wav';
