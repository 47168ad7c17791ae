import { describe, it, expect } from 'vitest';
import { buildFishPayload } from './fish-synthesizer.js';
import { makeConfig } from '../../testing/fixtures.js';

const settings = { ...makeConfig().tts.fish, refs: { penny: 'ref-penny' } };

describe('buildFishPayload', () => {
  it('should use the defaults and the persona reference', () => {
    expect(buildFishPayload('hello', 'penny', settings)).toEqual({
      text: 'hello',
      chunk_length: 200,
      format: 'wav',
      references: [],
      reference_id: 'ref-penny',
      seed: null,
      use_memory_cache: 'off',
      normalize: true,
      streaming: false,
      max_new_tokens: 1024,
      top_p: 0.8,
      repetition_penalty: 1.1,
      temperature: 0.8,
    });
  });

  it('should lift temperature and top_p for a tone tag', () => {
    const payload = buildFishPayload('(joyful) hello', 'domino', settings);
    expect(payload.temperature).toBe(1.2);
    expect(payload.top_p).toBe(0.95);
    expect(payload.reference_id).toBeNull();
  });

  it('should prefer promoted tuning and keep higher values under a tone tag', () => {
    const payload = buildFishPayload('(sad) oh', 'penny', settings, {
      temperature: 0.9,
      topP: 0.9,
      format: 'MP3',
      refs: { penny: 'tuned' },
    });
    expect(payload.temperature).toBe(0.9);
    expect(payload.top_p).toBe(0.9);
    expect(payload.format).toBe('mp3');
    expect(payload.reference_id).toBe('tuned');
  });
});
