import { describe, it, expect } from 'vitest';
import {
  cleanReplyText,
  extractActions,
  extractToneTag,
  speechText,
  stripDiagnosticTails,
} from './reply-sanitizer.js';

describe('reply sanitizer', () => {
  describe('extractActions', () => {
    it('should pull the actions block out of the reply', () => {
      const raw =
        'Turning on.<actions>[{"type":"ha_call_service","data":{"service":"light.turn_on","entity_id":"light.office"}}]</actions>';
      expect(extractActions(raw)).toEqual({
        text: 'Turning on.',
        actions: [
          {
            type: 'ha_call_service',
            data: { service: 'light.turn_on', entity_id: 'light.office' },
          },
        ],
      });
    });

    it('should treat a single object as a one-element list', () => {
      expect(extractActions('<actions>{"type":"noop"}</actions> Done')).toEqual({
        text: 'Done',
        actions: [{ type: 'noop', data: {} }],
      });
    });

    it('should leave the text untouched when the block does not parse', () => {
      const raw = 'a <actions>[oops]</actions>';
      expect(extractActions(raw)).toEqual({ text: raw, actions: [] });
    });
  });

  it('should cut echoed context from a line and report it', () => {
    expect(stripDiagnosticTails('Sure thing. Context: user=lyfe, room=office\nBye')).toEqual({
      text: 'Sure thing.\nBye',
      removed: ['Context: user=lyfe, room=office'],
    });
  });

  it('should collapse markdown, bullets and think blocks into one paragraph', () => {
    expect(cleanReplyText('<think>plan</think>**Hello**\n- one\n- two')).toBe('Hello one two');
  });

  describe('extractToneTag', () => {
    it('should split a leading tag in either bracket style', () => {
      expect(extractToneTag('(joyful) Great news!')).toEqual({ tone: 'joyful', text: 'Great news!' });
      expect(extractToneTag('[SAD] oh')).toEqual({ tone: 'sad', text: 'oh' });
    });

    it('should ignore unknown tags', () => {
      expect(extractToneTag('(happy) hi')).toEqual({ text: '(happy) hi' });
    });
  });

  it('should prefix speech text with the tone', () => {
    expect(speechText('Hi', 'whisper')).toBe('(whisper) Hi');
    expect(speechText('Hi')).toBe('Hi');
  });
});
