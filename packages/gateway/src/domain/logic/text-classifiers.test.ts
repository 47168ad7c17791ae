import { describe, it, expect } from 'vitest';
import { PersonaRegistry } from '../personas/persona-registry.js';
import { DEFAULT_PERSONAS } from '../../config.js';
import {
  findDiagnosticMarker,
  hasCollectiveKeyword,
  isClockQuestion,
  matchCallout,
  mentionedPersonas,
  stripAddressing,
} from './text-classifiers.js';

const registry = new PersonaRegistry(DEFAULT_PERSONAS, 'domino');
const greetings = ['hey', 'hi', 'hello', 'ok', 'okay', 'yo'];
const keywords = ['collective'];

describe('text classifiers', () => {
  describe('hasCollectiveKeyword', () => {
    it('should find the keyword with or without an article', () => {
      expect(hasCollectiveKeyword('ask the collective please', keywords)).toBe(true);
      expect(hasCollectiveKeyword('Collective, status?', keywords)).toBe(true);
    });

    it('should only match whole words', () => {
      expect(hasCollectiveKeyword('we decided collectively', keywords)).toBe(false);
    });
  });

  describe('mentionedPersonas', () => {
    it('should list distinct personas in order of first appearance', () => {
      expect(mentionedPersonas('penny and domino, hi', registry)).toEqual(['penny', 'domino']);
    });

    it('should fold aliases into their persona', () => {
      expect(mentionedPersonas('penai what is up, jimmy', registry)).toEqual(['penny', 'jimmy']);
      expect(mentionedPersonas('penny or penai?', registry)).toEqual(['penny']);
    });
  });

  describe('matchCallout', () => {
    it('should match a greeting, a name and a comma', () => {
      expect(matchCallout('hey domino, lights on', registry, greetings)).toEqual({
        persona: 'domino',
        rest: 'lights on',
      });
    });

    it('should accept a colon separator and any case', () => {
      expect(matchCallout('Penny: plan my day', registry, greetings)).toEqual({
        persona: 'penny',
        rest: 'plan my day',
      });
    });

    it('should not match a bare name or a name later in the sentence', () => {
      expect(matchCallout('domino', registry, greetings)).toBeNull();
      expect(matchCallout('tell domino hi', registry, greetings)).toBeNull();
    });
  });

  describe('stripAddressing', () => {
    it('should remove leading names and joiners', () => {
      expect(
        stripAddressing("domino and penny, what's the weather", registry, keywords, greetings),
      ).toBe("what's the weather");
    });

    it('should remove a greeting only when a name follows it', () => {
      expect(stripAddressing('hey collective, status report', registry, keywords, greetings)).toBe(
        'status report',
      );
      expect(stripAddressing('hi there', registry, keywords, greetings)).toBe('hi there');
    });
  });

  it('should recognise clock questions', () => {
    expect(isClockQuestion('what time is it?')).toBe(true);
    expect(isClockQuestion("What's the time")).toBe(true);
    expect(isClockQuestion('time to go')).toBe(false);
  });

  it('should locate the earliest diagnostic marker', () => {
    expect(findDiagnosticMarker('ok Context: user=x, noise_level=3')).toBe(3);
    expect(findDiagnosticMarker('all good')).toBe(-1);
  });
});
