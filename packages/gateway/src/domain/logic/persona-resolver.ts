/**
 * @file packages/gateway/src/domain/logic/persona-resolver.ts
 * @description Decides which persona(s) answer a request and what text they receive.
 */

import { AUTO_SELECTOR, COLLECTIVE_LABEL } from '@chorus/shared';
import type { PersonaRegistry } from '../personas/persona-registry.js';
import { AppError } from '../errors/app-error.js';
import {
  hasCollectiveKeyword,
  matchCallout,
  mentionedPersonas,
  stripAddressing,
} from './text-classifiers.js';

export interface ResolverSettings {
  collectiveKeywords: string[];
  greetings: string[];
}

export interface Resolution {
  mode: 'single' | 'fanout';
  /** Persona name, or "collective" for fan-out. */
  label: string;
  targets: string[];
  text: string;
}

/**
 * Resolves the selector and text to targets.
 *
 * Order: explicit persona, collective keyword as selector, fan-out signals
 * in the text (a collective keyword or two or more names), a leading
 * callout, then the default persona.
 *
 * @throws AppError 400 for a selector that names no persona.
 */
export function resolveTargets(
  selector: string,
  text: string,
  registry: PersonaRegistry,
  settings: ResolverSettings,
): Resolution {
  const normalized = (selector || AUTO_SELECTOR).trim().toLowerCase();
  // Pure addressing ("domino and penny") keeps the original words.
  const strip = (value: string) =>
    stripAddressing(value, registry, settings.collectiveKeywords, settings.greetings) ||
    value.trim();
  const everyone = (): Resolution => ({
    mode: 'fanout',
    label: COLLECTIVE_LABEL,
    targets: registry.names(),
    text: strip(text),
  });

  if (normalized !== AUTO_SELECTOR) {
    const persona = registry.get(normalized);
    if (persona) {
      return { mode: 'single', label: persona.name, targets: [persona.name], text };
    }
    if (settings.collectiveKeywords.some((k) => k.toLowerCase() === normalized)) {
      return everyone();
    }
    throw new AppError(`Unknown persona '${selector}'`, 400);
  }

  if (hasCollectiveKeyword(text, settings.collectiveKeywords)) {
    return everyone();
  }

  const mentioned = mentionedPersonas(text, registry);
  if (mentioned.length >= 2) {
    return { mode: 'fanout', label: COLLECTIVE_LABEL, targets: mentioned, text: strip(text) };
  }

  const callout = matchCallout(text, registry, settings.greetings);
  if (callout) {
    return { mode: 'single', label: callout.persona, targets: [callout.persona], text: callout.rest };
  }

  const fallback = registry.defaultPersona().name;
  return { mode: 'single', label: fallback, targets: [fallback], text };
}
