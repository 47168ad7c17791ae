/**
 * @file packages/gateway/src/domain/logic/promoted-inference.ts
 * @description Heuristic detection of explicit preference statements in user text.
 */

import type { PromotedStatePatch, TtsPreference } from '@chorus/shared';

export interface InferredPatch {
  patch: PromotedStatePatch;
  reasons: string[];
}

const TIMEZONE_PHRASES: Array<[string, string]> = [
  ['central', 'America/Chicago'],
  ['eastern', 'America/New_York'],
  ['mountain', 'America/Denver'],
  ['pacific', 'America/Los_Angeles'],
  ['utc', 'UTC'],
  ['gmt', 'UTC'],
];

const TIMEZONE_ABBREVIATIONS: Array<[RegExp, string, string]> = [
  [/\b(cst|cdt)\b/, 'CST/CDT', 'America/Chicago'],
  [/\b(est|edt)\b/, 'EST/EDT', 'America/New_York'],
  [/\b(pst|pdt)\b/, 'PST/PDT', 'America/Los_Angeles'],
];

// Checked in order; the first phrase contained in the candidate wins.
const TTS_PHRASES: Array<[string, TtsPreference]> = [
  ['fish', 'fish'],
  ['elevenlabs', 'elevenlabs'],
  ['eleven labs', 'elevenlabs'],
  ['browser', 'browser'],
  ['off', 'off'],
  ['disable', 'off'],
  ['disabled', 'off'],
];

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * Infers a promoted-state patch from phrases such as "I'm in Austin",
 * "central time", "use metric" or "use fish for penny".
 * @param text - User text.
 * @param personas - Persona names that TTS overrides may target.
 */
export function inferPromotedPatch(text: string, personas: string[]): InferredPatch {
  const trimmed = (text || '').trim();
  const patch: PromotedStatePatch = {};
  const reasons: string[] = [];
  if (!trimmed) return { patch, reasons };

  const lowered = trimmed.toLowerCase();

  const location = /\b(?:i\s*am|i'm|im)\s+in\s+([a-zA-Z][\w .,'-]{1,80})\b/i.exec(trimmed);
  if (location) {
    const value = location[1].trim().replace(/\.+$/, '');
    if (value) {
      patch.location = value;
      reasons.push(`Detected location: ${value}`);
    }
  }

  for (const [phrase, zone] of TIMEZONE_PHRASES) {
    if (new RegExp(`\\b${phrase}\\s+time\\b`).test(lowered)) {
      patch.timezone = zone;
      reasons.push(`Detected timezone: ${phrase} time → ${zone}`);
      break;
    }
  }
  if (patch.timezone === undefined) {
    const hit = TIMEZONE_ABBREVIATIONS.find(([re]) => re.test(lowered));
    if (hit) {
      patch.timezone = hit[2];
      reasons.push(`Detected timezone: ${hit[1]} → ${hit[2]}`);
    }
  }

  if (/\bmetric\b/.test(lowered)) {
    patch.preferredUnits = 'metric';
    reasons.push('Detected preferred units: metric');
  } else if (/\b(imperial|us\s+customary)\b/.test(lowered)) {
    patch.preferredUnits = 'imperial';
    reasons.push('Detected preferred units: imperial');
  }

  const overrides: Record<string, string> = {};
  for (const persona of personas) {
    const name = escapeRegExp(persona.toLowerCase());
    const candidate =
      new RegExp(`\\buse\\s+([a-z ]+)\\s+for\\s+${name}\\b`).exec(lowered)?.[1] ??
      new RegExp(`\\bturn\\s+([a-z ]+)\\s+(?:tts\\s+)?for\\s+${name}\\b`).exec(lowered)?.[1];
    if (!candidate) continue;

    const chosen = TTS_PHRASES.find(([phrase]) => candidate.includes(phrase));
    if (chosen) {
      overrides[persona] = chosen[1];
      reasons.push(`Detected TTS override: ${persona} → ${chosen[1]}`);
    }
  }
  if (Object.keys(overrides).length > 0) patch.ttsOverrides = overrides;

  return { patch, reasons };
}
