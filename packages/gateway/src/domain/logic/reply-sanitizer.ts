/**
 * @file packages/gateway/src/domain/logic/reply-sanitizer.ts
 * @description Turns raw model output into display text, device actions and a tone tag.
 */

import { z } from 'zod';
import { ActionSchema, TONE_TAGS, type Action, type ToneTag } from '@chorus/shared';
import { findDiagnosticMarker } from './text-classifiers.js';

const ACTIONS_BLOCK = String.raw`<actions>\s*([\[{][\s\S]*?[\]}])\s*</actions>`;

const ActionListSchema = z.array(ActionSchema);

export interface ExtractedActions {
  text: string;
  actions: Action[];
}

/**
 * Pulls the first `<actions>[...]</actions>` block out of the reply.
 * A single object is treated as a one-element list. When the block does
 * not parse, the original text comes back untouched with no actions.
 */
export function extractActions(raw: string): ExtractedActions {
  if (!raw) return { text: raw, actions: [] };

  const match = new RegExp(ACTIONS_BLOCK, 'i').exec(raw);
  if (!match) return { text: raw, actions: [] };

  let parsed: unknown;
  try {
    parsed = JSON.parse(match[1]);
  } catch {
    return { text: raw, actions: [] };
  }

  const result = ActionListSchema.safeParse(Array.isArray(parsed) ? parsed : [parsed]);
  if (!result.success) return { text: raw, actions: [] };

  return {
    text: raw.replace(new RegExp(ACTIONS_BLOCK, 'gi'), '').trim(),
    actions: result.data,
  };
}

export interface DiagnosticStrip {
  text: string;
  /** Fragments cut from the reply, for logging. */
  removed: string[];
}

/**
 * Cuts every line at its earliest diagnostic marker.
 */
export function stripDiagnosticTails(text: string): DiagnosticStrip {
  const removed: string[] = [];
  const lines = text.split(/\r?\n/).map((line) => {
    const cut = findDiagnosticMarker(line);
    if (cut === -1) return line;
    const tail = line.slice(cut).trim();
    if (tail) removed.push(tail);
    return line.slice(0, cut).trimEnd();
  });
  return { text: removed.length > 0 ? lines.join('\n') : text, removed };
}

/**
 * Cleans model output for display and speech: drops diagnostic echoes,
 * `<think>` blocks, markdown markers and bullets, and collapses the
 * result to one paragraph.
 */
export function cleanReplyText(text: string): string {
  if (!text) return text;

  let out = stripDiagnosticTails(text).text;
  out = out.replace(/<think>[\s\S]*?<\/think>/gi, '');
  out = out.replace(/(\*\*|\*|__|_|`)/g, '');

  return out
    .split(/\r?\n/)
    .map((line) => line.replace(/^\s*[-•]\s+/, '').trim())
    .filter(Boolean)
    .join(' ');
}

export interface ToneExtraction {
  tone?: ToneTag;
  text: string;
}

const TONE_TAG_RE = new RegExp(`^\\s*[([](${TONE_TAGS.join('|')})[)\\]]\\s*`, 'i');

const isToneTag = (value: string): value is ToneTag =>
  TONE_TAGS.some((tag) => tag === value);

/**
 * Splits a leading `(joyful)` / `[sad]` style tag off the reply.
 */
export function extractToneTag(text: string): ToneExtraction {
  const match = TONE_TAG_RE.exec(text);
  if (!match) return { text };
  const tone = match[1].toLowerCase();
  if (!isToneTag(tone)) return { text };
  return { tone, text: text.slice(match[0].length) };
}

/**
 * Text handed to speech synthesis: the tone tag stays in front so engines
 * that understand it can colour the voice.
 */
export function speechText(reply: string, tone?: ToneTag): string {
  return tone ? `(${tone}) ${reply}` : reply;
}
