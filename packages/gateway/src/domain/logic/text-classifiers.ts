/**
 * @file packages/gateway/src/domain/logic/text-classifiers.ts
 * @description Pure pattern classifiers over user and model text.
 */

import type { PersonaLexicon } from '../personas/persona-registry.js';

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/** Longest first, so "penai" is tried before "pen". */
const alternation = (terms: string[]): string =>
  [...terms]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join('|');

const collectivePattern = (keywords: string[]): string =>
  `(?:the\\s+)?(?:${alternation(keywords)})`;

/**
 * Determines whether the text names the collective anywhere ("collective",
 * "the collective", or any configured keyword).
 */
export function hasCollectiveKeyword(text: string, keywords: string[]): boolean {
  if (!text || keywords.length === 0) return false;
  return new RegExp(`\\b${collectivePattern(keywords)}\\b`, 'i').test(text);
}

/**
 * Distinct personas mentioned as whole words, in order of first appearance.
 */
export function mentionedPersonas(text: string, lexicon: PersonaLexicon): string[] {
  if (!text) return [];
  const firstSeen = new Map<string, number>();

  for (const term of lexicon.terms()) {
    const match = new RegExp(`\\b${escapeRegExp(term)}\\b`, 'i').exec(text);
    const persona = lexicon.canonical(term);
    if (!match || !persona) continue;
    const seen = firstSeen.get(persona);
    if (seen === undefined || match.index < seen) firstSeen.set(persona, match.index);
  }

  return [...firstSeen.entries()].sort((a, b) => a[1] - b[1]).map(([persona]) => persona);
}

export interface CalloutMatch {
  persona: string;
  rest: string;
}

/**
 * Matches a leading callout: an optional greeting, a persona name, then a
 * separator (`: , ; — – -` followed by whitespace) or plain whitespace.
 *
 * "hey domino, lights on" -> { persona: 'domino', rest: 'lights on' }
 */
export function matchCallout(
  text: string,
  lexicon: PersonaLexicon,
  greetings: string[],
): CalloutMatch | null {
  const terms = lexicon.terms();
  if (!text || terms.length === 0) return null;

  const greeting = greetings.length > 0 ? `(?:(?:${alternation(greetings)})\\b[\\s,]*)?` : '';
  const pattern = new RegExp(
    `^\\s*${greeting}(${alternation(terms)})\\b(?:\\s*[:,;—–-]\\s+|\\s+)`,
    'i',
  );
  const match = pattern.exec(text);
  if (!match) return null;

  const persona = lexicon.canonical(match[1]);
  if (!persona) return null;
  return { persona, rest: text.slice(match[0].length).trimStart() };
}

/**
 * Removes leading addressing so the model does not parrot it back:
 * greetings in front of a name, persona names, collective keywords,
 * joiners (`and`, `&`, `+`) and separators, repeatedly.
 *
 * "domino and penny, what's the weather" -> "what's the weather"
 */
export function stripAddressing(
  text: string,
  lexicon: PersonaLexicon,
  collectiveKeywords: string[],
  greetings: string[],
): string {
  if (!text) return text;

  const targets = [
    ...(collectiveKeywords.length > 0 ? [collectivePattern(collectiveKeywords)] : []),
    ...(lexicon.terms().length > 0 ? [`(?:${alternation(lexicon.terms())})`] : []),
  ];
  if (targets.length === 0) return text.trim();
  const target = targets.join('|');

  const patterns: RegExp[] = [
    ...(greetings.length > 0
      ? [new RegExp(`^\\s*(?:${alternation(greetings)})\\b[\\s,]*(?=(?:${target})\\b)`, 'i')]
      : []),
    new RegExp(`^\\s*(?:${target})\\b`, 'i'),
    /^\s*(?:and\b|&|\+)\s*/i,
    /^\s*(?:,|:|;|—|–|-|\.{3,}|…|\.)\s*/,
  ];

  let current = text.trim();
  for (;;) {
    const before = current;
    for (const pattern of patterns) {
      current = current.replace(pattern, '');
    }
    current = current.trimStart();
    if (current === before) return current;
  }
}

const CLOCK_QUESTION_RE =
  /\b(what\s*['’]?s\s+the\s+time|what\s+time\s+is\s+it|current\s+time|time\s+now|tell\s+me\s+the\s+time)\b/i;

/**
 * Determines whether the text asks for the current time.
 */
export function isClockQuestion(text: string): boolean {
  return CLOCK_QUESTION_RE.test(text || '');
}

/**
 * Echoed context and stack traces that must never reach the user.
 */
export const DIAGNOSTIC_MARKERS = [
  'context: user=',
  'noise_level=',
  'noiselevel=',
  'traceback (most recent call last)',
] as const;

/**
 * Index of the earliest diagnostic marker in the line, or -1.
 * Best-effort filter: it only knows the fixed marker list.
 */
export function findDiagnosticMarker(line: string): number {
  const lower = line.toLowerCase();
  let cut = -1;
  for (const marker of DIAGNOSTIC_MARKERS) {
    const idx = lower.indexOf(marker);
    if (idx !== -1 && (cut === -1 || idx < cut)) cut = idx;
  }
  return cut;
}
