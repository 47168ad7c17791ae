/**
 * @file packages/gateway/src/domain/logic/prompt-builder.ts
 * @description Builds the per-target system prompt from clock, promoted state, retrieved notes and chat history.
 */

import type { ChatContext, PromotedState, RetrievalHit } from '@chorus/shared';

export const TRUNCATION_MARKER = '...[TRUNCATED]';
const TECH_STACK_LIMIT = 1400;
const MIN_RETRIEVAL_BUDGET = 500;

export interface ClockReading {
  /** "YYYY-MM-DD HH:mm:ss TZ" */
  stamp: string;
  /** IANA zone the stamp was rendered in. */
  zone: string;
  date: Date;
}

const localZone = (): string => Intl.DateTimeFormat().resolvedOptions().timeZone || 'local';

const formatterFor = (zone: string): Intl.DateTimeFormat | null => {
  try {
    return new Intl.DateTimeFormat('en-US', {
      timeZone: zone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hourCycle: 'h23',
      timeZoneName: 'short',
    });
  } catch {
    // Unknown zone name; the caller falls back to the server zone.
    return null;
  }
};

/**
 * Reads the clock in the promoted timezone, falling back to the server zone
 * when it is unset or not a valid IANA name.
 */
export function readClock(timezone: string | null | undefined, now: Date = new Date()): ClockReading {
  const requested = (timezone ?? '').trim();
  let zone = requested || localZone();
  let formatter = formatterFor(zone);
  if (!formatter) {
    zone = localZone();
    formatter = formatterFor(zone);
  }
  if (!formatter) {
    return { stamp: now.toISOString(), zone, date: now };
  }

  const parts: Record<string, string> = {};
  for (const part of formatter.formatToParts(now)) {
    parts[part.type] = part.value;
  }
  const stamp =
    `${parts.year}-${parts.month}-${parts.day} ` +
    `${parts.hour}:${parts.minute}:${parts.second} ${parts.timeZoneName ?? ''}`.trimEnd();
  return { stamp, zone, date: now };
}

export function buildTimeBlock(clock: ClockReading): string {
  return `Current server time: ${clock.stamp} (${clock.zone}).`;
}

/**
 * Reply of the clock fast path.
 */
export function clockReply(clock: ClockReading): string {
  return `Current time: ${clock.stamp} (${clock.zone}).`;
}

/**
 * Renders the durable preferences the model should honour.
 */
export function buildMemoryBlock(promoted: PromotedState): string {
  const lines: string[] = [];
  if (promoted.timezone) lines.push(`User timezone: ${promoted.timezone}.`);
  if (promoted.location) lines.push(`User location: ${promoted.location}.`);
  if (promoted.preferredUnits) lines.push(`Preferred units: ${promoted.preferredUnits}.`);
  if (promoted.workingRules) lines.push(`Working rules: ${promoted.workingRules}`);

  let techStack = (promoted.techStack ?? '').trim();
  if (techStack) {
    if (techStack.length > TECH_STACK_LIMIT) {
      techStack = techStack.slice(0, TECH_STACK_LIMIT) + TRUNCATION_MARKER;
    }
    lines.push(`Tech stack: ${techStack}`);
  }

  return lines.join('\n');
}

/**
 * Renders retrieved notes inside BEGIN/END markers, capped at `maxChars`
 * (never below 500). Once the budget runs out the current line is cut and
 * ends with the truncation marker; nothing else is added.
 */
export function buildRetrievalBlock(query: string, hits: RetrievalHit[], maxChars: number): string {
  if (hits.length === 0) return '';

  const lines = [
    'BEGIN_RETRIEVED_NOTES',
    'Non-authoritative. May be stale. Verify against live state and code.',
    `Query: ${JSON.stringify(query.trim())}`,
    `Returned: ${hits.length} docs (top ${hits.length} shown)`,
  ];
  const budget = Math.max(MIN_RETRIEVAL_BUDGET, Math.trunc(maxChars));
  let used = lines.reduce((sum, line) => sum + line.length + 1, 0);
  let truncated = false;

  const append = (line: string): void => {
    if (truncated) return;
    if (used + line.length + 1 <= budget) {
      lines.push(line);
      used += line.length + 1;
      return;
    }
    const remaining = Math.max(0, budget - used);
    lines.push(
      remaining <= TRUNCATION_MARKER.length
        ? TRUNCATION_MARKER
        : line.slice(0, remaining - TRUNCATION_MARKER.length) + TRUNCATION_MARKER,
    );
    truncated = true;
  };

  for (const hit of hits) {
    if (truncated) break;
    const updated = hit.updatedAt === null ? 'unknown' : String(Math.trunc(hit.updatedAt));
    append(`DOC ${hit.docId} (score=${hit.score}, updated=${updated}):`);
    append(hit.content.trim() || '(empty)');
    append('---');
  }

  lines.push('END_RETRIEVED_NOTES');
  return lines.join('\n');
}

/**
 * Renders the rolling digest and recent turns as plain text.
 */
export function renderChatContext(context: ChatContext): string {
  const parts: string[] = [];
  if (context.summary) parts.push(`Earlier context: ${context.summary}`);
  if (context.messages.length > 0) {
    parts.push('Recent turns:');
    for (const turn of context.messages) {
      const content = turn.content.trim();
      if (!content) continue;
      parts.push(turn.role === 'user' ? `User: ${content}` : `Assistant: ${content}`);
    }
  }
  return parts.join('\n');
}

/**
 * Appends the non-empty blocks to the persona prompt, separated by blank lines.
 */
export function composeSystemPrompt(base: string, blocks: string[]): string {
  const present = blocks.filter((block) => block.length > 0);
  return present.length > 0 ? `${base}\n\n${present.join('\n\n')}` : base;
}
