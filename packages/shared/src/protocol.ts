/**
 * @file packages/shared/src/protocol.ts
 * @description Wire protocol of the hub: requests, responses, stream events and broadcast frames.
 */

import { z } from 'zod';
import { ActionSchema, ToneTagSchema } from './types.js';
import { AUTO_SELECTOR } from './constants.js';

// ─── Ask Request ──────────────────────────────────────────────

export const RequestContextSchema = z.object({
  user: z.string().optional(),
  room: z.string().optional(),
  noiseLevel: z.number().optional(),
  sessionId: z.string().optional(),
  autoPromote: z.boolean().optional(),
  extensions: z.record(z.unknown()).default({}),
});
export type RequestContext = z.infer<typeof RequestContextSchema>;

export const AskRequestSchema = z.object({
  persona: z.string().trim().min(1).default(AUTO_SELECTOR),
  text: z.string().refine((value) => value.trim().length > 0, { message: 'text is required' }),
  sessionId: z.string().trim().min(1).optional(),
  room: z.string().optional(),
  context: RequestContextSchema.optional(),
  noAudio: z.boolean().default(false),
});
export type AskRequest = z.infer<typeof AskRequestSchema>;
export type AskRequestInput = z.input<typeof AskRequestSchema>;

// ─── Ask Response ─────────────────────────────────────────────

export const AudioRefSchema = z.object({
  audioId: z.string(),
  mime: z.string(),
  ttsProvider: z.string(),
});
export type AudioRef = z.infer<typeof AudioRefSchema>;

export interface PersonaReply {
  persona: string;
  reply: string;
  actions: z.infer<typeof ActionSchema>[];
  tone?: z.infer<typeof ToneTagSchema>;
  audio?: AudioRef;
  error?: string;
}

export interface AskResponse extends PersonaReply {
  responses?: PersonaReply[];
}

// ─── Stream Events ────────────────────────────────────────────

export const StreamEventTypeSchema = z.enum([
  'meta',
  'memory',
  'message',
  'audio',
  'error',
  'keepalive',
  'done',
]);
export type StreamEventType = z.infer<typeof StreamEventTypeSchema>;

export interface MemoryEventPayload {
  eventId: string;
  eventTs: number;
  kind: 'promoted_state';
  mode: 'applied' | 'suggested' | 'error';
  source: 'auto_promote';
  appliedAt: number | null;
  patch?: Record<string, unknown>;
  reasons?: string[];
  error?: string;
}

export type StreamEvent =
  | { type: 'meta'; persona: string; targets: string[] }
  | { type: 'memory'; memory: MemoryEventPayload }
  | {
      type: 'message';
      persona: string;
      reply: string;
      actions: z.infer<typeof ActionSchema>[];
      tone?: z.infer<typeof ToneTagSchema>;
    }
  | { type: 'audio'; persona: string; audioId: string; mime: string; ttsProvider: string }
  | { type: 'error'; persona: string; error: string }
  | { type: 'keepalive' }
  | { type: 'done'; persona: string };

/**
 * Serializes a stream event as a server-sent event block.
 * Keepalives become SSE comments so clients never see them as data.
 */
export function serializeSseEvent(event: StreamEvent): string {
  switch (event.type) {
    case 'keepalive':
      return ': keep-alive\n\n';
    case 'memory':
      return formatSse('memory', event.memory);
    default: {
      const { type, ...payload } = event;
      return formatSse(type, payload);
    }
  }
}

function formatSse(event: StreamEventType, data: unknown): string {
  return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
}

// ─── Broadcast Frames ─────────────────────────────────────────

export interface ReplySummary extends PersonaReply {
  requestId: string;
  sessionId: string;
  timestamp: number;
}

export type BroadcastFrame =
  | { type: 'reply'; summary: ReplySummary }
  | { type: 'hello'; subscribers: number };

/**
 * Serializes a broadcast frame.
 */
export function serializeBroadcastFrame(frame: BroadcastFrame): string {
  return JSON.stringify(frame);
}

// ─── Memory Administration ────────────────────────────────────

export const RetrievalUpsertRequestSchema = z.object({
  docId: z.string().trim().min(1),
  title: z.string().default(''),
  content: z.string(),
  tags: z.string().default(''),
  sessionId: z.string().optional(),
});
export type RetrievalUpsertRequest = z.infer<typeof RetrievalUpsertRequestSchema>;

export const RetrievalQueryRequestSchema = z.object({
  query: z.string(),
  limit: z.number().int().positive().default(3),
  sessionId: z.string().optional(),
});
export type RetrievalQueryRequest = z.infer<typeof RetrievalQueryRequestSchema>;
