/**
 * @file packages/shared/src/types.ts
 * @description Domain schemas shared by the hub and its clients.
 */

import { z } from 'zod';
import { TONE_TAGS, TTS_PREFERENCES } from './constants.js';

// ─── Chat ─────────────────────────────────────────────────────

export const ChatRoleSchema = z.enum(['user', 'assistant']);
export type ChatRole = z.infer<typeof ChatRoleSchema>;

export interface ChatTurn {
  role: ChatRole;
  content: string;
}

export interface ChatContext {
  summary: string;
  messages: ChatTurn[];
}

// ─── Actions ──────────────────────────────────────────────────

export const ActionSchema = z.object({
  type: z.string(),
  data: z.record(z.unknown()).default({}),
});
export type Action = z.infer<typeof ActionSchema>;

export const ToneTagSchema = z.enum(TONE_TAGS);
export type ToneTag = z.infer<typeof ToneTagSchema>;

export const TtsPreferenceSchema = z.enum(TTS_PREFERENCES);
export type TtsPreference = z.infer<typeof TtsPreferenceSchema>;

// ─── Promoted State ───────────────────────────────────────────

export const FishTuningSchema = z
  .object({
    timeoutSec: z.number().positive(),
    format: z.string(),
    normalize: z.boolean(),
    chunkLength: z.number().int().positive(),
    temperature: z.number(),
    topP: z.number(),
    repetitionPenalty: z.number(),
    maxNewTokens: z.number().int().positive(),
    refs: z.record(z.string().nullable()),
  })
  .partial()
  .passthrough();
export type FishTuning = z.infer<typeof FishTuningSchema>;

export const PromotedStateSchema = z
  .object({
    timezone: z.string().nullable(),
    location: z.string().nullable(),
    preferredUnits: z.string().nullable(),
    workingRules: z.string().nullable(),
    techStack: z.string().nullable(),
    ttsOverrides: z.record(z.string()),
    baseUrls: z.record(z.string().nullable()),
    fishTts: FishTuningSchema,
    whisperStt: z.record(z.unknown()),
    retrievalEnabled: z.boolean(),
  })
  .partial()
  .passthrough();
export type PromotedState = z.infer<typeof PromotedStateSchema>;

/** Patches share the document shape; every field is optional. */
export const PromotedStatePatchSchema = PromotedStateSchema;
export type PromotedStatePatch = PromotedState;

// ─── Retrieval ────────────────────────────────────────────────

export interface RetrievalHit {
  docId: string;
  title: string;
  content: string;
  tags: string;
  score: number;
  updatedAt: number | null;
}

export interface RetrievalStats {
  available: boolean;
  docs: number;
  totalChars: number;
}

// ─── Personas ─────────────────────────────────────────────────

export const BackendKindSchema = z.enum(['lmstudio', 'openai', 'gemini']);
export type BackendKind = z.infer<typeof BackendKindSchema>;

export const PersonaDefinitionSchema = z.object({
  name: z
    .string()
    .min(1)
    .regex(/^[a-z][a-z0-9_-]*$/, 'persona names are lowercase identifiers'),
  displayName: z.string().optional(),
  backend: BackendKindSchema,
  model: z.string().optional(),
  temperature: z.number().min(0).max(2).optional(),
  systemPrompt: z.string(),
  aliases: z.array(z.string()).default([]),
  extensions: z.record(z.unknown()).optional(),
});
export type PersonaDefinition = z.infer<typeof PersonaDefinitionSchema>;

// ─── Hub Configuration ────────────────────────────────────────

export const BackendEndpointSchema = z.object({
  baseUrl: z.string().optional(),
  apiKey: z.string().optional(),
  model: z.string(),
  timeoutMs: z.number().int().positive().default(60_000),
});
export type BackendEndpoint = z.infer<typeof BackendEndpointSchema>;

export const HubConfigSchema = z.object({
  port: z.number().int().positive().default(2424),
  host: z.string().default('0.0.0.0'),
  dataPath: z.string(),
  dbPath: z.string().optional(),
  corsOrigins: z.array(z.string()).default(['http://localhost:3000', 'http://127.0.0.1:3000']),
  defaultPersona: z.string().default('domino'),
  personas: z.array(PersonaDefinitionSchema).min(1),
  resolver: z
    .object({
      collectiveKeywords: z.array(z.string()).default(['collective']),
      greetings: z.array(z.string()).default(['hey', 'hi', 'hello', 'ok', 'okay', 'yo']),
    })
    .default({}),
  backends: z.object({
    lmstudio: BackendEndpointSchema,
    openai: BackendEndpointSchema,
    gemini: BackendEndpointSchema,
  }),
  history: z
    .object({
      lastN: z.number().int().nonnegative().default(16),
      maxChars: z.number().int().positive().default(6000),
      maxSummaryChars: z.number().int().positive().default(1800),
      dedupeWindowSeconds: z.number().nonnegative().default(300),
    })
    .default({}),
  sessions: z
    .object({
      maxAgeDays: z.number().positive().default(30),
      sweepCron: z.string().default('17 * * * *'),
    })
    .default({}),
  retrieval: z
    .object({
      maxDocChars: z.number().int().nonnegative().default(40_000),
      maxTotalChars: z.number().int().nonnegative().default(200_000),
      maxInjectChars: z.number().int().positive().default(8000),
      queryLimit: z.number().int().positive().default(3),
    })
    .default({}),
  audio: z
    .object({
      ttlSeconds: z.number().positive().default(600),
      maxItems: z.number().int().positive().default(50),
    })
    .default({}),
  stream: z
    .object({
      keepaliveSeconds: z.number().positive().default(15),
    })
    .default({}),
  broadcast: z
    .object({
      queueSize: z.number().int().positive().default(32),
    })
    .default({}),
  admin: z
    .object({
      enabled: z.boolean().default(false),
      token: z.string().default(''),
    })
    .default({}),
  autoPromoteDefault: z.boolean().default(false),
  homeAssistant: z
    .object({
      baseUrl: z.string().optional(),
      token: z.string().optional(),
      timeoutMs: z.number().int().positive().default(5000),
    })
    .default({}),
  tts: z
    .object({
      fish: z
        .object({
          enabled: z.boolean().default(false),
          baseUrl: z.string().default('http://fish-speech-server:8080'),
          timeoutMs: z.number().int().positive().default(120_000),
          format: z.string().default('wav'),
          normalize: z.boolean().default(true),
          refs: z.record(z.string()).default({}),
        })
        .default({}),
      elevenlabs: z
        .object({
          apiKey: z.string().optional(),
          modelId: z.string().default('eleven_multilingual_v2'),
          voices: z.record(z.string()).default({}),
          timeoutMs: z.number().int().positive().default(30_000),
        })
        .default({}),
    })
    .default({}),
});
export type HubConfig = z.infer<typeof HubConfigSchema>;
export type HubConfigInput = z.input<typeof HubConfigSchema>;
