/**
 * @file packages/gateway/src/config.ts
 * @description Loads the hub configuration from .env, chorus.config.yaml and the environment.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve, join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { config as loadDotenv } from 'dotenv';
import {
  DEFAULT_PORTS,
  HubConfigSchema,
  isRecord,
  type HubConfig,
  type PersonaDefinition,
  type PromotedState,
} from '@chorus/shared';
export type { HubConfig };

const DEFAULT_DATA_DIR = join(
  process.env.HOME || process.env.USERPROFILE || '.',
  '.chorus',
  'data',
);

export const CONFIG_FILE_NAME = 'chorus.config.yaml';

let cachedConfig: HubConfig | null = null;

const PLAIN_TEXT_RULE =
  'Always answer in plain text only: no markdown, no bullet lists, no numbered lists, no headings, and no code fences. ' +
  'Do not show your reasoning or planning, and never include <think> blocks or other tags.';

export const DEFAULT_PERSONAS: PersonaDefinition[] = [
  {
    name: 'domino',
    displayName: 'Domino',
    backend: 'lmstudio',
    temperature: 0.6,
    aliases: [],
    systemPrompt:
      'You are Domino, a witty smart home and general-purpose assistant. Speak directly to the user, keep answers to 1-3 sentences unless asked for detail. ' +
      'When the user asks you to control the home, append a machine-readable block at the very end: ' +
      '<actions>[{"type":"ha_call_service","data":{"service":"light.turn_on","entity_id":"light.office"}}]</actions>. ' +
      'Never mention the actions block. ' +
      PLAIN_TEXT_RULE,
  },
  {
    name: 'penny',
    displayName: 'Penny',
    backend: 'openai',
    temperature: 0.5,
    aliases: ['penai'],
    systemPrompt:
      'You are Penny, a warm, clever assistant who helps with planning, design, coding and explanations. ' +
      PLAIN_TEXT_RULE,
  },
  {
    name: 'jimmy',
    displayName: 'Jimmy',
    backend: 'gemini',
    aliases: [],
    systemPrompt:
      'You are Jimmy, a calm and precise research butler who pushes back when something is unsafe or does not make sense. ' +
      PLAIN_TEXT_RULE,
  },
];

/**
 * Parses bool.
 * @param value - Value.
 * @returns The parse bool result.
 */
const parseBool = (value?: string): boolean | undefined => {
  if (value === undefined) return undefined;
  const normalized = value.toLowerCase().trim();
  if (['true', '1', 'yes', 'y', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'n', 'off'].includes(normalized)) return false;
  return undefined;
};

/**
 * Parses a numeric environment value.
 * @param value - Value.
 * @returns The number, or undefined when absent or not numeric.
 */
const parseNumber = (value?: string): number | undefined => {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
};

/**
 * Parses list.
 * @param value - Value.
 * @returns The parse list result.
 */
const parseList = (value?: string): string[] | undefined => {
  if (!value) return undefined;
  return value
    .split(',')
    .map((v) => v.trim())
    .filter(Boolean);
};

const section = (source: Record<string, unknown>, key: string): Record<string, unknown> => {
  const value = source[key];
  return isRecord(value) ? value : {};
};

const stripUndefined = (value: Record<string, unknown>): Record<string, unknown> =>
  Object.fromEntries(Object.entries(value).filter(([, v]) => v !== undefined));

/**
 * Builds the persona -> voice map from per-persona environment variables
 * such as ELEVENLABS_VOICE_PENNY or FISH_REF_DOMINO.
 */
const personaEnvMap = (prefix: string, personas: string[]): Record<string, string> => {
  const out: Record<string, string> = {};
  for (const name of personas) {
    const value = process.env[`${prefix}_${name.toUpperCase()}`];
    if (value) out[name] = value;
  }
  return out;
};

/**
 * Loads config.
 * @param projectRoot - Project root.
 * @returns The load config result.
 */
export function loadConfig(projectRoot?: string): HubConfig {
  if (cachedConfig) return cachedConfig;

  const root = projectRoot || process.cwd();

  // Load .env file
  const envPath = join(root, '.env');
  if (existsSync(envPath)) {
    loadDotenv({ path: envPath });
  }

  // Load chorus.config.yaml
  const configPath = join(root, CONFIG_FILE_NAME);
  let fileConfig: Record<string, unknown> = {};
  if (existsSync(configPath)) {
    const parsed: unknown = parseYaml(readFileSync(configPath, 'utf-8'));
    fileConfig = isRecord(parsed) ? parsed : {};
  }

  cachedConfig = buildConfig(root, fileConfig);
  return cachedConfig;
}

/**
 * Merges file config with environment overrides and validates the result.
 * @param root - Directory relative paths are resolved against.
 * @param fileConfig - Parsed YAML document.
 */
export function buildConfig(root: string, fileConfig: Record<string, unknown>): HubConfig {
  const env = process.env;
  const personas = Array.isArray(fileConfig.personas) ? fileConfig.personas : DEFAULT_PERSONAS;
  const personaNames = personas
    .map((p) => (isRecord(p) && typeof p.name === 'string' ? p.name : ''))
    .filter(Boolean);

  const fileBackends = section(fileConfig, 'backends');
  const fileAdmin = section(fileConfig, 'admin');
  const fileHa = section(fileConfig, 'homeAssistant');
  const fileTts = section(fileConfig, 'tts');
  const fileFish = section(fileTts, 'fish');
  const fileEleven = section(fileTts, 'elevenlabs');
  const fileSessions = section(fileConfig, 'sessions');
  const fileRetrieval = section(fileConfig, 'retrieval');
  const fileAudio = section(fileConfig, 'audio');
  const fileHistory = section(fileConfig, 'history');

  const dataPath = resolve(
    root,
    (typeof fileConfig.dataPath === 'string' && fileConfig.dataPath) ||
      env.CHORUS_DATA_DIR ||
      DEFAULT_DATA_DIR,
  );

  const merged = {
    ...fileConfig,
    port: parseNumber(env.CHORUS_PORT) ?? fileConfig.port,
    host: env.CHORUS_HOST || fileConfig.host,
    dataPath,
    dbPath: env.MEMORY_DB_PATH || fileConfig.dbPath,
    corsOrigins: parseList(env.CHORUS_CORS_ORIGINS) ?? fileConfig.corsOrigins,
    defaultPersona: env.CHORUS_DEFAULT_PERSONA || fileConfig.defaultPersona,
    personas,
    backends: {
      lmstudio: {
        model: 'mistral-nemo-base-2407',
        ...section(fileBackends, 'lmstudio'),
        ...stripUndefined({
          baseUrl:
            env.LMSTUDIO_BASE_URL ||
            section(fileBackends, 'lmstudio').baseUrl ||
            `http://127.0.0.1:${DEFAULT_PORTS.lmstudio}/v1`,
          apiKey: env.LMSTUDIO_API_KEY || section(fileBackends, 'lmstudio').apiKey || 'lm-studio',
          model: env.LMSTUDIO_MODEL,
        }),
      },
      openai: {
        model: 'gpt-4.1-mini',
        ...section(fileBackends, 'openai'),
        ...stripUndefined({ apiKey: env.OPENAI_API_KEY, model: env.OPENAI_MODEL }),
      },
      gemini: {
        model: 'gemini-2.0-flash',
        baseUrl: 'https://generativelanguage.googleapis.com/v1beta/openai/',
        ...section(fileBackends, 'gemini'),
        ...stripUndefined({ apiKey: env.GEMINI_API_KEY, model: env.GEMINI_MODEL }),
      },
    },
    history: {
      ...fileHistory,
      ...stripUndefined({
        lastN: parseNumber(env.CHAT_HISTORY_LAST_N),
        maxChars: parseNumber(env.CHAT_HISTORY_MAX_CHARS),
      }),
    },
    sessions: {
      ...fileSessions,
      ...stripUndefined({ maxAgeDays: parseNumber(env.SESSION_MAX_AGE_DAYS) }),
    },
    retrieval: {
      ...fileRetrieval,
      ...stripUndefined({
        maxDocChars: parseNumber(env.RETRIEVAL_MAX_DOC_CHARS),
        maxTotalChars: parseNumber(env.RETRIEVAL_MAX_TOTAL_CHARS),
        maxInjectChars: parseNumber(env.RETRIEVAL_MAX_INJECT_CHARS),
      }),
    },
    audio: {
      ...fileAudio,
      ...stripUndefined({
        ttlSeconds: parseNumber(env.AUDIO_TTL_SECONDS),
        maxItems: parseNumber(env.AUDIO_MAX_ITEMS),
      }),
    },
    admin: {
      ...fileAdmin,
      ...stripUndefined({
        enabled: parseBool(env.MEMORY_ADMIN_ENABLED),
        token: env.MEMORY_ADMIN_TOKEN,
      }),
    },
    autoPromoteDefault:
      parseBool(env.AUTO_PROMOTE_STATE_DEFAULT) ?? fileConfig.autoPromoteDefault,
    homeAssistant: {
      ...fileHa,
      ...stripUndefined({
        baseUrl: env.HA_BASE_URL,
        token: env.HA_TOKEN,
        timeoutMs: parseNumber(env.HA_TIMEOUT_MS),
      }),
    },
    tts: {
      ...fileTts,
      fish: {
        refs: personaEnvMap('FISH_REF', personaNames),
        ...fileFish,
        ...stripUndefined({
          enabled: parseBool(env.FISH_TTS_ENABLED),
          baseUrl: env.FISH_TTS_BASE_URL,
          timeoutMs: parseNumber(env.FISH_TTS_TIMEOUT_MS),
          format: env.FISH_TTS_FORMAT?.toLowerCase(),
          normalize: parseBool(env.FISH_TTS_NORMALIZE),
        }),
      },
      elevenlabs: {
        voices: personaEnvMap('ELEVENLABS_VOICE', personaNames),
        ...fileEleven,
        ...stripUndefined({
          apiKey: env.ELEVENLABS_API_KEY,
          modelId: env.ELEVENLABS_MODEL_ID,
        }),
      },
    },
  };

  return HubConfigSchema.parse(stripUndefined(merged));
}

/**
 * Drops the cached configuration so the next loadConfig() re-reads it.
 */
export function resetConfigCache(): void {
  cachedConfig = null;
}

/**
 * Builds the promoted-state document seeded into an empty store.
 * Environment values win over configuration so a fresh deployment can be
 * pre-filled without touching the database.
 */
export function defaultPromotedState(config: HubConfig, env = process.env): PromotedState {
  const perPersona = <T>(value: (name: string) => T): Record<string, T> =>
    Object.fromEntries(config.personas.map((p) => [p.name, value(p.name)]));

  return {
    timezone: env.TIMEZONE || env.TZ || null,
    location: env.LOCATION || null,
    preferredUnits: env.PREFERRED_UNITS || null,
    workingRules: env.WORKING_RULES || null,
    techStack: env.TECH_STACK || null,
    ttsOverrides: perPersona((name) => env[`TTS_${name.toUpperCase()}`] || 'auto'),
    baseUrls: {
      ha: config.homeAssistant.baseUrl ?? null,
      lmstudio: config.backends.lmstudio.baseUrl ?? null,
      fish: config.tts.fish.baseUrl,
    },
    fishTts: {
      timeoutSec: config.tts.fish.timeoutMs / 1000,
      format: config.tts.fish.format,
      normalize: config.tts.fish.normalize,
      chunkLength: 200,
      temperature: 0.8,
      topP: 0.8,
      repetitionPenalty: 1.1,
      maxNewTokens: 1024,
      refs: perPersona((name) => config.tts.fish.refs[name] ?? null),
    },
    whisperStt: { timeoutSec: 60 },
    retrievalEnabled: false,
  };
}
