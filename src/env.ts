// src/env.ts
import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

// ───────────────────────── helpers ─────────────────────────

const emptyToUndefined = (value: unknown): unknown => {
  if (typeof value === 'string' && value.trim() === '') return undefined;
  return value;
};

const numberFromEnv = (value: unknown): unknown => {
  // prevent z.coerce.number from treating booleans as 1/0
  if (typeof value === 'boolean') return NaN;

  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') return undefined;

    const normalized = trimmed.toLowerCase();
    if (normalized === 'true' || normalized === 'false') return NaN;

    return trimmed;
  }

  return value;
};

const lowerCaseFromEnv = (value: unknown): unknown => {
  const normalized = emptyToUndefined(value);
  return typeof normalized === 'string' ? normalized.trim().toLowerCase() : normalized;
};

// ───────────────────────── schema ─────────────────────────

export const EnvSchema = z.object({
  /* ───────────────────────── Core ───────────────────────── */
  PORT: z.preprocess(numberFromEnv, z.coerce.number().int().positive().default(5000)),
  NODE_ENV: z.preprocess(emptyToUndefined, z.string().default('development')),
  LOG_LEVEL: z.preprocess(
    lowerCaseFromEnv,
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  ),

  /* ───────────────────────── TTS ───────────────────────── */
  /** Directory holding synthesized and mock WAV files, keyed by text fingerprint. */
  VOICES_DIR: z.preprocess(emptyToUndefined, z.string().min(1).default('voices')),
  /** voicevox tries the live backend first; mock and disabled go straight to the mock tone. */
  TTS_BACKEND: z.preprocess(lowerCaseFromEnv, z.enum(['voicevox', 'mock', 'disabled']).default('voicevox')),
  TTS_MIN_AUDIO_BYTES: z.preprocess(numberFromEnv, z.coerce.number().int().positive().default(20_480)),
  VOICEVOX_ENDPOINT: z.preprocess(emptyToUndefined, z.string().url().default('http://127.0.0.1:50021')),
  VOICEVOX_SPEAKER: z.preprocess(numberFromEnv, z.coerce.number().int().nonnegative().default(1)),
  VOICEVOX_PROBE_TIMEOUT_MS: z.preprocess(numberFromEnv, z.coerce.number().int().positive().default(3_000)),
  VOICEVOX_QUERY_TIMEOUT_MS: z.preprocess(numberFromEnv, z.coerce.number().int().positive().default(10_000)),
  VOICEVOX_SYNTHESIS_TIMEOUT_MS: z.preprocess(numberFromEnv, z.coerce.number().int().positive().default(30_000)),

  /* ───────────────────────── Chat / LLM ───────────────────────── */
  OLLAMA_ENDPOINT: z.preprocess(emptyToUndefined, z.string().url().default('http://127.0.0.1:11434')),
  OLLAMA_MODEL: z.preprocess(emptyToUndefined, z.string().min(1).default('qwen3:8b')),
  CHAT_TIMEOUT_MS: z.preprocess(numberFromEnv, z.coerce.number().int().positive().default(30_000)),
  /** Canned line sent through the reply pipeline when the character's head is patted. */
  PAT_TEXT: z.preprocess(emptyToUndefined, z.string().min(1).default('頭をなでる')),
});

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  // Back-compat: API_PORT → PORT
  const withPort = source.PORT?.trim() ? source : { ...source, PORT: source.API_PORT };
  const parsed = EnvSchema.safeParse(withPort);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ');
    throw new Error(`Invalid environment variables: ${issues}`);
  }
  return parsed.data;
}

export const env = parseEnv(process.env);
