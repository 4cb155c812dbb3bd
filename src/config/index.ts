/**
 * Central configuration. All env vars are read here so the rest of the app
 * stays env-agnostic and testable.
 */
import dotenv from 'dotenv';

dotenv.config();

function readNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

export const config = {
  env: process.env.NODE_ENV || 'development',
  port: readNumber('PORT', 8000),
  logLevel: process.env.LOG_LEVEL || 'info',

  genai: {
    /** Provider credential; empty string means GenAI is disabled. */
    apiKey: process.env.OPENAI_API_KEY || '',
    model: process.env.OPENAI_MODEL || 'gpt-4',
    temperature: readNumber('OPENAI_TEMPERATURE', 0.7),
    maxTokens: Math.trunc(readNumber('GENAI_MAX_TOKENS', 2000)),
    /** Deadline for a single provider call. Calls are never retried. */
    timeoutMs: readNumber('GENAI_TIMEOUT_MS', 30000),
    /** OpenAI-compatible endpoint (e.g. https://openrouter.ai/api/v1). Unset uses the SDK default. */
    baseUrl: process.env.OPENAI_BASE_URL || undefined,
  },
} as const;

export type GenAIConfig = typeof config.genai;
