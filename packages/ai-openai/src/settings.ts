import { z } from 'zod';
import { parseEnv } from '@tabingest/core';
import type { Env } from '@tabingest/core';

export const DEFAULT_MODEL = 'gpt-4.1-nano';

export interface OpenAISettings {
  readonly apiKey: string;
  readonly model: string;
  readonly timeoutMs: number;
}

const openAIEnvShape = {
  OPENAI_API_KEY: z.string(),
  OPENAI_MODEL: z.string().default(DEFAULT_MODEL),
  OPENAI_TIMEOUT_MS: z.coerce.number().int().min(1).default(30000),
};

export function loadOpenAISettings(env: Env = process.env): OpenAISettings {
  const parsed = parseEnv(openAIEnvShape, env);
  return { apiKey: parsed.OPENAI_API_KEY, model: parsed.OPENAI_MODEL, timeoutMs: parsed.OPENAI_TIMEOUT_MS };
}
