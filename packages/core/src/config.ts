import dotenv from 'dotenv';
import { z } from 'zod';
import { DEFAULT_FUZZY_THRESHOLD } from './domain/services/similarity.js';

/** A configuration variable is missing or malformed. */
export class ConfigurationError extends Error {
  constructor(readonly variables: readonly string[], message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export type Env = Readonly<Record<string, string | undefined>>;

/** Load a `.env` file into `process.env`. Variables already set win. */
export function loadDotenv(path?: string): void {
  dotenv.config(path ? { path } : {});
}

/**
 * Validate environment variables against a zod object schema.
 * Empty strings count as unset so defaults apply.
 */
export function parseEnv<T extends z.ZodRawShape>(shape: T, env: Env) {
  const input: Record<string, string> = {};
  for (const key of Object.keys(shape)) {
    const value = env[key];
    if (value !== undefined && value !== '') input[key] = value;
  }

  const result = z.object(shape).safeParse(input);
  if (!result.success) {
    const variables = [...new Set(result.error.issues.map((issue) => String(issue.path[0] ?? '?')))];
    const details = result.error.issues.map((issue) => `${String(issue.path[0] ?? '?')}: ${issue.message}`).join('; ');
    throw new ConfigurationError(variables, `Invalid configuration: ${details}`);
  }
  return result.data;
}

const coreEnvShape = {
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  NODE_ENV: z.string().default('development'),
  FUZZY_MATCH_THRESHOLD: z.coerce.number().min(0).max(1).default(DEFAULT_FUZZY_THRESHOLD),
  MAX_CONCURRENT_BATCHES: z.coerce.number().int().min(1).default(2),
  AI_MAX_RETRIES: z.coerce.number().int().min(1).default(3),
  AI_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  ISSUE_FLUSH_SIZE: z.coerce.number().int().min(1).default(100),
  BATCH_RETENTION_DAYS: z.coerce.number().int().min(1).default(90),
};

/** Tunables of the ingestion engine. */
export interface IngestionSettings {
  readonly logLevel: string;
  /** Logging is off under `NODE_ENV=test`. */
  readonly logSilent: boolean;
  readonly fuzzyThreshold: number;
  readonly maxConcurrentBatches: number;
  /** Attempts for the AI call, the first one included. */
  readonly aiMaxRetries: number;
  readonly aiRetryDelayMs: number;
  /** Rows per processing chunk: quality issues are flushed and progress is reported per chunk. */
  readonly chunkSize: number;
  readonly retentionDays: number;
}

export const DEFAULT_SETTINGS: IngestionSettings = {
  logLevel: 'info',
  logSilent: false,
  fuzzyThreshold: DEFAULT_FUZZY_THRESHOLD,
  maxConcurrentBatches: 2,
  aiMaxRetries: 3,
  aiRetryDelayMs: 1000,
  chunkSize: 100,
  retentionDays: 90,
};

export function loadSettings(env: Env = process.env): IngestionSettings {
  const parsed = parseEnv(coreEnvShape, env);
  return {
    logLevel: parsed.LOG_LEVEL,
    logSilent: parsed.NODE_ENV === 'test',
    fuzzyThreshold: parsed.FUZZY_MATCH_THRESHOLD,
    maxConcurrentBatches: parsed.MAX_CONCURRENT_BATCHES,
    aiMaxRetries: parsed.AI_MAX_RETRIES,
    aiRetryDelayMs: parsed.AI_RETRY_DELAY_MS,
    chunkSize: parsed.ISSUE_FLUSH_SIZE,
    retentionDays: parsed.BATCH_RETENTION_DAYS,
  };
}
