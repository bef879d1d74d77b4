import { z } from 'zod';
import { parseEnv } from '@tabingest/core';
import type { Env } from '@tabingest/core';

export interface MongoSettings {
  readonly url: string;
  readonly database: string;
}

const mongoEnvShape = {
  MONGO_URL: z.string().regex(/^mongodb(\+srv)?:\/\//, 'must be a mongodb:// or mongodb+srv:// connection string'),
  MONGO_DATABASE: z.string().default('imports'),
};

/** Read `MONGO_URL` and `MONGO_DATABASE` (default `imports`). */
export function loadMongoSettings(env: Env = process.env): MongoSettings {
  const parsed = parseEnv(mongoEnvShape, env);
  return { url: parsed.MONGO_URL, database: parsed.MONGO_DATABASE };
}
