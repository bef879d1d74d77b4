import type { z } from 'zod';

/**
 * Parse a value that may be a JSON string or already a parsed object.
 *
 * MySQL/MariaDB with certain driver versions return JSON columns as strings
 * instead of parsed objects.
 */
export function parseJson(value: unknown): unknown {
  if (typeof value === 'string') {
    return JSON.parse(value) as unknown;
  }
  return value;
}

/** Read a JSON column and validate its shape. */
export function jsonColumn<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  return schema.parse(parseJson(value));
}
