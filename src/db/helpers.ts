/**
 * Database Helpers
 *
 * Utilities for ID generation, JSON columns, timestamps.
 */

import { uuidv7 } from 'uuidv7';
import { z } from 'zod';

/**
 * Generate a time-sortable unique ID (UUIDv7)
 */
export function generateId(): string {
  return uuidv7();
}

/**
 * Get current ISO8601 timestamp for SQLite
 */
export function nowISO(): string {
  return new Date().toISOString();
}

/**
 * Parse a JSON column holding an object, validating the values with `schema`.
 * Corrupt columns read as empty rather than failing the whole row.
 */
export function parseJsonRecord<T>(
  value: string | null,
  schema: z.ZodType<T>
): Record<string, T> {
  if (!value) return {};
  try {
    const parsed = z.record(z.string(), schema).safeParse(JSON.parse(value));
    return parsed.success ? parsed.data : {};
  } catch {
    return {};
  }
}

export function parseJsonObject(value: string | null): Record<string, unknown> {
  return parseJsonRecord(value, z.unknown());
}

export function parseJsonArray<T>(
  value: string | null,
  schema: z.ZodType<T>
): T[] {
  if (!value) return [];
  try {
    const parsed = z.array(schema).safeParse(JSON.parse(value));
    return parsed.success ? parsed.data : [];
  } catch {
    return [];
  }
}
