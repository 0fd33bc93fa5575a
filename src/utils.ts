/**
 * @fileoverview Common Utility Functions
 *
 * Small, pure helpers used by the repositories and stores: id and
 * timestamp generation, and the `snake_case` ⇄ `camelCase` mapping between
 * Supabase rows and entities.
 */

import { randomUUID } from 'node:crypto';

/**
 * Generate a UUID v4.
 */
export function generateId(): string {
  return randomUUID();
}

/**
 * Get the current timestamp as an ISO string.
 */
export function now(): string {
  return new Date().toISOString();
}

/**
 * Convert a `snake_case` identifier to `camelCase`.
 *
 * @example
 * snakeToCamel('rsvp_status'); // → 'rsvpStatus'
 * snakeToCamel('id');          // → 'id'
 */
export function snakeToCamel(s: string): string {
  return s.replace(/_([a-z0-9])/g, (_, c: string) => c.toUpperCase());
}

/**
 * Convert a `camelCase` identifier to `snake_case`.
 *
 * @example
 * camelToSnake('plusOneAllowed'); // → 'plus_one_allowed'
 */
export function camelToSnake(s: string): string {
  return s.replace(/[A-Z]/g, (c) => `_${c.toLowerCase()}`);
}

/**
 * Rename the top-level keys of a database row to camelCase.
 *
 * Nested values (JSON columns, arrays) are kept as they are.
 */
export function rowToRecord(row: object): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(row)) {
    out[snakeToCamel(key)] = value;
  }
  return out;
}

/**
 * Rename the top-level keys of an entity to snake_case column names,
 * dropping `undefined` values so PostgREST leaves those columns alone.
 */
export function recordToRow(record: object): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    if (value === undefined) continue;
    out[camelToSnake(key)] = value;
  }
  return out;
}

/**
 * Rename object keys to camelCase at every depth. Used for JSON columns
 * whose documents are stored with snake_case keys.
 */
export function camelizeKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(camelizeKeys);
  if (!isRecord(value)) return value;
  return Object.fromEntries(Object.entries(value).map(([key, inner]) => [snakeToCamel(key), camelizeKeys(inner)]));
}

/** Inverse of {@link camelizeKeys}. */
export function snakeizeKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(snakeizeKeys);
  if (!isRecord(value)) return value;
  return Object.fromEntries(Object.entries(value).map(([key, inner]) => [camelToSnake(key), snakeizeKeys(inner)]));
}

/**
 * Type guard for plain objects (rows, error payloads).
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Format a millisecond duration for log lines.
 *
 * @example
 * formatDuration(84);   // → '84ms'
 * formatDuration(1530); // → '1.53s'
 */
export function formatDuration(ms: number): string {
  return ms < 1000 ? `${Math.round(ms)}ms` : `${(ms / 1000).toFixed(2)}s`;
}

/**
 * Resolve after `ms` milliseconds.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
