/**
 * Pieces every feature module builds on: the server-managed columns, the
 * dependency bags the repository and store factories take, and the date
 * helpers used by the derived views.
 */

import { z } from 'zod';
import type { RepositoryCache } from '../cache';
import type { RetryPolicy } from '../network';
import type { TenantContext } from '../session';
import type { ActivityStore } from '../stores/activity';
import { now } from '../utils';

// =============================================================================
// Schemas
// =============================================================================

/** Columns every tenant-owned row carries. */
export const ownedRow = {
  id: z.string(),
  coupleId: z.string(),
  createdAt: z.string(),
  updatedAt: z.string().nullish()
};

/** Mask for `.omit()` on insert schemas: the server fills these in. */
export const SERVER_MANAGED = { id: true, coupleId: true, createdAt: true, updatedAt: true } as const;

/**
 * Server-managed fields of an entity that exists only locally. The tenant
 * column is left blank; the repository sets it on insert.
 */
export function provisionalFields(id: string) {
  const timestamp = now();
  return { id, coupleId: '', createdAt: timestamp, updatedAt: timestamp };
}

// =============================================================================
// Dependencies
// =============================================================================

export interface RepositoryDeps {
  tenant: TenantContext;
  cache?: RepositoryCache;
  cacheTtlMs?: number;
  retry?: RetryPolicy;
  requestTimeoutMs?: number;
  offlineFallbackMs?: number;
}

export interface StoreDeps {
  activity?: ActivityStore;
  freshnessMs?: number;
  clock?: () => number;
}

// =============================================================================
// Dates
// =============================================================================

/** Milliseconds since the epoch for an ISO date or date-time, or `null`. */
export function toTime(value: string | null | undefined): number | null {
  if (!value) return null;
  const time = Date.parse(value);
  return Number.isNaN(time) ? null : time;
}

/** `true` when `value` is a date strictly before `reference`. */
export function isBefore(value: string | null | undefined, reference: Date): boolean {
  const time = toTime(value);
  return time !== null && time < reference.getTime();
}

/** `true` when `value` falls in `[reference, reference + days)`. */
export function isWithinDays(value: string | null | undefined, reference: Date, days: number): boolean {
  const time = toTime(value);
  if (time === null) return false;
  const start = reference.getTime();
  return time >= start && time < start + days * 24 * 60 * 60 * 1000;
}

/** Sort by an ISO date field, oldest first; entries without a date go last. */
export function byDate<T>(pick: (item: T) => string | null | undefined): (a: T, b: T) => number {
  return (a, b) => {
    const ta = toTime(pick(a));
    const tb = toTime(pick(b));
    if (ta === null) return tb === null ? 0 : 1;
    if (tb === null) return -1;
    return ta - tb;
  };
}

/** Percentage rounded to one decimal; 0 when `total` is 0. */
export function percent(part: number, total: number): number {
  return total === 0 ? 0 : Math.round((part / total) * 1000) / 10;
}
