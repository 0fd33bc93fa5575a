/**
 * @fileoverview Remote Table Gateway
 *
 * The narrow contract a repository needs from the backend for one table,
 * and its Supabase (PostgREST) implementation.
 *
 * Every call is tenant-scoped except `insert`, whose row carries the tenant
 * column itself. Writes use `.select()` so the server's canonical row comes
 * back; RLS can silently block a write, and an empty selection is how that
 * shows up (reported as `null` / `0`).
 *
 * Errors are thrown as {@link NetworkError}s built from the PostgREST error
 * object plus the HTTP status.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { classifyError, type NetworkError } from '../errors';
import { isRecord } from '../utils';

// =============================================================================
// Contract
// =============================================================================

/** A raw database row (snake_case columns). */
export type Row = Record<string, unknown>;

export interface RemoteTable {
  /** Table name, used in cache keys and log lines. */
  readonly name: string;
  /** Column holding the tenant id. */
  readonly tenantColumn: string;
  selectAll(tenantId: string): Promise<Row[]>;
  /** `null` when no row with that id exists for the tenant. */
  selectOne(tenantId: string, id: string): Promise<Row | null>;
  insert(row: Row): Promise<Row>;
  /** `null` when no row with that id exists for the tenant. */
  update(tenantId: string, id: string, changes: Row): Promise<Row | null>;
  /** Number of rows removed (0 or 1). */
  delete(tenantId: string, id: string): Promise<number>;
}

// =============================================================================
// Supabase Implementation
// =============================================================================

export interface SupabaseTableOptions {
  table: string;
  /** Default: `'couple_id'`. */
  tenantColumn?: string;
  /** Column list for SELECTs. Default: `'*'`. */
  columns?: string;
  /** Server-side ordering for `selectAll`. Default: none. */
  orderBy?: { column: string; ascending?: boolean };
}

interface PostgrestFailure {
  message: string;
  details?: string | null;
  hint?: string | null;
  code?: string | null;
}

function failure(error: PostgrestFailure, status: number): NetworkError {
  return classifyError({
    message: error.message,
    details: error.details ?? undefined,
    hint: error.hint ?? undefined,
    code: error.code || undefined,
    status: status > 0 ? status : undefined
  });
}

function toRows(data: unknown): Row[] {
  return Array.isArray(data) ? data.filter(isRecord) : [];
}

function toRow(data: unknown): Row | null {
  return isRecord(data) ? data : null;
}

/**
 * Bind a {@link RemoteTable} to a Supabase table.
 *
 * @example
 * const guests = createSupabaseTable(getSupabase(), { table: 'guest_list' });
 * const rows = await guests.selectAll(coupleId);
 */
export function createSupabaseTable(client: SupabaseClient, options: SupabaseTableOptions): RemoteTable {
  const { table, tenantColumn = 'couple_id', columns = '*', orderBy } = options;

  return {
    name: table,
    tenantColumn,

    async selectAll(tenantId) {
      let query = client.from(table).select(columns).eq(tenantColumn, tenantId);
      if (orderBy) {
        query = query.order(orderBy.column, { ascending: orderBy.ascending ?? true });
      }
      const { data, error, status } = await query;
      if (error) throw failure(error, status);
      return toRows(data);
    },

    async selectOne(tenantId, id) {
      const { data, error, status } = await client
        .from(table)
        .select(columns)
        .eq(tenantColumn, tenantId)
        .eq('id', id)
        .maybeSingle();
      if (error) throw failure(error, status);
      return toRow(data);
    },

    async insert(row) {
      const { data, error, status } = await client.from(table).insert(row).select(columns).single();
      if (error) throw failure(error, status);
      const created = toRow(data);
      if (!created) {
        throw classifyError({ message: `Insert into ${table} returned no row`, code: 'PGRST116' });
      }
      return created;
    },

    async update(tenantId, id, changes) {
      const { data, error, status } = await client
        .from(table)
        .update(changes)
        .eq('id', id)
        .eq(tenantColumn, tenantId)
        .select(columns)
        .maybeSingle();
      if (error) throw failure(error, status);
      return toRow(data);
    },

    async delete(tenantId, id) {
      const { data, error, status } = await client
        .from(table)
        .delete()
        .eq('id', id)
        .eq(tenantColumn, tenantId)
        .select('id');
      if (error) throw failure(error, status);
      return toRows(data).length;
    }
  };
}
