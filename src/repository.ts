/**
 * @fileoverview Repositories: Tenant-Scoped Remote Access with Caching
 *
 * A repository is the only gateway to the backend for one entity family.
 * {@link TableRepository} implements the {@link Repository} contract once,
 * driven by an {@link EntityDefinition} (feature label, table, zod schemas),
 * so the features do not repeat the fetch/cache/invalidate boilerplate.
 *
 * Every call:
 *   1. Reads the tenant from the injected {@link TenantContext}: a missing
 *      tenant fails closed with `unauthorized` before touching the network.
 *   2. Runs the remote call through {@link withRetry} (transient errors only)
 *      with a per-attempt timeout.
 *   3. Maps rows between `snake_case` columns and camelCase entities and
 *      validates them with the entity schema.
 *
 * Caching:
 *   - `fetchAll()` is served from the {@link RepositoryCache} while the
 *     tenant's entry is within TTL.
 *   - Every successful mutation removes all of the tenant's keys for this
 *     table (collection and derived values such as stats) before returning,
 *     so the next read goes to the server.
 *   - With `offlineFallbackMs > 0`, the last good collection is kept under a
 *     separate key and served when a fetch fails with a transport error.
 *
 * @see {@link cache.ts} for the cache
 * @see {@link network.ts} for retry and timeout
 * @see {@link stores/entityStore.ts} for the optimistic layer on top
 */

import type { z } from 'zod';
import { RepositoryCache } from './cache';
import { getPlannerConfig } from './config';
import { debugLog, debugWarn, debugError } from './debug';
import { classifyError, PlannerError, toPlannerError, type PlannerErrorKind } from './errors';
import { withRetry, type RetryPolicy } from './network';
import { requireTenantId, type TenantContext } from './session';
import type { RemoteTable, Row } from './supabase/table';
import { camelizeKeys, formatDuration, now, recordToRow, rowToRecord, snakeizeKeys, snakeToCamel } from './utils';

// =============================================================================
// Contract
// =============================================================================

/** Any record with a stable identifier. */
export interface Entity {
  id: string;
}

/**
 * The repository contract stores depend on. Production code uses
 * {@link TableRepository}; tests use `FakeRepository` from `trousseau/testing`.
 *
 * @typeParam T - The entity type.
 * @typeParam I - The insert payload type.
 */
export interface Repository<T extends Entity, I> {
  /** Label used in errors and log lines, e.g. `'guest'`. */
  readonly feature: string;
  fetchAll(): Promise<T[]>;
  fetchById(id: string): Promise<T>;
  create(insert: I): Promise<T>;
  update(entity: T): Promise<T>;
  /** Deleting an id that no longer exists succeeds. */
  delete(id: string): Promise<void>;
  invalidateCache(): void;
}

/**
 * Static description of an entity family.
 */
export interface EntityDefinition<T extends Entity, I> {
  feature: string;
  /** Supabase table name. */
  table: string;
  /** Column holding the tenant id. Default: `'couple_id'`. */
  tenantColumn?: string;
  /** Validates a camelCased row. */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Validates a caller-supplied insert payload. */
  insertSchema: z.ZodType<I, z.ZodTypeDef, unknown>;
  /** Server-side ordering of `fetchAll()`. */
  orderBy?: { column: string; ascending?: boolean };
  /** JSON columns whose nested keys are stored in snake_case. */
  jsonColumns?: readonly string[];
}

export interface TableRepositoryOptions<T extends Entity, I> {
  definition: EntityDefinition<T, I>;
  table: RemoteTable;
  tenant: TenantContext;
  /** Shared cache. Default: a private cache. */
  cache?: RepositoryCache;
  cacheTtlMs?: number;
  retry?: RetryPolicy;
  requestTimeoutMs?: number;
  offlineFallbackMs?: number;
}

/** Columns a client never writes on update. */
const SERVER_MANAGED_COLUMNS = ['id', 'created_at'];

// =============================================================================
// Implementation
// =============================================================================

export class TableRepository<T extends Entity, I extends object> implements Repository<T, I> {
  readonly feature: string;
  protected readonly table: RemoteTable;
  protected readonly tenant: TenantContext;
  protected readonly cache: RepositoryCache;
  private readonly definition: EntityDefinition<T, I>;
  private readonly cacheTtlMs: number;
  private readonly retry: RetryPolicy;
  private readonly requestTimeoutMs: number;
  private readonly offlineFallbackMs: number;

  constructor(options: TableRepositoryOptions<T, I>) {
    const defaults = getPlannerConfig();
    this.definition = options.definition;
    this.feature = options.definition.feature;
    this.table = options.table;
    this.tenant = options.tenant;
    this.cache = options.cache ?? new RepositoryCache();
    this.cacheTtlMs = options.cacheTtlMs ?? defaults.cacheTtlMs;
    this.retry = options.retry ?? defaults.retry;
    this.requestTimeoutMs = options.requestTimeoutMs ?? defaults.requestTimeoutMs;
    this.offlineFallbackMs = options.offlineFallbackMs ?? defaults.offlineFallbackMs;
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  async fetchAll(): Promise<T[]> {
    const tenantId = this.requireTenant();
    const key = this.cacheKey(tenantId, 'all');

    const cached = this.cache.get<T[]>(key);
    if (cached) {
      debugLog(`[Repository] Cache hit: ${this.table.name} (${cached.length} items)`);
      return cached;
    }

    debugLog(`[Repository] Cache miss: fetching ${this.table.name}`);
    const startTime = Date.now();
    const generation = this.cache.generation(this.tenantPrefix(tenantId));

    let rows: Row[];
    try {
      rows = await this.remote('select', () => this.table.selectAll(tenantId));
    } catch (e) {
      const fallback = this.offlineFallback(tenantId, e);
      if (fallback) return fallback;
      debugError(`[Repository] Failed to fetch ${this.table.name} after ${formatDuration(Date.now() - startTime)}`, e);
      throw toPlannerError('fetchFailed', this.feature, e);
    }

    const items = rows.map((row) => this.decode(row, 'fetchFailed'));
    if (this.cache.generation(this.tenantPrefix(tenantId)) !== generation) {
      debugLog(`[Repository] ${this.table.name} changed during the fetch; not caching the result`);
      return items;
    }
    this.cache.set(key, items, this.cacheTtlMs);
    if (this.offlineFallbackMs > 0) {
      this.cache.set(this.offlineKey(tenantId), items, this.offlineFallbackMs);
    }

    debugLog(`[Repository] Fetched ${items.length} ${this.table.name} rows in ${formatDuration(Date.now() - startTime)}`);
    return items;
  }

  async fetchById(id: string): Promise<T> {
    const tenantId = this.requireTenant();

    const cached = this.cache.get<T[]>(this.cacheKey(tenantId, 'all'));
    if (cached) {
      const hit = cached.find((item) => item.id === id);
      if (hit) return hit;
    }

    let row: Row | null;
    try {
      row = await this.remote('selectOne', () => this.table.selectOne(tenantId, id));
    } catch (e) {
      throw toPlannerError('fetchFailed', this.feature, e);
    }
    if (!row) {
      throw new PlannerError('notFound', this.feature, new Error(`${this.table.name} ${id} not found`));
    }
    return this.decode(row, 'fetchFailed');
  }

  /**
   * Compute a value from the collection and cache it next to it.
   *
   * The value lives under the tenant's prefix, so any mutation invalidates
   * it together with the collection.
   *
   * @example
   * const stats = await repository.fetchDerived('stats', computeGuestStats);
   */
  async fetchDerived<V>(name: string, compute: (items: T[]) => V): Promise<V> {
    const tenantId = this.requireTenant();
    const key = this.cacheKey(tenantId, name);

    const cached = this.cache.get<V>(key);
    if (cached !== undefined) return cached;

    const generation = this.cache.generation(this.tenantPrefix(tenantId));
    const value = compute(await this.fetchAll());
    if (this.cache.generation(this.tenantPrefix(tenantId)) === generation) {
      this.cache.set(key, value, this.cacheTtlMs);
    }
    return value;
  }

  // ---------------------------------------------------------------------------
  // Writes
  // ---------------------------------------------------------------------------

  async create(insert: I): Promise<T> {
    const tenantId = this.requireTenant();

    const parsed = this.definition.insertSchema.safeParse(insert);
    if (!parsed.success) {
      throw new PlannerError('validationFailed', this.feature, parsed.error);
    }

    const row = { ...this.encode(parsed.data), [this.table.tenantColumn]: tenantId };
    const startTime = Date.now();

    let created: Row;
    try {
      created = await this.remote('insert', () => this.table.insert(row));
    } catch (e) {
      debugError(`[Repository] Failed to create ${this.feature}`, e);
      throw toPlannerError('createFailed', this.feature, e);
    }

    this.invalidateTenant(tenantId);
    debugLog(`[Repository] Created ${this.feature} in ${formatDuration(Date.now() - startTime)}`);
    return this.decode(created, 'createFailed');
  }

  async update(entity: T): Promise<T> {
    const tenantId = this.requireTenant();

    const checked = this.definition.schema.safeParse(entity);
    if (!checked.success) {
      throw new PlannerError('validationFailed', this.feature, checked.error);
    }

    const changes = this.encode(checked.data);
    for (const column of [...SERVER_MANAGED_COLUMNS, this.table.tenantColumn]) {
      delete changes[column];
    }
    changes.updated_at = now();
    const startTime = Date.now();

    let updated: Row | null;
    try {
      updated = await this.remote('update', () => this.table.update(tenantId, entity.id, changes));
    } catch (e) {
      debugError(`[Repository] Failed to update ${this.feature} ${entity.id}`, e);
      throw toPlannerError('updateFailed', this.feature, e);
    }
    if (!updated) {
      throw new PlannerError('notFound', this.feature, new Error(`${this.table.name} ${entity.id} not found`));
    }

    this.invalidateTenant(tenantId);
    debugLog(`[Repository] Updated ${this.feature} in ${formatDuration(Date.now() - startTime)}`);
    return this.decode(updated, 'updateFailed');
  }

  async delete(id: string): Promise<void> {
    const tenantId = this.requireTenant();
    const startTime = Date.now();

    let removed: number;
    try {
      removed = await this.remote('delete', () => this.table.delete(tenantId, id));
    } catch (e) {
      debugError(`[Repository] Failed to delete ${this.feature} ${id}`, e);
      throw toPlannerError('deleteFailed', this.feature, e);
    }

    this.invalidateTenant(tenantId);
    if (removed === 0) {
      debugWarn(`[Repository] Delete of ${this.table.name} ${id} matched no row; treating as already deleted`);
      return;
    }
    debugLog(`[Repository] Deleted ${this.feature} in ${formatDuration(Date.now() - startTime)}`);
  }

  /**
   * Drop this table's cached entries for the current tenant (for every
   * tenant when none is selected). The next `fetchAll()` goes to the
   * server. The offline fallback copy is kept.
   */
  invalidateCache(): void {
    const tenantId = this.tenant.getTenantId();
    this.cache.invalidatePrefix(tenantId ? `${this.table.name}:${tenantId}:` : `${this.table.name}:`);
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  protected requireTenant(): string {
    return requireTenantId(this.tenant, this.feature);
  }

  protected cacheKey(tenantId: string, name: string): string {
    return `${this.tenantPrefix(tenantId)}${name}`;
  }

  private tenantPrefix(tenantId: string): string {
    return `${this.table.name}:${tenantId}:`;
  }

  private offlineKey(tenantId: string): string {
    return `offline:${this.table.name}:${tenantId}`;
  }

  private invalidateTenant(tenantId: string): void {
    this.cache.invalidatePrefix(this.tenantPrefix(tenantId));
  }

  private remote<R>(operation: string, call: () => Promise<R>): Promise<R> {
    return withRetry(call, {
      policy: this.retry,
      timeoutMs: this.requestTimeoutMs,
      label: `${this.table.name}.${operation}`
    });
  }

  private offlineFallback(tenantId: string, error: unknown): T[] | undefined {
    if (this.offlineFallbackMs <= 0 || !classifyError(error).isRetryable) return undefined;
    const fallback = this.cache.get<T[]>(this.offlineKey(tenantId));
    if (fallback) {
      debugWarn(`[Repository] Serving last known ${this.table.name} (${fallback.length} items) after a transport failure`);
    }
    return fallback;
  }

  private encode(record: object): Row {
    const row = recordToRow(record);
    for (const column of this.definition.jsonColumns ?? []) {
      if (column in row) row[column] = snakeizeKeys(row[column]);
    }
    return row;
  }

  private decode(row: Row, failure: PlannerErrorKind): T {
    const record = rowToRecord(row);
    for (const column of this.definition.jsonColumns ?? []) {
      const key = snakeToCamel(column);
      if (key in record) record[key] = camelizeKeys(record[key]);
    }
    const parsed = this.definition.schema.safeParse(record);
    if (!parsed.success) {
      throw new PlannerError(failure, this.feature, parsed.error);
    }
    return parsed.data;
  }
}
