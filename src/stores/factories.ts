/**
 * @fileoverview Detail Store Factory
 *
 * A reactive store for a single entity (a guest's detail page, one vendor's
 * contract view). It tracks the loaded id so a refresh reloads the same
 * entity, and exposes a read-only `loading` sub-store next to the value.
 *
 * Reads go through {@link Repository.fetchById}, so a detail view opened
 * from a fresh list is served from the repository cache.
 */

import { writable, type Readable } from 'svelte/store';
import { debugError } from '../debug';
import { toPlannerError, type PlannerError } from '../errors';
import type { Entity, Repository } from '../repository';

// =============================================================================
// Types
// =============================================================================

export interface DetailStore<T> extends Readable<T | null> {
  /** Read-only loading sub-store. */
  loading: Readable<boolean>;

  /** Last load failure, cleared by the next successful load. */
  error: Readable<PlannerError | null>;

  /** Load one entity by id. Resolves after the store is updated. */
  load(id: string): Promise<void>;

  /** Reload the currently tracked id, if any. */
  refresh(): Promise<void>;

  /** Reset the store to null and clear the tracked id. */
  clear(): void;

  /** Replace the store's data directly. */
  set(data: T | null): void;

  /** Get the currently tracked entity id, or null if none loaded. */
  getCurrentId(): string | null;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * @example
 * const vendor = createDetailStore(vendorRepository);
 * await vendor.load(vendorId);
 * // $vendor is Vendor | null, $loading is boolean
 */
export function createDetailStore<T extends Entity>(repository: Pick<Repository<T, unknown>, 'feature' | 'fetchById'>): DetailStore<T> {
  const { subscribe, set } = writable<T | null>(null);
  const loading = writable<boolean>(false);
  const error = writable<PlannerError | null>(null);
  let currentId: string | null = null;
  /* Guards against an older load landing after a newer one */
  let requestSeq = 0;

  async function load(id: string): Promise<void> {
    currentId = id;
    const seq = ++requestSeq;
    loading.set(true);
    try {
      const entity = await repository.fetchById(id);
      if (seq !== requestSeq) return;
      set(entity);
      error.set(null);
    } catch (e) {
      if (seq !== requestSeq) return;
      const failure = toPlannerError('fetchFailed', repository.feature, e);
      debugError(`[Store] ${repository.feature} ${id} failed to load:`, failure.message);
      set(null);
      error.set(failure);
    } finally {
      if (seq === requestSeq) loading.set(false);
    }
  }

  return {
    subscribe,
    loading: { subscribe: loading.subscribe },
    error: { subscribe: error.subscribe },

    load,

    async refresh(): Promise<void> {
      if (currentId) await load(currentId);
    },

    clear(): void {
      requestSeq++;
      currentId = null;
      set(null);
      error.set(null);
      loading.set(false);
    },

    set(data: T | null): void {
      set(data);
    },

    getCurrentId(): string | null {
      return currentId;
    }
  };
}
