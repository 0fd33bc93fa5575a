/**
 * @fileoverview Tenant Session
 *
 * Holds which couple (tenant) the signed-in user is working on. The
 * session is an ordinary object handed to repositories as a
 * {@link TenantContext}; there is no process-wide instance, so two
 * planners in one process (or two tests) never share a tenant.
 *
 * The tenant is set at sign-in / couple selection and cleared at sign-out.
 * Repositories read it at call time and treat a missing tenant as a hard
 * `unauthorized` failure.
 */

import { writable, get, type Readable } from 'svelte/store';
import { PlannerError } from './errors';
import { debugLog } from './debug';

// =============================================================================
// Types
// =============================================================================

/** What a repository needs to scope its calls. */
export interface TenantContext {
  getTenantId(): string | null;
}

export interface RecentCouple {
  tenantId: string;
  coupleName: string;
  lastAccessedAt: string;
}

export interface TenantSessionState {
  tenantId: string | null;
  coupleName: string | null;
  recentCouples: RecentCouple[];
}

export interface TenantSession extends Readable<TenantSessionState>, TenantContext {
  /** Select a couple. Moves it to the front of the recent list when named. */
  setTenant(tenantId: string, coupleName?: string): void;
  /** Sign-out: forget the current tenant. Recent couples are kept. */
  clearTenant(): void;
  /**
   * Register a listener for tenant changes (not fired for re-selecting the
   * same tenant). Returns an unsubscribe function.
   */
  onTenantChange(callback: (next: string | null, previous: string | null) => void): () => void;
}

/** Maximum number of entries in `recentCouples`. */
const MAX_RECENT_COUPLES = 5;

// =============================================================================
// Factory
// =============================================================================

export function createTenantSession(initialTenantId: string | null = null): TenantSession {
  const store = writable<TenantSessionState>({
    tenantId: initialTenantId,
    coupleName: null,
    recentCouples: []
  });
  const listeners = new Set<(next: string | null, previous: string | null) => void>();

  function notify(next: string | null, previous: string | null): void {
    if (next === previous) return;
    debugLog(`[Session] Tenant changed: ${previous ?? 'none'} → ${next ?? 'none'}`);
    for (const listener of listeners) listener(next, previous);
  }

  return {
    subscribe: store.subscribe,

    getTenantId(): string | null {
      return get(store).tenantId;
    },

    setTenant(tenantId: string, coupleName?: string): void {
      const previous = get(store).tenantId;
      store.update((state) => {
        const recentCouples = coupleName
          ? [
              { tenantId, coupleName, lastAccessedAt: new Date().toISOString() },
              ...state.recentCouples.filter((c) => c.tenantId !== tenantId)
            ].slice(0, MAX_RECENT_COUPLES)
          : state.recentCouples;
        return { tenantId, coupleName: coupleName ?? null, recentCouples };
      });
      notify(tenantId, previous);
    },

    clearTenant(): void {
      const previous = get(store).tenantId;
      store.update((state) => ({ ...state, tenantId: null, coupleName: null }));
      notify(null, previous);
    },

    onTenantChange(callback) {
      listeners.add(callback);
      return () => {
        listeners.delete(callback);
      };
    }
  };
}

/**
 * A fixed tenant, for scripts and tests that never switch couples.
 */
export function staticTenant(tenantId: string | null): TenantContext {
  return { getTenantId: () => tenantId };
}

/**
 * Read the tenant or fail closed.
 *
 * @throws {PlannerError} `unauthorized` when no tenant is selected.
 */
export function requireTenantId(context: TenantContext, feature: string): string {
  const tenantId = context.getTenantId();
  if (!tenantId) {
    throw new PlannerError('unauthorized', feature);
  }
  return tenantId;
}
