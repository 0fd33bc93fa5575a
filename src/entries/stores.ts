/**
 * @fileoverview Stores subpath barrel: `trousseau/stores`
 *
 * Svelte-compatible stores: the optimistic entity store every feature builds
 * on, the single-record detail store, and the shared activity store.
 *
 * All stores follow the Svelte store contract (subscribe/unsubscribe) and can
 * be used with the `$store` auto-subscription syntax in `.svelte` files, or
 * read with `get()` from `svelte/store` anywhere else.
 */

// =============================================================================
//  Entity Store
// =============================================================================
// One collection of one entity family, with optimistic create/update/delete,
// rollback on failure, and serialized mutations.

export { createEntityStore } from '../stores/entityStore';
export type { EntityStore, EntityStoreConfig, EntityStoreState, LoadOptions } from '../stores/entityStore';

// =============================================================================
//  Detail Store
// =============================================================================

export { createDetailStore } from '../stores/factories';
export type { DetailStore } from '../stores/factories';

// =============================================================================
//  Activity Store
// =============================================================================
// Aggregates pending mutation counts and recent errors across every store.

export { createActivityStore } from '../stores/activity';
export type { ActivityStore, ActivityState, ActivityError } from '../stores/activity';

// =============================================================================
//  Tenant Session
// =============================================================================

export { createTenantSession } from '../session';
export type { TenantSession, TenantSessionState } from '../session';
