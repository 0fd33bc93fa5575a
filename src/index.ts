/**
 * @fileoverview Main entry point: `trousseau`
 *
 * The primary barrel export. It re-exports the full public API surface:
 *
 * - **Configuration**: process-wide defaults for caching, retry and timeouts.
 * - **Planner**: the composition root wiring repositories and stores for
 *   one signed-in couple.
 * - **Data Access**: tenant-scoped repositories over Supabase tables, the
 *   shared repository cache and the tenant session.
 * - **Optimistic Layer**: pure mutation helpers and the per-store queue.
 * - **Errors & Results**: classified transport errors, user-facing planner
 *   errors and the `Result` type store mutations return.
 * - **Debug & Utilities**: logging, ID generation and case conversion.
 * - **Supabase**: the shared client and credential/schema validation.
 *
 * Stores, feature modules, types and test doubles are also available from
 * the focused subpath entry points (`trousseau/stores`,
 * `trousseau/features`, `trousseau/types`, `trousseau/testing`).
 */

// =============================================================================
//  Configuration
// =============================================================================

export { initPlanner, getPlannerConfig, DEFAULT_CONFIG } from './config';
export type { PlannerConfig, ResolvedPlannerConfig } from './config';

// =============================================================================
//  Planner
// =============================================================================
// `createPlanner` builds one repository and one store per entity family,
// all sharing one cache, one activity store and one tenant.

export { createPlanner, PLANNER_TABLES } from './planner';
export type { Planner, PlannerOptions, PlannerRepositories, PlannerStores } from './planner';

// =============================================================================
//  Data Access
// =============================================================================

export { TableRepository } from './repository';
export type { Entity, Repository, EntityDefinition, TableRepositoryOptions } from './repository';

export { RepositoryCache } from './cache';
export type { CacheStatistics, RepositoryCacheOptions } from './cache';

export { createTenantSession, staticTenant, requireTenantId } from './session';
export type { TenantContext, TenantSession, TenantSessionState, RecentCouple } from './session';

// =============================================================================
//  Optimistic Layer
// =============================================================================

export {
  applyMutation,
  settleMutation,
  retargetMutation,
  replay,
  isProvisionalId,
  mutationTarget,
  PROVISIONAL_ID_PREFIX
} from './optimistic';
export type { Mutation, MutationType, MutationOutcome } from './optimistic';

export { createMutationQueue } from './queue';
export type { MutationQueue } from './queue';

// =============================================================================
//  Stores
// =============================================================================

export { createEntityStore } from './stores/entityStore';
export type { EntityStore, EntityStoreConfig, EntityStoreState, LoadOptions } from './stores/entityStore';
export { createDetailStore } from './stores/factories';
export type { DetailStore } from './stores/factories';
export { createActivityStore } from './stores/activity';
export type { ActivityStore, ActivityState, ActivityError } from './stores/activity';

// =============================================================================
//  Errors & Results
// =============================================================================

export { NetworkError, PlannerError, classifyError, extractErrorMessage, toPlannerError } from './errors';
export type { NetworkErrorKind, PlannerErrorKind } from './errors';

export { ok, err, settle } from './result';
export type { Result } from './result';

export { withRetry, withTimeout, retryDelay, RETRY_POLICIES } from './network';
export type { RetryPolicy, RetryOptions } from './network';

// =============================================================================
//  Debug & Utilities
// =============================================================================

export { debug, debugLog, debugWarn, debugError, isDebugMode, setDebugMode } from './debug';
export {
  generateId,
  now,
  snakeToCamel,
  camelToSnake,
  rowToRecord,
  recordToRow,
  camelizeKeys,
  snakeizeKeys,
  formatDuration
} from './utils';

// =============================================================================
//  Supabase
// =============================================================================

export { getSupabase, setSupabase, createNodeClient } from './supabase/client';
export type { NodeClientOptions } from './supabase/client';
export { createSupabaseTable } from './supabase/table';
export type { RemoteTable, Row, SupabaseTableOptions } from './supabase/table';
export { validateSupabaseCredentials, validateSchema } from './supabase/validate';
export type { CredentialCheck, SchemaCheck } from './supabase/validate';
