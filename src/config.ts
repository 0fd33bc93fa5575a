/**
 * @fileoverview Planner Configuration
 *
 * Central configuration hub. {@link initPlanner} accepts a
 * {@link PlannerConfig} describing:
 *   - The app prefix (debug flag name, client header)
 *   - Supabase credentials for the lazily created client
 *   - Cache and freshness windows
 *   - The retry policy and request timeout applied to every remote call
 *
 * Unlike tenant identity, these values are process-wide defaults: every
 * repository and store accepts the same options individually and only
 * falls back to this module when an option is omitted. Calling
 * {@link initPlanner} is therefore optional.
 *
 * @see {@link repository.ts} and {@link stores/entityStore.ts} for the consumers
 */

import { _setDebugPrefix } from './debug';
import { _setClientPrefix } from './supabase/client';
import { RETRY_POLICIES, type RetryPolicy } from './network';

// =============================================================================
// Configuration Interfaces
// =============================================================================

/**
 * Top-level configuration.
 *
 * @example
 * initPlanner({
 *   prefix: 'ido',
 *   supabaseUrl: process.env.SUPABASE_URL,
 *   supabaseAnonKey: process.env.SUPABASE_ANON_KEY,
 *   cacheTtlMs: 30_000,
 *   retry: RETRY_POLICIES.standard,
 * });
 */
export interface PlannerConfig {
  /** Application prefix: used for the debug flag and the client header. */
  prefix?: string;
  /** Supabase project URL used by `getSupabase()`. */
  supabaseUrl?: string;
  /** Supabase anon key used by `getSupabase()`. */
  supabaseAnonKey?: string;
  /** How long a fetched collection is served from the repository cache (ms). Default: 60000. */
  cacheTtlMs?: number;
  /** How long a store skips non-forced reloads after a successful load (ms). Default: 60000. */
  storeFreshnessMs?: number;
  /** Retry policy for transient transport failures. Default: `RETRY_POLICIES.network`. */
  retry?: RetryPolicy;
  /** Per-attempt timeout for remote calls (ms). Default: 10000. */
  requestTimeoutMs?: number;
  /**
   * How long the last good collection may be served when a fetch fails
   * with a transport error (ms). Default: 0 (disabled).
   */
  offlineFallbackMs?: number;
}

export type ResolvedPlannerConfig = Required<Omit<PlannerConfig, 'supabaseUrl' | 'supabaseAnonKey'>> &
  Pick<PlannerConfig, 'supabaseUrl' | 'supabaseAnonKey'>;

export const DEFAULT_CONFIG: ResolvedPlannerConfig = {
  prefix: 'trousseau',
  cacheTtlMs: 60_000,
  storeFreshnessMs: 60_000,
  retry: RETRY_POLICIES.network,
  requestTimeoutMs: 10_000,
  offlineFallbackMs: 0
};

// =============================================================================
// Module State
// =============================================================================

let plannerConfig: ResolvedPlannerConfig = DEFAULT_CONFIG;

// =============================================================================
// Initialization
// =============================================================================

/**
 * Set the process-wide defaults.
 *
 * Propagates the prefix to the modules that derive names from it. May be
 * called again to change settings; existing repositories keep the options
 * they were constructed with.
 */
export function initPlanner(config: PlannerConfig): void {
  plannerConfig = { ...DEFAULT_CONFIG, ...stripUndefined(config) };

  if (config.prefix) {
    _setDebugPrefix(config.prefix);
    _setClientPrefix(config.prefix);
  }
}

/**
 * Get the current configuration (the defaults when {@link initPlanner}
 * has not been called).
 */
export function getPlannerConfig(): ResolvedPlannerConfig {
  return plannerConfig;
}

/**
 * Restore the defaults. Used by tests.
 *
 * @internal
 */
export function _resetPlannerConfig(): void {
  plannerConfig = DEFAULT_CONFIG;
  _setDebugPrefix(DEFAULT_CONFIG.prefix);
  _setClientPrefix(DEFAULT_CONFIG.prefix);
}

function stripUndefined(config: PlannerConfig): PlannerConfig {
  const out: PlannerConfig = {};
  for (const [key, value] of Object.entries(config)) {
    if (value !== undefined) Object.assign(out, { [key]: value });
  }
  return out;
}
