/**
 * Supabase Client - Lazy Initialization
 *
 * One client per process, created on first access from the planner
 * configuration. Consumers that already own a client (or tests) register
 * it with {@link setSupabase} instead.
 *
 * Clients are built for a Node host by {@link createNodeClient}: no session
 * persistence and no token refresh timer, since the tenant is carried by
 * the planner's session rather than by the client and a pending timer
 * would keep a script from exiting.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { getPlannerConfig } from '../config';
import { debugLog } from '../debug';

let _prefix = 'trousseau';

/** @internal */
export function _setClientPrefix(prefix: string) {
  _prefix = prefix;
}

let realClient: SupabaseClient | null = null;

export interface NodeClientOptions {
  /** Keep the access token fresh once a user signs in. Default: `false`. */
  autoRefreshToken?: boolean;
  /** Replaces the global `fetch` for every request the client makes. */
  fetch?: typeof fetch;
}

/**
 * Create a client configured for a Node host.
 *
 * @example
 * const admin = createNodeClient(process.env.SUPABASE_URL, process.env.SUPABASE_ANON_KEY);
 */
export function createNodeClient(url: string, anonKey: string, options: NodeClientOptions = {}): SupabaseClient {
  return createClient(url, anonKey, {
    auth: {
      persistSession: false,
      autoRefreshToken: options.autoRefreshToken ?? false,
      detectSessionInUrl: false
    },
    global: {
      headers: { 'x-client-info': `${_prefix}-node` },
      ...(options.fetch ? { fetch: options.fetch } : {})
    }
  });
}

/**
 * Get the shared client, creating it from `supabaseUrl` / `supabaseAnonKey`
 * on first use.
 *
 * @throws {Error} When no client was registered and the config lacks credentials.
 */
export function getSupabase(): SupabaseClient {
  if (realClient) return realClient;

  const { supabaseUrl, supabaseAnonKey } = getPlannerConfig();
  if (!supabaseUrl || !supabaseAnonKey) {
    throw new Error(
      'Supabase is not configured. Call initPlanner({ supabaseUrl, supabaseAnonKey }) or setSupabase(client) first.'
    );
  }

  realClient = createNodeClient(supabaseUrl, supabaseAnonKey);
  debugLog(`[Supabase] Client created for ${supabaseUrl}`);

  return realClient;
}

/**
 * Register an existing client (or `null` to drop the shared one).
 */
export function setSupabase(client: SupabaseClient | null): void {
  realClient = client;
}
