/**
 * @fileoverview Debug Logging Utilities
 *
 * Provides opt-in debug logging gated by an environment flag. When debug
 * mode is enabled (`<PREFIX>_DEBUG_MODE=true`, e.g. `TROUSSEAU_DEBUG_MODE`),
 * all debug calls forward to the console. When disabled, they are dropped.
 *
 * The prefix is configurable via {@link _setDebugPrefix} (set by
 * {@link config.ts#initPlanner}) so several planner instances in one
 * process can be toggled independently.
 *
 * @example
 * // From the shell:
 * //   TROUSSEAU_DEBUG_MODE=true node app.js
 *
 * // Or programmatically:
 * import { setDebugMode } from 'trousseau';
 * setDebugMode(true);
 */

// =============================================================================
// Internal State
// =============================================================================

/** Cached result of the environment check (avoids repeated reads). */
let debugEnabled: boolean | null = null;

/** Configurable prefix for the environment flag (default: `'trousseau'`). */
let debugPrefix = 'trousseau';

// =============================================================================
// Internal Helpers
// =============================================================================

/**
 * Set the prefix used for the debug environment flag.
 *
 * Called internally by {@link config.ts#initPlanner}. Resets the cached
 * flag so the next check reads the new variable.
 *
 * @internal
 */
export function _setDebugPrefix(prefix: string) {
  debugPrefix = prefix;
  debugEnabled = null;
}

function flagName(): string {
  return `${debugPrefix.toUpperCase().replace(/[^A-Z0-9]/g, '_')}_DEBUG_MODE`;
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Check whether debug mode is currently enabled.
 *
 * Reads the environment flag on the first call and caches the result.
 */
export function isDebugMode(): boolean {
  if (debugEnabled !== null) return debugEnabled;
  debugEnabled = typeof process !== 'undefined' && process.env[flagName()] === 'true';
  return debugEnabled;
}

/**
 * Enable or disable debug mode at runtime.
 *
 * Only affects the current process; the environment is left untouched.
 */
export function setDebugMode(enabled: boolean) {
  debugEnabled = enabled;
}

/** Log at the `console.log` level. No-op when debug mode is disabled. */
export function debugLog(...args: unknown[]) {
  if (isDebugMode()) console.log(...args);
}

/** Log at the `console.warn` level. No-op when debug mode is disabled. */
export function debugWarn(...args: unknown[]) {
  if (isDebugMode()) console.warn(...args);
}

/** Log at the `console.error` level. No-op when debug mode is disabled. */
export function debugError(...args: unknown[]) {
  if (isDebugMode()) console.error(...args);
}

/**
 * Unified debug logging function with configurable severity level.
 *
 * @example
 * debug('log', '[Repository] guest_list fetched 12 rows in 84ms');
 * debug('error', '[Store] guest update failed:', error);
 */
export function debug(level: 'log' | 'warn' | 'error', ...args: unknown[]): void {
  if (!isDebugMode()) return;
  switch (level) {
    case 'log':
      console.log(...args);
      break;
    case 'warn':
      console.warn(...args);
      break;
    case 'error':
      console.error(...args);
      break;
  }
}
