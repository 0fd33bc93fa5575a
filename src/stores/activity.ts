/**
 * @fileoverview Activity Store
 *
 * Aggregate status across every entity store of a planner: how many remote
 * mutations are still pending, the most recent user-facing error with its
 * technical details, and a short history of failures for a debug panel.
 *
 * Entity stores report into it when one is passed to `createEntityStore`.
 */

import { writable, type Readable } from 'svelte/store';
import type { PlannerError } from '../errors';

// Detailed failure for debugging
export interface ActivityError {
  feature: string;
  operation: 'load' | 'create' | 'update' | 'delete';
  entityId: string | null;
  kind: PlannerError['kind'];
  message: string;
  timestamp: string;
}

export interface ActivityState {
  pendingCount: number;
  lastError: string | null; // Friendly error message
  lastErrorDetails: string | null; // Raw technical error
  errors: ActivityError[];
  lastSuccessAt: string | null;
}

export interface ActivityStore extends Readable<ActivityState> {
  /** Add `delta` (positive or negative) to the pending mutation count. */
  adjustPending(delta: number): void;
  recordError(error: PlannerError, operation: ActivityError['operation'], entityId?: string | null): void;
  recordSuccess(): void;
  clearErrors(): void;
  reset(): void;
}

// Max errors to keep in history
const MAX_ERROR_HISTORY = 10;

function initialState(): ActivityState {
  return {
    pendingCount: 0,
    lastError: null,
    lastErrorDetails: null,
    errors: [],
    lastSuccessAt: null
  };
}

export function createActivityStore(): ActivityStore {
  const { subscribe, set, update } = writable<ActivityState>(initialState());

  return {
    subscribe,
    adjustPending: (delta: number) =>
      update((state) => ({ ...state, pendingCount: Math.max(0, state.pendingCount + delta) })),
    recordError: (error, operation, entityId = null) =>
      update((state) => ({
        ...state,
        lastError: error.userMessage,
        lastErrorDetails: error.message,
        errors: [
          ...state.errors,
          {
            feature: error.feature,
            operation,
            entityId,
            kind: error.kind,
            message: error.message,
            timestamp: new Date().toISOString()
          }
        ].slice(-MAX_ERROR_HISTORY)
      })),
    recordSuccess: () =>
      update((state) => ({ ...state, lastError: null, lastErrorDetails: null, lastSuccessAt: new Date().toISOString() })),
    clearErrors: () => update((state) => ({ ...state, lastError: null, lastErrorDetails: null, errors: [] })),
    reset: () => set(initialState())
  };
}
