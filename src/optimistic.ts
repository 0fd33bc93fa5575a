/**
 * @fileoverview Optimistic Mutations
 *
 * A store keeps two collections:
 *
 *   - **confirmed**: the last state the server agreed with.
 *   - **visible**  : `confirmed` with every pending mutation replayed on top,
 *                     in the order the mutations were issued.
 *
 * {@link applyMutation} is the optimistic step (what the user sees before the
 * server answers). {@link settleMutation} folds a server answer into the
 * confirmed collection. A failed mutation leaves `confirmed` untouched, so
 * dropping it from the pending list *is* the rollback:
 *
 *   - failed update → the prior value comes back (it never left `confirmed`)
 *   - failed create → the provisional entity disappears
 *   - failed delete → the entity reappears at its confirmed index
 *
 * Both functions are pure and return new arrays.
 */

import type { Entity } from './repository';
import type { Result } from './result';

// =============================================================================
// Types
// =============================================================================

export type Mutation<T extends Entity> =
  | { type: 'create'; provisional: T }
  | { type: 'update'; previous: T; next: T }
  | { type: 'delete'; removed: T };

export type MutationType = Mutation<Entity>['type'];

/** Outcome of a remote call: the canonical entity, or nothing for deletes. */
export type MutationOutcome<T, E = unknown> = Result<T | null, E>;

/** Prefix of ids assigned to entities that the server has not created yet. */
export const PROVISIONAL_ID_PREFIX = 'provisional-';

export function isProvisionalId(id: string): boolean {
  return id.startsWith(PROVISIONAL_ID_PREFIX);
}

/** Id of the entity a mutation is about. */
export function mutationTarget<T extends Entity>(mutation: Mutation<T>): string {
  switch (mutation.type) {
    case 'create':
      return mutation.provisional.id;
    case 'update':
      return mutation.next.id;
    case 'delete':
      return mutation.removed.id;
  }
}

// =============================================================================
// Apply / Settle
// =============================================================================

/**
 * Optimistic apply.
 *
 * - create: append the provisional entity
 * - update: replace the entity with the same id (no-op if absent)
 * - delete: remove the entity with that id
 */
export function applyMutation<T extends Entity>(items: readonly T[], mutation: Mutation<T>): T[] {
  switch (mutation.type) {
    case 'create':
      return [...items, mutation.provisional];
    case 'update':
      return items.map((item) => (item.id === mutation.next.id ? mutation.next : item));
    case 'delete':
      return items.filter((item) => item.id !== mutation.removed.id);
  }
}

/**
 * Fold a server answer into the confirmed collection.
 *
 * Settling the same successful outcome twice gives the same collection; the
 * store relies on that when a load races with mutations.
 */
export function settleMutation<T extends Entity>(
  confirmed: readonly T[],
  mutation: Mutation<T>,
  outcome: MutationOutcome<T>
): T[] {
  if (!outcome.ok) return [...confirmed];

  switch (mutation.type) {
    case 'create': {
      const created = outcome.value ?? mutation.provisional;
      return upsert(confirmed, created);
    }
    case 'update': {
      const updated = outcome.value ?? mutation.next;
      return confirmed.map((item) => (item.id === updated.id ? updated : item));
    }
    case 'delete':
      return confirmed.filter((item) => item.id !== mutation.removed.id);
  }
}

/**
 * Point a mutation issued against a provisional entity at the id the server
 * assigned to it. Mutations about other entities are returned unchanged.
 */
export function retargetMutation<T extends Entity>(mutation: Mutation<T>, provisionalId: string, id: string): Mutation<T> {
  if (mutationTarget(mutation) !== provisionalId) return mutation;
  switch (mutation.type) {
    case 'create':
      return mutation;
    case 'update':
      return { type: 'update', previous: { ...mutation.previous, id }, next: { ...mutation.next, id } };
    case 'delete':
      return { type: 'delete', removed: { ...mutation.removed, id } };
  }
}

/**
 * Replay pending mutations over a confirmed collection.
 */
export function replay<T extends Entity>(confirmed: readonly T[], pending: readonly Mutation<T>[]): T[] {
  return pending.reduce<T[]>((items, mutation) => applyMutation(items, mutation), [...confirmed]);
}

function upsert<T extends Entity>(items: readonly T[], entity: T): T[] {
  const index = items.findIndex((item) => item.id === entity.id);
  if (index === -1) return [...items, entity];
  const next = [...items];
  next[index] = entity;
  return next;
}
