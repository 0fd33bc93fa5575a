/**
 * @fileoverview Entity Store Factory
 *
 * `createEntityStore` builds the per-feature store the UI binds to: a
 * Svelte-contract store over `{ items, isLoading, error, successMessage,
 * lastLoadedAt }` that orchestrates optimistic mutations against a
 * {@link Repository}.
 *
 * Mutation pipeline (see {@link optimistic.ts} for the pure parts):
 *
 *   1. Synchronously apply the mutation to the visible collection.
 *   2. Enqueue the remote call on the store's {@link MutationQueue}; calls
 *      run one at a time, in issue order.
 *   3. Settle the call into a {@link Result} and fold it into the confirmed
 *      collection. A failure leaves the confirmed collection as it was, so
 *      the optimistic change disappears, and the error lands in `error`.
 *
 * `load()` replaces the confirmed collection. Mutations still pending when
 * it resolves are replayed on top, and mutations that settled while it was
 * in flight are folded into the fetched rows, so a load never erases a
 * change the user just made.
 *
 * `reset()` (tenant switch, sign-out) bumps an epoch: results of loads and
 * mutations started before it are dropped, and queued mutations that had
 * not reached the server yet are not sent.
 */

import { get, writable, type Readable } from 'svelte/store';
import { getPlannerConfig } from '../config';
import { debugError, debugLog, debugWarn } from '../debug';
import { PlannerError, toPlannerError, type PlannerErrorKind } from '../errors';
import {
  isProvisionalId,
  mutationTarget,
  PROVISIONAL_ID_PREFIX,
  replay,
  retargetMutation,
  settleMutation,
  type Mutation,
  type MutationOutcome,
  type MutationType
} from '../optimistic';
import { createMutationQueue } from '../queue';
import type { Entity, Repository } from '../repository';
import { err, ok, settle, type Result } from '../result';
import { generateId } from '../utils';
import type { ActivityStore } from './activity';

// =============================================================================
// Types
// =============================================================================

export interface EntityStoreState<T> {
  items: T[];
  isLoading: boolean;
  error: PlannerError | null;
  successMessage: string | null;
  /** Clock time of the last successful load, or `null` before the first one. */
  lastLoadedAt: number | null;
}

export interface EntityStoreConfig<T extends Entity, I> {
  repository: Repository<T, I>;
  /** Build the entity shown while a create is in flight. */
  provisional: (insert: I, id: string) => T;
  /** Capitalized noun for success messages. Default: the repository feature, capitalized. */
  label?: string;
  /** A non-forced `load()` within this window of the last one is skipped. */
  freshnessMs?: number;
  clock?: () => number;
  activity?: ActivityStore;
}

export interface LoadOptions {
  /** Load even if the last load is still fresh. */
  force?: boolean;
}

export interface EntityStore<T extends Entity, I> extends Readable<EntityStoreState<T>> {
  readonly feature: string;
  load(options?: LoadOptions): Promise<void>;
  create(insert: I): Promise<Result<T, PlannerError>>;
  update(entity: T): Promise<Result<T, PlannerError>>;
  delete(target: T | string): Promise<Result<void, PlannerError>>;
  clearError(): void;
  clearSuccess(): void;
  /** Forget everything, including in-flight work. */
  reset(): void;
  /** Replace the confirmed collection. Pending mutations stay applied. */
  set(items: T[]): void;
  getItems(): T[];
  /** Mutations issued but not yet settled. */
  pendingCount(): number;
  /** Resolves once every issued mutation has settled. */
  whenIdle(): Promise<void>;
}

interface PendingMutation<T extends Entity> {
  mutation: Mutation<T>;
}

interface SettledMutation<T extends Entity> {
  mutation: Mutation<T>;
  outcome: MutationOutcome<T>;
}

const FAILURE_KIND: Record<MutationType, PlannerErrorKind> = {
  create: 'createFailed',
  update: 'updateFailed',
  delete: 'deleteFailed'
};

const SUCCESS_VERB: Record<MutationType, string> = {
  create: 'added',
  update: 'updated',
  delete: 'deleted'
};

function initialState<T>(): EntityStoreState<T> {
  return { items: [], isLoading: false, error: null, successMessage: null, lastLoadedAt: null };
}

function capitalize(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1);
}

// =============================================================================
// Factory
// =============================================================================

/**
 * @example
 * const guests = createEntityStore({
 *   repository: guestRepository,
 *   provisional: (insert, id) => ({ ...insert, id, coupleId: '', createdAt: now(), updatedAt: now() }),
 * });
 *
 * await guests.load();
 * const result = await guests.create({ fullName: 'Ada Byron', rsvpStatus: 'pending' });
 */
export function createEntityStore<T extends Entity, I>(config: EntityStoreConfig<T, I>): EntityStore<T, I> {
  const { repository, provisional, activity } = config;
  const feature = repository.feature;
  const label = config.label ?? capitalize(feature);
  const freshnessMs = config.freshnessMs ?? getPlannerConfig().storeFreshnessMs;
  const clock = config.clock ?? Date.now;

  const store = writable<EntityStoreState<T>>(initialState());
  const queue = createMutationQueue(feature);

  let confirmed: T[] = [];
  let pending: PendingMutation<T>[] = [];
  let epoch = 0;
  /* Deletes of ids that were never loaded: queued, but with nothing to apply */
  let remoteOnlyDeletes = 0;
  let inFlightLoad: Promise<void> | null = null;
  /* Mutations that settled while the current load was in flight */
  let settledDuringLoad: SettledMutation<T>[] | null = null;

  function render(patch: Partial<Omit<EntityStoreState<T>, 'items'>> = {}): void {
    const items = replay(confirmed, pending.map((p) => p.mutation));
    store.update((state) => ({ ...state, ...patch, items }));
  }

  function fail(error: PlannerError, operation: MutationType | 'load', entityId: string | null): void {
    debugError(`[Store] ${feature} ${operation} failed:`, error.message);
    render({ error, successMessage: null });
    activity?.recordError(error, operation, entityId);
  }

  /**
   * Apply `mutation` now, send it when its turn comes, and settle it.
   */
  function execute(
    mutation: Mutation<T>,
    send: (targetId: string) => Promise<T | null>
  ): Promise<MutationOutcome<T, PlannerError>> {
    const entry: PendingMutation<T> = { mutation };
    const startedIn = epoch;
    const kind = FAILURE_KIND[mutation.type];

    pending.push(entry);
    render();
    activity?.adjustPending(1);

    return queue.enqueue(async () => {
      let outcome: MutationOutcome<T, PlannerError>;
      const current = entry.mutation;

      if (epoch !== startedIn) {
        outcome = err(new PlannerError(kind, feature, new Error('Tenant changed before the request was sent')));
      } else if (current.type !== 'create' && isProvisionalId(mutationTarget(current))) {
        // The create this depends on failed, so there is nothing on the server
        outcome =
          current.type === 'delete'
            ? ok(null)
            : err(new PlannerError('notFound', feature, new Error(`${feature} was never created`)));
      } else {
        outcome = await settle(send(mutationTarget(current)), (e) => toPlannerError(kind, feature, e));
      }

      if (epoch !== startedIn) return outcome;
      activity?.adjustPending(-1);

      pending = pending.filter((p) => p !== entry);
      confirmed = settleMutation(confirmed, current, outcome);
      settledDuringLoad?.push({ mutation: current, outcome });

      if (outcome.ok) {
        if (current.type === 'create' && outcome.value) {
          const serverId = outcome.value.id;
          for (const p of pending) {
            p.mutation = retargetMutation(p.mutation, current.provisional.id, serverId);
          }
        }
        render({ error: null, successMessage: `${label} ${SUCCESS_VERB[current.type]} successfully` });
        activity?.recordSuccess();
      } else {
        fail(outcome.error, current.type, mutationTarget(current));
      }
      return outcome;
    });
  }

  return {
    subscribe: store.subscribe,
    feature,

    load(options: LoadOptions = {}): Promise<void> {
      if (inFlightLoad) {
        debugLog(`[Store] ${feature} load already in flight`);
        return inFlightLoad;
      }

      const { lastLoadedAt } = get(store);
      if (!options.force && lastLoadedAt !== null && clock() - lastLoadedAt < freshnessMs) {
        debugLog(`[Store] ${feature} loaded recently; skipping`);
        return Promise.resolve();
      }

      const startedIn = epoch;
      settledDuringLoad = [];
      store.update((state) => ({ ...state, isLoading: true }));

      const run = async (): Promise<void> => {
        const outcome = await settle(repository.fetchAll(), (e) => toPlannerError('fetchFailed', feature, e));
        if (epoch !== startedIn) return;

        const settled = settledDuringLoad ?? [];
        settledDuringLoad = null;
        inFlightLoad = null;

        if (outcome.ok) {
          confirmed = settled.reduce<T[]>(
            (items, s) => settleMutation(items, s.mutation, s.outcome),
            outcome.value
          );
          render({ isLoading: false, error: null, lastLoadedAt: clock() });
          if (pending.length > 0) {
            debugLog(`[Store] ${feature} load merged with ${pending.length} pending mutation(s)`);
          }
        } else {
          store.update((state) => ({ ...state, isLoading: false }));
          fail(outcome.error, 'load', null);
        }
      };

      inFlightLoad = run();
      return inFlightLoad;
    },

    async create(insert: I): Promise<Result<T, PlannerError>> {
      const entity = provisional(insert, `${PROVISIONAL_ID_PREFIX}${generateId()}`);
      const outcome = await execute({ type: 'create', provisional: entity }, () => repository.create(insert));
      if (!outcome.ok) return outcome;
      return ok(outcome.value ?? entity);
    },

    async update(entity: T): Promise<Result<T, PlannerError>> {
      const previous = get(store).items.find((item) => item.id === entity.id);
      if (!previous) {
        const error = new PlannerError('notFound', feature, new Error(`${feature} ${entity.id} is not loaded`));
        fail(error, 'update', entity.id);
        return err(error);
      }

      const outcome = await execute({ type: 'update', previous, next: entity }, (id) =>
        repository.update({ ...entity, id })
      );
      if (!outcome.ok) return outcome;
      return ok(outcome.value ?? entity);
    },

    async delete(target: T | string): Promise<Result<void, PlannerError>> {
      const id = typeof target === 'string' ? target : target.id;
      const removed = get(store).items.find((item) => item.id === id) ?? (typeof target === 'string' ? undefined : target);

      if (!removed) {
        debugWarn(`[Store] ${feature} ${id} is not loaded; deleting remotely only`);
        const startedIn = epoch;
        remoteOnlyDeletes++;
        activity?.adjustPending(1);

        return queue.enqueue(async (): Promise<Result<void, PlannerError>> => {
          if (epoch !== startedIn) {
            return err(new PlannerError('deleteFailed', feature, new Error('Tenant changed before the request was sent')));
          }
          const result = await settle(repository.delete(id), (e) => toPlannerError('deleteFailed', feature, e));
          if (epoch !== startedIn) return result;

          remoteOnlyDeletes--;
          activity?.adjustPending(-1);
          if (result.ok) {
            render({ error: null, successMessage: `${label} deleted successfully` });
            activity?.recordSuccess();
          } else {
            fail(result.error, 'delete', id);
          }
          return result;
        });
      }

      const outcome = await execute({ type: 'delete', removed }, (targetId) =>
        repository.delete(targetId).then(() => null)
      );
      return outcome.ok ? ok(undefined) : outcome;
    },

    clearError(): void {
      store.update((state) => ({ ...state, error: null }));
    },

    clearSuccess(): void {
      store.update((state) => ({ ...state, successMessage: null }));
    },

    reset(): void {
      epoch++;
      activity?.adjustPending(-(pending.length + remoteOnlyDeletes));
      confirmed = [];
      pending = [];
      remoteOnlyDeletes = 0;
      inFlightLoad = null;
      settledDuringLoad = null;
      store.set(initialState());
      debugLog(`[Store] ${feature} reset`);
    },

    set(items: T[]): void {
      confirmed = [...items];
      render();
    },

    getItems(): T[] {
      return get(store).items;
    },

    pendingCount(): number {
      return pending.length + remoteOnlyDeletes;
    },

    whenIdle(): Promise<void> {
      return queue.drain();
    }
  };
}
