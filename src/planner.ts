/**
 * @fileoverview Planner: Composition Root
 *
 * `createPlanner` wires one planner for one signed-in user:
 *
 *   - one shared {@link RepositoryCache}
 *   - one repository per entity family, all reading the same tenant
 *   - one store per feature, all reporting into one {@link ActivityStore}
 *
 * When the session's tenant changes (couple switch, sign-out) the planner
 * clears the cache and resets every store, so nothing loaded for the
 * previous couple stays visible.
 *
 * Tables come from the Supabase client by default. Tests and scripts pass
 * `tables` to substitute their own {@link RemoteTable}s.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { RepositoryCache } from './cache';
import { getPlannerConfig } from './config';
import { debugLog } from './debug';
import type { RetryPolicy } from './network';
import { TableRepository, type Entity, type EntityDefinition } from './repository';
import type { TenantContext, TenantSession } from './session';
import { createActivityStore, type ActivityStore } from './stores/activity';
import type { EntityStore } from './stores/entityStore';
import { getSupabase } from './supabase/client';
import { createSupabaseTable, type RemoteTable } from './supabase/table';
import {
  affordabilityScenarioDefinition,
  createAffordabilityStore,
  type AffordabilityScenario,
  type AffordabilityScenarioInsert,
  type AffordabilityStore
} from './features/affordability';
import {
  budgetCategoryDefinition,
  createBudgetCategoryStore,
  createExpenseStore,
  createPaymentStore,
  expenseDefinition,
  paymentDefinition,
  type BudgetCategory,
  type BudgetCategoryInsert,
  type BudgetCategoryStore,
  type Expense,
  type ExpenseInsert,
  type ExpenseStore,
  type Payment,
  type PaymentInsert,
  type PaymentStore
} from './features/budget';
import {
  createDocumentStore,
  documentDefinition,
  type DocumentStore,
  type PlannerDocument,
  type PlannerDocumentInsert
} from './features/documents';
import { createGuestStore, GuestRepository, guestDefinition, type GuestStore } from './features/guests';
import { createNoteStore, noteDefinition, type Note, type NoteInsert, type NoteStore } from './features/notes';
import { createSettingsStore, SettingsRepository, settingsDefinition, type SettingsStore } from './features/settings';
import type { RepositoryDeps, StoreDeps } from './features/shared';
import { createTaskStore, taskDefinition, type TaskStore, type WeddingTask, type WeddingTaskInsert } from './features/tasks';
import {
  createMilestoneStore,
  createTimelineStore,
  milestoneDefinition,
  timelineItemDefinition,
  type Milestone,
  type MilestoneInsert,
  type MilestoneStore,
  type TimelineItem,
  type TimelineItemInsert,
  type TimelineStore
} from './features/timeline';
import {
  createVendorStore,
  vendorDefinition,
  type Vendor,
  type VendorInsert,
  type VendorStore
} from './features/vendors';
import {
  createMoodBoardElementStore,
  createMoodBoardStore,
  createSeatingChartStore,
  MoodBoardElementRepository,
  moodBoardDefinition,
  moodBoardElementDefinition,
  seatingChartDefinition,
  type MoodBoard,
  type MoodBoardElementStore,
  type MoodBoardInsert,
  type MoodBoardStore,
  type SeatingChart,
  type SeatingChartInsert,
  type SeatingChartStore
} from './features/visualPlanning';

// =============================================================================
// Types
// =============================================================================

export interface PlannerOptions {
  /**
   * Where the tenant comes from. A {@link TenantSession} also drives the
   * automatic reset on tenant change.
   */
  tenant: TenantContext | TenantSession;
  /** Default: {@link getSupabase}. Ignored for tables supplied in `tables`. */
  supabase?: SupabaseClient;
  /** Remote tables by table name, used instead of Supabase tables. */
  tables?: Partial<Record<string, RemoteTable>>;
  cache?: RepositoryCache;
  activity?: ActivityStore;
  cacheTtlMs?: number;
  storeFreshnessMs?: number;
  retry?: RetryPolicy;
  requestTimeoutMs?: number;
  offlineFallbackMs?: number;
  clock?: () => number;
}

export interface PlannerRepositories {
  guests: GuestRepository;
  tasks: TableRepository<WeddingTask, WeddingTaskInsert>;
  vendors: TableRepository<Vendor, VendorInsert>;
  notes: TableRepository<Note, NoteInsert>;
  timeline: TableRepository<TimelineItem, TimelineItemInsert>;
  milestones: TableRepository<Milestone, MilestoneInsert>;
  budgetCategories: TableRepository<BudgetCategory, BudgetCategoryInsert>;
  expenses: TableRepository<Expense, ExpenseInsert>;
  payments: TableRepository<Payment, PaymentInsert>;
  documents: TableRepository<PlannerDocument, PlannerDocumentInsert>;
  seatingCharts: TableRepository<SeatingChart, SeatingChartInsert>;
  moodBoards: TableRepository<MoodBoard, MoodBoardInsert>;
  affordability: TableRepository<AffordabilityScenario, AffordabilityScenarioInsert>;
  settings: SettingsRepository;
}

export interface PlannerStores {
  guests: GuestStore;
  tasks: TaskStore;
  vendors: VendorStore;
  notes: NoteStore;
  timeline: TimelineStore;
  milestones: MilestoneStore;
  budgetCategories: BudgetCategoryStore;
  expenses: ExpenseStore;
  payments: PaymentStore;
  documents: DocumentStore;
  seatingCharts: SeatingChartStore;
  moodBoards: MoodBoardStore;
  affordability: AffordabilityStore;
  settings: SettingsStore;
}

export interface Planner {
  readonly tenant: TenantContext;
  readonly cache: RepositoryCache;
  readonly activity: ActivityStore;
  readonly repositories: PlannerRepositories;
  readonly stores: PlannerStores;
  /**
   * The element store of one mood board, created on first use and kept
   * until the tenant changes.
   */
  moodBoardElements(boardId: string): MoodBoardElementStore;
  /** Load every store (respecting each store's freshness window unless `force`). */
  loadAll(options?: { force?: boolean }): Promise<void>;
  /** Clear the cache and reset every store and the activity store. */
  resetAll(): void;
  /** Stop following the tenant session and drop all state. */
  dispose(): void;
}

/** Every table the planner reads, for `validateSchema`. */
export const PLANNER_TABLES: readonly string[] = [
  guestDefinition,
  taskDefinition,
  vendorDefinition,
  noteDefinition,
  timelineItemDefinition,
  milestoneDefinition,
  budgetCategoryDefinition,
  expenseDefinition,
  paymentDefinition,
  documentDefinition,
  seatingChartDefinition,
  moodBoardDefinition,
  moodBoardElementDefinition,
  affordabilityScenarioDefinition,
  settingsDefinition
].map((definition) => definition.table);

type TableSource = Pick<EntityDefinition<Entity, unknown>, 'table' | 'tenantColumn' | 'orderBy'>;

function isTenantSession(tenant: TenantContext | TenantSession): tenant is TenantSession {
  return 'onTenantChange' in tenant;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * @example
 * const session = createTenantSession();
 * const planner = createPlanner({ tenant: session });
 *
 * session.setTenant(coupleId, 'Ada & Grace');
 * await planner.stores.guests.load();
 */
export function createPlanner(options: PlannerOptions): Planner {
  const { tenant } = options;
  const cache = options.cache ?? new RepositoryCache();
  const activity = options.activity ?? createActivityStore();

  let client: SupabaseClient | null = options.supabase ?? null;
  function resolveTable(definition: TableSource): RemoteTable {
    const supplied = options.tables?.[definition.table];
    if (supplied) return supplied;
    client ??= getSupabase();
    return createSupabaseTable(client, {
      table: definition.table,
      tenantColumn: definition.tenantColumn,
      orderBy: definition.orderBy
    });
  }

  const repositoryDeps: RepositoryDeps = {
    tenant,
    cache,
    cacheTtlMs: options.cacheTtlMs,
    retry: options.retry,
    requestTimeoutMs: options.requestTimeoutMs,
    offlineFallbackMs: options.offlineFallbackMs
  };

  function repositoryFor<T extends Entity, I extends object>(definition: EntityDefinition<T, I>): TableRepository<T, I> {
    return new TableRepository({ ...repositoryDeps, definition, table: resolveTable(definition) });
  }

  const repositories: PlannerRepositories = {
    guests: new GuestRepository(resolveTable(guestDefinition), repositoryDeps),
    tasks: repositoryFor(taskDefinition),
    vendors: repositoryFor(vendorDefinition),
    notes: repositoryFor(noteDefinition),
    timeline: repositoryFor(timelineItemDefinition),
    milestones: repositoryFor(milestoneDefinition),
    budgetCategories: repositoryFor(budgetCategoryDefinition),
    expenses: repositoryFor(expenseDefinition),
    payments: repositoryFor(paymentDefinition),
    documents: repositoryFor(documentDefinition),
    seatingCharts: repositoryFor(seatingChartDefinition),
    moodBoards: repositoryFor(moodBoardDefinition),
    affordability: repositoryFor(affordabilityScenarioDefinition),
    settings: new SettingsRepository(resolveTable(settingsDefinition), repositoryDeps)
  };

  const storeDeps: StoreDeps = {
    activity,
    freshnessMs: options.storeFreshnessMs ?? getPlannerConfig().storeFreshnessMs,
    clock: options.clock
  };

  const stores: PlannerStores = {
    guests: createGuestStore(repositories.guests, storeDeps),
    tasks: createTaskStore(repositories.tasks, storeDeps),
    vendors: createVendorStore(repositories.vendors, storeDeps),
    notes: createNoteStore(repositories.notes, storeDeps),
    timeline: createTimelineStore(repositories.timeline, storeDeps),
    milestones: createMilestoneStore(repositories.milestones, storeDeps),
    budgetCategories: createBudgetCategoryStore(repositories.budgetCategories, storeDeps),
    expenses: createExpenseStore(repositories.expenses, storeDeps),
    payments: createPaymentStore(repositories.payments, storeDeps),
    documents: createDocumentStore(repositories.documents, storeDeps),
    seatingCharts: createSeatingChartStore(repositories.seatingCharts, storeDeps),
    moodBoards: createMoodBoardStore(repositories.moodBoards, storeDeps),
    affordability: createAffordabilityStore(repositories.affordability, storeDeps),
    settings: createSettingsStore(repositories.settings, storeDeps)
  };

  const allStores: Array<Pick<EntityStore<Entity, never>, 'load' | 'reset'>> = Object.values(stores);
  const elementStores = new Map<string, MoodBoardElementStore>();

  function moodBoardElements(boardId: string): MoodBoardElementStore {
    let store = elementStores.get(boardId);
    if (!store) {
      const repository = new MoodBoardElementRepository(resolveTable(moodBoardElementDefinition), repositoryDeps, boardId);
      store = createMoodBoardElementStore(repository, storeDeps);
      elementStores.set(boardId, store);
    }
    return store;
  }

  function resetAll(): void {
    cache.clear();
    for (const store of allStores) store.reset();
    for (const store of elementStores.values()) store.reset();
    elementStores.clear();
    activity.reset();
    debugLog('[Planner] Cache cleared and stores reset');
  }

  const stopFollowing = isTenantSession(tenant)
    ? tenant.onTenantChange((next, previous) => {
        debugLog(`[Planner] Tenant switch ${previous ?? 'none'} → ${next ?? 'none'}`);
        resetAll();
      })
    : () => {};

  return {
    tenant,
    cache,
    activity,
    repositories,
    stores,
    moodBoardElements,

    async loadAll(loadOptions = {}): Promise<void> {
      await Promise.all(allStores.map((store) => store.load(loadOptions)));
    },

    resetAll,

    dispose(): void {
      stopFollowing();
      resetAll();
    }
  };
}
