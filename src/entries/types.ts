/**
 * @fileoverview Types subpath barrel: `trousseau/types`
 *
 * Every public type in one place. Only `export type` statements; nothing
 * here survives compilation.
 */

// =============================================================================
//  Configuration
// =============================================================================

export type { PlannerConfig, ResolvedPlannerConfig } from '../config';
export type { RetryPolicy, RetryOptions } from '../network';
export type { Result } from '../result';

// =============================================================================
//  Errors
// =============================================================================

export type { NetworkErrorKind, PlannerErrorKind } from '../errors';

// =============================================================================
//  Data Access
// =============================================================================

export type { Entity, Repository, EntityDefinition, TableRepositoryOptions } from '../repository';
export type { RemoteTable, Row, SupabaseTableOptions } from '../supabase/table';
export type { NodeClientOptions } from '../supabase/client';
export type { CredentialCheck, SchemaCheck } from '../supabase/validate';
export type { CacheStatistics, RepositoryCacheOptions } from '../cache';
export type { TenantContext, TenantSession, TenantSessionState, RecentCouple } from '../session';

// =============================================================================
//  Optimistic Layer
// =============================================================================

export type { Mutation, MutationType, MutationOutcome } from '../optimistic';
export type { MutationQueue } from '../queue';
export type { EntityStore, EntityStoreConfig, EntityStoreState, LoadOptions } from '../stores/entityStore';
export type { DetailStore } from '../stores/factories';
export type { ActivityStore, ActivityState, ActivityError } from '../stores/activity';

// =============================================================================
//  Planner
// =============================================================================

export type { Planner, PlannerOptions, PlannerRepositories, PlannerStores } from '../planner';
export type { RepositoryDeps, StoreDeps } from '../features/shared';

// =============================================================================
//  Entities
// =============================================================================

export type { Guest, GuestInsert, GuestStats, GuestFilters, GuestSortOption, RsvpStatus, InvitedBy } from '../features/guests';
export type { WeddingTask, WeddingTaskInsert, TaskStatus, TaskPriority, TaskProgress } from '../features/tasks';
export type { Vendor, VendorInsert, VendorStats } from '../features/vendors';
export type { Note, NoteInsert, NoteRelatedType } from '../features/notes';
export type { TimelineItem, TimelineItemInsert, TimelineItemType, Milestone, MilestoneInsert } from '../features/timeline';
export type {
  BudgetCategory,
  BudgetCategoryInsert,
  Expense,
  ExpenseInsert,
  ExpensePaymentStatus,
  Payment,
  PaymentInsert,
  BudgetSummary,
  CategoryOverspend
} from '../features/budget';
export type { PlannerDocument, PlannerDocumentInsert, DocumentType } from '../features/documents';
export type {
  SeatingChart,
  SeatingChartInsert,
  VenueLayout,
  SeatingCoverage,
  MoodBoard,
  MoodBoardInsert,
  MoodBoardElement,
  MoodBoardElementInsert,
  ElementType
} from '../features/visualPlanning';
export type { AffordabilityScenario, AffordabilityScenarioInsert, AffordabilityProjection } from '../features/affordability';
export type { CoupleSettings, SettingsPatch, SettingsRow, SettingsInsert, SettingsWeddingEvent } from '../features/settings';
