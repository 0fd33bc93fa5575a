/**
 * @fileoverview Timeline
 *
 * Two entity families: dated planning entries (`timeline_items`) and the
 * milestones they lead up to (`wedding_milestones`).
 */

import { derived, type Readable } from 'svelte/store';
import { z } from 'zod';
import type { EntityDefinition, Repository } from '../repository';
import { createEntityStore, type EntityStore } from '../stores/entityStore';
import { byDate, isBefore, provisionalFields, ownedRow, SERVER_MANAGED, toTime, type StoreDeps } from './shared';

// =============================================================================
// Timeline Items
// =============================================================================

export const timelineItemTypeSchema = z.enum(['task', 'milestone', 'vendor_event', 'payment', 'reminder', 'ceremony', 'other']);
export type TimelineItemType = z.infer<typeof timelineItemTypeSchema>;

export const timelineItemSchema = z.object({
  ...ownedRow,
  title: z.string(),
  description: z.string().nullish(),
  itemType: timelineItemTypeSchema.default('other'),
  itemDate: z.string(),
  endDate: z.string().nullish(),
  completed: z.boolean().default(false),
  taskId: z.string().nullish(),
  milestoneId: z.string().nullish(),
  vendorId: z.coerce.string().nullish()
});

export type TimelineItem = z.infer<typeof timelineItemSchema>;

export const timelineItemInsertSchema = timelineItemSchema
  .omit(SERVER_MANAGED)
  .extend({
    title: z.string().trim().min(1, 'Title is required'),
    itemDate: z.string().refine((value) => toTime(value) !== null, 'Invalid date')
  })
  .partial()
  .required({ title: true, itemDate: true });

export type TimelineItemInsert = z.infer<typeof timelineItemInsertSchema>;

export const timelineItemDefinition: EntityDefinition<TimelineItem, TimelineItemInsert> = {
  feature: 'timeline item',
  table: 'timeline_items',
  schema: timelineItemSchema,
  insertSchema: timelineItemInsertSchema,
  orderBy: { column: 'item_date' }
};

// =============================================================================
// Milestones
// =============================================================================

export const milestoneSchema = z.object({
  ...ownedRow,
  milestoneName: z.string(),
  description: z.string().nullish(),
  targetDate: z.string(),
  completed: z.boolean().default(false),
  color: z.string().nullish()
});

export type Milestone = z.infer<typeof milestoneSchema>;

export const milestoneInsertSchema = milestoneSchema
  .omit(SERVER_MANAGED)
  .extend({
    milestoneName: z.string().trim().min(1, 'Milestone name is required'),
    targetDate: z.string().refine((value) => toTime(value) !== null, 'Invalid date')
  })
  .partial()
  .required({ milestoneName: true, targetDate: true });

export type MilestoneInsert = z.infer<typeof milestoneInsertSchema>;

export const milestoneDefinition: EntityDefinition<Milestone, MilestoneInsert> = {
  feature: 'milestone',
  table: 'wedding_milestones',
  schema: milestoneSchema,
  insertSchema: milestoneInsertSchema,
  orderBy: { column: 'target_date' }
};

// =============================================================================
// Derived Views
// =============================================================================

export function sortTimeline(items: readonly TimelineItem[]): TimelineItem[] {
  return [...items].sort(byDate((item) => item.itemDate));
}

/** Incomplete entries dated before `now`. */
export function overdueTimelineItems(items: readonly TimelineItem[], now: Date = new Date()): TimelineItem[] {
  return sortTimeline(items.filter((item) => !item.completed && isBefore(item.itemDate, now)));
}

/** Incomplete milestones on or after `now`, soonest first. */
export function upcomingMilestones(milestones: readonly Milestone[], now: Date = new Date(), limit?: number): Milestone[] {
  const upcoming = milestones
    .filter((milestone) => !milestone.completed && !isBefore(milestone.targetDate, now))
    .sort(byDate((milestone) => milestone.targetDate));
  return limit === undefined ? upcoming : upcoming.slice(0, limit);
}

// =============================================================================
// Stores
// =============================================================================

export interface TimelineStore extends EntityStore<TimelineItem, TimelineItemInsert> {
  sorted: Readable<TimelineItem[]>;
}

export function createTimelineStore(
  repository: Repository<TimelineItem, TimelineItemInsert>,
  deps: StoreDeps = {}
): TimelineStore {
  const store = createEntityStore<TimelineItem, TimelineItemInsert>({
    ...deps,
    repository,
    label: 'Timeline item',
    provisional: (insert, id) => ({ itemType: 'other', completed: false, ...insert, ...provisionalFields(id) })
  });
  return { ...store, sorted: derived(store, ($store) => sortTimeline($store.items)) };
}

export interface MilestoneStore extends EntityStore<Milestone, MilestoneInsert> {
  upcoming(limit?: number, now?: () => Date): Readable<Milestone[]>;
}

export function createMilestoneStore(
  repository: Repository<Milestone, MilestoneInsert>,
  deps: StoreDeps = {}
): MilestoneStore {
  const store = createEntityStore<Milestone, MilestoneInsert>({
    ...deps,
    repository,
    label: 'Milestone',
    provisional: (insert, id) => ({ completed: false, ...insert, ...provisionalFields(id) })
  });
  return {
    ...store,
    upcoming: (limit, now = () => new Date()) =>
      derived(store, ($store) => upcomingMilestones($store.items, now(), limit))
  };
}
