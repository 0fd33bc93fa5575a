/**
 * @fileoverview Tasks
 *
 * Wedding to-dos (`wedding_tasks`), ordered by due date on the server.
 */

import { derived, type Readable } from 'svelte/store';
import { z } from 'zod';
import type { EntityDefinition, Repository } from '../repository';
import { createEntityStore, type EntityStore } from '../stores/entityStore';
import { byDate, isBefore, percent, provisionalFields, ownedRow, SERVER_MANAGED, type StoreDeps } from './shared';

export const TASK_STATUSES = ['not_started', 'in_progress', 'on_hold', 'completed', 'cancelled'] as const;
export const taskStatusSchema = z.enum(TASK_STATUSES);
export type TaskStatus = z.infer<typeof taskStatusSchema>;

export const taskPrioritySchema = z.enum(['low', 'medium', 'high', 'urgent']);
export type TaskPriority = z.infer<typeof taskPrioritySchema>;

export const taskSchema = z.object({
  ...ownedRow,
  taskName: z.string(),
  description: z.string().nullish(),
  status: taskStatusSchema.default('not_started'),
  priority: taskPrioritySchema.default('medium'),
  dueDate: z.string().nullish(),
  assignedTo: z.array(z.string()).nullish(),
  vendorId: z.coerce.string().nullish(),
  budgetCategoryId: z.string().nullish(),
  notes: z.string().nullish()
});

export type WeddingTask = z.infer<typeof taskSchema>;

export const taskInsertSchema = taskSchema
  .omit(SERVER_MANAGED)
  .extend({ taskName: z.string().trim().min(1, 'Task name is required') })
  .partial()
  .required({ taskName: true });

export type WeddingTaskInsert = z.infer<typeof taskInsertSchema>;

export const taskDefinition: EntityDefinition<WeddingTask, WeddingTaskInsert> = {
  feature: 'task',
  table: 'wedding_tasks',
  schema: taskSchema,
  insertSchema: taskInsertSchema,
  orderBy: { column: 'due_date' }
};

// =============================================================================
// Derived Views
// =============================================================================

export interface TaskProgress {
  total: number;
  completed: number;
  /** 0..100 */
  percentComplete: number;
}

function isClosed(task: Pick<WeddingTask, 'status'>): boolean {
  return task.status === 'completed' || task.status === 'cancelled';
}

/** Open tasks whose due date has passed, oldest first. */
export function overdueTasks(tasks: readonly WeddingTask[], now: Date = new Date()): WeddingTask[] {
  return tasks.filter((task) => !isClosed(task) && isBefore(task.dueDate, now)).sort(byDate((t) => t.dueDate));
}

export function tasksByStatus(tasks: readonly WeddingTask[]): Record<TaskStatus, WeddingTask[]> {
  const groups: Record<TaskStatus, WeddingTask[]> = {
    not_started: [],
    in_progress: [],
    on_hold: [],
    completed: [],
    cancelled: []
  };
  for (const task of tasks) groups[task.status].push(task);
  return groups;
}

export function taskProgress(tasks: readonly WeddingTask[]): TaskProgress {
  const completed = tasks.filter((task) => task.status === 'completed').length;
  return { total: tasks.length, completed, percentComplete: percent(completed, tasks.length) };
}

// =============================================================================
// Store
// =============================================================================

export interface TaskStore extends EntityStore<WeddingTask, WeddingTaskInsert> {
  progress: Readable<TaskProgress>;
  byStatus: Readable<Record<TaskStatus, WeddingTask[]>>;
  overdue(now?: () => Date): Readable<WeddingTask[]>;
}

export function createTaskStore(
  repository: Repository<WeddingTask, WeddingTaskInsert>,
  deps: StoreDeps = {}
): TaskStore {
  const store = createEntityStore<WeddingTask, WeddingTaskInsert>({
    ...deps,
    repository,
    label: 'Task',
    provisional: (insert, id) => ({ status: 'not_started', priority: 'medium', ...insert, ...provisionalFields(id) })
  });

  return {
    ...store,
    progress: derived(store, ($store) => taskProgress($store.items)),
    byStatus: derived(store, ($store) => tasksByStatus($store.items)),
    overdue: (now = () => new Date()) => derived(store, ($store) => overdueTasks($store.items, now()))
  };
}
