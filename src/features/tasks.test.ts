import { get } from 'svelte/store';
import { describe, expect, it } from 'vitest';
import { FakeRepository } from '../testing/fakeRepository';
import {
  createTaskStore,
  overdueTasks,
  taskInsertSchema,
  taskProgress,
  taskSchema,
  tasksByStatus,
  type WeddingTask,
  type WeddingTaskInsert
} from './tasks';

function task(id: string, extra: Partial<WeddingTask> = {}): WeddingTask {
  return taskSchema.parse({ id, coupleId: 'c1', createdAt: '2026-01-01T00:00:00.000Z', taskName: `Task ${id}`, ...extra });
}

const now = new Date('2026-06-01T00:00:00.000Z');

const tasks = [
  task('t1', { dueDate: '2026-05-01' }),
  task('t2', { dueDate: '2026-05-15', status: 'completed' }),
  task('t3', { dueDate: '2026-07-01' }),
  task('t4', { dueDate: '2026-04-01', status: 'in_progress' }),
  task('t5'),
  task('t6', { dueDate: '2026-01-01', status: 'cancelled' })
];

describe('taskSchema', () => {
  it('defaults status and priority', () => {
    expect(task('t9')).toMatchObject({ status: 'not_started', priority: 'medium' });
  });
});

describe('taskInsertSchema', () => {
  it('requires a task name', () => {
    expect(taskInsertSchema.safeParse({ taskName: ' ' }).success).toBe(false);
    expect(taskInsertSchema.parse({ taskName: 'Book florist', priority: 'high' })).toEqual({
      taskName: 'Book florist',
      priority: 'high'
    });
  });
});

describe('overdueTasks', () => {
  it('lists open tasks past due, oldest first', () => {
    expect(overdueTasks(tasks, now).map((t) => t.id)).toEqual(['t4', 't1']);
  });
});

describe('tasksByStatus', () => {
  it('groups every status', () => {
    const groups = tasksByStatus(tasks);
    expect(groups.not_started.map((t) => t.id)).toEqual(['t1', 't3', 't5']);
    expect(groups.in_progress.map((t) => t.id)).toEqual(['t4']);
    expect(groups.on_hold).toEqual([]);
    expect(groups.completed.map((t) => t.id)).toEqual(['t2']);
    expect(groups.cancelled.map((t) => t.id)).toEqual(['t6']);
  });
});

describe('taskProgress', () => {
  it('rounds to one decimal', () => {
    expect(taskProgress(tasks)).toEqual({ total: 6, completed: 1, percentComplete: 16.7 });
    expect(taskProgress([])).toEqual({ total: 0, completed: 0, percentComplete: 0 });
  });
});

describe('createTaskStore', () => {
  it('keeps derived views in step with optimistic changes', async () => {
    const repository = new FakeRepository<WeddingTask, WeddingTaskInsert>({
      feature: 'task',
      build: (insert, id) => taskSchema.parse({ ...insert, id, coupleId: 'c1', createdAt: '2026-01-01T00:00:00.000Z' }),
      seed: tasks
    });
    const store = createTaskStore(repository);
    await store.load();
    const overdue = store.overdue(() => now);

    expect(get(overdue).map((t) => t.id)).toEqual(['t4', 't1']);

    repository.hold('update');
    const done = store.update({ ...tasks[0], status: 'completed' });
    expect(get(overdue).map((t) => t.id)).toEqual(['t4']);
    expect(get(store.progress).completed).toBe(2);

    repository.release('update');
    await done;
    expect(get(store).successMessage).toBe('Task updated successfully');
  });
});
