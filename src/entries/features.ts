/**
 * @fileoverview Features subpath barrel: `trousseau/features`
 *
 * Schemas, repository definitions, derived views and store factories for
 * each entity family of a wedding plan.
 */

export * from '../features/guests';
export * from '../features/tasks';
export * from '../features/vendors';
export * from '../features/notes';
export * from '../features/timeline';
export * from '../features/budget';
export * from '../features/documents';
export * from '../features/visualPlanning';
export * from '../features/affordability';
export * from '../features/settings';
export { toTime, isBefore, isWithinDays, byDate, percent } from '../features/shared';
export type { RepositoryDeps, StoreDeps } from '../features/shared';
