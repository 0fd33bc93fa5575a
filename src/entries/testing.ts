/**
 * @fileoverview Testing subpath barrel: `trousseau/testing`
 *
 * In-process stand-ins for the backend: a scriptable {@link FakeRepository}
 * for store tests, and an in-memory {@link RemoteTable} for repository and
 * planner tests.
 */

export { FakeRepository } from '../testing/fakeRepository';
export type { FakeCall, FakeOperation, FakeRepositoryOptions } from '../testing/fakeRepository';

export { createMemoryTable } from '../testing/memoryTable';
export type { MemoryTable, MemoryTableOptions, MemoryOperation } from '../testing/memoryTable';
