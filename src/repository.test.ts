import { beforeEach, describe, expect, it } from 'vitest';
import { RepositoryCache } from './cache';
import { GuestRepository } from './features/guests';
import type { RetryPolicy } from './network';
import { createTenantSession, type TenantSession } from './session';
import { createMemoryTable, type MemoryTable } from './testing/memoryTable';

const CREATED_AT = '2026-01-01T00:00:00.000Z';

function guestRow(id: string, coupleId: string, firstName: string) {
  return { id, couple_id: coupleId, first_name: firstName, last_name: 'Test', rsvp_status: 'pending', created_at: CREATED_AT };
}

const ada = {
  id: 'g1',
  coupleId: 'c1',
  firstName: 'Ada',
  lastName: 'Test',
  rsvpStatus: 'pending',
  createdAt: CREATED_AT,
  plusOneAllowed: false,
  plusOneAttending: false,
  isWeddingParty: false
} as const;

const single: RetryPolicy = { maxAttempts: 1, baseDelayMs: 0, maxDelayMs: 0 };

describe('TableRepository', () => {
  let time: number;
  let session: TenantSession;
  let table: MemoryTable;
  let cache: RepositoryCache;

  function repository(options: { retry?: RetryPolicy; offlineFallbackMs?: number } = {}) {
    return new GuestRepository(table, {
      tenant: session,
      cache,
      cacheTtlMs: 1000,
      retry: options.retry ?? single,
      requestTimeoutMs: 0,
      offlineFallbackMs: options.offlineFallbackMs ?? 0
    });
  }

  beforeEach(() => {
    time = 0;
    session = createTenantSession('c1');
    table = createMemoryTable({
      name: 'guest_list',
      rows: [guestRow('g1', 'c1', 'Ada'), guestRow('g2', 'c2', 'Grace')],
      generateId: () => 'g3'
    });
    cache = new RepositoryCache({ clock: () => time });
  });

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  it("maps the tenant's rows to camelCase entities", async () => {
    await expect(repository().fetchAll()).resolves.toEqual([ada]);
  });

  it('serves the collection from cache until the TTL elapses', async () => {
    const guests = repository();
    await guests.fetchAll();
    time = 999;
    await guests.fetchAll();
    expect(table.calls.selectAll).toBe(1);

    time = 1000;
    await guests.fetchAll();
    expect(table.calls.selectAll).toBe(2);
  });

  it("never returns the previous tenant's cached collection", async () => {
    const guests = repository();
    await guests.fetchAll();

    session.setTenant('c2');
    const items = await guests.fetchAll();
    expect(items.map((g) => g.id)).toEqual(['g2']);
    expect(table.calls.selectAll).toBe(2);
  });

  it('fails closed without a tenant', async () => {
    session.clearTenant();
    const guests = repository();

    await expect(guests.fetchAll()).rejects.toMatchObject({ kind: 'unauthorized', feature: 'guest' });
    await expect(guests.create({ firstName: 'Alan', lastName: 'Turing' })).rejects.toMatchObject({ kind: 'unauthorized' });
    expect(table.calls.selectAll).toBe(0);
    expect(table.calls.insert).toBe(0);
  });

  it('serves fetchById from the cached collection', async () => {
    const guests = repository();
    await guests.fetchAll();
    await expect(guests.fetchById('g1')).resolves.toEqual(ada);
    expect(table.calls.selectOne).toBe(0);
  });

  it("reports another tenant's id as notFound", async () => {
    await expect(repository().fetchById('g2')).rejects.toMatchObject({ kind: 'notFound' });
    expect(table.calls.selectOne).toBe(1);
  });

  it('retries transient failures', async () => {
    table.failNext('selectAll', undefined, 2);
    const guests = repository({ retry: { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0 } });

    await expect(guests.fetchAll()).resolves.toEqual([ada]);
    expect(table.calls.selectAll).toBe(3);
  });

  it('wraps a failed fetch as fetchFailed with its cause', async () => {
    table.failNext('selectAll');
    await expect(repository().fetchAll()).rejects.toMatchObject({
      kind: 'fetchFailed',
      message: 'guest fetchFailed: Simulated connection failure'
    });
  });

  // ---------------------------------------------------------------------------
  // Offline fallback
  // ---------------------------------------------------------------------------

  it('serves the last good collection after a transport failure', async () => {
    const guests = repository({ offlineFallbackMs: 5000 });
    await guests.fetchAll();

    time = 2000;
    table.failNext('selectAll');
    await expect(guests.fetchAll()).resolves.toEqual([ada]);

    time = 5000;
    table.failNext('selectAll');
    await expect(guests.fetchAll()).rejects.toMatchObject({ kind: 'fetchFailed' });
  });

  it('does not use the fallback for business errors', async () => {
    const guests = repository({ offlineFallbackMs: 5000 });
    await guests.fetchAll();

    time = 2000;
    table.failNext('selectAll', { status: 401, message: 'JWT expired' });
    await expect(guests.fetchAll()).rejects.toMatchObject({ kind: 'unauthorized' });
  });

  // ---------------------------------------------------------------------------
  // Writes
  // ---------------------------------------------------------------------------

  it('rejects an invalid payload without a remote call', async () => {
    await expect(repository().create({ firstName: '   ', lastName: 'Turing' })).rejects.toMatchObject({
      kind: 'validationFailed'
    });
    expect(table.calls.insert).toBe(0);
  });

  it('creates under the current tenant and invalidates the cache', async () => {
    const guests = repository();
    await guests.fetchAll();

    const created = await guests.create({ firstName: 'Alan', lastName: 'Turing', email: 'alan@example.com' });
    expect(created).toMatchObject({ id: 'g3', coupleId: 'c1', firstName: 'Alan', email: 'alan@example.com', rsvpStatus: 'pending' });
    expect(table.rows().find((row) => row.id === 'g3')).toMatchObject({ couple_id: 'c1', first_name: 'Alan' });

    const items = await guests.fetchAll();
    expect(items.map((g) => g.id)).toEqual(['g1', 'g3']);
    expect(table.calls.selectAll).toBe(2);
  });

  it('maps a server-side rejection to validationFailed', async () => {
    const cause = { code: '23505', message: 'duplicate key value violates unique constraint' };
    table.failNext('insert', cause);

    await expect(repository().create({ firstName: 'Alan', lastName: 'Turing' })).rejects.toMatchObject({
      kind: 'validationFailed',
      cause
    });
  });

  it('updates without touching server-managed columns', async () => {
    const updated = await repository().update({ ...ada, firstName: 'Ada L.' });

    expect(updated.firstName).toBe('Ada L.');
    expect(updated.updatedAt).toEqual(expect.any(String));
    expect(table.rows().find((row) => row.id === 'g1')).toMatchObject({
      couple_id: 'c1',
      first_name: 'Ada L.',
      created_at: CREATED_AT
    });
  });

  it("reports an update of a missing or foreign row as notFound", async () => {
    const guests = repository();
    await expect(guests.update({ ...ada, id: 'missing' })).rejects.toMatchObject({ kind: 'notFound' });
    await expect(guests.update({ ...ada, id: 'g2' })).rejects.toMatchObject({ kind: 'notFound' });
    expect(table.rows().find((row) => row.id === 'g2')).toMatchObject({ first_name: 'Grace' });
  });

  it('treats deleting a missing id as success', async () => {
    const guests = repository();
    await guests.delete('g1');
    await expect(guests.delete('g1')).resolves.toBeUndefined();
    expect(table.rows().map((row) => row.id)).toEqual(['g2']);
  });

  it('refetches after a delete', async () => {
    const guests = repository();
    await guests.fetchAll();
    await guests.delete('g1');
    await expect(guests.fetchAll()).resolves.toEqual([]);
    expect(table.calls.selectAll).toBe(2);
  });

  it('does not cache a read that a mutation overtook', async () => {
    const guests = repository();
    table.hold('selectAll');
    const staleRead = guests.fetchAll();
    await new Promise((resolve) => setTimeout(resolve, 0));

    await guests.delete('g1');
    table.release('selectAll');
    await expect(staleRead).resolves.toEqual([ada]);

    await expect(guests.fetchAll()).resolves.toEqual([]);
    expect(table.calls.selectAll).toBe(2);
  });

  // ---------------------------------------------------------------------------
  // Derived values & invalidation
  // ---------------------------------------------------------------------------

  it('caches stats with the collection and drops them on mutation', async () => {
    const guests = repository();
    await expect(guests.fetchStats()).resolves.toEqual({
      totalGuests: 1,
      attendingGuests: 0,
      pendingGuests: 1,
      declinedGuests: 0,
      responseRate: 0
    });

    await guests.create({ firstName: 'Alan', lastName: 'Turing', rsvpStatus: 'attending' });
    await expect(guests.fetchStats()).resolves.toMatchObject({ totalGuests: 2, attendingGuests: 1, responseRate: 50 });
  });

  it("invalidates only the current tenant's entries", async () => {
    const guests = repository();
    await guests.fetchAll();
    session.setTenant('c2');
    await guests.fetchAll();

    guests.invalidateCache();
    expect(cache.has('guest_list:c1:all')).toBe(true);
    expect(cache.has('guest_list:c2:all')).toBe(false);
  });
});
