import { get } from 'svelte/store';
import { beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_SETTINGS } from './features/settings';
import { createPlanner, PLANNER_TABLES, type PlannerOptions } from './planner';
import { createTenantSession, staticTenant, type TenantSession } from './session';
import { createMemoryTable, type MemoryTable } from './testing/memoryTable';

function guestRow(id: string, coupleId: string, firstName: string) {
  return { id, couple_id: coupleId, first_name: firstName, last_name: 'Test', created_at: '2026-01-01T00:00:00.000Z' };
}

function elementRow(id: string, boardId: string, zIndex: number) {
  return { id, mood_board_id: boardId, element_type: 'color', z_index: zIndex, created_at: '2026-01-01T00:00:00.000Z' };
}

describe('createPlanner', () => {
  let session: TenantSession;
  let tables: Record<string, MemoryTable>;

  function planner(overrides: Partial<PlannerOptions> = {}) {
    return createPlanner({
      tenant: session,
      tables,
      retry: { maxAttempts: 1, baseDelayMs: 0, maxDelayMs: 0 },
      requestTimeoutMs: 0,
      ...overrides
    });
  }

  beforeEach(() => {
    session = createTenantSession('c1');
    tables = {};
    for (const name of PLANNER_TABLES) tables[name] = createMemoryTable({ name });
    tables.guest_list = createMemoryTable({
      name: 'guest_list',
      rows: [guestRow('g1', 'c1', 'Ada'), guestRow('g2', 'c2', 'Grace')]
    });
    tables.visual_elements = createMemoryTable({
      name: 'visual_elements',
      tenantColumn: 'mood_board_id',
      rows: [elementRow('e1', 'b1', 3), elementRow('e2', 'b1', 1), elementRow('e3', 'b2', 0)]
    });
  });

  it('covers every planning table', () => {
    expect(PLANNER_TABLES).toEqual([
      'guest_list',
      'wedding_tasks',
      'vendor_information',
      'notes',
      'timeline_items',
      'wedding_milestones',
      'budget_categories',
      'expenses',
      'payment_plans',
      'documents',
      'seating_charts',
      'mood_boards',
      'visual_elements',
      'affordability_scenarios',
      'couple_settings'
    ]);
  });

  it('loads every store from its table', async () => {
    const p = planner();
    await p.loadAll();

    expect(get(p.stores.guests).items.map((g) => g.id)).toEqual(['g1']);
    for (const name of PLANNER_TABLES) {
      // Board elements load per board, not with the planner
      expect(tables[name].calls.selectAll).toBe(name === 'visual_elements' ? 0 : 1);
    }
  });

  it('seeds default settings for a couple without a settings row', async () => {
    const p = planner();
    await p.loadAll();

    expect(get(p.stores.settings.settings)).toEqual(DEFAULT_SETTINGS);
    expect(tables.couple_settings.rows()).toMatchObject([{ couple_id: 'c1' }]);

    session.setTenant('c2');
    expect(get(p.stores.settings)).toBeNull();
  });

  it('keeps one element store per mood board until the tenant changes', async () => {
    const p = planner();
    const elements = p.moodBoardElements('b1');
    expect(p.moodBoardElements('b1')).toBe(elements);

    await elements.load();
    expect(get(elements.layers).map((e) => e.id)).toEqual(['e2', 'e1']);

    session.setTenant('c2');
    expect(get(elements).items).toEqual([]);
    expect(p.moodBoardElements('b1')).not.toBe(elements);
  });

  it('clears cached and visible data when the tenant changes', async () => {
    const p = planner();
    await p.loadAll();
    // The settings read is invalidated by the defaults row it creates
    expect(p.cache.statistics().activeEntries).toBe(13);

    session.setTenant('c2');
    expect(get(p.stores.guests).items).toEqual([]);
    expect(p.cache.statistics().activeEntries).toBe(0);

    await p.loadAll();
    expect(get(p.stores.guests).items.map((g) => g.id)).toEqual(['g2']);
  });

  it('does not send a mutation queued for the previous tenant', async () => {
    const p = planner();
    await p.loadAll();

    const created = p.stores.guests.create({ firstName: 'Alan', lastName: 'Turing' });
    session.setTenant('c2');

    await expect(created).resolves.toMatchObject({
      ok: false,
      error: { kind: 'createFailed', message: 'guest createFailed: Tenant changed before the request was sent' }
    });
    expect(tables.guest_list.calls.insert).toBe(0);
    expect(get(p.activity).pendingCount).toBe(0);
  });

  it('reports store failures to the shared activity store', async () => {
    tables.wedding_tasks.failNext('selectAll');
    const p = planner();
    await p.loadAll();

    expect(get(p.activity).errors).toMatchObject([{ feature: 'task', operation: 'load', kind: 'fetchFailed' }]);
    expect(get(p.stores.tasks).error?.kind).toBe('fetchFailed');
    expect(get(p.stores.guests).error).toBeNull();
  });

  it('fails every load closed without a tenant', async () => {
    const p = planner({ tenant: staticTenant(null) });
    await p.loadAll();

    expect(get(p.stores.vendors).error?.kind).toBe('unauthorized');
    expect(tables.vendor_information.calls.selectAll).toBe(0);
  });

  it('serves guest stats through the shared cache', async () => {
    const p = planner();
    await expect(p.repositories.guests.fetchStats()).resolves.toMatchObject({ totalGuests: 1, pendingGuests: 1 });
    await p.repositories.guests.fetchAll();
    expect(tables.guest_list.calls.selectAll).toBe(1);
  });

  it('stops following the session after dispose', async () => {
    const p = planner();
    p.dispose();
    await p.loadAll();

    session.setTenant('c2');
    expect(get(p.stores.guests).items.map((g) => g.id)).toEqual(['g1']);
  });
});
