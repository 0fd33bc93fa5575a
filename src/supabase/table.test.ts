import { describe, expect, it } from 'vitest';
import { createNodeClient } from './client';
import { createSupabaseTable } from './table';

interface Recorded {
  method: string;
  url: URL;
}

function client(respond: (request: Recorded) => Response) {
  const requests: Recorded[] = [];
  const fetch: typeof globalThis.fetch = async (input, init) => {
    const url = new URL(input instanceof Request ? input.url : String(input));
    const recorded = { method: init?.method ?? 'GET', url };
    requests.push(recorded);
    return respond(recorded);
  };
  const supabase = createNodeClient('http://localhost:54321', 'test-anon-key', { fetch });
  return { supabase, requests };
}

const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

describe('createSupabaseTable', () => {
  it('scopes selects to the tenant and applies the ordering', async () => {
    const { supabase, requests } = client(() => json([{ id: 't1', couple_id: 'c1', item_date: '2026-05-01' }]));
    const table = createSupabaseTable(supabase, { table: 'timeline_items', orderBy: { column: 'item_date' } });

    await expect(table.selectAll('c1')).resolves.toEqual([{ id: 't1', couple_id: 'c1', item_date: '2026-05-01' }]);
    expect(requests[0].url.pathname).toBe('/rest/v1/timeline_items');
    expect(requests[0].url.searchParams.get('couple_id')).toBe('eq.c1');
    expect(requests[0].url.searchParams.get('order')).toBe('item_date.asc');
  });

  it('returns the inserted row', async () => {
    const { supabase, requests } = client(() => json({ id: 'g1', couple_id: 'c1', first_name: 'Ada' }, 201));
    const table = createSupabaseTable(supabase, { table: 'guest_list' });

    await expect(table.insert({ couple_id: 'c1', first_name: 'Ada' })).resolves.toEqual({
      id: 'g1',
      couple_id: 'c1',
      first_name: 'Ada'
    });
    expect(requests[0].method).toBe('POST');
  });

  it('counts deleted rows within the tenant', async () => {
    const { supabase, requests } = client(() => json([{ id: 'g1' }]));
    const table = createSupabaseTable(supabase, { table: 'guest_list' });

    await expect(table.delete('c1', 'g1')).resolves.toBe(1);
    expect(requests[0].method).toBe('DELETE');
    expect(requests[0].url.searchParams.get('id')).toBe('eq.g1');
    expect(requests[0].url.searchParams.get('couple_id')).toBe('eq.c1');
  });

  it('reports an RLS-blocked delete as zero rows', async () => {
    const { supabase } = client(() => json([]));
    const table = createSupabaseTable(supabase, { table: 'guest_list' });

    await expect(table.delete('c1', 'g1')).resolves.toBe(0);
  });

  it('throws classified errors with the HTTP status', async () => {
    const { supabase } = client(() => json({ code: 'PGRST301', message: 'JWT expired' }, 401));
    const table = createSupabaseTable(supabase, { table: 'guest_list' });

    await expect(table.selectAll('c1')).rejects.toMatchObject({
      name: 'NetworkError',
      kind: 'unauthorized',
      status: 401,
      code: 'PGRST301'
    });
  });
});
