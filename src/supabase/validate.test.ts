import { afterEach, describe, expect, it, vi } from 'vitest';
import { createNodeClient } from './client';
import { validateSchema, validateSupabaseCredentials } from './validate';

const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

function tableOf(input: string | URL | Request): string {
  const url = new URL(input instanceof Request ? input.url : String(input));
  return url.pathname.split('/').pop() ?? '';
}

describe('validateSupabaseCredentials', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('rejects a malformed URL without a request', async () => {
    await expect(validateSupabaseCredentials('not a url', 'test-anon-key')).resolves.toEqual({
      valid: false,
      error: 'Invalid Supabase URL format'
    });
  });

  it('accepts credentials when only the health-check table is missing', async () => {
    vi.stubGlobal('fetch', async () =>
      json({ code: '42P01', message: 'relation "public._health_check" does not exist' }, 404)
    );
    await expect(validateSupabaseCredentials('http://localhost:54321', 'test-anon-key')).resolves.toEqual({ valid: true });
  });

  it('rejects an invalid key', async () => {
    vi.stubGlobal('fetch', async () => json({ message: 'Invalid API key', hint: 'Double check your Supabase `anon` key.' }, 401));
    await expect(validateSupabaseCredentials('http://localhost:54321', 'test-anon-key')).resolves.toEqual({
      valid: false,
      error: 'Invalid Supabase credentials. Check your URL and Anon Key.'
    });
  });
});

describe('validateSchema', () => {
  it('reports missing and inaccessible tables', async () => {
    const fetch: typeof globalThis.fetch = async (input) => {
      switch (tableOf(input)) {
        case 'notes':
          return json({ code: '42P01', message: 'relation "public.notes" does not exist' }, 404);
        case 'payment_plans':
          return json({ code: '42501', message: 'permission denied for table payment_plans' }, 403);
        default:
          return json([]);
      }
    };
    const supabase = createNodeClient('http://localhost:54321', 'test-anon-key', { fetch });

    await expect(validateSchema(supabase, ['guest_list', 'notes', 'payment_plans'])).resolves.toEqual({
      valid: false,
      missingTables: ['notes'],
      errors: [
        'Table "notes" does not exist',
        'Table "payment_plans" exists but is not accessible (RLS or permissions error): permission denied for table payment_plans'
      ]
    });
  });

  it('passes when every table answers', async () => {
    const supabase = createNodeClient('http://localhost:54321', 'test-anon-key', { fetch: async () => json([]) });

    await expect(validateSchema(supabase, ['guest_list', 'expenses'])).resolves.toEqual({
      valid: true,
      missingTables: [],
      errors: []
    });
  });
});
