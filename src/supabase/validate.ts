/**
 * Setup checks against a Supabase project.
 *
 * {@link validateSupabaseCredentials} answers "can these credentials talk to
 * the project at all?" before anything is configured.
 * {@link validateSchema} answers "does the project have every table the
 * planner reads?" once a client exists.
 *
 * Both report problems as values; neither throws.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { debugError, debugLog } from '../debug';
import { extractErrorMessage } from '../errors';
import { createNodeClient } from './client';

export interface CredentialCheck {
  valid: boolean;
  error?: string;
}

export interface SchemaCheck {
  valid: boolean;
  missingTables: string[];
  errors: string[];
}

interface QueryFailure {
  message?: string;
  code?: string;
}

const isMissingRelation = (failure: QueryFailure) =>
  failure.code === '42P01' || (/relation .* does not exist/.test(failure.message ?? ''));

const isPermissionDenied = (failure: QueryFailure) =>
  failure.code === '42501' || (failure.message ?? '').includes('permission denied');

/**
 * Check a project with a one-row read of `testTable`. A "relation does not
 * exist" answer still proves the URL and key are accepted.
 */
export async function validateSupabaseCredentials(
  url: string,
  anonKey: string,
  testTable = '_health_check'
): Promise<CredentialCheck> {
  if (!URL.canParse(url)) {
    return { valid: false, error: 'Invalid Supabase URL format' };
  }

  try {
    const { error } = await createNodeClient(url, anonKey).from(testTable).select('id').limit(1);
    if (!error || isMissingRelation(error)) return { valid: true };

    if (error.code === 'PGRST301' || error.message.includes('Invalid API key')) {
      return { valid: false, error: 'Invalid Supabase credentials. Check your URL and Anon Key.' };
    }
    return { valid: false, error: `Supabase responded with an error: ${error.message}` };
  } catch (e) {
    return { valid: false, error: `Could not connect to Supabase: ${extractErrorMessage(e)}` };
  }
}

/** One problem line for `table`, or `null` when it answered. */
async function checkTable(client: SupabaseClient, table: string): Promise<{ missing: boolean; problem: string } | null> {
  try {
    const { error } = await client.from(table).select('id').limit(0);
    if (!error) return null;
    if (isMissingRelation(error)) return { missing: true, problem: `Table "${table}" does not exist` };
    if (isPermissionDenied(error)) {
      return {
        missing: false,
        problem: `Table "${table}" exists but is not accessible (RLS or permissions error): ${error.message}`
      };
    }
    return { missing: false, problem: `Table "${table}": ${error.message}` };
  } catch (e) {
    return { missing: false, problem: `Table "${table}": ${extractErrorMessage(e)}` };
  }
}

/**
 * Check each table with a zero-row read, in order.
 *
 * @example
 * const { valid, errors } = await validateSchema(getSupabase(), PLANNER_TABLES);
 */
export async function validateSchema(client: SupabaseClient, tableNames: readonly string[]): Promise<SchemaCheck> {
  const result: SchemaCheck = { valid: true, missingTables: [], errors: [] };

  for (const table of tableNames) {
    const failure = await checkTable(client, table);
    if (!failure) continue;
    if (failure.missing) result.missingTables.push(table);
    result.errors.push(failure.problem);
  }

  result.valid = result.errors.length === 0;
  if (result.valid) {
    debugLog(`[Schema] ${tableNames.length} planner tables validated`);
  } else {
    for (const problem of result.errors) debugError('[Schema]', problem);
  }
  return result;
}
