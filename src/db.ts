/**
 * Supabase client factory.
 * Server-side only: uses the service role key and never persists a session.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

export function getSupabaseClient(url: string, serviceRoleKey: string): SupabaseClient {
  return createClient(url, serviceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/** Ids that can't be a uuid can't match a row; callers skip the round trip. */
export function isUuid(value: string): boolean {
  return UUID_PATTERN.test(value);
}
