/**
 * Supabase Client for Backend
 * Uses the service role key; the catalog table is written by the importer only.
 */

import { createClient, SupabaseClient } from '@supabase/supabase-js';

export interface SupabaseSettings {
  url: string;
  serviceRoleKey: string;
}

export function createSupabaseAdmin(settings: SupabaseSettings): SupabaseClient {
  return createClient(settings.url, settings.serviceRoleKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
}
