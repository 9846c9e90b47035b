import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { config } from './index.js';

/**
 * Create a Supabase client with the service role (server-side access to every table)
 */
export function createServiceClient(): SupabaseClient {
  return createClient(config.supabase.url, config.supabase.serviceRoleKey, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
    },
  });
}
