import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { GatewayConfig } from './config';

let supabaseInstance: SupabaseClient | null = null;

export const getSupabase = (config: GatewayConfig): SupabaseClient | null => {
  if (supabaseInstance) return supabaseInstance;

  const { url, serviceRoleKey } = config.supabase;

  if (!url || !serviceRoleKey) {
    console.error(
      '[Supabase] Configuration missing: SUPABASE_URL or SUPABASE_SERVICE_ROLE_KEY not set. ' +
      'Quest and Health Index persistence will be unavailable.'
    );
    return null;
  }

  supabaseInstance = createClient(url, serviceRoleKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false
    }
  });
  return supabaseInstance;
};
