// src/lib/supaClient.ts
import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { AppConfig } from './config';

// Server-only client with service role (no session persisted)
export function createSupabase(config: AppConfig): SupabaseClient {
  return createClient(config.supabaseUrl, config.supabaseKey, {
    auth: { persistSession: false },
  });
}
