// src/lib/aliases/server.ts
// Process-wide wiring for route handlers and scripts. Built on first use so a
// missing env only fails the request that needs Supabase.
import type { SupabaseClient } from '@supabase/supabase-js';
import { loadConfig, type AppConfig } from '../config';
import { createSupabase } from '../supaClient';
import { createSupabaseSynonymStore, type SynonymStore } from '../synonyms';
import { AliasAdminService } from './service';
import { createSupabaseAliasStore } from './store';

let CTX: { config: AppConfig; sb: SupabaseClient } | null = null;
let SERVICE: AliasAdminService | null = null;
let SYNONYMS: SynonymStore | null = null;

function context() {
  if (!CTX) {
    const config = loadConfig();
    CTX = { config, sb: createSupabase(config) };
  }
  return CTX;
}

export function getAliasService(): AliasAdminService {
  if (!SERVICE) {
    const { config, sb } = context();
    SERVICE = new AliasAdminService(createSupabaseAliasStore(sb, { pageSize: config.pageSize }), {
      listingTtlMs: config.listingTtlMs,
    });
  }
  return SERVICE;
}

export function getSynonymStore(): SynonymStore {
  if (!SYNONYMS) SYNONYMS = createSupabaseSynonymStore(context().sb);
  return SYNONYMS;
}
