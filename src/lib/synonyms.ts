// src/lib/synonyms.ts
// Name-keyed synonym table: sku_synonyms(alternative_code unique, principal_code, name).
// Every principal gets a reference row pointing at itself before any alternative lands.
import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { canonicalizeSku, parseSkuBlock } from './sku';
import { applySequentially, emptyReport, type BatchReport } from './aliases/apply';
import { errorMessage, nothingToAdd, type BatchError } from './aliases/errors';
import { writeResult } from './aliases/store';
import type { StoreWriteResult } from './aliases/types';

export const SYNONYMS_TABLE = 'sku_synonyms';

const SynonymRowSchema = z.object({
  alternative_code: z.string(),
  principal_code: z.string(),
  name: z.string().nullable().optional(),
});

export type SynonymRow = z.infer<typeof SynonymRowSchema>;

export interface SynonymStore {
  countByPrincipal(principal: string): Promise<number>;
  /** Point lookup on the global unique key. */
  findByAlternative(code: string): Promise<SynonymRow | null>;
  insert(row: SynonymRow): Promise<StoreWriteResult>;
}

export type SynonymRequest = {
  principal: string;
  name?: string | null;
  rawBlock: string;
};

export type SynonymOutcome =
  | { status: 'rejected'; error: BatchError }
  | { status: 'applied'; principal: string; seeded: boolean; report: BatchReport };

export function createSupabaseSynonymStore(sb: SupabaseClient): SynonymStore {
  return {
    async countByPrincipal(principal) {
      const { count, error } = await sb
        .from(SYNONYMS_TABLE)
        .select('alternative_code', { count: 'exact', head: true })
        .eq('principal_code', principal);
      if (error) throw new Error(`Counting ${SYNONYMS_TABLE} failed: ${error.message}`);
      return count ?? 0;
    },

    async findByAlternative(code) {
      const { data, error } = await sb
        .from(SYNONYMS_TABLE)
        .select('alternative_code, principal_code, name')
        .eq('alternative_code', code)
        .maybeSingle();
      if (error) throw new Error(`Lookup of ${code} failed: ${error.message}`);
      if (!data) return null;
      const parsed = SynonymRowSchema.safeParse(data);
      return parsed.success ? parsed.data : null;
    },

    async insert(row) {
      try {
        const { data, error } = await sb.from(SYNONYMS_TABLE).insert(row).select('alternative_code');
        return writeResult(error, data, 'Insert returned no row');
      } catch (e) {
        return { ok: false, duplicate: false, detail: errorMessage(e) };
      }
    },
  };
}

/**
 * Seed the reference row if the principal has no rows yet. A duplicate key is
 * fine only when the existing row is the principal's own reference row; the
 * principal's code bound to another principal is an error.
 */
async function ensureReferenceRow(
  store: SynonymStore,
  principal: string,
  name: string | null,
): Promise<{ seeded: boolean; error?: string }> {
  if ((await store.countByPrincipal(principal)) > 0) return { seeded: false };

  const res = await store.insert({ alternative_code: principal, principal_code: principal, name });
  if (res.ok) return { seeded: true };
  if (!res.duplicate) return { seeded: false, error: res.detail };

  const existing = await store.findByAlternative(principal);
  if (existing && existing.principal_code !== principal) {
    return { seeded: false, error: `${principal} is already bound to ${existing.principal_code}` };
  }
  return { seeded: false };
}

/**
 * Add alternative codes for one principal. Codes already bound anywhere are
 * skipped after a point lookup, never overwritten.
 */
export async function addSynonyms(
  store: SynonymStore,
  req: SynonymRequest,
): Promise<SynonymOutcome> {
  const principal = canonicalizeSku(req.principal);
  if (!principal) {
    return {
      status: 'rejected',
      error: { kind: 'EmptyPrincipal', message: 'A principal SKU is required.' },
    };
  }

  const candidates = parseSkuBlock(req.rawBlock);
  if (!candidates.length) return { status: 'rejected', error: nothingToAdd() };

  const name = req.name?.trim() || null;
  let seed: { seeded: boolean; error?: string };
  try {
    seed = await ensureReferenceRow(store, principal, name);
  } catch (e) {
    seed = { seeded: false, error: errorMessage(e) };
  }
  if (seed.error !== undefined) {
    console.error(`[synonyms] reference row for ${principal} failed:`, seed.error);
    return {
      status: 'rejected',
      error: { kind: 'SeedFailed', message: `Could not seed ${principal}: ${seed.error}` },
    };
  }

  const report = await applySequentially(candidates, async (code) => {
    if (code === principal) return { status: 'skipped', reason: 'principal' };

    const bound = await store.findByAlternative(code);
    if (bound) {
      return {
        status: 'skipped',
        reason: 'DuplicateGlobalCode',
        detail: `already bound to ${bound.principal_code}`,
      };
    }

    const res = await store.insert({ alternative_code: code, principal_code: principal, name });
    if (res.ok) return { status: 'ok' };
    if (res.duplicate) {
      return { status: 'skipped', reason: 'DuplicateGlobalCode', detail: res.detail };
    }
    return { status: 'failed', detail: res.detail };
  }, emptyReport());

  return { status: 'applied', principal, seeded: seed.seeded, report };
}
