// src/lib/aliases/store.ts
// Supabase-backed AliasStore: view v_aliases_by_product + add/remove RPCs.
import type { PostgrestError, SupabaseClient } from '@supabase/supabase-js';
import { errorMessage } from './errors';
import { toProductRow, type AliasStore, type ProductRow, type StoreWriteResult } from './types';

export const PRODUCTS_VIEW = 'v_aliases_by_product';
export const UNIQUE_VIOLATION = '23505';

export type SupabaseAliasStoreOptions = {
  pageSize?: number; // default 1000
};

function hasData(data: unknown): boolean {
  if (Array.isArray(data)) return data.length > 0;
  return data !== null && data !== undefined && data !== false;
}

export function writeResult(
  error: PostgrestError | null,
  data: unknown,
  emptyDetail: string,
): StoreWriteResult {
  if (error) {
    return { ok: false, duplicate: error.code === UNIQUE_VIOLATION, detail: error.message };
  }
  if (!hasData(data)) return { ok: false, duplicate: false, detail: emptyDetail };
  return { ok: true };
}

function rowsFrom(data: unknown[] | null): ProductRow[] {
  const rows: ProductRow[] = [];
  for (const raw of data ?? []) {
    const row = toProductRow(raw);
    if (row) rows.push(row);
    else console.warn('[aliases] skipping malformed product row', raw);
  }
  return rows;
}

export function createSupabaseAliasStore(
  sb: SupabaseClient,
  opts: SupabaseAliasStoreOptions = {},
): AliasStore {
  const pageSize = opts.pageSize ?? 1000;

  async function* pages(filter: string | undefined): AsyncGenerator<ProductRow> {
    let start = 0;
    for (;;) {
      let sel = sb.from(PRODUCTS_VIEW).select('*');
      if (filter) sel = sel.ilike('name', `%${filter}%`);
      const { data, error } = await sel.order('name').range(start, start + pageSize - 1);
      if (error) throw new Error(`Listing ${PRODUCTS_VIEW} failed: ${error.message}`);

      const page: unknown[] = data ?? [];
      yield* rowsFrom(page);
      if (page.length < pageSize) return;
      start += pageSize;
    }
  }

  return {
    listProducts(filter?: string): AsyncIterable<ProductRow> {
      const q = filter?.trim() || undefined;
      return { [Symbol.asyncIterator]: () => pages(q) };
    },

    async getProduct(productId: string): Promise<ProductRow | null> {
      const { data, error } = await sb
        .from(PRODUCTS_VIEW)
        .select('*')
        .eq('product_id', productId)
        .limit(1);
      if (error) throw new Error(`Reading product ${productId} failed: ${error.message}`);
      return rowsFrom(data)[0] ?? null;
    },

    async addAlias(productId: string, sku: string): Promise<StoreWriteResult> {
      try {
        const { data, error } = await sb.rpc('add_alias_sku', { p_product_id: productId, p_sku: sku });
        return writeResult(error, data, 'RPC returned no data');
      } catch (e) {
        return { ok: false, duplicate: false, detail: errorMessage(e) };
      }
    },

    async removeAlias(productId: string, sku: string): Promise<StoreWriteResult> {
      try {
        const { data, error } = await sb.rpc('remove_alias_sku', { p_product_id: productId, p_sku: sku });
        // No row back usually means the alias was not there
        return writeResult(error, data, 'No row deleted (maybe it did not exist)');
      } catch (e) {
        return { ok: false, duplicate: false, detail: errorMessage(e) };
      }
    },
  };
}
