// src/lib/aliases/types.ts
import { z } from 'zod';

// One row of public.v_aliases_by_product. all_skus includes the primary.
export const ProductViewRowSchema = z.object({
  product_id: z.union([z.string(), z.number()]).transform(String),
  name: z.string().nullable().transform((v) => v ?? ''),
  primary_sku: z.string(),
  all_skus: z
    .array(z.string())
    .nullable()
    .optional()
    .catch([])
    .transform((v) => v ?? []),
});

export type ProductRow = {
  productId: string;
  name: string;
  primarySku: string;
  allSkus: string[];
  aliases: string[]; // allSkus minus the primary, sorted
};

export function toProductRow(raw: unknown): ProductRow | null {
  const parsed = ProductViewRowSchema.safeParse(raw);
  if (!parsed.success) return null;
  const r = parsed.data;
  return {
    productId: r.product_id,
    name: r.name,
    primarySku: r.primary_sku,
    allSkus: r.all_skus,
    aliases: r.all_skus.filter((s) => s !== r.primary_sku).sort(),
  };
}

export interface AliasStore {
  /** Lazy, finite, restartable: every iteration re-reads from the first page. */
  listProducts(filter?: string): AsyncIterable<ProductRow>;
  getProduct(productId: string): Promise<ProductRow | null>;
  addAlias(productId: string, sku: string): Promise<StoreWriteResult>;
  removeAlias(productId: string, sku: string): Promise<StoreWriteResult>;
}

export type StoreWriteResult =
  | { ok: true }
  | { ok: false; duplicate: boolean; detail: string };

export async function collectRows<T>(rows: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const r of rows) out.push(r);
  return out;
}
