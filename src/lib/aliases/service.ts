// src/lib/aliases/service.ts
// What the admin screen does: search, add, remove, refresh. The selected
// product is always passed in; nothing here remembers a selection.
import { applySequentially, shouldInvalidate, summarizeReport, type BatchReport } from './apply';
import { nothingToAdd, type BatchError } from './errors';
import { ListingCache } from './listingCache';
import { planAdditions, planRemovals } from './reconcile';
import { collectRows, type AliasStore, type ProductRow, type StoreWriteResult } from './types';

export type AliasBatchOutcome =
  | { status: 'rejected'; error: BatchError }
  | { status: 'applied'; report: BatchReport; invalidated: boolean };

export type AliasServiceOptions = {
  listingTtlMs?: number; // default 5 min
  cache?: ListingCache<ProductRow[]>;
};

function toOutcome(res: StoreWriteResult) {
  return res.ok ? ({ status: 'ok' } as const) : ({ status: 'failed', detail: res.detail } as const);
}

export class AliasAdminService {
  readonly cache: ListingCache<ProductRow[]>;

  constructor(
    private readonly store: AliasStore,
    opts: AliasServiceOptions = {},
  ) {
    this.cache = opts.cache ?? new ListingCache<ProductRow[]>(opts.listingTtlMs ?? 5 * 60 * 1000);
  }

  /** Products whose name contains `filter`, sorted by name. Cached per filter. */
  searchProducts(filter?: string | null): Promise<ProductRow[]> {
    const q = filter?.trim() || undefined;
    return this.cache.getOrLoad(q, () => collectRows(this.store.listProducts(q)));
  }

  getProduct(productId: string): Promise<ProductRow | null> {
    return this.store.getProduct(productId);
  }

  async addAliases(product: ProductRow, rawBlock: string): Promise<AliasBatchOutcome> {
    const toAdd = planAdditions(product.primarySku, product.allSkus, rawBlock);
    if (!toAdd.length) return { status: 'rejected', error: nothingToAdd() };

    console.log(`[aliases] adding ${toAdd.length} alias(es) to ${product.primarySku}`);
    const report = await applySequentially(toAdd, async (sku) =>
      toOutcome(await this.store.addAlias(product.productId, sku)),
    );
    return this.finish('add', product, report);
  }

  async removeAliases(product: ProductRow, requested: Iterable<string>): Promise<AliasBatchOutcome> {
    const plan = planRemovals(product.primarySku, requested);
    if (!plan.ok) return { status: 'rejected', error: plan.error };

    const report = await applySequentially(plan.codes, async (sku) =>
      toOutcome(await this.store.removeAlias(product.productId, sku)),
    );
    return this.finish('remove', product, report);
  }

  private finish(op: 'add' | 'remove', product: ProductRow, report: BatchReport): AliasBatchOutcome {
    for (const f of report.failed) {
      console.error(`[aliases] ${op} ${f.code} on ${product.primarySku} failed: ${f.detail}`);
    }
    console.log(`[aliases] ${op} on ${product.primarySku}: ${summarizeReport(report)}`);

    const invalidated = shouldInvalidate(report);
    if (invalidated) this.cache.invalidate();
    return { status: 'applied', report, invalidated };
  }
}
