// src/lib/aliases/reconcile.ts
// Pure planning: which codes to add, which to remove. No I/O here.

import { canonicalizeSku, canonicalSkuSet, parseSkuBlock } from '../sku';
import { emptySelection, primaryProtected, type RemovalError } from './errors';

export type RemovalPlan = { ok: true; codes: string[] } | { ok: false; error: RemovalError };

/**
 * Canonical codes from `rawBlock` that are neither the primary nor already an
 * alias. Existing aliases are canonicalized before the diff, so a stored
 * "gh97 18767c" matches a typed "GH97-18767C ".
 *
 * An empty array means "nothing new", not an error.
 */
export function planAdditions(
  primary: string,
  existingAliases: Iterable<string>,
  rawBlock: string,
): string[] {
  const taken = canonicalSkuSet(existingAliases);
  const primaryCanon = canonicalizeSku(primary);
  if (primaryCanon) taken.add(primaryCanon);

  return parseSkuBlock(rawBlock)
    .filter((sku) => !taken.has(sku))
    .sort();
}

/**
 * Validate an operator's removal selection. The primary code anywhere in the
 * batch rejects the whole batch; an empty selection is an error too.
 * Requested codes pass through as stored (deduped, order kept).
 */
export function planRemovals(primary: string, requested: Iterable<string>): RemovalPlan {
  const codes = Array.from(new Set(Array.from(requested).filter((s) => s.trim() !== '')));
  if (!codes.length) return { ok: false, error: emptySelection() };

  const primaryCanon = canonicalizeSku(primary);
  if (codes.some((s) => canonicalizeSku(s) === primaryCanon)) {
    return { ok: false, error: primaryProtected(primary) };
  }
  return { ok: true, codes };
}
