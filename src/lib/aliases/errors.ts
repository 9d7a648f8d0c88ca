// src/lib/aliases/errors.ts
// Batch-level and per-code outcomes. Returned as values, never thrown.

export type RemovalErrorKind = 'PrimaryProtected' | 'EmptySelection';

export type RemovalError = {
  kind: RemovalErrorKind;
  message: string;
};

export type BatchErrorKind =
  | RemovalErrorKind
  | 'NothingToAdd'
  | 'EmptyPrincipal'
  | 'SeedFailed'
  | 'ProductNotFound';

export type BatchError = {
  kind: BatchErrorKind;
  message: string;
};

export type SkipReason = 'principal' | 'DuplicateGlobalCode';

/** Per-code failure: the call threw, returned an error, or returned no data. */
export type MutationFailed = { code: string; detail: string };

export type Skipped = { code: string; reason: SkipReason; detail?: string };

export function primaryProtected(primary: string): RemovalError {
  return {
    kind: 'PrimaryProtected',
    message: `Primary SKU ${primary} cannot be removed; nothing was deleted.`,
  };
}

export function emptySelection(): RemovalError {
  return { kind: 'EmptySelection', message: 'Select at least one alias to remove.' };
}

export function nothingToAdd(): BatchError {
  return { kind: 'NothingToAdd', message: 'Nothing to add: every SKU is already linked.' };
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  if (typeof e === 'string') return e;
  if (e && typeof e === 'object' && 'message' in e && typeof e.message === 'string') {
    return e.message;
  }
  return String(e);
}
