// src/lib/aliases/apply.ts
// Sequential per-code apply. No transaction: each call stands alone.

import { errorMessage, type MutationFailed, type Skipped, type SkipReason } from './errors';

export type MutationOutcome =
  | { status: 'ok' }
  | { status: 'failed'; detail: string }
  | { status: 'skipped'; reason: SkipReason; detail?: string };

export type BatchReport = {
  succeeded: string[];
  failed: MutationFailed[];
  skipped: Skipped[];
};

export type Mutation = (code: string) => Promise<MutationOutcome>;

export function emptyReport(): BatchReport {
  return { succeeded: [], failed: [], skipped: [] };
}

/**
 * Run `mutate` for each code, one at a time. A throw or rejection counts as a
 * failure for that code only; the rest of the batch still runs.
 */
export async function applySequentially(
  codes: readonly string[],
  mutate: Mutation,
  report: BatchReport = emptyReport(),
): Promise<BatchReport> {
  for (const code of codes) {
    let outcome: MutationOutcome;
    try {
      outcome = await mutate(code);
    } catch (e) {
      outcome = { status: 'failed', detail: errorMessage(e) };
    }

    if (outcome.status === 'ok') report.succeeded.push(code);
    else if (outcome.status === 'failed') report.failed.push({ code, detail: outcome.detail });
    else report.skipped.push({ code, reason: outcome.reason, detail: outcome.detail });
  }
  return report;
}

/** Refresh the listing only after a clean batch; on failure keep context for a retry. */
export function shouldInvalidate(report: BatchReport): boolean {
  return report.succeeded.length > 0 && report.failed.length === 0;
}

export function summarizeReport(report: BatchReport): string {
  const parts = [`${report.succeeded.length} ok`];
  if (report.skipped.length) parts.push(`${report.skipped.length} skipped`);
  if (report.failed.length) parts.push(`${report.failed.length} failed`);
  return parts.join(', ');
}
