// src/lib/aliases/reconcile.test.ts
import { planAdditions, planRemovals } from './reconcile';

describe('planAdditions', () => {
  it('filters existing aliases and the primary, dedupes the rest', () => {
    expect(planAdditions('P1', new Set(['A1']), 'A1, a2\nP1, A3;A3')).toEqual(['A2', 'A3']);
  });

  it('compares against the canonical form of stored aliases', () => {
    expect(planAdditions('P1', ['gh97-18767c '], 'GH97-18767C')).toEqual([]);
    expect(planAdditions('P1', ['5.6061E+11'], '560610000000, 560610000001')).toEqual([
      '560610000001',
    ]);
  });

  it('never proposes the primary, whatever its formatting', () => {
    expect(planAdditions('560610000000', [], '5.6061e+11')).toEqual([]);
    expect(planAdditions(' p1 ', [], 'P1\np1')).toEqual([]);
  });

  it('returns a sorted list', () => {
    expect(planAdditions('P1', [], 'C3\nA1\nB2')).toEqual(['A1', 'B2', 'C3']);
  });

  it('returns empty for blank or separator-only input', () => {
    expect(planAdditions('P1', ['A1'], '')).toEqual([]);
    expect(planAdditions('P1', ['A1'], ' ,;\n ')).toEqual([]);
  });
});

describe('planRemovals', () => {
  it('rejects the whole batch when the primary is selected', () => {
    const plan = planRemovals('P1', new Set(['P1', 'A1']));
    expect(plan.ok).toBe(false);
    if (!plan.ok) expect(plan.error.kind).toBe('PrimaryProtected');
  });

  it('matches the primary in canonical form', () => {
    const plan = planRemovals('P1', ['A1', ' p1 ']);
    expect(plan).toEqual({
      ok: false,
      error: {
        kind: 'PrimaryProtected',
        message: 'Primary SKU P1 cannot be removed; nothing was deleted.',
      },
    });
  });

  it('rejects an empty selection', () => {
    const plan = planRemovals('P1', new Set<string>());
    expect(plan.ok).toBe(false);
    if (!plan.ok) expect(plan.error.kind).toBe('EmptySelection');
    expect(planRemovals('P1', ['', '  ']).ok).toBe(false);
  });

  it('passes the selection through as stored', () => {
    expect(planRemovals('P1', new Set(['A1', 'A2']))).toEqual({ ok: true, codes: ['A1', 'A2'] });
    expect(planRemovals('P1', ['a 1', 'a 1', ' '])).toEqual({ ok: true, codes: ['a 1'] });
  });
});
