/* scripts/ingest_synonyms.ts
   Usage:
     npx tsx scripts/ingest_synonyms.ts data/sku_synonyms.csv

   CSV columns: principal_code,name,alternative_code (one code per cell;
   a cell holding a separator is skipped with a warning, never split)
   Rows are grouped by principal; each group seeds its reference row first.
   Alternatives already bound to any principal are skipped, never overwritten.
*/
import 'dotenv/config';
import fs from 'fs';
import { parse } from 'csv-parse';
import { getSynonymStore } from '../src/lib/aliases/server';
import { addSynonyms } from '../src/lib/synonyms';
import { canonicalizeSingleSku, canonicalizeSku } from '../src/lib/sku';

const [, , csvPath] = process.argv;
if (!csvPath) {
  console.error('Usage: npx tsx scripts/ingest_synonyms.ts <csvPath>');
  process.exit(1);
}

type Group = { name: string | null; alternatives: string[] };

function field(r: Record<string, unknown>, key: string): string {
  return String(r[key] ?? '').trim();
}

async function main() {
  console.log(`Ingesting ${csvPath} -> sku_synonyms`);

  const parser = fs
    .createReadStream(csvPath)
    .pipe(parse({ columns: true, trim: true, skip_empty_lines: true }));

  const groups = new Map<string, Group>();
  let parsed = 0,
    skipped = 0;

  for await (const r of parser) {
    parsed++;
    const principal = canonicalizeSku(field(r, 'principal_code'));
    const cell = field(r, 'alternative_code');
    const alternative = canonicalizeSingleSku(cell);
    if (alternative === null) {
      console.warn(`Row ${parsed}: alternative_code "${cell}" holds several codes; skipped`);
      skipped++;
      continue;
    }
    if (!principal || !alternative) {
      skipped++;
      continue;
    }
    const g = groups.get(principal) ?? { name: null, alternatives: [] };
    g.name = g.name || field(r, 'name') || null;
    g.alternatives.push(alternative);
    groups.set(principal, g);
  }

  const store = getSynonymStore();
  let added = 0,
    dupes = 0,
    failed = 0;

  for (const [principal, g] of groups) {
    const outcome = await addSynonyms(store, {
      principal,
      name: g.name,
      rawBlock: g.alternatives.join('\n'),
    });
    if (outcome.status === 'rejected') {
      console.warn(`${principal}: ${outcome.error.kind} (${outcome.error.message})`);
      if (outcome.error.kind === 'SeedFailed') failed += g.alternatives.length;
      continue;
    }
    const { succeeded, skipped: sk, failed: fl } = outcome.report;
    added += succeeded.length;
    dupes += sk.length;
    failed += fl.length;
    for (const f of fl) console.error(`- ${principal} / ${f.code} → ${f.detail}`);
  }

  console.log(
    `Done. Parsed: ${parsed}. Principals: ${groups.size}. Added: ${added}. ` +
      `Skipped: ${skipped + dupes}. Failed: ${failed}.`,
  );
  if (failed) process.exitCode = 1;
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
