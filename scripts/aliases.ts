/* scripts/aliases.ts
   Usage:
     npx tsx scripts/aliases.ts search "iPhone 11"
     npx tsx scripts/aliases.ts add <productId> "GH97-18767C, 5.6061E+11"
     npx tsx scripts/aliases.ts remove <productId> GH97-18767C 560610000000
*/
import 'dotenv/config';
import { getAliasService } from '../src/lib/aliases/server';
import type { AliasBatchOutcome } from '../src/lib/aliases/service';

const USAGE = 'Usage: npx tsx scripts/aliases.ts <search|add|remove> ...';

function printOutcome(outcome: AliasBatchOutcome) {
  if (outcome.status === 'rejected') {
    console.warn(`${outcome.error.kind}: ${outcome.error.message}`);
    return;
  }
  const { succeeded, failed } = outcome.report;
  if (succeeded.length) console.log(`OK: ${succeeded.join(', ')}`);
  if (failed.length) {
    console.error('Failed:');
    for (const f of failed) console.error(`- ${f.code} → ${f.detail}`);
  }
}

async function main() {
  const [, , cmd, ...args] = process.argv;
  const service = getAliasService();

  if (cmd === 'search') {
    const rows = await service.searchProducts(args.join(' '));
    if (!rows.length) {
      console.log('No products matched.');
      return;
    }
    console.table(
      rows.map((r) => ({ id: r.productId, name: r.name, primary: r.primarySku, aliases: r.aliases.join(', ') })),
    );
    return;
  }

  if (cmd === 'add' || cmd === 'remove') {
    const [productId, ...rest] = args;
    if (!productId || !rest.length) {
      console.error(USAGE);
      process.exit(1);
    }
    const product = await service.getProduct(productId);
    if (!product) {
      console.error(`Product ${productId} not found`);
      process.exit(1);
    }

    const outcome =
      cmd === 'add'
        ? await service.addAliases(product, rest.join('\n'))
        : await service.removeAliases(product, rest);
    printOutcome(outcome);
    if (outcome.status === 'applied' && outcome.report.failed.length) process.exitCode = 1;
    return;
  }

  console.error(USAGE);
  process.exit(1);
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
