#!/usr/bin/env ts-node
/**
 * Campaign Tree Builder
 *
 * Validates a recipients CSV (address,amount), builds the campaign's Merkle
 * tree offline and prints the root. Nothing is pinned.
 *
 * Usage:
 *   npm run build-tree -- recipients.csv --decimals 6
 *   npm run build-tree -- recipients.csv --decimals 6 --out campaign.json
 *
 * Exit codes: 0 on success, 1 on validation errors or unreadable input.
 */

import * as path from 'path';
import * as fs from 'fs';
import { parseCampaignCsv } from '../src/ingestion';
import { assembleCampaign } from '../src/campaign';
import { getLeafCount } from '../src/merkle';
import { parseDecimals } from '../src/api/state';

function usage(): never {
  console.error('Usage: build-tree <file.csv> --decimals N [--out file.json]');
  process.exit(1);
}

async function main() {
  const args = process.argv.slice(2);
  const decimalsIdx = args.indexOf('--decimals');
  const outIdx = args.indexOf('--out');

  const csvPath = args.find((arg, i) => !arg.startsWith('--') && i !== decimalsIdx + 1 && i !== outIdx + 1);
  const decimalsArg = decimalsIdx >= 0 ? args[decimalsIdx + 1] : undefined;
  const outPath = outIdx >= 0 ? args[outIdx + 1] : undefined;

  const decimals = parseDecimals(decimalsArg);
  if (!csvPath || decimals === undefined || (outIdx >= 0 && !outPath)) {
    usage();
  }

  const text = fs.readFileSync(path.resolve(csvPath), 'utf-8');
  const parsed = parseCampaignCsv(text, decimals);

  if (parsed.validationErrors.length > 0) {
    console.error(`Invalid csv file: ${parsed.validationErrors.length} problem(s)`);
    for (const { row, message } of parsed.validationErrors) {
      console.error(`  row ${row}: ${message}`);
    }
    process.exit(1);
  }

  const { tree, document } = assembleCampaign(parsed.records);

  console.log(`  Recipients:  ${document.number_of_recipients}`);
  console.log(`  Total:       ${document.total_amount} (base units)`);
  console.log(`  Levels:      ${tree.tree.length} (${getLeafCount(tree)} leaves)`);
  console.log(`  Root:        ${tree.root}`);

  if (outPath) {
    const resolved = path.resolve(outPath);
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
    fs.writeFileSync(resolved, JSON.stringify(document, null, 2) + '\n');
    console.log(`\n  Campaign document saved to: ${resolved}`);
  }
}

main().catch(err => {
  console.error('Error:', err);
  process.exit(1);
});
