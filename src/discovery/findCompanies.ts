import 'dotenv/config';
import { parseArgs } from 'node:util';
import { intFlag, loadConfig } from '../config.js';
import { ConfigError, DiscoveryError } from '../errors.js';
import { writeCsv } from '../utils/csv.js';
import { isMain } from '../utils/main.js';
import { collectColumns, discoverCompanies } from './discover.js';
import { DEFAULT_VERTICALS_PATH, SIZE_NAMES, loadVerticals, type SizeName } from './verticals.js';

const USAGE = `Find companies in target verticals for lead generation.

Usage:
  find-companies --vertical insurance [--output companies.csv] [--limit 20]
  find-companies --all-verticals [--apollo-key KEY] [--size small|mid|large]`;

function isSize(v: string): v is SizeName {
  return SIZE_NAMES.some((s) => s === v);
}

async function main() {
  const { values } = parseArgs({
    options: {
      vertical: { type: 'string' },
      'all-verticals': { type: 'boolean', default: false },
      'apollo-key': { type: 'string' },
      limit: { type: 'string' },
      size: { type: 'string', default: 'mid' },
      output: { type: 'string', default: 'companies.csv' },
      verticals: { type: 'string', default: DEFAULT_VERTICALS_PATH },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  const dataset = loadVerticals(values.verticals);
  if (values.help || (!values.vertical && !values['all-verticals'])) {
    console.log(`${USAGE}\n\nVerticals: ${[...dataset.verticals.keys()].join(', ')}`);
    return;
  }
  const size = values.size;
  if (!isSize(size)) throw new ConfigError(`--size must be one of ${SIZE_NAMES.join(', ')}`);

  const config = loadConfig();
  const apiKey = values['apollo-key'] || config.apolloApiKey;
  const limit = intFlag(values.limit, 'limit', 20, 1, 10_000);
  const verticals = values['all-verticals'] ? [...dataset.verticals.keys()] : [values.vertical ?? ''];

  console.log(`Finding companies in ${verticals.join(', ')} (${apiKey ? 'Apollo search' : 'bundled lists'})...`);
  const companies = await discoverCompanies(dataset, {
    verticals,
    limit,
    apiKey,
    size,
    onVertical: (vertical, found) => console.log(`  ${vertical}: ${found} companies`),
  });

  if (!companies.length) {
    console.log('No companies to export.');
    return;
  }
  writeCsv(values.output, collectColumns(companies), companies);
  console.log(`\nExported ${companies.length} companies to ${values.output}`);
  console.log(`Next step: npm run scrape -- --input ${values.output} --output qualified_leads.csv`);
}

if (isMain(import.meta.url)) {
  main().catch((e) => {
    console.error(e instanceof DiscoveryError || e instanceof ConfigError ? `${e.name}: ${e.message}` : e);
    process.exit(1);
  });
}
