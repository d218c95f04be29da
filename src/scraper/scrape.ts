import 'dotenv/config';
import fs from 'node:fs';
import { parseArgs } from 'node:util';
import cliProgress from 'cli-progress';
import { loadConfig, intFlag } from '../config.js';
import { ConfigError, InputError } from '../errors.js';
import { readCsv } from '../utils/csv.js';
import { isMain } from '../utils/main.js';
import type { CompanyRecord, InspectionResult } from '../types.js';
import { configureHttp, createFetcher } from './fetcher.js';
import { inspectCompany, type InspectOptions, type InspectorDeps } from './inspector.js';
import { PlaywrightRenderer } from './renderer.js';
import { runBatch } from './batch.js';
import { writeBatchOutputs } from './output.js';

const USAGE = `Find companies that collect phone numbers on their websites.

Usage:
  scrape --url https://example.com [--json]
  scrape --input companies.csv [--output qualified_leads.csv] [--url-column website]
         [--workers 5] [--timeout 10000] [--no-subpages] [--render]`;

async function main() {
  const { values } = parseArgs({
    options: {
      url: { type: 'string' },
      input: { type: 'string' },
      output: { type: 'string', default: 'qualified_leads.csv' },
      'url-column': { type: 'string', default: 'website' },
      workers: { type: 'string' },
      timeout: { type: 'string' },
      'no-subpages': { type: 'boolean', default: false },
      render: { type: 'boolean', default: false },
      json: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  if (values.help || (!values.url && !values.input)) {
    console.log(USAGE);
    return;
  }

  const config = loadConfig();
  const timeoutMs = intFlag(values.timeout, 'timeout', config.timeoutMs, 100, 120_000);
  const concurrency = intFlag(values.workers, 'workers', config.concurrency, 1, 100);
  configureHttp();

  const renderer = values.render || config.render ? new PlaywrightRenderer({ timeoutMs: timeoutMs * 2 }) : undefined;
  const deps: InspectorDeps = { fetcher: createFetcher({ timeoutMs }), renderer };
  const inspectOpts: InspectOptions = {
    subpages: !values['no-subpages'],
    maxPages: config.maxPages,
    discoverLinks: config.discoverLinks,
    renderPages: config.renderPages,
  };

  try {
    if (values.url) {
      await checkSingle(values.url, deps, inspectOpts, values.json);
    } else if (values.input) {
      await checkFile(values.input, values.output, values['url-column'], concurrency, deps, inspectOpts, config.summaryOut);
    }
  } finally {
    await renderer?.close();
  }
}

async function checkSingle(url: string, deps: InspectorDeps, opts: InspectOptions, json: boolean) {
  const company: CompanyRecord = { index: 0, name: '', website: url, row: { website: url } };
  if (!json) console.log(`\nChecking: ${url}\n${'-'.repeat(50)}`);
  const result = await inspectCompany(company, deps, opts);
  if (json) {
    console.log(JSON.stringify(result, null, 2));
    return;
  }
  printVerdict(result);
}

function printVerdict(result: InspectionResult) {
  if (result.status === 'error') {
    console.log(`Error: ${result.errorDetail}`);
  } else if (result.match) {
    console.log('QUALIFIED - phone number field found');
    console.log(`  Page:    ${result.matchedPage}`);
    console.log(`  Rule:    ${result.match.rule} (${result.match.ruleName})`);
    console.log(`  Field:   ${result.match.element}`);
    console.log(`  Matched: ${result.match.matchedOn}`);
  } else {
    console.log('NOT QUALIFIED - no phone number field found');
  }
  console.log(`  Pages checked: ${result.pagesChecked.map((p) => `${p.url}${p.via === 'render' ? ' (rendered)' : ''}${p.ok ? '' : ` [${p.error?.kind}]`}`).join(', ') || 'none'}`);
}

async function checkFile(
  input: string, output: string, urlColumn: string, concurrency: number,
  deps: InspectorDeps, opts: InspectOptions, summaryOut?: string,
) {
  if (!fs.existsSync(input)) throw new InputError(`Input file not found: ${input}`);
  const table = await readCsv(input);
  if (!table.columns.length) throw new InputError(`Input file has no header row: ${input}`);
  console.log(`\nLoaded ${table.rows.length} companies from ${input}`);
  console.log(`Checking websites for phone number fields with ${concurrency} workers...\n`);

  const interrupt = new AbortController();
  const onSigint = () => {
    if (interrupt.signal.aborted) process.exit(130);
    console.log('\nInterrupted: finishing in-flight companies, press Ctrl+C again to quit now');
    interrupt.abort();
  };
  process.on('SIGINT', onSigint);

  const bar = new cliProgress.SingleBar(
    { hideCursor: true, format: '[{bar}] {value}/{total} | {percentage}% | qualified:{qualified} errors:{errors}' },
    cliProgress.Presets.shades_classic,
  );
  let qualified = 0, errors = 0, started = false;

  try {
    const report = await runBatch(table, {
      concurrency,
      urlColumn,
      signal: interrupt.signal,
      inspect: (company) => inspectCompany(company, deps, opts),
      onResult: (result, _done, total) => {
        if (!started) {
          bar.start(total, 0, { qualified, errors });
          started = true;
        }
        if (result.status === 'qualified') qualified++;
        if (result.status === 'error') errors++;
        bar.increment(1, { qualified, errors });
      },
    });
    if (started) {
      bar.stop();
      started = false;
    }

    const written = writeBatchOutputs(report, output, summaryOut);
    const s = report.stats;
    console.log(`\n${'='.repeat(50)}\nRESULTS SUMMARY\n${'='.repeat(50)}`);
    console.log(`  Companies checked:     ${s.inspected}/${s.total}`);
    console.log(`  With phone fields:     ${s.qualified}`);
    console.log(`  Without phone fields:  ${s.notQualified}`);
    console.log(`  Could not check:       ${s.errors}`);
    console.log(`  Skipped rows:          ${s.skipped}`);
    console.log(`  Qualification rate:    ${s.qualificationRate.toFixed(1)}%`);
    console.log(`\nOutput files:\n  Qualified leads: ${written.qualifiedPath}\n  All results:     ${written.allPath}`);
    if (written.skippedPath) console.log(`  Skipped rows:    ${written.skippedPath}`);
    if (written.summaryPath) console.log(`  Summary:         ${written.summaryPath}`);
  } finally {
    if (started) bar.stop();
    process.off('SIGINT', onSigint);
  }
}

if (isMain(import.meta.url)) {
  main().catch((e) => {
    console.error(e instanceof ConfigError || e instanceof InputError ? `${e.name}: ${e.message}` : e);
    process.exit(1);
  });
}
