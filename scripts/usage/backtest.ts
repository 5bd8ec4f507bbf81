import 'dotenv/config';
import { readFileSync, writeFileSync } from 'node:fs';

import { loadBacktestConfig, type BacktestConfig } from '@/lib/config/backtest';
import { parsePeakWindow } from '@/lib/tariffs/touWindow';
import { parseTariffCsv, parseTariffJson } from '@/lib/tariffs/parse';
import { runBacktest } from '@/modules/backtest/service';

type Args = {
  readings?: string;
  tariffs?: string;
  reference?: string;
  strictness?: string;
  zone?: string;
  peak?: string;
  out?: string;
};

const ARG_KEYS: ReadonlyArray<keyof Args> = ['readings', 'tariffs', 'reference', 'strictness', 'zone', 'peak', 'out'];

function isArgKey(k: string): k is keyof Args {
  return ARG_KEYS.some((key) => key === k);
}

function parseArgs(argv: string[]): Args {
  const args: Args = {};
  for (let i = 2; i < argv.length; i++) {
    const flag = argv[i];
    if (!flag.startsWith('--')) continue;
    const key = flag.slice(2);
    const value = argv[i + 1];
    if (isArgKey(key)) args[key] = value ?? '';
    i++;
  }
  return args;
}

function usage() {
  console.log(`
Usage:
  npm run backtest -- --readings ./verbruik.csv --tariffs ./tarieven.json|./tarieven.csv \\
    [--reference 0.30] [--strictness fail_fast|best_effort] [--zone Europe/Brussels] \\
    [--peak 0700-2200] [--out ./report.json]

Notes:
  - Flags override BACKTEST_* variables from the environment / .env.
  - Tariff files ending in .csv are read as CSV (same column names as the JSON fields).
  - Exits 1 on parsing errors or when a fail_fast run stops on a reading.
`);
}

function applyArgs(config: BacktestConfig, args: Args): BacktestConfig {
  const next = { ...config };
  if (args.reference) next.referencePriceEurPerKwh = args.reference.replace(',', '.');
  if (args.zone) next.zone = args.zone;
  if (args.strictness === 'fail_fast' || args.strictness === 'best_effort') next.strictness = args.strictness;
  else if (args.strictness) throw new Error(`--strictness must be fail_fast or best_effort, got "${args.strictness}"`);
  if (args.peak) {
    const w = parsePeakWindow(args.peak);
    if (!w) throw new Error(`--peak must be HHMM-HHMM, got "${args.peak}"`);
    next.peakWindow = w;
  }
  return next;
}

function readTariffs(path: string) {
  const text = readFileSync(path, 'utf8');
  return path.toLowerCase().endsWith('.csv') ? parseTariffCsv(text) : parseTariffJson(text);
}

function main() {
  const args = parseArgs(process.argv);
  if (!args.readings || !args.tariffs) {
    usage();
    process.exit(1);
  }

  const config = applyArgs(loadBacktestConfig(), args);
  const outcome = runBacktest({
    readingsCsv: readFileSync(args.readings, 'utf8'),
    tariffRules: readTariffs(args.tariffs),
    config,
  });

  if (outcome.status === 'PARSE_ERROR') {
    console.error(`[backtest] ${outcome.errors.length} parsing error(s) in ${args.readings}`);
    for (const e of outcome.errors.slice(0, 20)) console.error(`  row ${e.row ?? '-'} ${e.code}: ${e.message}`);
    process.exit(1);
  }
  if (outcome.status === 'ERROR') {
    console.error(`[backtest] ${outcome.error.code}: ${outcome.error.message}`);
    process.exit(1);
  }

  if (outcome.quality.issues.length > 0) {
    console.warn(`[backtest] ${outcome.quality.issues.length} data-quality issue(s); first: ${outcome.quality.issues[0]?.message}`);
  }

  const json = JSON.stringify(
    { ...outcome.presented, quality: outcome.quality, lines: outcome.lines ?? undefined },
    null,
    2,
  );
  if (args.out) {
    writeFileSync(args.out, json + '\n');
    console.log(`[backtest] wrote ${args.out}`);
  } else {
    console.log(json);
  }
}

try {
  main();
} catch (err) {
  console.error('[backtest] failed:', err instanceof Error ? err.message : err);
  process.exit(1);
}
