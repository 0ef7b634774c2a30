#!/usr/bin/env node
import { config } from './config.js';
import { UnavailableError } from './errors.js';
import { FileMarketFeed } from './market/file-market-feed.js';
import { formatLedgerReport, formatStatus } from './report/formatter.js';
import { buildLedgerReport } from './report/summary.js';
import { createRuntime, createStore } from './runtime.js';
import { loadSettingsFile } from './settings/loader.js';

function printUsage(): void {
  console.log(`
Usage:
  tsx src/index.ts status
  tsx src/index.ts report [--prices]
  tsx src/index.ts once [--force]

Commands:
  status    Stage table per instrument (current ledger generation)
  report    Realized PnL by month, win rate, stop-loss count
  once      Run a single trading cycle against the market feed (paper)

Options:
  --prices  Mark open stages to the market feed in the report
  --force   Skip the KRX session-hours check (once)

Paths come from .env (SETTINGS_PATH, DATA_DIR, MARKET_FEED_PATH).
`);
}

function parseArgs(args: string[]): { command: string | undefined; flags: Set<string> } {
  const flags = new Set(args.filter((a) => a.startsWith('--')));
  const command = args.find((a) => !a.startsWith('--'));
  return { command, flags };
}

async function loadPrices(codes: readonly string[]): Promise<Map<string, number>> {
  const feed = new FileMarketFeed({
    path: config.marketFeed.path,
    maxAgeMs: config.marketFeed.maxAgeMinutes * 60_000,
  });
  const prices = new Map<string, number>();
  for (const code of codes) {
    try {
      prices.set(code, await feed.currentPrice(code));
    } catch (err) {
      if (!(err instanceof UnavailableError)) throw err;
      console.error(`  (no price for ${code}: ${err.message})`);
    }
  }
  return prices;
}

async function main(): Promise<void> {
  const { command, flags } = parseArgs(process.argv.slice(2));

  switch (command) {
    case 'status': {
      const settings = loadSettingsFile(config.settingsPath);
      const store = createStore();
      const ledgers = store.load(settings.instruments);
      console.log(`Generation: ${store.currentGeneration() ?? '(none)'}  Backups: ${store.listBackups().length}`);
      console.log(formatStatus(ledgers.values()));
      break;
    }

    case 'report': {
      const settings = loadSettingsFile(config.settingsPath);
      const store = createStore();
      const ledgers = store.load(settings.instruments);
      const prices = flags.has('--prices') ? await loadPrices([...ledgers.keys()]) : new Map<string, number>();
      const report = buildLedgerReport(ledgers.values(), prices);
      console.log(formatLedgerReport(report, store.loadBudget()));
      break;
    }

    case 'once': {
      const runtime = createRuntime({ sessionCheck: !flags.has('--force') });
      try {
        const result = await runtime.cycle.runOnce();
        console.log(JSON.stringify(
          {
            status: result.status,
            skipReason: result.skipReason ?? null,
            mode: result.mode,
            plans: result.plans,
            filled: result.filled,
            rejected: result.rejected,
            timedOut: result.timedOut,
            saved: result.saved,
            generation: result.generation,
          },
          null,
          2,
        ));
        await runtime.notifier.flush();
      } finally {
        runtime.db.close();
      }
      break;
    }

    default:
      if (command) console.error(`Unknown command: ${command}`);
      printUsage();
      process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
