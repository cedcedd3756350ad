/**
 * AdFeed — Single Cycle
 *
 * Runs one poll cycle against the configured targets and prints the report.
 * Useful for checking filters and selectors without starting the service.
 *
 * Usage:
 *   npm run run-once
 *   npm run run-once -- --verbose      # debug logging
 *   npm run run-once -- --no-jitter    # no pause between targets
 */

import 'dotenv/config';
import { resolve } from 'path';
import { logger, setLogLevel, errorMessage } from '../src/lib/logger';
import { loadEnv } from '../src/lib/env';
import { ConfigManager } from '../src/config';
import { ChangeStore } from '../src/store';
import { HttpPageFetcher, MarketplaceExtractor } from '../src/sources';
import { runCycle } from '../src/scheduler';

interface RunOnceOptions {
  verbose: boolean;
  jitter: boolean;
}

function parseArgs(): RunOnceOptions {
  const args = process.argv.slice(2);
  return {
    verbose: args.includes('--verbose'),
    jitter: !args.includes('--no-jitter'),
  };
}

async function runOnce(): Promise<void> {
  const options = parseArgs();
  if (options.verbose) setLogLevel('debug');

  const env = loadEnv();
  const config = await ConfigManager.load(env.CONFIG_FILE);
  const snapshot = config.getSnapshot();
  const store = new ChangeStore({ databasePath: resolve(snapshot.databaseName) });

  try {
    const report = await runCycle(
      snapshot,
      {
        store,
        fetcher: new HttpPageFetcher({ timeoutMs: env.FETCH_TIMEOUT_MS }),
        extractor: new MarketplaceExtractor(),
      },
      {
        jitter: options.jitter ? undefined : { minMs: 0, maxMs: 0 },
        onArrival: (arrival) => console.log(`  NEW  ${arrival.title} - ${arrival.price}  ${arrival.url}`),
      }
    );

    console.log('\n' + '='.repeat(60));
    console.log(`CYCLE ${report.cycleId} COMPLETE`);
    console.log('='.repeat(60));
    for (const target of report.targets) {
      const outcome = target.error
        ? `failed: ${target.error}`
        : `${target.candidates} candidates, ${target.filtered} filtered, ${target.inserted} new, ${target.updated} seen`;
      console.log(`${target.url}\n  ${outcome}`);
    }
    console.log(`Pruned: ${report.pruned ?? 'n/a'}`);
    console.log(`Duration: ${(report.durationMs / 1000).toFixed(2)}s`);
    console.log('='.repeat(60) + '\n');

    if (report.error || report.targets.some((t) => t.error)) {
      process.exitCode = 1;
    }
  } finally {
    store.close();
  }
}

runOnce().catch((error: unknown) => {
  logger.error('Run failed', { error: errorMessage(error) });
  process.exit(1);
});
