/**
 * AdFeed — Service Entry Point
 *
 * Loads the config document, opens the change store, starts the HTTP
 * server and the poll scheduler, and shuts everything down in order on
 * SIGINT/SIGTERM.
 *
 * Usage:
 *   npm start
 *   CONFIG_FILE=/etc/adfeed/config.json npm start
 */

import 'dotenv/config';
import { resolve } from 'path';
import type { Server } from 'http';
import { logger, attachLogFile, detachLogFile, errorMessage } from '../src/lib/logger';
import { loadEnv } from '../src/lib/env';
import { ConfigManager } from '../src/config';
import { ChangeStore } from '../src/store';
import { FeedSynthesizer, feedLink } from '../src/delivery';
import { HttpPageFetcher, MarketplaceExtractor } from '../src/sources';
import { JobScheduler } from '../src/scheduler';
import { createApp, RateLimiter } from '../src/server';
import type { Arrival } from '../src/types';

const log = logger.child({ component: 'main' });

// ============================================================
// SERVER
// ============================================================

function listen(app: ReturnType<typeof createApp>, host: string, port: number): Promise<Server> {
  return new Promise((resolveServer, reject) => {
    const server = app.listen(port, host, () => resolveServer(server));
    server.once('error', reject);
  });
}

function close(server: Server): Promise<void> {
  return new Promise((resolveClose, reject) => {
    server.close((error) => (error ? reject(error) : resolveClose()));
  });
}

// ============================================================
// MAIN
// ============================================================

async function main(): Promise<void> {
  const env = loadEnv();
  const config = await ConfigManager.load(env.CONFIG_FILE);
  const snapshot = config.getSnapshot();

  // Log destination, database and binding are fixed for the life of the process
  attachLogFile(resolve(snapshot.logFilename));

  const store = new ChangeStore({ databasePath: resolve(snapshot.databaseName) });
  const feed = new FeedSynthesizer({
    store,
    feedLink: feedLink(snapshot.serverIp, snapshot.serverPort),
  });

  const scheduler = new JobScheduler({
    snapshot: () => config.getSnapshot(),
    store,
    fetcher: new HttpPageFetcher({ timeoutMs: env.FETCH_TIMEOUT_MS }),
    extractor: new MarketplaceExtractor(),
  });
  scheduler.on('arrival', (arrival: Arrival) => feed.recordArrival(arrival));
  config.onApply(scheduler.handleConfigChange);

  const rateLimiter = new RateLimiter({ maxRequests: env.RATE_LIMIT_PER_MINUTE });
  const cleanupTimer = setInterval(() => rateLimiter.cleanup(), 60_000);
  cleanupTimer.unref();

  const app = createApp({ config, store, feed, scheduler, rateLimiter });
  const server = await listen(app, snapshot.serverIp, snapshot.serverPort);

  log.info('AdFeed started', {
    feed: feedLink(snapshot.serverIp, snapshot.serverPort),
    config: config.path,
    database: snapshot.databaseName,
    targets: snapshot.targets.length,
    pollIntervalMinutes: snapshot.pollIntervalMinutes,
  });

  scheduler.start();

  let shuttingDown = false;

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info('Shutting down', { signal });

    clearInterval(cleanupTimer);
    await close(server);
    // The store stays open until the running cycle has finished writing
    await scheduler.stop();
    store.close();

    log.info('Shutdown complete');
    await detachLogFile();
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (error: unknown) => {
          log.error('Shutdown failed', { error: errorMessage(error) });
          process.exit(1);
        }
      );
    });
  }
}

main().catch((error: unknown) => {
  log.error('Startup failed', { error: errorMessage(error) });
  process.exit(1);
});
